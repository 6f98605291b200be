import { Command } from "@commander-js/extra-typings";
import { executeScan } from "./commands/scan.js";
import { DEFAULT_TIMEOUT } from "../core/config.js";

export const program = new Command()
  .name("repo-check")
  .description("Check immediate subfolders for Git status (branch + clean/dirty)")
  .version("0.1.0")
  .option("-p, --path <dir...>", "Directory to scan; repeat to scan several (default: current directory)")
  .option("--include-hidden", "Include hidden subfolders starting with a dot")
  .option("--ignore <name...>", "Subfolder names to skip")
  .option("--no-color", "Disable ANSI colors and live redraw")
  .option("-w, --max-workers <n>", "Maximum parallel Git checks (default: available CPUs)")
  .option("-t, --timeout <duration>", `Timeout per Git check, e.g. 500ms, 10s (default: ${DEFAULT_TIMEOUT})`)
  .option("--ignore-untracked", "Do not count untracked files as uncommitted changes")
  .option("-v, --verbose", "Log debug details to stderr")
  .option("--log-file <file>", "Append JSON log lines to a file")
  .action(async (options) => {
    process.exitCode = await executeScan(options);
  });
