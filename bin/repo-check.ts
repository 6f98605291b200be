#!/usr/bin/env node

import { program } from "../src/cli/index.js";

await program.parseAsync();
