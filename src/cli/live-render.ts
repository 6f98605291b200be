import { renderLines, type RenderOptions, type Slot } from "./render.js";
import type { CandidatePath } from "../core/types.js";

export interface TextSink {
  write(chunk: string): unknown;
}

const ESC = "\x1b[";
const CLEAR_LINE = `${ESC}2K`;

function cursorUp(lines: number): string {
  return `${ESC}${lines}A`;
}

/**
 * Redraws the status block in place as results arrive. Each frame is a
 * single write: move up over the previous frame, then clear and reprint
 * every line.
 */
export class LiveRenderer {
  private drawnLines = 0;

  constructor(
    private readonly out: TextSink,
    private readonly candidates: readonly CandidatePath[],
    private readonly options: RenderOptions,
  ) {}

  get linesOnScreen(): number {
    return this.drawnLines;
  }

  draw(slots: readonly Slot[]): void {
    const lines = renderLines(this.candidates, slots, this.options);
    let frame = this.drawnLines > 0 ? cursorUp(this.drawnLines) : "";
    for (const line of lines) {
      frame += `${CLEAR_LINE}${line}\n`;
    }
    this.out.write(frame);
    this.drawnLines = lines.length;
  }
}
