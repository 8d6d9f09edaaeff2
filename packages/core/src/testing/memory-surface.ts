import { DEFAULT_SIZE, type TerminalSize, type TerminalSurface } from "../surface.js";

/**
 * Surface that records every printed line. Used by tests in place of a
 * terminal.
 */
export class MemorySurface implements TerminalSurface {
  readonly lines: string[] = [];
  readonly resizes: TerminalSize[] = [];
  readonly columns: number;
  readonly rows: number;

  constructor(size: TerminalSize = DEFAULT_SIZE) {
    this.columns = size.columns;
    this.rows = size.rows;
  }

  println(text: string): void {
    this.lines.push(text);
  }

  resize(size: TerminalSize): void {
    this.resizes.push(size);
  }

  get output(): string {
    return this.lines.join("\n");
  }

  clear(): void {
    this.lines.length = 0;
  }
}
