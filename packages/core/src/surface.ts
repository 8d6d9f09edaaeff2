/**
 * TerminalSurface: where the REPL writes finished output.
 *
 * The live prompt line is not written here; hosts draw it from `ReplView`.
 * Everything that should scroll away above the prompt (submitted lines,
 * command output, background messages) goes through `println`.
 */

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface TerminalSurface {
  /** Size at startup. Later changes arrive as resize events. */
  readonly columns: number;
  readonly rows: number;
  println(text: string): void;
  /** Ask the host to resize the terminal, where it can. */
  resize?(size: TerminalSize): void;
}

export const DEFAULT_SIZE: TerminalSize = { columns: 80, rows: 24 };

/** Surface for headless use: output is dropped. */
export class NullSurface implements TerminalSurface {
  readonly columns: number;
  readonly rows: number;

  constructor(size: TerminalSize = DEFAULT_SIZE) {
    this.columns = size.columns;
    this.rows = size.rows;
  }

  println(_text: string): void {}
}

/** Split multi-line text into the lines `println` expects, dropping one trailing newline. */
export function splitLines(text: string): string[] {
  const normalized = text.replace(/\r\n/g, "\n");
  const body = normalized.endsWith("\n") ? normalized.slice(0, -1) : normalized;
  return body.split("\n");
}
