/**
 * InkSurface: collects finished output for Ink's `<Static>` region.
 *
 * Lines printed here are rendered once above the live prompt and then left
 * in the terminal's scrollback.
 */

import type { TerminalSize, TerminalSurface } from "@replkit/core";

export interface OutputLine {
  id: number;
  text: string;
}

type Listener = (lines: readonly OutputLine[]) => void;

export class InkSurface implements TerminalSurface {
  private readonly output: OutputLine[] = [];
  private readonly listeners = new Set<Listener>();
  private nextId = 0;
  private size: TerminalSize;

  constructor(size: TerminalSize = { columns: process.stdout.columns ?? 80, rows: process.stdout.rows ?? 24 }) {
    this.size = size;
  }

  get columns(): number {
    return this.size.columns;
  }

  get rows(): number {
    return this.size.rows;
  }

  get lines(): readonly OutputLine[] {
    return this.output;
  }

  println(text: string): void {
    this.output.push({ id: this.nextId++, text });
    this.emit();
  }

  /** Ink cannot resize the terminal; the new size is only recorded. */
  resize(size: TerminalSize): void {
    this.size = { ...size };
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const snapshot = [...this.output];
    for (const listener of this.listeners) listener(snapshot);
  }
}
