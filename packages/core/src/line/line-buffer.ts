/**
 * LineBuffer: the text being edited plus prompt bookkeeping.
 *
 * Editing only happens at the end of the buffer. Lengths are counted in code
 * points so wrap arithmetic matches what the terminal draws for plain text.
 */

import stripAnsi from "strip-ansi";

export const DEFAULT_PROMPT = ">";
export const DEFAULT_SEPARATOR = ">";

export function displayLength(text: string): number {
  return Array.from(stripAnsi(text)).length;
}

/** Prompt, separator and the single space joining them to the input. */
export function promptLength(prompt: string, separator: string): number {
  return displayLength(prompt) + displayLength(separator) + 1;
}

export interface LineBufferOptions {
  prompt?: string;
  promptSeparator?: string;
  styleEnabled?: boolean;
  completionEnabled?: boolean;
}

export class LineBuffer {
  private text = "";
  private codePoints = 0;
  private promptText: string;
  private separatorText: string;
  private promptLen: number;

  /** Set when the completion resolver flags the input as invalid. */
  err = false;
  completionEnabled: boolean;
  styleEnabled: boolean;

  constructor(options: LineBufferOptions = {}) {
    this.promptText = options.prompt?.trim() ?? DEFAULT_PROMPT;
    this.separatorText = options.promptSeparator?.trim() ?? DEFAULT_SEPARATOR;
    this.promptLen = promptLength(this.promptText, this.separatorText);
    this.styleEnabled = options.styleEnabled ?? true;
    this.completionEnabled = options.completionEnabled ?? true;
  }

  get input(): string {
    return this.text;
  }

  /** Input length in code points. */
  get length(): number {
    return this.codePoints;
  }

  get prompt(): string {
    return this.promptText;
  }

  get promptSeparator(): string {
    return this.separatorText;
  }

  get promptLength(): number {
    return this.promptLen;
  }

  setPrompt(prompt: string, separator?: string): void {
    this.promptText = prompt.trim();
    if (separator !== undefined) this.separatorText = separator.trim();
    this.promptLen = promptLength(this.promptText, this.separatorText);
  }

  setPromptSeparator(separator: string): void {
    this.setPrompt(this.promptText, separator);
  }

  // ── Editing ─────────────────────────────────────────────────────────────

  insertChar(char: string): void {
    this.text += char;
    this.codePoints += Array.from(char).length;
  }

  /** Removes the last code point. Returns it, or `undefined` when empty. */
  removeChar(): string | undefined {
    if (this.codePoints === 0) return undefined;
    const chars = Array.from(this.text);
    const removed = chars.pop();
    this.text = chars.join("");
    this.codePoints = chars.length;
    return removed;
  }

  append(text: string): void {
    this.text += text;
    this.codePoints += Array.from(text).length;
  }

  /** Swaps in new text and returns what was there. */
  replace(text: string): string {
    const previous = this.text;
    this.text = text;
    this.codePoints = Array.from(text).length;
    return previous;
  }

  /** Empties the buffer, clears the error flag and returns the old text. */
  clear(): string {
    this.err = false;
    return this.replace("");
  }

  // ── Wrap arithmetic ─────────────────────────────────────────────────────

  /** Prompt plus input, in terminal cells. */
  get displayWidth(): number {
    return this.promptLen + this.codePoints;
  }

  /** Number of extra rows the line occupies after wrapping. */
  wrappedHeight(columns: number, width = this.displayWidth): number {
    return columns > 0 ? Math.floor(width / columns) : 0;
  }

  /** Column the cursor lands on after the last character. */
  cursorColumn(columns: number, width = this.displayWidth): number {
    return columns > 0 ? width % columns : width;
  }
}
