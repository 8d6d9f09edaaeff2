/**
 * Completion state: which parts of the live input have already been
 * resolved against the registry.
 *
 * Slices are offsets into the start-trimmed input. They are dropped again
 * when the user backspaces to the end of the token they describe.
 */

// ── Slices ──────────────────────────────────────────────────────────────────

export interface Slice {
  start: number;
  len: number;
  /** Registry node id the text resolved to. */
  id: number;
}

/** Same span of text; the resolved id is not compared. */
export function sameSpan(a: Slice, b: Slice): boolean {
  return a.start === b.start && a.len === b.len;
}

export function sameSlice(a: Slice, b: Slice): boolean {
  return sameSpan(a, b) && a.id === b.id;
}

export function sliceEnd(slice: Slice): number {
  return slice.start + slice.len;
}

export function sliceText(line: string, slice: Slice): string {
  return line.slice(slice.start, slice.start + slice.len);
}

// ── Text helpers ────────────────────────────────────────────────────────────

const WHITESPACE = /\s/;

export function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && WHITESPACE.test(char);
}

export function endsWithWhitespace(text: string): boolean {
  return isWhitespace(text[text.length - 1]);
}

export function lastWhitespaceIndex(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (isWhitespace(text[i])) return i;
  }
  return -1;
}

export function firstWhitespaceIndex(text: string): number {
  for (let i = 0; i < text.length; i++) {
    if (isWhitespace(text[i])) return i;
  }
  return -1;
}

/** Text after the last whitespace character, or all of it. */
export function lastToken(text: string): string {
  return text.slice(lastWhitespaceIndex(text) + 1);
}

export function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function isQuote(char: string | undefined): char is "'" | '"' {
  return char === "'" || char === '"';
}

// ── State ───────────────────────────────────────────────────────────────────

export interface OpenQuote {
  index: number;
  quote: "'" | '"';
}

export interface LineEnding {
  /** The token being typed, including a quoted span when one is open or just closed. */
  token: string;
  openQuote?: OpenQuote;
}

export class CompletionState {
  command?: Slice;
  argument?: Slice;
  value?: Slice;
  /** End offsets of required user inputs seen after the command, innermost last. */
  requiredInputs: number[] = [];
  ending: LineEnding = { token: "" };

  /**
   * Drop slices and required-input marks the cursor has backspaced into.
   * Returns true when anything changed.
   */
  checkState(line: string): boolean {
    let modified = false;

    const required = this.requiredInputs[this.requiredInputs.length - 1];
    if (required !== undefined && line.trimEnd().length === required) {
      this.requiredInputs.pop();
      modified = true;
    }

    if (this.command && line.length === sliceEnd(this.command)) {
      this.command = undefined;
      this.argument = undefined;
      this.value = undefined;
      return true;
    }
    if (this.argument && line.length === sliceEnd(this.argument)) {
      this.argument = undefined;
      this.value = undefined;
      return true;
    }
    if (this.value && line.length === sliceEnd(this.value)) {
      this.value = undefined;
      return true;
    }
    return modified;
  }

  /** Recompute the trailing token, tracking quotes that are still open. */
  updateToken(line: string): void {
    const token = lastToken(line);
    const open = this.ending.openQuote;

    if (open) {
      const right = line.lastIndexOf(open.quote);
      if (right === -1) {
        this.ending = { token };
      } else if (open.index < right) {
        this.ending = { token: line.slice(open.index, right + 1) };
      } else {
        const rest = line.slice(open.index);
        this.ending = rest.startsWith(open.quote) ? { token: rest, openQuote: open } : { token: rest };
      }
      return;
    }

    const leading = this.ending.token[0];
    const startingQuote = isQuote(leading) ? leading : undefined;

    let right = -1;
    let quote: "'" | '"' | undefined;
    for (let i = line.length - 1; i >= 0; i--) {
      const char = line[i];
      if (startingQuote ? char === startingQuote : isQuote(char)) {
        right = i;
        quote = startingQuote ?? (char === "'" ? "'" : '"');
        break;
      }
    }

    if (right === -1 || quote === undefined) {
      this.ending = { token };
      return;
    }

    let count = 0;
    for (const char of line) if (char === quote) count++;

    if (count % 2 === 1) {
      this.ending = { token: line.slice(right), openQuote: { index: right, quote } };
    } else if (token.endsWith(quote)) {
      const left = line.slice(0, right).lastIndexOf(quote);
      this.ending = { token: line.slice(Math.max(left, 0), right + 1) };
    } else {
      this.ending = { token };
    }
  }
}
