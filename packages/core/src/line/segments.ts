/**
 * Input segmentation for display styling.
 *
 * Splits the live input into runs a front end can colour: the command word,
 * flags, quoted spans, other text and the whitespace between them. No escape
 * codes are produced here.
 */

import { quotesBalanced } from "../tokenize.js";
import { isWhitespace } from "../completion/state.js";

export type SegmentRole = "command" | "flag" | "quoted" | "text" | "space";

export interface Segment {
  text: string;
  role: SegmentRole;
}

export interface SegmentedInput {
  segments: Segment[];
  /** A quote is still open at the end of the input. */
  mismatchedQuotes: boolean;
}

function isFlagStart(input: string, index: number): boolean {
  if (input[index] !== "-") return false;
  const next = input[index + 1];
  return next === undefined || isWhitespace(next) || next === "-" || /\p{Alphabetic}/u.test(next);
}

/** Index just past the quote closing the one at `open`, or the input length. */
function quotedEnd(input: string, open: number): number {
  const quote = input[open];
  for (let i = open + 1; i < input.length; i++) {
    const char = input[i];
    if (char === "\\" && quote === '"') i++;
    else if (char === quote) return i + 1;
  }
  return input.length;
}

export function segmentInput(input: string): SegmentedInput {
  const segments: Segment[] = [];

  const push = (text: string, role: SegmentRole) => {
    if (text === "") return;
    const last = segments[segments.length - 1];
    if (last && last.role === role) last.text += text;
    else segments.push({ text, role });
  };

  let i = 0;
  let first = true;

  while (i < input.length) {
    if (isWhitespace(input[i])) {
      const start = i;
      while (i < input.length && isWhitespace(input[i])) i++;
      push(input.slice(start, i), "space");
      continue;
    }

    let role: SegmentRole = first ? "command" : isFlagStart(input, i) ? "flag" : "text";
    first = false;

    while (i < input.length && !isWhitespace(input[i])) {
      const char = input[i];
      if (char === "'" || char === '"') {
        const end = quotedEnd(input, i);
        push(input.slice(i, end), "quoted");
        i = end;
        role = "text";
        continue;
      }

      const start = i;
      while (i < input.length) {
        const c = input[i];
        if (isWhitespace(c) || c === "'" || c === '"') break;
        i += c === "\\" ? 2 : 1;
      }
      push(input.slice(start, Math.min(i, input.length)), role);
    }
  }

  return { segments, mismatchedQuotes: !quotesBalanced(input) };
}
