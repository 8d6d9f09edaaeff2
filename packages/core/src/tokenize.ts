/**
 * Shell-style splitting of submitted lines.
 *
 * Quoting and escaping follow POSIX shell rules via shell-quote. Variables
 * are kept literally, and shell operators come back as their own tokens.
 */

import { parse, quote, type ParseEntry } from "shell-quote";
import { ParseError } from "@replkit/shared";

/**
 * True when every quote opened in `input` is closed again.
 */
export function quotesBalanced(input: string): boolean {
  let open: "'" | '"' | undefined;
  for (let i = 0; i < input.length; i++) {
    const char = input[i];
    if (open === "'") {
      if (char === "'") open = undefined;
    } else if (char === "\\") {
      i++;
    } else if (open === '"') {
      if (char === '"') open = undefined;
    } else if (char === "'" || char === '"') {
      open = char;
    }
  }
  return open === undefined;
}

function entryTokens(entry: ParseEntry): string[] {
  if (typeof entry === "string") return [entry];
  if ("comment" in entry) return `#${entry.comment}`.split(/\s+/).filter(Boolean);
  if (entry.op === "glob") return [entry.pattern];
  return [entry.op];
}

/**
 * Split `input` into tokens. Throws `ParseError` on unbalanced quotes.
 */
export function tokenize(input: string): string[] {
  if (!quotesBalanced(input)) throw ParseError.mismatchedQuotes(input);
  return parse(input, (key) => `$${key}`).flatMap(entryTokens);
}

/** Result form of `tokenize` for callers that route errors as values. */
export function tryTokenize(input: string): { ok: true; tokens: string[] } | { ok: false; error: ParseError } {
  try {
    return { ok: true, tokens: tokenize(input) };
  } catch (error) {
    if (error instanceof ParseError) return { ok: false, error };
    throw error;
  }
}

/** Join tokens back into a line that tokenizes to the same tokens. */
export function joinTokens(tokens: readonly string[]): string {
  return quote([...tokens]);
}
