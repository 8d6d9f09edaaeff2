/**
 * Prompt line theme and formatting.
 *
 * Uses chalk for ANSI color output. All colors are defined here so the
 * palette can be adjusted in one place.
 */

import chalk, { type ChalkInstance } from "chalk";
import { segmentInput, type ReplView, type SegmentRole } from "@replkit/core";

export interface Theme {
  prompt: (text: string) => string;
  separator: (text: string) => string;
  /** Separator while the input is invalid or a quote is open. */
  separatorError: (text: string) => string;
  command: (text: string) => string;
  flag: (text: string) => string;
  quoted: (text: string) => string;
  ghost: (text: string) => string;
}

export function createTheme(c: ChalkInstance = chalk): Theme {
  return {
    prompt: c.bold,
    separator: c.bold,
    separatorError: c.red.bold,
    command: c.yellow,
    flag: c.gray,
    quoted: c.blue,
    ghost: c.dim,
  };
}

export const theme = createTheme();

function styleFor(role: SegmentRole, t: Theme): ((text: string) => string) | undefined {
  switch (role) {
    case "command":
      return t.command;
    case "flag":
      return t.flag;
    case "quoted":
      return t.quoted;
    case "text":
    case "space":
      return undefined;
  }
}

/** Colour the input by segment. Returns whether a quote is left open. */
export function styleInput(input: string, t: Theme = theme): { text: string; mismatchedQuotes: boolean } {
  const { segments, mismatchedQuotes } = segmentInput(input);
  const text = segments
    .map((segment) => {
      const style = styleFor(segment.role, t);
      return style ? style(segment.text) : segment.text;
    })
    .join("");
  return { text, mismatchedQuotes };
}

/**
 * The prompt line for a view, as `prompt + separator + " " + input`, plus
 * ghost text when the view carries it.
 */
export function formatPromptLine(view: ReplView, t: Theme = theme): string {
  if (!view.styleEnabled) {
    return `${view.prompt}${view.promptSeparator} ${view.input}`;
  }

  const { text, mismatchedQuotes } = styleInput(view.input, t);
  const separator = view.err || mismatchedQuotes ? t.separatorError : t.separator;
  const ghost = view.ghostText ? t.ghost(view.ghostText) : "";
  return `${t.prompt(view.prompt)}${separator(view.promptSeparator)} ${text}${ghost}`;
}
