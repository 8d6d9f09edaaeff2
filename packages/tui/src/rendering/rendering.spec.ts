import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import type { ReplView } from "@replkit/core";
import { createTheme, formatPromptLine, styleInput, type Theme } from "./theme.js";

// Wraps each role in a readable tag instead of escape codes
const tag =
  (name: string) =>
  (text: string): string =>
    `<${name}>${text}</${name}>`;

const tags: Theme = {
  prompt: tag("p"),
  separator: tag("s"),
  separatorError: tag("err"),
  command: tag("cmd"),
  flag: tag("flag"),
  quoted: tag("q"),
  ghost: tag("ghost"),
};

function view(overrides: Partial<ReplView> = {}): ReplView {
  return {
    prompt: ">",
    promptSeparator: ">",
    input: "",
    err: false,
    styleEnabled: true,
    completionEnabled: true,
    cursorRow: 0,
    cursorColumn: 3,
    ...overrides,
  };
}

// ============================================================================
// styleInput
// ============================================================================

describe("styleInput", () => {
  it("colours the command, flags and quoted spans", () => {
    expect(styleInput('echo -c "a b" x', tags)).toEqual({
      text: '<cmd>echo</cmd> <flag>-c</flag> <q>"a b"</q> x',
      mismatchedQuotes: false,
    });
  });

  it("reports an open quote", () => {
    expect(styleInput("echo 'hi", tags).mismatchedQuotes).toBe(true);
  });

  it("uses ANSI colours from the default palette", () => {
    const ansi = createTheme(new Chalk({ level: 1 }));
    expect(styleInput("roll", ansi).text).toBe("\u001B[33mroll\u001B[39m");
  });
});

// ============================================================================
// formatPromptLine
// ============================================================================

describe("formatPromptLine", () => {
  it("joins prompt, separator and input with one space", () => {
    expect(formatPromptLine(view({ input: "roll --sides 6" }), tags)).toBe(
      "<p>></p><s>></s> <cmd>roll</cmd> <flag>--sides</flag> 6",
    );
  });

  it("marks the separator when the input is invalid", () => {
    expect(formatPromptLine(view({ input: "foo", err: true }), tags)).toBe("<p>></p><err>></err> <cmd>foo</cmd>");
  });

  it("marks the separator while a quote is open", () => {
    expect(formatPromptLine(view({ input: 'echo "a' }), tags)).toBe(
      '<p>></p><err>></err> <cmd>echo</cmd> <q>"a</q>',
    );
  });

  it("appends ghost text", () => {
    expect(formatPromptLine(view({ input: "ro", ghostText: "ll" }), tags)).toBe(
      "<p>></p><s>></s> <cmd>ro</cmd><ghost>ll</ghost>",
    );
  });

  it("prints plain text when styling is off", () => {
    expect(formatPromptLine(view({ input: "roll", styleEnabled: false, prompt: "dice" }), tags)).toBe(
      "dice> roll",
    );
  });
});
