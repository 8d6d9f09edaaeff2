/**
 * REPL options: validated with zod before a `Repl` is built.
 */

import { z } from "zod";
import { ConfigError, isParseError } from "@replkit/shared";
import { Completion } from "./completion/resolver.js";
import type { CommandScheme } from "./completion/grammar.js";
import type { Registry } from "./completion/registry.js";
import { Repl } from "./repl.js";
import type { TerminalSurface } from "./surface.js";
import { tokenize } from "./tokenize.js";

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

const CompletionSourceSchema = z.custom<CommandScheme | Registry | Completion>(
  (value) =>
    value instanceof Completion ||
    (isObject(value) && ("commands" in value || "nodes" in value)),
  { message: "Expected a command scheme, a compiled registry or a Completion" },
);

const SurfaceSchema = z.custom<TerminalSurface>(
  (value) =>
    isObject(value) &&
    "println" in value &&
    typeof value.println === "function" &&
    "columns" in value &&
    typeof value.columns === "number",
  { message: "Expected a terminal surface" },
);

export const TerminalSizeSchema = z.object({
  columns: z.number().int().positive(),
  rows: z.number().int().positive(),
});

export const HistoryEntrySchema = z.union([
  z.string(),
  z.object({ value: z.string(), tag: z.number().int().optional() }),
]);

export const ReplOptionsSchema = z
  .object({
    prompt: z.string().optional(),
    promptSeparator: z.string().optional(),
    style: z.boolean().default(true),
    completion: CompletionSourceSchema.optional(),
    /** Oldest first. */
    history: z.array(HistoryEntrySchema).default([]),
    /** A line, tokenized like submitted input, or tokens as they are. */
    quitCommand: z.union([z.string().min(1), z.array(z.string()).nonempty()]).optional(),
    size: TerminalSizeSchema.optional(),
    surface: SurfaceSchema.optional(),
  })
  .strict();

export type ReplOptions = z.input<typeof ReplOptionsSchema>;

function quitTokens(quitCommand: string | string[] | undefined): string[] | undefined {
  if (quitCommand === undefined || Array.isArray(quitCommand)) return quitCommand;
  try {
    return tokenize(quitCommand);
  } catch (error) {
    if (isParseError(error)) {
      throw new ConfigError(`Invalid quit command: ${error.message}`, [
        { path: "quitCommand", message: error.message },
      ]);
    }
    throw error;
  }
}

/**
 * Validate `options` and build a REPL. Throws `ConfigError` for invalid
 * options and `GrammarError` for a malformed grammar.
 */
export function createRepl<Ctx = void>(options: ReplOptions = {}): Repl<Ctx> {
  const parsed = ReplOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid REPL options",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }

  const { quitCommand, ...config } = parsed.data;
  return new Repl<Ctx>({ ...config, quitCommand: quitTokens(quitCommand) });
}
