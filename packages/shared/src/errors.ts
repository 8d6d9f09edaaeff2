/**
 * Error types raised across replkit packages.
 *
 * Every error carries a `code` discriminator so callers can branch without
 * `instanceof` checks across package boundaries (see the `is*Error` guards).
 */

// ── Parse errors ────────────────────────────────────────────────────────────

export type ParseErrorCode = "MISMATCHED_QUOTES";

/**
 * Raised when a submitted line cannot be split into tokens.
 */
export class ParseError extends Error {
  readonly name = "ParseError";

  constructor(
    readonly code: ParseErrorCode,
    message: string,
    readonly input?: string,
  ) {
    super(message);
  }

  static mismatchedQuotes(input?: string): ParseError {
    return new ParseError("MISMATCHED_QUOTES", "Mismatched quotes", input);
  }
}

// ── Grammar errors ──────────────────────────────────────────────────────────

export type GrammarErrorCode =
  | "DUPLICATE_KEY"
  | "INNER_LENGTH_MISMATCH"
  | "INVALID_SHORT"
  | "MISPLACED_SHORT"
  | "MISPLACED_INNER"
  | "MISSING_VALUES"
  | "INVALID_RANGE"
  | "INVALID_ALIAS";

/**
 * Raised when a completion grammar cannot be compiled. Grammars are static
 * program data, so these surface at startup.
 */
export class GrammarError extends Error {
  readonly name = "GrammarError";

  constructor(
    readonly code: GrammarErrorCode,
    message: string,
    readonly key?: string,
  ) {
    super(message);
  }

  static duplicate(key: string): GrammarError {
    return new GrammarError(
      "DUPLICATE_KEY",
      `Key "${key}" is already mapped to a different node`,
      key,
    );
  }

  static innerLength(expected: number, actual: number, context: string): GrammarError {
    return new GrammarError(
      "INNER_LENGTH_MISMATCH",
      `${context}: expected ${expected} inner schemes (one per recommendation), got ${actual}`,
    );
  }

  static invalidShort(short: string): GrammarError {
    return new GrammarError(
      "INVALID_SHORT",
      `Short "${short}" must be a single character other than "h"`,
      short,
    );
  }

  static misplacedShort(context: string): GrammarError {
    return new GrammarError("MISPLACED_SHORT", `${context}: only argument nodes may declare shorts`);
  }

  static misplacedInner(context: string): GrammarError {
    return new GrammarError(
      "MISPLACED_INNER",
      `${context}: only argument nodes may declare inner schemes`,
    );
  }

  static missingValues(context: string): GrammarError {
    return new GrammarError("MISSING_VALUES", `${context}: value nodes must list their values`);
  }

  static invalidAlias(context: string, index: number): GrammarError {
    return new GrammarError("INVALID_ALIAS", `${context}: alias index ${index} is out of bounds`);
  }

  static invalidRange(context: string): GrammarError {
    return new GrammarError(
      "INVALID_RANGE",
      `${context}: value ranges must start above zero and end after they start`,
    );
  }
}

// ── Callback errors ─────────────────────────────────────────────────────────

/**
 * Identity of an input hook: a process-unique numeric id plus an optional
 * tag shared by related hooks.
 */
export interface HookIdentity {
  readonly id: number;
  readonly tag?: string;
}

/**
 * Raised by an asynchronous hook callback. Carries the id of the hook that
 * spawned the callback so the failure can be attributed back to it.
 */
export class CallbackError extends Error {
  readonly name = "CallbackError";
  readonly code = "CALLBACK_FAILED";

  constructor(
    readonly hookId: HookIdentity,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  /** Wrap an arbitrary thrown value, keeping it as `cause`. */
  static from(hookId: HookIdentity, error: unknown): CallbackError {
    if (error instanceof CallbackError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new CallbackError(hookId, message, { cause: error });
  }
}

// ── Config errors ───────────────────────────────────────────────────────────

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when REPL options fail validation.
 */
export class ConfigError extends Error {
  readonly name = "ConfigError";
  readonly code = "INVALID_CONFIG";

  constructor(
    message: string,
    readonly issues: ConfigIssue[] = [],
  ) {
    super(message);
  }
}

// ── Type guards ─────────────────────────────────────────────────────────────

function hasName(value: unknown, name: string): boolean {
  return value instanceof Error && value.name === name;
}

export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError || hasName(value, "ParseError");
}

export function isGrammarError(value: unknown): value is GrammarError {
  return value instanceof GrammarError || hasName(value, "GrammarError");
}

export function isCallbackError(value: unknown): value is CallbackError {
  return value instanceof CallbackError || hasName(value, "CallbackError");
}

export function isConfigError(value: unknown): value is ConfigError {
  return value instanceof ConfigError || hasName(value, "ConfigError");
}
