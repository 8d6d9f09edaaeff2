/**
 * Completion grammar: the declarative tree a REPL's commands are described
 * with.
 *
 * The top-level `commands` node lists command names followed by their
 * aliases. `inner` holds one scheme per non-alias command, in the same order.
 * Argument nodes repeat that shape one level down: their `recs` are argument
 * names and their `inner` describes what each argument accepts.
 *
 * @example
 * ```typescript
 * const grammar = commandScheme(commands(["echo", "quit", "exit"], { alias: [[1, 2]] }), [
 *   argument({ parent: "root", recs: ["reverse"], short: [[0, "r"]], required: 1 }, [
 *     flag({ entry: "echo" }),
 *   ]),
 *   endNode("root"),
 * ]);
 * ```
 */

// ── Types ───────────────────────────────────────────────────────────────────

/** Where a node may appear: top level, anywhere, or under one named command. */
export type Parent = "root" | "universal" | { entry: string };

/** Half-open count range, `start <= n < end`. */
export interface CountRange {
  start: number;
  end: number;
}

export type Validator = (input: string) => boolean;

export type RecKind =
  | { type: "command" }
  /** `required` user-defined inputs must follow the command before arguments. */
  | { type: "argument"; required: number }
  | { type: "flag" }
  | { type: "value"; range: CountRange }
  | { type: "userDefined"; range: CountRange; validate?: Validator }
  | { type: "help" }
  | { type: "null" };

export type RecKindType = RecKind["type"];

export interface RecData {
  parent?: Parent;
  /** `[recIndex, aliasIndex]` pairs into `recs`; aliases follow every primary name. */
  alias?: ReadonlyArray<readonly [number, number]>;
  /** `[recIndex, char]` pairs for `-x` style shorts. */
  short?: ReadonlyArray<readonly [number, string]>;
  recs?: readonly string[];
  kind: RecKind;
  /** Leaf node: nothing is expected after it. */
  end: boolean;
  /** Whether `help` / `--help` is offered and accepted here. */
  hasHelp: boolean;
}

export interface InnerScheme {
  data: RecData;
  inner?: readonly InnerScheme[];
}

export interface CommandScheme {
  commands: RecData;
  inner: readonly InnerScheme[];
}

// ── Reserved nodes ──────────────────────────────────────────────────────────

export const HELP_NODE: RecData = {
  parent: "universal",
  kind: { type: "help" },
  end: true,
  hasHelp: false,
};

export const EMPTY_NODE: RecData = {
  kind: { type: "null" },
  end: true,
  hasHelp: false,
};

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Number of primary (non-alias) recommendations. */
export function uniqueRecEnd(data: RecData): number {
  const len = data.recs?.length ?? 0;
  return len - (data.alias?.length ?? 0);
}

/** Range for "at least one, at most `max`" inputs. */
export function countRange(max: number): CountRange {
  return { start: 1, end: max + 1 };
}

export function inRange(range: CountRange, n: number): boolean {
  return n >= range.start && n < range.end;
}

export function isRangeKind(
  kind: RecKind,
): kind is Extract<RecKind, { type: "value" | "userDefined" }> {
  return kind.type === "value" || kind.type === "userDefined";
}

// ── Builders ────────────────────────────────────────────────────────────────

export function recData(kind: RecKind, options: Partial<Omit<RecData, "kind">> = {}): RecData {
  return { end: false, hasHelp: true, ...options, kind };
}

export function commandScheme(commandsNode: RecData, inner: readonly InnerScheme[]): CommandScheme {
  return { commands: commandsNode, inner };
}

export function commands(
  recs: readonly string[],
  options: { alias?: ReadonlyArray<readonly [number, number]> } = {},
): RecData {
  return recData({ type: "command" }, { recs, alias: options.alias });
}

interface NodeOptions {
  end?: boolean;
  hasHelp?: boolean;
}

export interface ArgumentOptions extends NodeOptions {
  parent: Parent;
  recs: readonly string[];
  alias?: ReadonlyArray<readonly [number, number]>;
  short?: ReadonlyArray<readonly [number, string]>;
  /** User-defined inputs that must follow the command. */
  required?: number;
}

export function argument(options: ArgumentOptions, inner: readonly InnerScheme[]): InnerScheme {
  const { required = 0, end = false, hasHelp = true, ...rest } = options;
  return { data: recData({ type: "argument", required }, { ...rest, end, hasHelp }), inner };
}

export interface ValueOptions extends NodeOptions {
  /** Most values accepted in a row. */
  max?: number;
  alias?: ReadonlyArray<readonly [number, number]>;
}

export function value(parent: Parent, recs: readonly string[], options: ValueOptions = {}): InnerScheme {
  const { max = 1, end = false, hasHelp = true, alias } = options;
  return {
    data: recData({ type: "value", range: countRange(max) }, { parent, recs, alias, end, hasHelp }),
  };
}

export function flag(parent: Parent, options: NodeOptions = {}): InnerScheme {
  const { end = false, hasHelp = true } = options;
  return { data: recData({ type: "flag" }, { parent, end, hasHelp }) };
}

export interface UserDefinedOptions extends NodeOptions {
  max?: number;
  /** Return `true` when the input is acceptable. */
  validate?: Validator;
}

export function userDefined(parent: Parent, options: UserDefinedOptions = {}): InnerScheme {
  const { max = 1, end = false, hasHelp = true, validate } = options;
  return {
    data: recData(
      { type: "userDefined", range: countRange(max), validate },
      { parent, end, hasHelp },
    ),
  };
}

/** A command or argument that takes nothing further. */
export function endNode(parent: Parent): InnerScheme {
  return { data: { ...EMPTY_NODE, parent } };
}
