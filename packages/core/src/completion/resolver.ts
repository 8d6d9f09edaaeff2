/**
 * Completion: resolves the live input against a compiled registry.
 *
 * After every edit `update()` works out which command, argument and value the
 * input refers to, rebuilds the recommendation list and reports whether the
 * input is currently in error. `cycle()` walks the recommendations for
 * Tab / Shift+Tab, returning to the user's own text after the last one.
 */

import {
  inRange,
  isRangeKind,
  uniqueRecEnd,
  type CommandScheme,
  type RecData,
  type RecKind,
} from "./grammar.js";
import {
  COMMANDS,
  HELP,
  HELP_ARG,
  HELP_ARG_SHORT,
  HELP_SHORT,
  HELP_STR,
  INVALID,
  VALID,
  compileGrammar,
  type Registry,
} from "./registry.js";
import {
  CompletionState,
  endsWithWhitespace,
  firstWhitespaceIndex,
  lastToken,
  lastWhitespaceIndex,
  sameSlice,
  sameSpan,
  sliceEnd,
  sliceText,
  words,
  type Slice,
} from "./state.js";

/** Cycle position meaning "the text the user typed". */
export const USER_INPUT = -1;

export type Direction = "next" | "previous";

export interface CompletionResult {
  /** The full input line with the trailing token replaced. */
  line: string;
  err: boolean;
}

interface Indexer {
  /** Primary and secondary node ids recommendations come from. */
  list: [number, number];
  /** Both sources are active at once. */
  multiple: boolean;
  /** Positions in `recommendations` that came from the secondary source. */
  inSecondary: number[];
  /** Current cycle position. */
  cursor: number;
}

const COMMAND_KIND: RecKind = { type: "command" };
const BARE_ARGUMENT: RecKind = { type: "argument", required: 0 };

function defaultIndexer(): Indexer {
  return { list: [COMMANDS, INVALID], multiple: false, inSecondary: [], cursor: USER_INPUT };
}

function stripDashes(text: string): [number, string | undefined] {
  let dashes = 0;
  while (text[dashes] === "-") dashes++;
  const rest = text.slice(dashes);
  return [dashes, rest.length > 0 ? rest : undefined];
}

function trimDashes(text: string): string {
  return text.replace(/^-+/, "");
}

/** Recommendation text that the typed token already spells out. */
function matchesToken(kind: RecKind, token: string, recommendation: string): boolean {
  switch (kind.type) {
    case "value":
      return token === recommendation && token !== HELP_STR;
    case "argument":
      return token.startsWith("--") && token.slice(2) === recommendation;
    default:
      return token === recommendation;
  }
}

export class Completion {
  readonly registry: Registry;
  private recs: string[];
  private state = new CompletionState();
  private indexer = defaultIndexer();
  /** Start-trimmed input as of the last update. */
  private input = "";

  constructor(source: CommandScheme | Registry) {
    this.registry = "commands" in source ? compileGrammar(source) : source;
    this.recs = [...this.registry.commandRecommendations];
  }

  get recommendations(): readonly string[] {
    return this.recs;
  }

  /** The token currently being completed. */
  get token(): string {
    return this.state.ending.token;
  }

  get hasOpenQuote(): boolean {
    return this.state.ending.openQuote !== undefined;
  }

  /** Current cycle position, `USER_INPUT` when showing the typed text. */
  get cursor(): number {
    return this.indexer.cursor;
  }

  /** Slices resolved so far, for inspection. */
  get resolved(): Readonly<Pick<CompletionState, "command" | "argument" | "value" | "requiredInputs">> {
    const { command, argument, value, requiredInputs } = this.state;
    return { command, argument, value, requiredInputs };
  }

  reset(): void {
    this.recs = [...this.registry.commandRecommendations];
    this.state = new CompletionState();
    this.indexer = defaultIndexer();
  }

  // ── Lookups ─────────────────────────────────────────────────────────────

  private node(id: number): RecData {
    const node = this.registry.nodes[id] ?? this.registry.nodes[INVALID];
    if (!node) throw new RangeError(`Unknown registry node ${id}`);
    return node;
  }

  /** Node a recommendation at `index` was drawn from. */
  nodeForRecommendation(index: number): RecData {
    if (this.indexer.multiple && this.indexer.inSecondary.includes(index)) {
      return this.node(this.indexer.list[1]);
    }
    return this.node(this.indexer.list[0]);
  }

  private lastKey(): Slice | undefined {
    return this.state.value ?? this.state.argument ?? this.state.command;
  }

  private argOrCommand(): Slice | undefined {
    return this.state.argument ?? this.state.command;
  }

  /** Text after the last resolved key, minus a leading help flag. */
  private trailing(line: string): string {
    const key = this.lastKey();
    if (!key) return line;
    const rest = line.slice(sliceEnd(key)).trim();
    if (rest.startsWith(HELP_ARG)) return rest.slice(HELP_ARG.length);
    if (rest.startsWith(HELP_ARG_SHORT)) return rest.slice(HELP_ARG_SHORT.length);
    return rest;
  }

  private validRecPrefix(text: string, hasHelp: boolean): boolean {
    return (
      (hasHelp && HELP_STR.startsWith(trimDashes(text))) ||
      (this.recs[0]?.startsWith(text) ?? false)
    );
  }

  /**
   * Whether a recommendation should be written as `--name`. `undefined` for
   * kinds that have no completion text of their own.
   */
  argFormat(recommendation: string, kind: RecKind): boolean | undefined {
    if (recommendation === HELP_STR) return this.state.command !== undefined;
    switch (kind.type) {
      case "argument":
        return true;
      case "value":
      case "command":
        return false;
      case "help":
        return this.state.command !== undefined;
      default:
        return undefined;
    }
  }

  // ── Hashing ─────────────────────────────────────────────────────────────

  private fromRaw(
    start: number,
    len: number,
    expected: RecKind,
    line: string,
    count?: number,
  ): Slice {
    const slice: Slice = { start, len, id: INVALID };
    switch (expected.type) {
      case "command":
        this.hashCommand(line, slice);
        break;
      case "argument":
        this.hashArgument(line, slice);
        break;
      case "value":
        this.hashValue(line, slice, expected.range, count ?? 1);
        break;
      case "userDefined":
        if (
          inRange(expected.range, count ?? 1) &&
          (expected.validate?.(sliceText(line, slice)) ?? true)
        ) {
          slice.id = VALID;
        }
        break;
      default:
        break;
    }
    return slice;
  }

  private hashCommand(line: string, slice: Slice): void {
    const text = sliceText(line, slice);
    if (text.startsWith("-")) return;

    // Pascal-cased input gets one retry in lower case
    const key = /^[A-Z]/.test(text) ? text.charAt(0).toLowerCase() + text.slice(1) : text;
    const id = this.registry.lookup.get(key);
    if (id === undefined) return;

    const parent = this.node(id).parent;
    if (parent === "root" || parent === "universal") slice.id = id;
  }

  private hashArgument(line: string, slice: Slice): void {
    const text = sliceText(line, slice);
    if (!text.startsWith("-")) return;
    const id = this.argumentId(trimDashes(text), line);
    if (id !== undefined) slice.id = id;
  }

  /** Registry id of `name` when it is an argument of the resolved command. */
  private argumentId(name: string, line: string): number | undefined {
    const command = this.state.command;
    if (!command) return undefined;
    const commandText = sliceText(line, command).toLowerCase();

    const id = this.registry.lookup.get(name);
    if (id === undefined) return undefined;

    const parent = this.node(id).parent;
    if (parent === "universal") return id;
    if (typeof parent === "object" && parent.entry.toLowerCase() === commandText) return id;
    return undefined;
  }

  private hashValue(line: string, slice: Slice, range: { start: number; end: number }, count: number): void {
    if (!inRange(range, count)) return;
    const text = sliceText(line, slice);
    if (text.startsWith("-")) return;

    const owner = this.argOrCommand();
    if (owner && this.registry.valueSets.get(owner.id)?.has(text)) slice.id = VALID;
  }

  // ── Token scanning ──────────────────────────────────────────────────────

  /** Resolve the last token of `line` as `expected`. */
  private parseTokenFromEnd(line: string, expected: RecKind, count?: number): Slice | undefined {
    if (this.state.ending.openQuote) return undefined;

    const trimmed = line.trimEnd();
    const last = trimmed[trimmed.length - 1];
    let start: number;

    if (last === "'" || last === '"') {
      start = trimmed.slice(0, -1).lastIndexOf(last);
      if (start === -1) return undefined;
    } else {
      start = lastWhitespaceIndex(trimmed) + 1;
    }

    const len = trimmed.length - start;
    return len > 0 ? this.fromRaw(start, len, expected, line, count) : undefined;
  }

  /**
   * Walk tokens backwards from the end of `slice`, counting unresolved ones
   * until a token resolves as `countTill` (or matches the last known key).
   */
  private countValues(slice: string, countTill: RecKind): [Slice | undefined, number] {
    let count = 0;
    let previous: Slice | undefined;
    let end = slice.length;
    const lastValid = this.lastKey();

    for (;;) {
      const token = this.parseTokenFromEnd(slice.slice(0, end), countTill);
      if (!token) break;

      if (token.id !== INVALID) return [token, count];
      if (lastValid && sameSpan(token, lastValid)) return [lastValid, count];

      count++;
      end = token.start;
      previous = token;
    }
    return [previous, Math.max(count - 1, 0)];
  }

  private forwardArgumentOrValue(line: string, commandKind: RecKind): Slice | undefined {
    const [match, count] = this.countValues(line, commandKind);

    if (match) {
      if (match.id === INVALID || count === 0) return match;
      const meta = this.node(match.id);
      if (isRangeKind(meta.kind) && !meta.end && inRange(meta.kind.range, count)) return undefined;
    }

    return this.parseTokenFromEnd(line, commandKind, count);
  }

  // ── Errors ──────────────────────────────────────────────────────────────

  private kindError(id: number, token: string, trailing: string): boolean {
    const node = this.node(id);
    const command = this.state.command;
    const hasHelp =
      id === VALID ? (command ? this.node(command.id).hasHelp : false) : node.hasHelp;
    const kind = node.kind;

    if (kind.type === "argument") {
      const supplied = this.state.requiredInputs.length + (token.length > 0 ? 1 : 0);
      if (kind.required > supplied) return true;
      if (kind.required === supplied) return false;

      const [dashes, rest] = stripDashes(token);
      if (dashes === 0 && rest !== undefined) return true;
      if (dashes < 3 && rest === undefined) return false;
      if (dashes === 1 && rest === HELP_SHORT) {
        return !(command ? this.node(command.id).hasHelp : false);
      }
      if (dashes === 1 && rest !== undefined && Array.from(rest).length === 1) {
        return this.argumentId(rest, this.input) === undefined;
      }
      if (dashes === 2 && rest !== undefined) return !this.validRecPrefix(rest, hasHelp);
      return true;
    }

    if (token.startsWith("-")) {
      const [dashes, rest] = stripDashes(token);
      if (
        (dashes < 3 && rest === undefined) ||
        (dashes === 1 && rest === HELP_SHORT) ||
        (dashes === 2 && rest === HELP_STR)
      ) {
        return !hasHelp;
      }
      if (dashes === 2 && rest !== undefined) return !this.validRecPrefix(rest, hasHelp);
      return true;
    }

    switch (kind.type) {
      case "command":
        return !this.validRecPrefix(token, hasHelp);
      case "userDefined":
        return trailing === "" || (kind.validate ? !kind.validate(token) : false);
      case "value":
        return trailing === "" || !this.validRecPrefix(token, hasHelp);
      default:
        return trailing !== "";
    }
  }

  private valueError(line: string): boolean {
    const [primary, secondary] = this.indexer.list;
    const token = this.token;
    const trailing = this.trailing(line);

    const primaryErr = this.kindError(primary, token, trailing);
    if (!this.indexer.multiple) return primaryErr;

    const secondaryErr = this.kindError(secondary, token, trailing);
    if (token.startsWith("-") && this.node(secondary).kind.type === "argument") return secondaryErr;
    return primaryErr && secondaryErr;
  }

  private shouldAddHelp(primaryId: number, secondaryId: number, line: string): boolean {
    const primary = this.node(primaryId);
    const secondary = this.node(secondaryId);

    const fromPrimary =
      primary.hasHelp &&
      (!isRangeKind(primary.kind) ||
        (() => {
          const trailing = this.trailing(line);
          return trailing === "" || !this.kindError(primaryId, this.token, trailing);
        })());

    return (
      fromPrimary ||
      (secondary.hasHelp && (this.indexer.multiple || this.state.value?.id === VALID))
    );
  }

  private hasErrors(line: string): boolean {
    return (
      this.state.command?.id === INVALID ||
      this.state.argument?.id === INVALID ||
      this.state.value?.id === INVALID ||
      this.valueError(line)
    );
  }

  // ── Update ──────────────────────────────────────────────────────────────

  /**
   * Re-resolve after the input changed. Returns the error flag for the line.
   */
  update(input: string): boolean {
    const line = input.trimStart();
    this.input = line;

    if (line === "") {
      this.recs = [...this.registry.commandRecommendations];
      this.state.ending = { token: "" };
      return false;
    }

    this.state.updateToken(line);
    const changed = this.state.checkState(line);

    if (!changed && this.indexer.list[0] === INVALID) return this.hasErrors(line);

    const openQuote = this.state.ending.openQuote !== undefined;
    const multipleSwitchKind =
      this.indexer.multiple &&
      endsWithWhitespace(line) &&
      (words(line).pop()?.startsWith("-") ?? false);

    if (multipleSwitchKind) this.indexer.multiple = false;
    this.indexer.cursor = USER_INPUT;

    if (!this.state.command && !openQuote) {
      const split = firstWhitespaceIndex(line);
      this.state.command = split === -1 ? undefined : this.fromRaw(0, split, COMMAND_KIND, line);
    }

    this.resolveAfterCommand(line, openQuote, multipleSwitchKind);
    this.resolveAfterArgument(line, openQuote);
    this.selectSources(line);

    const [primaryId, secondaryId] = this.indexer.list;
    const primary = this.node(primaryId);
    const secondary = this.node(secondaryId);
    const addHelp = this.shouldAddHelp(primaryId, secondaryId, line);
    const token = this.token;

    if (token === "") {
      this.recs = primary.recs ? primary.recs.slice(0, uniqueRecEnd(primary)) : [];

      if (this.indexer.multiple && secondary.recs) {
        const from = this.recs.length;
        const extra = secondary.recs.slice(0, uniqueRecEnd(secondary));
        const to = from + extra.length + (addHelp ? 1 : 0);
        this.indexer.inSecondary = Array.from({ length: to - from }, (_, i) => from + i);
        this.recs.push(...extra);
      }
      if (addHelp) this.recs.push(HELP_STR);
      return this.hasErrors(line);
    }

    const needle = trimDashes(token).toLowerCase();
    const dashed = token.startsWith("-");

    const fromPrimary = !dashed || primary.kind.type === "argument" ? (primary.recs ?? []) : [];
    const fromSecondary =
      this.indexer.multiple && (!dashed || secondary.kind.type === "argument")
        ? (secondary.recs ?? [])
        : [];

    const matches = [...fromPrimary, ...fromSecondary, ...(addHelp ? [HELP_STR] : [])].filter(
      (rec) => rec.includes(needle),
    );
    // Prefix matches first, otherwise declaration order
    matches.sort((a, b) => Number(b.startsWith(needle)) - Number(a.startsWith(needle)));

    if (this.indexer.multiple && secondary.recs) {
      const secondaryRecs = secondary.recs;
      this.indexer.inSecondary = matches
        .map((rec, i) => (secondaryRecs.includes(rec) || rec === HELP_STR ? i : -1))
        .filter((i) => i >= 0);
    }

    this.recs = matches;
    return this.hasErrors(line);
  }

  /** Resolve the argument or value that follows the command. */
  private resolveAfterCommand(line: string, openQuote: boolean, multipleSwitchKind: boolean): void {
    const command = this.state.command;
    if (
      !command ||
      openQuote ||
      this.state.value !== undefined ||
      (this.state.argument !== undefined && !multipleSwitchKind)
    ) {
      return;
    }

    const commandKind = this.node(command.id).kind;
    const suffix = line.slice(command.len).trimStart();
    if ((commandKind.type !== "argument" && commandKind.type !== "value") || suffix === "") return;

    let next: Slice | undefined;
    if (endsWithWhitespace(suffix)) {
      next = this.forwardArgumentOrValue(line, commandKind);
    } else {
      // Backspacing into a token: re-derive the key that precedes it
      const [match, count] = this.countValues(
        line.slice(0, line.length - this.token.length),
        commandKind,
      );
      if (match && !sameSlice(match, command)) {
        const meta = this.node(match.id);
        if (isRangeKind(meta.kind) && inRange(meta.kind.range, count + 1)) {
          this.indexer.multiple = count >= meta.kind.range.start;
          next = match;
        } else if (meta.end) {
          next = match;
        }
      }
    }

    let kind: RecKind = commandKind;
    if (next) {
      const text = sliceText(line, next);
      if (text === HELP_ARG || text === HELP_ARG_SHORT) {
        next = { ...next, id: HELP };
        kind = BARE_ARGUMENT;
      }
    }

    if (kind.type === "argument") {
      if (next && next.id === INVALID && this.state.requiredInputs.length < kind.required) {
        this.state.requiredInputs.push(sliceEnd(next));
      } else {
        this.state.argument = next;
      }
    } else if (kind.type === "value") {
      this.state.value = next;
    }
  }

  /** Resolve flags and the values that follow an argument. */
  private resolveAfterArgument(line: string, openQuote: boolean): void {
    const argument = this.state.argument;
    const command = this.state.command;
    const argumentNode = argument ? this.node(argument.id) : undefined;

    if (argumentNode?.kind.type === "flag") {
      // A flag takes nothing, so move on unless it ends the command
      if (!argumentNode.end) this.state.argument = undefined;
      return;
    }

    if (
      !command ||
      command.id === INVALID ||
      this.state.value !== undefined ||
      openQuote ||
      !argument ||
      !argumentNode ||
      !isRangeKind(argumentNode.kind)
    ) {
      return;
    }

    const range = argumentNode.kind.range;
    const commandKind = this.node(command.id).kind;
    const suffix = line.slice(sliceEnd(argument)).trimStart();
    if (argument.id === INVALID || suffix === "") return;

    if (endsWithWhitespace(suffix)) {
      const token = this.parseTokenFromEnd(line, argumentNode.kind);
      if (!token) return;

      if (token.id !== INVALID && !argumentNode.end) {
        const [, count] = this.countValues(line, commandKind);
        if (inRange(range, count + 1)) {
          this.indexer.multiple = true;
        } else {
          this.indexer.multiple = false;
          this.state.argument = undefined;
        }
      } else {
        this.state.value = token;
      }
    } else {
      const [, count] = this.countValues(line.slice(0, line.length - this.token.length), commandKind);
      this.indexer.multiple = inRange(range, count);
    }
  }

  private selectSources(line: string): void {
    const { command, argument, value } = this.state;

    if (argument && value) this.indexer.list = [value.id, argument.id];
    else if (command && value) this.indexer.list = [value.id, command.id];
    else if (command && argument) this.indexer.list = [argument.id, command.id];
    else if (command) this.indexer.list = [command.id, INVALID];
    else if (!argument && !value && words(line).length <= 1) this.indexer.list = [COMMANDS, INVALID];
    else this.indexer.list = [INVALID, INVALID];

    if (this.indexer.list[1] === INVALID) this.indexer.multiple = false;
  }

  // ── Cycling ─────────────────────────────────────────────────────────────

  /**
   * Step to the next or previous recommendation and return the rewritten
   * line. Returns `undefined` when there is nothing to cycle through.
   */
  cycle(direction: Direction, input: string): CompletionResult | undefined {
    const token = this.token;
    const recs = this.recs;
    const only = recs[0];

    if (only === undefined || this.lastKey()?.id === INVALID) return undefined;
    if (recs.length === 1 && matchesToken(this.nodeForRecommendation(0).kind, token, only)) {
      return undefined;
    }

    const step = direction === "next" ? 1 : -1;
    let recommendation: string | undefined;

    while (recommendation === undefined) {
      let cursor = this.indexer.cursor + step;
      if (cursor < USER_INPUT) cursor = recs.length - 1;
      else if (cursor >= recs.length) cursor = USER_INPUT;
      this.indexer.cursor = cursor;

      if (cursor === USER_INPUT) {
        recommendation = token;
        break;
      }

      const next = recs[cursor];
      if (next !== undefined && !matchesToken(this.nodeForRecommendation(cursor).kind, token, next)) {
        recommendation = next;
      }
    }

    const atUserInput = this.indexer.cursor === USER_INPUT;
    const kind: RecKind =
      recommendation === HELP_STR
        ? this.node(HELP).kind
        : atUserInput
          ? COMMAND_KIND
          : this.nodeForRecommendation(this.indexer.cursor).kind;
    const asArgument = this.argFormat(recommendation, kind) ?? false;

    const split = lastWhitespaceIndex(input);
    const prefix = asArgument && recommendation !== "" && !atUserInput ? "--" : "";
    const line = split === -1 ? recommendation : `${input.slice(0, split)} ${prefix}${recommendation}`;

    return { line, err: atUserInput ? this.valueError(line) : false };
  }

  // ── Ghost text ──────────────────────────────────────────────────────────

  /**
   * Remaining characters of the top recommendation given what has been
   * typed, or `undefined` when it does not extend the trailing token.
   */
  suggestionSuffix(input: string): string | undefined {
    const recommendation = this.recs[0];
    if (recommendation === undefined) return undefined;

    const asArgument = this.argFormat(recommendation, this.nodeForRecommendation(0).kind);
    if (asArgument === undefined) return undefined;

    let token = lastToken(input);
    if (token === "") return undefined;

    if (asArgument) {
      if (!token.startsWith("--")) return undefined;
      token = token.slice(2);
      if (!/^\p{Alphabetic}/u.test(token)) return undefined;
    } else if (token.startsWith("-")) {
      return undefined;
    }

    return recommendation.startsWith(token) ? recommendation.slice(token.length) : undefined;
  }
}
