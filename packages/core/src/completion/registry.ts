/**
 * Registry: a grammar flattened into an indexed node list plus lookup maps.
 *
 * Compiled once at startup. Ids 0..3 are reserved; grammar nodes are numbered
 * from 4 in depth-first declaration order.
 */

import { GrammarError } from "@replkit/shared";
import { Logger } from "@replkit/kernel";
import {
  EMPTY_NODE,
  HELP_NODE,
  uniqueRecEnd,
  type CommandScheme,
  type InnerScheme,
  type Parent,
  type RecData,
  type RecKind,
} from "./grammar.js";

const log = Logger.for("Registry");

export const COMMANDS = 0;
export const INVALID = 1;
export const VALID = 2;
export const HELP = 3;

export const HELP_STR = "help";
export const HELP_SHORT = "h";
export const HELP_ARG = "--help";
export const HELP_ARG_SHORT = "-h";

export interface Registry {
  readonly nodes: readonly RecData[];
  readonly lookup: ReadonlyMap<string, number>;
  /** Accepted literals of each value node, keyed by node id. */
  readonly valueSets: ReadonlyMap<number, ReadonlySet<string>>;
  /** Primary command names followed by `help`. */
  readonly commandRecommendations: readonly string[];
}

// ── Structural equality ─────────────────────────────────────────────────────

function parentsEqual(a: Parent | undefined, b: Parent | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (typeof a === "string" || typeof b === "string") return a === b;
  return a.entry === b.entry;
}

function pairsEqual<T>(
  a: ReadonlyArray<readonly [number, T]> | undefined,
  b: ReadonlyArray<readonly [number, T]> | undefined,
): boolean {
  if (a === undefined || b === undefined) return a === b;
  return (
    a.length === b.length &&
    a.every((pair, i) => {
      const other = b[i];
      return other !== undefined && pair[0] === other[0] && pair[1] === other[1];
    })
  );
}

function listsEqual(a: readonly string[] | undefined, b: readonly string[] | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

function kindsEqual(a: RecKind, b: RecKind): boolean {
  switch (a.type) {
    case "argument":
      return b.type === "argument" && a.required === b.required;
    case "value":
      return b.type === "value" && a.range.start === b.range.start && a.range.end === b.range.end;
    case "userDefined":
      return (
        b.type === "userDefined" &&
        a.range.start === b.range.start &&
        a.range.end === b.range.end &&
        a.validate === b.validate
      );
    default:
      return a.type === b.type;
  }
}

export function nodesEqual(a: RecData, b: RecData): boolean {
  return (
    a === b ||
    (parentsEqual(a.parent, b.parent) &&
      pairsEqual(a.alias, b.alias) &&
      pairsEqual(a.short, b.short) &&
      listsEqual(a.recs, b.recs) &&
      kindsEqual(a.kind, b.kind) &&
      a.end === b.end &&
      a.hasHelp === b.hasHelp)
  );
}

// ── Compilation ─────────────────────────────────────────────────────────────

class RegistryBuilder {
  readonly nodes: RecData[];
  readonly lookup = new Map<string, number>([[HELP_STR, HELP]]);
  readonly valueSets = new Map<number, Set<string>>();

  constructor(commandsNode: RecData) {
    this.nodes = [commandsNode, { ...EMPTY_NODE }, { ...EMPTY_NODE }, HELP_NODE];
  }

  push(data: RecData): number {
    this.nodes.push(data);
    return this.nodes.length - 1;
  }

  insertKey(key: string, id: number): void {
    const existing = this.lookup.get(key);
    const data = this.nodes[id];
    if (existing !== undefined) {
      const previous = this.nodes[existing];
      if (!previous || !data || !nodesEqual(previous, data)) throw GrammarError.duplicate(key);
    }
    this.lookup.set(key, id);
  }

  insertAliases(owner: RecData, recIndex: number, id: number, context: string): void {
    for (const [target, aliasIndex] of owner.alias ?? []) {
      if (target !== recIndex) continue;
      const alias = owner.recs?.[aliasIndex];
      if (alias === undefined) {
        throw GrammarError.invalidAlias(context, aliasIndex);
      }
      this.insertKey(alias, id);
    }
  }

  insertValueSet(data: RecData, id: number, context: string): void {
    if (data.kind.type !== "value") return;
    if (data.kind.range.start <= 0 || data.kind.range.end <= data.kind.range.start) {
      throw GrammarError.invalidRange(context);
    }
    if (!data.recs) throw GrammarError.missingValues(context);
    this.valueSets.set(id, new Set(data.recs));
  }

  walk(scheme: InnerScheme, context: string): void {
    const { data } = scheme;
    if (data.kind.type !== "argument") {
      if (scheme.inner !== undefined) throw GrammarError.misplacedInner(context);
      if (data.short !== undefined) throw GrammarError.misplacedShort(context);
      return;
    }

    const expected = uniqueRecEnd(data);
    const inner = scheme.inner ?? [];
    if (inner.length !== expected) {
      throw GrammarError.innerLength(expected, inner.length, context);
    }

    for (let i = 0; i < expected; i++) {
      const name = data.recs?.[i];
      const child = inner[i];
      if (name === undefined || child === undefined) continue;

      const id = this.push(child.data);
      this.insertKey(name, id);

      const short = data.short?.find(([recIndex]) => recIndex === i);
      if (short) {
        const char = short[1];
        if (char === HELP_SHORT || Array.from(char).length !== 1) {
          throw GrammarError.invalidShort(char);
        }
        this.insertKey(char, id);
      }

      this.insertAliases(data, i, id, context);
      this.insertValueSet(child.data, id, `${context} ${name}`);
      this.walk(child, `${context} ${name}`);
    }
  }
}

/**
 * Flatten a grammar. Throws `GrammarError` on any structural problem.
 */
export function compileGrammar(scheme: CommandScheme): Registry {
  const { commands } = scheme;
  const expected = uniqueRecEnd(commands);

  if (scheme.inner.length !== expected) {
    throw GrammarError.innerLength(expected, scheme.inner.length, "commands");
  }
  if (commands.short !== undefined) throw GrammarError.misplacedShort("commands");

  const builder = new RegistryBuilder(commands);
  const names = commands.recs ?? [];

  for (let i = 0; i < expected; i++) {
    const name = names[i];
    const inner = scheme.inner[i];
    if (name === undefined || inner === undefined) continue;

    const id = builder.push(inner.data);
    builder.insertKey(name, id);
    builder.insertAliases(commands, i, id, "commands");
    builder.insertValueSet(inner.data, id, name);
    builder.walk(inner, name);
  }

  const registry: Registry = {
    nodes: builder.nodes,
    lookup: builder.lookup,
    valueSets: builder.valueSets,
    commandRecommendations: [...names.slice(0, expected), HELP_STR],
  };

  log.debug(
    { nodes: registry.nodes.length, keys: registry.lookup.size, valueSets: registry.valueSets.size },
    "compiled grammar",
  );
  return registry;
}
