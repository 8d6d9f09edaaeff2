import { GrammarError, isGrammarError } from "@replkit/shared";
import {
  argument,
  commandScheme,
  commands,
  endNode,
  flag,
  recData,
  value,
  type CommandScheme,
} from "./grammar.js";
import { COMMANDS, HELP, INVALID, VALID, compileGrammar, nodesEqual } from "./registry.js";
import { createSampleGrammar } from "../testing/fixtures.js";

function compileError(scheme: CommandScheme): GrammarError {
  try {
    compileGrammar(scheme);
  } catch (error) {
    if (error instanceof GrammarError) return error;
    throw error;
  }
  throw new Error("expected compileGrammar to throw");
}

describe("compileGrammar", () => {
  const registry = compileGrammar(createSampleGrammar());

  it("reserves the first four ids", () => {
    expect(registry.nodes[COMMANDS]?.recs).toEqual(["echo", "roll", "quit", "exit"]);
    expect(registry.nodes[INVALID]?.kind).toEqual({ type: "null" });
    expect(registry.nodes[VALID]?.kind).toEqual({ type: "null" });
    expect(registry.nodes[HELP]?.kind).toEqual({ type: "help" });
    expect(registry.lookup.get("help")).toBe(HELP);
  });

  it("numbers grammar nodes depth first from 4", () => {
    expect(registry.lookup.get("echo")).toBe(4);
    expect(registry.lookup.get("case")).toBe(5);
    expect(registry.lookup.get("reverse")).toBe(6);
    expect(registry.lookup.get("roll")).toBe(7);
    expect(registry.lookup.get("sides")).toBe(8);
    expect(registry.lookup.get("quit")).toBe(9);
    expect(registry.nodes).toHaveLength(10);
  });

  it("maps aliases and shorts onto their primary node", () => {
    expect(registry.lookup.get("exit")).toBe(9);
    expect(registry.lookup.get("c")).toBe(5);
    expect(registry.lookup.get("r")).toBe(6);
    expect(registry.lookup.get("s")).toBe(8);
  });

  it("collects value sets by node id", () => {
    expect([...(registry.valueSets.get(5) ?? [])]).toEqual(["lower", "upper"]);
    expect(registry.valueSets.size).toBe(1);
  });

  it("lists primary command names followed by help", () => {
    expect(registry.commandRecommendations).toEqual(["echo", "roll", "quit", "help"]);
  });

  it("rejects an inner list that does not match the primary names", () => {
    const error = compileError(commandScheme(commands(["a", "b"]), [endNode("root")]));
    expect(error.code).toBe("INNER_LENGTH_MISMATCH");
    expect(error.message).toBe("commands: expected 2 inner schemes (one per recommendation), got 1");
  });

  it("rejects a duplicate key mapped to a different node", () => {
    const error = compileError(
      commandScheme(commands(["go", "go"]), [
        endNode("root"),
        argument({ parent: "root", recs: ["far"] }, [flag({ entry: "go" })]),
      ]),
    );
    expect(error.code).toBe("DUPLICATE_KEY");
    expect(error.key).toBe("go");
  });

  it("accepts the same key twice when both nodes are identical", () => {
    const registry = compileGrammar(
      commandScheme(commands(["go", "run"]), [
        argument({ parent: "root", recs: ["fast"] }, [flag("universal")]),
        argument({ parent: "root", recs: ["fast"] }, [flag("universal")]),
      ]),
    );
    expect(registry.lookup.get("fast")).toBe(7);
  });

  it("rejects the reserved help short and multi-character shorts", () => {
    const withShort = (short: string) =>
      commandScheme(commands(["go"]), [
        argument({ parent: "root", recs: ["far"], short: [[0, short]] }, [flag({ entry: "go" })]),
      ]);

    expect(compileError(withShort("h")).code).toBe("INVALID_SHORT");
    expect(compileError(withShort("fa")).code).toBe("INVALID_SHORT");
  });

  it("rejects shorts and inner schemes on non-argument nodes", () => {
    const short = compileError(
      commandScheme(commands(["go"]), [
        { data: recData({ type: "flag" }, { parent: "root", short: [[0, "x"]] }) },
      ]),
    );
    expect(short.code).toBe("MISPLACED_SHORT");

    const inner = compileError(
      commandScheme(commands(["go"]), [{ data: recData({ type: "flag" }, { parent: "root" }), inner: [] }]),
    );
    expect(inner.code).toBe("MISPLACED_INNER");
  });

  it("rejects value nodes without values or with an empty range", () => {
    const missing = compileError(
      commandScheme(commands(["go"]), [
        { data: recData({ type: "value", range: { start: 1, end: 2 } }, { parent: "root" }) },
      ]),
    );
    expect(missing.code).toBe("MISSING_VALUES");

    const empty = compileError(commandScheme(commands(["go"]), [value("root", ["a"], { max: 0 })]));
    expect(empty.code).toBe("INVALID_RANGE");
  });

  it("rejects an alias pointing past the recommendation list", () => {
    const error = compileError(
      commandScheme(commands(["go", "run"], { alias: [[0, 5]] }), [endNode("root")]),
    );
    expect(error.code).toBe("INVALID_ALIAS");
    expect(isGrammarError(error)).toBe(true);
  });
});

describe("nodesEqual", () => {
  it("compares structure, with validators by identity", () => {
    const validate = (input: string) => input.length > 0;
    const a = recData({ type: "userDefined", range: { start: 1, end: 2 }, validate }, { parent: "root" });
    const b = recData({ type: "userDefined", range: { start: 1, end: 2 }, validate }, { parent: "root" });
    const c = recData(
      { type: "userDefined", range: { start: 1, end: 2 }, validate: (input) => input.length > 0 },
      { parent: "root" },
    );

    expect(nodesEqual(a, b)).toBe(true);
    expect(nodesEqual(a, c)).toBe(false);
  });
});
