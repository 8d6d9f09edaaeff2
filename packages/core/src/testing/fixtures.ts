/**
 * Sample grammar used across the test suites.
 *
 * ```text
 * echo <text> [--case lower|upper] [--reverse]   (-c, -r)
 * roll [--sides <2..120>]                         (-s)
 * quit | exit
 * ```
 */

import {
  argument,
  commandScheme,
  commands,
  endNode,
  flag,
  userDefined,
  value,
  type CommandScheme,
} from "../completion/grammar.js";

export function validSides(input: string): boolean {
  if (!/^\d+$/.test(input)) return false;
  const sides = Number(input);
  return sides >= 2 && sides <= 120;
}

export function createSampleGrammar(): CommandScheme {
  return commandScheme(commands(["echo", "roll", "quit", "exit"], { alias: [[2, 3]] }), [
    argument(
      {
        parent: "root",
        recs: ["case", "reverse"],
        short: [
          [0, "c"],
          [1, "r"],
        ],
        required: 1,
      },
      [value({ entry: "echo" }, ["lower", "upper"]), flag({ entry: "echo" })],
    ),
    argument({ parent: "root", recs: ["sides"], short: [[0, "s"]] }, [
      userDefined({ entry: "roll" }, { validate: validSides }),
    ]),
    endNode("root"),
  ]);
}
