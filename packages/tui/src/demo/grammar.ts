/**
 * Grammar for the demo REPL.
 *
 * ```text
 * echo <text> [--case lower|upper] [--reverse]   (-c, -r)
 * roll [--sides <2..120>]                         (-s)
 * wait [--seconds <1..10>]                       (-t)
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
} from "@replkit/core";

function integerIn(min: number, max: number): (input: string) => boolean {
  return (input) => /^\d+$/.test(input) && Number(input) >= min && Number(input) <= max;
}

export const validSides = integerIn(2, 120);
export const validSeconds = integerIn(1, 10);

export function demoGrammar(): CommandScheme {
  return commandScheme(commands(["echo", "roll", "wait", "quit", "exit"], { alias: [[3, 4]] }), [
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
    argument({ parent: "root", recs: ["seconds"], short: [[0, "t"]] }, [
      userDefined({ entry: "wait" }, { validate: validSeconds }),
    ]),
    endNode("root"),
  ]);
}
