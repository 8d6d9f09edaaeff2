/**
 * DemoContext: executor behind the `replkit-demo` binary.
 */

import { setTimeout as delay } from "node:timers/promises";
import {
  CommandHandle,
  HookedEvent,
  InputHook,
  Logger,
  type Executor,
  type Repl,
} from "@replkit/core";
import { validSeconds, validSides } from "./grammar.js";

const log = Logger.for("DemoContext");

export const HELP_TEXT = `Commands:
  echo <text> [--case lower|upper] [--reverse]   print text back
  roll [--sides <2..120>]                         roll a die (default 6 sides)
  wait [--seconds <1..10>]                        wait, then report back
  quit | exit                                     leave the REPL`;

export interface DemoContextOptions {
  /** Returns a number in [0, 1). */
  random?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

interface EchoArgs {
  words: string[];
  case?: "lower" | "upper";
  reverse: boolean;
}

function parseEcho(args: string[]): Parsed<EchoArgs> {
  const parsed: EchoArgs = { words: [], reverse: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--case":
      case "-c": {
        const next = args[++i];
        if (next !== "lower" && next !== "upper") {
          return { ok: false, message: "--case expects lower or upper" };
        }
        parsed.case = next;
        break;
      }
      case "--reverse":
      case "-r":
        parsed.reverse = true;
        break;
      default:
        parsed.words.push(arg);
    }
  }
  if (parsed.words.length === 0) return { ok: false, message: "echo needs some text" };
  return { ok: true, value: parsed };
}

/** Read `--name <n>` or its short form from args, falling back to `fallback`. */
function parseNumberOption(
  args: string[],
  names: readonly string[],
  validate: (input: string) => boolean,
  fallback: number,
): Parsed<number> {
  if (args.length === 0) return { ok: true, value: fallback };
  const [name, input, ...rest] = args;
  if (!names.includes(name) || rest.length > 0) {
    return { ok: false, message: `expected ${names[0]} <n>` };
  }
  if (input === undefined || !validate(input)) {
    return { ok: false, message: `invalid value for ${names[0]}: ${input ?? "(none)"}` };
  }
  return { ok: true, value: Number(input) };
}

function confirmQuit(): InputHook<DemoContext> {
  return InputHook.from<DemoContext>(
    {
      init(repl) {
        repl.setPromptAndSeparator("Are you sure? ([y]es | [n]o)", ">");
      },
      revert(repl) {
        repl.setDefaultPromptAndSeparator();
      },
      handleEvent(_repl, _ctx, event) {
        if (event.ctrl || event.meta) return HookedEvent.releaseHook();
        switch (event.char?.toLowerCase()) {
          case "y":
            return HookedEvent.breakRepl();
          case "n":
            return HookedEvent.releaseHook();
          default:
            return HookedEvent.continueHook();
        }
      },
    },
    { tag: "confirm-quit" },
  );
}

export class DemoContext implements Executor<DemoContext> {
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(options: DemoContextOptions = {}) {
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? delay;
  }

  tryExecuteCommand(repl: Repl<DemoContext>, tokens: string[]): CommandHandle<DemoContext> {
    const [command, ...args] = tokens;
    log.debug({ command, args: args.length }, "executing");

    if (args[0] === "help" || args[0] === "--help" || command === "help") {
      repl.printLines(HELP_TEXT);
      return CommandHandle.processed();
    }

    switch (command) {
      case "echo":
        return this.echo(repl, args);
      case "roll":
        return this.roll(repl, args);
      case "wait":
        return this.wait(repl, args);
      case "quit":
      case "exit":
        return CommandHandle.insertHook(confirmQuit());
      default:
        repl.println(`Unknown command: ${command}`);
        return CommandHandle.processed();
    }
  }

  private echo(repl: Repl<DemoContext>, args: string[]): CommandHandle<DemoContext> {
    const parsed = parseEcho(args);
    if (!parsed.ok) {
      repl.println(parsed.message);
      return CommandHandle.processed();
    }

    let text = parsed.value.words.join(" ");
    if (parsed.value.case === "upper") text = text.toUpperCase();
    if (parsed.value.case === "lower") text = text.toLowerCase();
    if (parsed.value.reverse) text = Array.from(text).reverse().join("");
    repl.println(text);
    return CommandHandle.processed();
  }

  private roll(repl: Repl<DemoContext>, args: string[]): CommandHandle<DemoContext> {
    const sides = parseNumberOption(args, ["--sides", "-s"], validSides, 6);
    if (!sides.ok) {
      repl.println(sides.message);
      return CommandHandle.processed();
    }
    const result = 1 + Math.floor(this.random() * sides.value);
    repl.println(`rolled ${result} (d${sides.value})`);
    return CommandHandle.processed();
  }

  private wait(repl: Repl<DemoContext>, args: string[]): CommandHandle<DemoContext> {
    const seconds = parseNumberOption(args, ["--seconds", "-t"], validSeconds, 1);
    if (!seconds.ok) {
      repl.println(seconds.message);
      return CommandHandle.processed();
    }
    repl.println(`waiting ${seconds.value}s`);
    return CommandHandle.executeAsyncCallback(async (r) => {
      await this.sleep(seconds.value * 1000);
      r.println(`waited ${seconds.value}s`);
    });
  }
}
