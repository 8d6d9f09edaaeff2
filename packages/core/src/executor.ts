/**
 * Executor: the caller's side of command dispatch.
 *
 * The REPL never runs commands itself. When a line is submitted the runner
 * hands its tokens to `tryExecuteCommand` and acts on the returned handle.
 */

import type { AsyncCallback } from "./event-loop.js";
import type { InputHook } from "./input/input-hook.js";
import type { Repl } from "./repl.js";

export type CommandHandle<Ctx> =
  | { type: "processed" }
  /** Queue a hook; it takes over key handling once it reaches the head. */
  | { type: "insertHook"; hook: InputHook<Ctx> }
  | { type: "executeAsyncCallback"; callback: AsyncCallback<Ctx> }
  | { type: "exit" };

export const CommandHandle = {
  processed<Ctx>(): CommandHandle<Ctx> {
    return { type: "processed" };
  },

  insertHook<Ctx>(hook: InputHook<Ctx>): CommandHandle<Ctx> {
    return { type: "insertHook", hook };
  },

  executeAsyncCallback<Ctx>(callback: AsyncCallback<Ctx>): CommandHandle<Ctx> {
    return { type: "executeAsyncCallback", callback };
  },

  exit<Ctx>(): CommandHandle<Ctx> {
    return { type: "exit" };
  },
};

/**
 * Implemented by the REPL's context object. Errors thrown here are logged by
 * the runner and reported on the surface; the loop keeps going.
 */
export interface Executor<Ctx> {
  tryExecuteCommand(
    repl: Repl<Ctx>,
    tokens: string[],
  ): CommandHandle<Ctx> | Promise<CommandHandle<Ctx>>;
}
