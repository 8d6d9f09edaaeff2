/**
 * EventLoop: what the caller should do after the REPL consumed an event.
 */

import type { HookIdentity, ParseError } from "@replkit/shared";
import type { Repl } from "./repl.js";

/**
 * Asynchronous work spawned by an input hook. Failures should be thrown as
 * `CallbackError` carrying the spawning hook's id.
 */
export type AsyncCallback<Ctx> = (repl: Repl<Ctx>, ctx: Ctx) => Promise<void>;

export type EventLoop<Ctx> =
  | { type: "continue" }
  | { type: "break" }
  | {
      type: "asyncCallback";
      callback: AsyncCallback<Ctx>;
      /** Hook that returned the callback; filled in by the dispatcher. */
      hookId?: HookIdentity;
    }
  | { type: "tryProcessInput"; tokens: string[] }
  | { type: "parseError"; error: ParseError };

export type EventLoopType = EventLoop<unknown>["type"];

export const EventLoop = {
  continue<Ctx>(): EventLoop<Ctx> {
    return { type: "continue" };
  },

  break<Ctx>(): EventLoop<Ctx> {
    return { type: "break" };
  },

  asyncCallback<Ctx>(callback: AsyncCallback<Ctx>): EventLoop<Ctx> {
    return { type: "asyncCallback", callback };
  },

  tryProcessInput<Ctx>(tokens: string[]): EventLoop<Ctx> {
    return { type: "tryProcessInput", tokens };
  },

  parseError<Ctx>(error: ParseError): EventLoop<Ctx> {
    return { type: "parseError", error };
  },
};
