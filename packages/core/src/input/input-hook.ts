/**
 * Input hooks: temporary takeovers of key handling.
 *
 * While a hook sits at the head of the REPL's queue it receives every
 * key-press event instead of the line editor. Each call returns the
 * instruction for the caller plus whether the hook stays active.
 *
 * @example
 * ```typescript
 * const confirm = InputHook.from<Ctx>({
 *   init(repl) {
 *     repl.setPromptAndSeparator("Are you sure? ([y]es | [n]o)", ">");
 *   },
 *   revert(repl) {
 *     repl.setDefaultPrompt();
 *   },
 *   handleEvent(repl, ctx, event) {
 *     if (event.char === "y") return HookedEvent.breakRepl();
 *     return event.char === "n" ? HookedEvent.releaseHook() : HookedEvent.continueHook();
 *   },
 * });
 * ```
 */

import { HookId } from "@replkit/kernel";
import type { KeyEvent } from "@replkit/shared";
import { EventLoop } from "../event-loop.js";
import type { Repl } from "../repl.js";

export type HookControl = "continue" | "release";

export interface HookedEvent<Ctx> {
  event: EventLoop<Ctx>;
  control: HookControl;
}

export const HookedEvent = {
  of<Ctx>(event: EventLoop<Ctx>, control: HookControl): HookedEvent<Ctx> {
    return { event, control };
  },

  /** Keep intercepting; nothing for the caller to do. */
  continueHook<Ctx>(): HookedEvent<Ctx> {
    return { event: EventLoop.continue(), control: "continue" };
  },

  /** Give key handling back to the line editor. */
  releaseHook<Ctx>(): HookedEvent<Ctx> {
    return { event: EventLoop.continue(), control: "release" };
  },

  /** Release and tell the caller to stop its loop. */
  breakRepl<Ctx>(): HookedEvent<Ctx> {
    return { event: EventLoop.break(), control: "release" };
  },
};

/**
 * The behaviour of a hook. `init` runs once before the first render after
 * the hook reaches the head of the queue; `revert` runs when it is released
 * or removed.
 */
export interface HookHandler<Ctx> {
  init?(repl: Repl<Ctx>, ctx: Ctx): void;
  revert?(repl: Repl<Ctx>, ctx: Ctx): void;
  handleEvent(repl: Repl<Ctx>, ctx: Ctx, event: KeyEvent): HookedEvent<Ctx>;
}

export interface InputHookOptions {
  /** Shared by related hooks so they can be removed together. */
  tag?: string;
  /** Reuse an id, e.g. one captured by a callback before the hook was built. */
  id?: HookId;
}

export class InputHook<Ctx> {
  private activated = false;

  private constructor(
    readonly id: HookId,
    private readonly handler: HookHandler<Ctx>,
  ) {}

  static from<Ctx>(handler: HookHandler<Ctx>, options: InputHookOptions = {}): InputHook<Ctx> {
    return new InputHook(options.id ?? HookId.next(options.tag), handler);
  }

  get tag(): string | undefined {
    return this.id.tag;
  }

  /** True once the hook has reached the head and its `init` has run. */
  get active(): boolean {
    return this.activated;
  }

  /** Runs `init` the first time only. Returns true when this call activated the hook. */
  activate(repl: Repl<Ctx>, ctx: Ctx): boolean {
    if (this.activated) return false;
    this.activated = true;
    this.handler.init?.(repl, ctx);
    return true;
  }

  revert(repl: Repl<Ctx>, ctx: Ctx): void {
    this.handler.revert?.(repl, ctx);
  }

  handleEvent(repl: Repl<Ctx>, ctx: Ctx, event: KeyEvent): HookedEvent<Ctx> {
    return this.handler.handleEvent(repl, ctx, event);
  }
}
