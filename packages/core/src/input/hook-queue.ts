/**
 * HookQueue: FIFO of pending input hooks. Only the head is ever active.
 */

import { Logger } from "@replkit/kernel";
import type { HookIdentity } from "@replkit/shared";
import type { Repl } from "../repl.js";
import type { InputHook } from "./input-hook.js";

const log = Logger.for("HookQueue");

export class HookQueue<Ctx> {
  private hooks: InputHook<Ctx>[] = [];

  get size(): number {
    return this.hooks.length;
  }

  get isEmpty(): boolean {
    return this.hooks.length === 0;
  }

  get head(): InputHook<Ctx> | undefined {
    return this.hooks[0];
  }

  push(hook: InputHook<Ctx>): void {
    this.hooks.push(hook);
    log.debug({ hook: hook.id.toString(), queued: this.hooks.length }, "hook registered");
  }

  /** Take the head out while it handles an event. */
  shift(): InputHook<Ctx> | undefined {
    return this.hooks.shift();
  }

  /** Put a hook back in front after it asked to keep intercepting. */
  unshift(hook: InputHook<Ctx>): void {
    this.hooks.unshift(hook);
  }

  /** Run the head hook's `init` if it has not run yet. */
  activateHead(repl: Repl<Ctx>, ctx: Ctx): boolean {
    const head = this.hooks[0];
    if (!head?.activate(repl, ctx)) return false;
    log.debug({ hook: head.id.toString() }, "hook initialized");
    return true;
  }

  /** Revert a hook that has already been taken out of the queue. */
  release(repl: Repl<Ctx>, ctx: Ctx, hook: InputHook<Ctx>): void {
    hook.revert(repl, ctx);
    log.debug({ hook: hook.id.toString(), queued: this.hooks.length }, "hook released");
  }

  /**
   * Pop and revert the head, but only when it is the hook `id` names. A
   * mismatch means that hook is already gone and leaves the queue untouched.
   */
  removeHead(repl: Repl<Ctx>, ctx: Ctx, id: HookIdentity): boolean {
    const head = this.hooks[0];
    if (!head || !head.id.equals(id)) {
      log.debug({ hook: id.id, head: head?.id.toString() }, "stale hook removal ignored");
      return false;
    }
    this.hooks.shift();
    head.revert(repl, ctx);
    log.debug({ hook: head.id.toString() }, "hook removed");
    return true;
  }

  /**
   * Remove every queued hook carrying `tag`. Hooks that were already
   * initialized are reverted. Returns how many were removed.
   */
  removeTagged(repl: Repl<Ctx>, ctx: Ctx, tag: string): number {
    const removed = this.hooks.filter((hook) => hook.id.hasTag(tag));
    if (removed.length === 0) return 0;

    this.hooks = this.hooks.filter((hook) => !hook.id.hasTag(tag));
    for (const hook of removed) {
      if (hook.active) hook.revert(repl, ctx);
    }
    log.debug({ tag, removed: removed.length, queued: this.hooks.length }, "hooks removed by tag");
    return removed.length;
  }
}
