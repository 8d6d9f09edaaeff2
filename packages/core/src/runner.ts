/**
 * # ReplRunner
 *
 * Drives a `Repl` from a stream of events: feeds each event to the
 * dispatcher, runs the resulting callbacks and commands, and renders.
 *
 * Key events that arrive while a command or callback is still running are
 * dropped. Messages sent with `notify` are printed above the prompt once
 * the runner is idle.
 *
 * @example
 * ```typescript
 * const runner = new ReplRunner(repl, ctx, { onRender: draw });
 * setInterval(() => runner.notify("tick"), 1000);
 * await runner.run(events);
 * ```
 */

import { Logger } from "@replkit/kernel";
import {
  CallbackError,
  isCallbackError,
  type HookIdentity,
  type ReplEvent,
} from "@replkit/shared";
import type { AsyncCallback, EventLoop } from "./event-loop.js";
import type { Executor } from "./executor.js";
import type { Repl, ReplView } from "./repl.js";

const log = Logger.for("ReplRunner");

export interface ReplRunnerOptions {
  /** Called with every view the REPL produces. */
  onRender?: (view: ReplView) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ReplRunner<Ctx extends Executor<Ctx>> {
  private readonly mailbox: string[] = [];
  private readonly onRender?: (view: ReplView) => void;
  private busy = false;
  private done = false;

  constructor(
    readonly repl: Repl<Ctx>,
    readonly ctx: Ctx,
    options: ReplRunnerOptions = {},
  ) {
    this.onRender = options.onRender;
  }

  /** A command or callback is running. */
  get processing(): boolean {
    return this.busy;
  }

  /** The loop was told to stop by `break` or an `exit` handle. */
  get stopped(): boolean {
    return this.done;
  }

  /** Queue a message to print above the prompt. */
  notify(message: string): void {
    this.mailbox.push(message);
    if (!this.busy) {
      this.flushMailbox();
      this.render();
    }
  }

  render(): ReplView | undefined {
    const view = this.repl.render(this.ctx);
    if (view) this.onRender?.(view);
    return view;
  }

  /**
   * Consume one event. Resolves to false once the REPL should stop.
   */
  async step(event: ReplEvent): Promise<boolean> {
    if (this.done) return false;

    if (this.busy) {
      if (event.type === "resize") this.repl.processInputEvent(this.ctx, event);
      else log.trace({ event: event.type }, "input dropped while processing");
      return true;
    }

    const keepGoing = await this.handle(this.repl.processInputEvent(this.ctx, event));
    if (!keepGoing) {
      this.done = true;
      return false;
    }

    this.flushMailbox();
    this.render();
    return true;
  }

  /** Render once, then step through `events` until they end or the REPL stops. */
  async run(events: AsyncIterable<ReplEvent>): Promise<void> {
    this.render();
    for await (const event of events) {
      if (!(await this.step(event))) break;
    }
    log.debug({ stopped: this.done }, "run finished");
  }

  private async handle(next: EventLoop<Ctx>): Promise<boolean> {
    switch (next.type) {
      case "continue":
        return true;
      case "break":
        return false;
      case "asyncCallback":
        await this.runCallback(next.callback, next.hookId);
        return true;
      case "parseError":
        log.warn({ code: next.error.code }, next.error.message);
        this.repl.println(next.error.message);
        return true;
      case "tryProcessInput":
        return this.execute(next.tokens);
    }
  }

  private async execute(tokens: string[]): Promise<boolean> {
    this.busy = true;
    try {
      const handle = await this.ctx.tryExecuteCommand(this.repl, tokens);
      switch (handle.type) {
        case "processed":
          return true;
        case "insertHook":
          this.repl.registerInputHook(handle.hook);
          return true;
        case "executeAsyncCallback":
          await this.invoke(handle.callback);
          return true;
        case "exit":
          return false;
      }
    } catch (error) {
      log.error({ err: error, command: tokens[0] }, "command failed");
      this.repl.println(`Error: ${errorMessage(error)}`);
      return true;
    } finally {
      this.busy = false;
    }
  }

  private async runCallback(callback: AsyncCallback<Ctx>, hookId?: HookIdentity): Promise<void> {
    this.busy = true;
    try {
      await this.invoke(callback, hookId);
    } finally {
      this.busy = false;
    }
  }

  /**
   * Await a callback. A failure tied to a hook removes that hook when it is
   * still the active one.
   */
  private async invoke(callback: AsyncCallback<Ctx>, hookId?: HookIdentity): Promise<void> {
    try {
      await callback(this.repl, this.ctx);
    } catch (error) {
      const failure = isCallbackError(error)
        ? error
        : hookId
          ? CallbackError.from(hookId, error)
          : undefined;

      if (!failure) {
        log.error({ err: error }, "callback failed");
        this.repl.println(`Error: ${errorMessage(error)}`);
        return;
      }

      log.error({ err: failure, hook: failure.hookId.id }, failure.message);
      this.repl.conditionallyRemoveHook(this.ctx, failure);
    }
  }

  private flushMailbox(): void {
    for (const message of this.mailbox.splice(0)) {
      this.repl.printBackgroundMessage(message);
    }
  }
}
