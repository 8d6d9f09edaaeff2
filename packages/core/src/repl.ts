/**
 * # Repl
 *
 * The line-editing engine. One call to `processInputEvent` consumes one
 * event and returns an `EventLoop` instruction; `render` returns what the
 * prompt line should look like afterwards. Nothing here touches a terminal:
 * finished output goes to a `TerminalSurface`, and the live line is drawn by
 * the host from `ReplView`.
 *
 * ```typescript
 * const repl = new Repl<Ctx>({ completion: grammar, surface });
 * for await (const event of events) {
 *   const next = repl.processInputEvent(ctx, event);
 *   if (next.type === "break") break;
 *   // handle tryProcessInput / asyncCallback / parseError
 *   const view = repl.render(ctx);
 *   if (view) draw(view);
 * }
 * ```
 *
 * Edits only ever happen at the end of the line.
 */

import {
  isCtrlChar,
  isKeyPress,
  type CallbackError,
  type KeyEvent,
  type ReplEvent,
} from "@replkit/shared";
import { Completion, type Direction } from "./completion/resolver.js";
import type { CommandScheme } from "./completion/grammar.js";
import type { Registry } from "./completion/registry.js";
import { EventLoop } from "./event-loop.js";
import { HookQueue } from "./input/hook-queue.js";
import type { HookedEvent, InputHook } from "./input/input-hook.js";
import { History, type HistoryEntry, type HistoryExportOptions } from "./line/history.js";
import { DEFAULT_PROMPT, DEFAULT_SEPARATOR, LineBuffer } from "./line/line-buffer.js";
import { NullSurface, splitLines, type TerminalSize, type TerminalSurface } from "./surface.js";
import { tryTokenize } from "./tokenize.js";

// ── Types ───────────────────────────────────────────────────────────────────

export interface ReplConfig {
  prompt?: string;
  promptSeparator?: string;
  /** Styled prompt, input colouring and ghost text. Defaults to true. */
  style?: boolean;
  /** Grammar for tab completion. Completion stays off without one. */
  completion?: CommandScheme | Registry | Completion;
  /** Seed entries, oldest first. */
  history?: Iterable<string | HistoryEntry>;
  /** Tokens submitted on Ctrl+D, or Ctrl+C on an empty line, instead of quitting. */
  quitCommand?: readonly string[];
  size?: TerminalSize;
  surface?: TerminalSurface;
}

/** Snapshot of the prompt line for a host to draw. */
export interface ReplView {
  readonly prompt: string;
  readonly promptSeparator: string;
  readonly input: string;
  /** The input does not fit the grammar. */
  readonly err: boolean;
  /** Dimmed suggestion drawn after the input; Right accepts it. */
  readonly ghostText?: string;
  readonly styleEnabled: boolean;
  readonly completionEnabled: boolean;
  /** Row of the cursor relative to the first row of the prompt. */
  readonly cursorRow: number;
  readonly cursorColumn: number;
}

type GhostText =
  | { source: "history"; order: number; text: string }
  | { source: "recommendation"; text: string };

// ── Repl ────────────────────────────────────────────────────────────────────

export class Repl<Ctx = void> {
  private readonly line: LineBuffer;
  private readonly history: History;
  private readonly completion?: Completion;
  private readonly hooks = new HookQueue<Ctx>();
  private readonly surface: TerminalSurface;
  private size: TerminalSize;
  private ghost?: GhostText;
  private quitCommand?: string[];
  private skipRender = false;

  constructor(config: ReplConfig = {}) {
    const { completion } = config;
    this.completion =
      completion === undefined || completion instanceof Completion
        ? completion
        : new Completion(completion);

    this.line = new LineBuffer({
      prompt: config.prompt,
      promptSeparator: config.promptSeparator,
      styleEnabled: config.style ?? true,
      completionEnabled: this.completion !== undefined,
    });
    this.history = new History(config.history ?? []);
    this.surface = config.surface ?? new NullSurface(config.size);
    this.size = config.size ?? { columns: this.surface.columns, rows: this.surface.rows };
    this.quitCommand = config.quitCommand ? [...config.quitCommand] : undefined;
  }

  // ── State ───────────────────────────────────────────────────────────────

  get input(): string {
    return this.line.input;
  }

  get err(): boolean {
    return this.line.err;
  }

  get prompt(): string {
    return this.line.prompt;
  }

  get promptSeparator(): string {
    return this.line.promptSeparator;
  }

  get recommendations(): readonly string[] {
    return this.completion?.recommendations ?? [];
  }

  get terminalSize(): TerminalSize {
    return { ...this.size };
  }

  /** Number of hooks waiting, including the active one. */
  get pendingHooks(): number {
    return this.hooks.size;
  }

  // ── Settings ────────────────────────────────────────────────────────────

  get completionEnabled(): boolean {
    return this.line.completionEnabled;
  }

  /** No effect when the REPL was built without a grammar. */
  enableCompletion(): void {
    if (!this.completion) return;
    this.line.completionEnabled = true;
  }

  disableCompletion(): void {
    this.line.completionEnabled = false;
    this.line.err = false;
  }

  get lineStylizationEnabled(): boolean {
    return this.line.styleEnabled;
  }

  enableLineStylization(): void {
    this.line.styleEnabled = true;
  }

  disableLineStylization(): void {
    this.line.styleEnabled = false;
    this.ghost = undefined;
  }

  setPrompt(prompt: string): void {
    this.line.setPrompt(prompt);
  }

  setPromptSeparator(separator: string): void {
    this.line.setPromptSeparator(separator);
  }

  setPromptAndSeparator(prompt: string, separator: string): void {
    this.line.setPrompt(prompt, separator);
  }

  setDefaultPrompt(): void {
    this.line.setPrompt(DEFAULT_PROMPT);
  }

  setDefaultPromptAndSeparator(): void {
    this.line.setPrompt(DEFAULT_PROMPT, DEFAULT_SEPARATOR);
  }

  setQuitCommand(tokens: readonly string[] | undefined): void {
    this.quitCommand = tokens ? [...tokens] : undefined;
  }

  setTerminalSize(size: TerminalSize): void {
    this.surface.resize?.(size);
    this.size = { ...size };
  }

  /** Skip the next render; the event changed nothing visible. */
  setUneventful(): void {
    this.skipRender = true;
  }

  get uneventful(): boolean {
    return this.skipRender;
  }

  // ── Editing ─────────────────────────────────────────────────────────────

  insertChar(char: string): void {
    this.line.insertChar(char);
    this.updateCompletion();
  }

  removeChar(): void {
    if (this.line.removeChar() === undefined) {
      this.setUneventful();
      return;
    }
    this.updateCompletion();
  }

  appendToLine(text: string): void {
    this.line.append(text);
    this.updateCompletion();
  }

  /** Replace the whole line, re-resolving completion from scratch. Returns the old text. */
  changeLine(text: string): string {
    const previous = this.line.replace(text);
    this.resetCompletion();
    this.updateCompletion();
    return previous;
  }

  /** Drop the current line without echoing it. Returns the dropped text. */
  clearLine(): string {
    return this.resetLineState();
  }

  /** Echo the line as scrollback and start a fresh one. Returns the old text. */
  newLine(): string {
    this.surface.println(this.echo());
    return this.resetLineState();
  }

  /** Echo the line marked as cancelled and start a fresh one. */
  ctrlCLine(): string {
    this.surface.println(`${this.echo()}^C`);
    return this.resetLineState();
  }

  private echo(): string {
    return `${this.line.prompt}${this.line.promptSeparator} ${this.line.input}`;
  }

  private resetLineState(): string {
    this.resetCompletion();
    this.history.resetPosition();
    this.ghost = undefined;
    return this.line.clear();
  }

  // ── History ─────────────────────────────────────────────────────────────

  addToHistory(text: string, tag?: number): void {
    this.history.push(text, tag);
  }

  /** Stored history, oldest first. */
  exportHistory(options?: HistoryExportOptions): string[] {
    return this.history.export(options);
  }

  historyBack(): void {
    const entry = this.history.back(this.line.input);
    if (entry === undefined) {
      this.setUneventful();
      return;
    }
    this.changeLine(entry);
  }

  historyForward(): void {
    const entry = this.history.forward();
    if (entry === undefined) {
      this.setUneventful();
      return;
    }
    this.changeLine(entry);
  }

  // ── Output ──────────────────────────────────────────────────────────────

  println(text: string): void {
    this.surface.println(text);
  }

  printLines(text: string): void {
    for (const line of splitLines(text)) this.surface.println(line);
  }

  /** Print output that did not come from the current line; the prompt is redrawn after it. */
  printBackgroundMessage(text: string): void {
    this.printLines(text);
    this.skipRender = false;
  }

  // ── Input hooks ─────────────────────────────────────────────────────────

  registerInputHook(hook: InputHook<Ctx>): void {
    this.hooks.push(hook);
  }

  /**
   * Remove the active hook when it is the one `error` was raised for.
   * Returns true when a hook was removed.
   */
  conditionallyRemoveHook(ctx: Ctx, error: CallbackError): boolean {
    return this.hooks.removeHead(this, ctx, error.hookId);
  }

  /** Remove every queued hook carrying `tag`. Returns how many were removed. */
  removeHooksByTag(ctx: Ctx, tag: string): number {
    return this.hooks.removeTagged(this, ctx, tag);
  }

  // ── Rendering ───────────────────────────────────────────────────────────

  /**
   * Prepare the prompt line after an event. Runs a pending hook `init` and
   * recomputes ghost text. Returns `undefined` when the last event changed
   * nothing, so the host can skip redrawing.
   */
  render(ctx: Ctx): ReplView | undefined {
    if (this.skipRender) {
      this.skipRender = false;
      return undefined;
    }
    this.hooks.activateHead(this, ctx);
    this.ghost = this.findGhostText();
    return this.view;
  }

  /** The prompt line as of the last render. */
  get view(): ReplView {
    const { columns } = this.size;
    return {
      prompt: this.line.prompt,
      promptSeparator: this.line.promptSeparator,
      input: this.line.input,
      err: this.line.err,
      ghostText: this.ghost?.text,
      styleEnabled: this.line.styleEnabled,
      completionEnabled: this.line.completionEnabled,
      cursorRow: this.line.wrappedHeight(columns),
      cursorColumn: this.line.cursorColumn(columns),
    };
  }

  private findGhostText(): GhostText | undefined {
    const input = this.line.input;
    if (!this.line.styleEnabled || input === "") return undefined;

    for (const [order, entry] of this.history.entries()) {
      if (entry.value.length > input.length && entry.value.startsWith(input)) {
        return { source: "history", order, text: entry.value.slice(input.length) };
      }
    }

    if (!this.line.completionEnabled || !this.completion) return undefined;
    const suffix = this.completion.suggestionSuffix(input);
    return suffix ? { source: "recommendation", text: suffix } : undefined;
  }

  private appendGhostText(): void {
    const ghost = this.ghost;
    this.ghost = undefined;
    if (!ghost) {
      this.setUneventful();
      return;
    }

    if (ghost.source === "history") {
      const entry = this.history.get(ghost.order);
      if (entry === undefined) this.setUneventful();
      else this.changeLine(entry);
      return;
    }
    this.appendToLine(ghost.text);
  }

  // ── Completion ──────────────────────────────────────────────────────────

  private updateCompletion(): void {
    if (!this.line.completionEnabled || !this.completion) return;
    this.line.err = this.completion.update(this.line.input);
  }

  private resetCompletion(): void {
    this.line.err = false;
    this.completion?.reset();
  }

  private tryCompletion(direction: Direction): void {
    const result =
      this.line.completionEnabled && this.completion
        ? this.completion.cycle(direction, this.line.input)
        : undefined;
    if (!result) {
      this.setUneventful();
      return;
    }
    this.line.replace(result.line);
    this.line.err = result.err;
  }

  // ── Dispatch ────────────────────────────────────────────────────────────

  /**
   * Ctrl+D, or Ctrl+C on an empty line. Quits, or submits the configured
   * quit command.
   */
  processCloseSignal(): EventLoop<Ctx> {
    this.clearLine();
    return this.quitCommand ? EventLoop.tryProcessInput([...this.quitCommand]) : EventLoop.break();
  }

  processInputEvent(ctx: Ctx, event: ReplEvent): EventLoop<Ctx> {
    if (isKeyPress(event) && !this.hooks.isEmpty) return this.dispatchToHook(ctx, event);

    switch (event.type) {
      case "resize":
        this.size = { columns: event.columns, rows: event.rows };
        return EventLoop.continue();
      case "paste":
        this.appendToLine(event.text);
        return EventLoop.continue();
      case "key":
        return this.processKey(event);
    }
  }

  private dispatchToHook(ctx: Ctx, event: KeyEvent): EventLoop<Ctx> {
    this.hooks.activateHead(this, ctx);
    const hook = this.hooks.shift();
    if (!hook) return EventLoop.continue();

    let hooked: HookedEvent<Ctx>;
    try {
      hooked = hook.handleEvent(this, ctx, event);
    } catch (error) {
      // a throwing hook is released, not re-queued
      this.hooks.release(this, ctx, hook);
      throw error;
    }
    if (hooked.control === "continue") this.hooks.unshift(hook);
    else this.hooks.release(this, ctx, hook);

    const next = hooked.event;
    return next.type === "asyncCallback" && next.hookId === undefined
      ? { ...next, hookId: hook.id }
      : next;
  }

  private processKey(event: KeyEvent): EventLoop<Ctx> {
    if (!isKeyPress(event)) {
      this.setUneventful();
      return EventLoop.continue();
    }

    if (isCtrlChar(event, "c")) {
      if (this.line.input === "") return this.processCloseSignal();
      this.ctrlCLine();
      return EventLoop.continue();
    }
    if (isCtrlChar(event, "d")) return this.processCloseSignal();

    switch (event.key) {
      case "tab":
        this.tryCompletion("next");
        break;
      case "backtab":
        this.tryCompletion("previous");
        break;
      case "right":
        this.appendGhostText();
        break;
      case "char":
        if (event.char && !event.ctrl && !event.meta) this.insertChar(event.char);
        else this.setUneventful();
        break;
      case "backspace":
        this.removeChar();
        break;
      case "up":
        this.historyBack();
        break;
      case "down":
        this.historyForward();
        break;
      case "enter":
        return this.submit();
      default:
        this.setUneventful();
    }
    return EventLoop.continue();
  }

  private submit(): EventLoop<Ctx> {
    if (this.line.input.trim() === "") {
      this.newLine();
      return EventLoop.continue();
    }

    const text = this.newLine();
    this.history.push(text);
    const result = tryTokenize(this.history.last() ?? text);
    return result.ok ? EventLoop.tryProcessInput(result.tokens) : EventLoop.parseError(result.error);
  }
}
