/**
 * useRepl: connects a `ReplRunner` to Ink.
 *
 * Translates Ink keystrokes into `ReplEvent`s, forwards terminal resizes,
 * and keeps the latest `ReplView` and the printed output in React state.
 */

import { useCallback, useEffect, useState } from "react";
import { useApp, useInput, useStdout } from "ink";
import type { Key } from "ink";
import {
  charEvent,
  keyEvent,
  Logger,
  type Executor,
  type KeyEvent,
  type ReplEvent,
  type ReplRunner,
  type ReplView,
} from "@replkit/core";
import type { InkSurface, OutputLine } from "../ink-surface.js";

const log = Logger.for("useRepl");

// ── Key normalization ───────────────────────────────────────────────────────

type Modifiers = Pick<KeyEvent, "ctrl" | "meta" | "shift">;

function modifiers(key: Key): Modifiers {
  const mods: Modifiers = {};
  if (key.ctrl) mods.ctrl = true;
  if (key.meta) mods.meta = true;
  if (key.shift) mods.shift = true;
  return mods;
}

/**
 * Map one Ink keystroke to a REPL event. Multi-character input (a paste or
 * a burst Ink delivered in one chunk) becomes a paste event.
 */
export function normalizeKeystroke(input: string, key: Key): ReplEvent | undefined {
  if (key.return) return keyEvent("enter");
  if (key.upArrow) return keyEvent("up");
  if (key.downArrow) return keyEvent("down");
  if (key.leftArrow) return keyEvent("left");
  if (key.rightArrow) return keyEvent("right");
  // Ink reports the physical Backspace key as either flag depending on the terminal
  if (key.backspace || key.delete) return keyEvent("backspace");
  if (key.tab) return keyEvent(key.shift ? "backtab" : "tab");
  if (key.escape) return keyEvent("escape");
  if (input === "") return undefined;
  if (key.ctrl || key.meta) return charEvent(input, modifiers(key));
  if (Array.from(input).length > 1) return { type: "paste", text: input };
  return charEvent(input, modifiers(key));
}

// ── Hook ────────────────────────────────────────────────────────────────────

export interface UseReplOptions<Ctx extends Executor<Ctx>> {
  runner: ReplRunner<Ctx>;
  surface: InkSurface;
  /** Called once the runner stops. Defaults to unmounting the Ink app. */
  onExit?: () => void;
  isActive?: boolean;
}

export interface UseReplResult {
  view?: ReplView;
  output: readonly OutputLine[];
  processing: boolean;
}

export function useRepl<Ctx extends Executor<Ctx>>({
  runner,
  surface,
  onExit,
  isActive = true,
}: UseReplOptions<Ctx>): UseReplResult {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [view, setView] = useState<ReplView | undefined>(() => runner.repl.render(runner.ctx));
  const [output, setOutput] = useState<readonly OutputLine[]>(() => surface.lines);
  const [processing, setProcessing] = useState(false);

  useEffect(() => surface.subscribe(setOutput), [surface]);

  const send = useCallback(
    (event: ReplEvent) => {
      const pending = runner.step(event);
      setProcessing(runner.processing);
      pending
        .then((alive) => {
          setProcessing(runner.processing);
          setView(runner.repl.view);
          if (!alive) (onExit ?? exit)();
        })
        .catch((error: unknown) => {
          log.error({ err: error, event: event.type }, "event failed");
        });
    },
    [runner, onExit, exit],
  );

  useEffect(() => {
    const onResize = () => send({ type: "resize", columns: stdout.columns, rows: stdout.rows });
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout, send]);

  useInput(
    (input, key) => {
      const event = normalizeKeystroke(input, key);
      if (event) send(event);
    },
    { isActive },
  );

  return { view, output, processing };
}
