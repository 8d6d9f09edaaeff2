/**
 * createTUI: run a REPL in the terminal with Ink.
 *
 * Builds the REPL on an `InkSurface`, drives it with a `ReplRunner` and
 * renders `ReplApp` until the runner stops.
 *
 * @example
 * ```typescript
 * const tui = createTUI({ context: new MyExecutor(), repl: { completion: grammar } });
 * setInterval(() => tui.runner.notify("tick"), 5000);
 * await tui.start();
 * ```
 *
 * @example Alternate Screen (no scrollback pollution)
 * ```typescript
 * createTUI({ context, alternateScreen: true }).start();
 * ```
 *
 * @module @replkit/tui/create-tui
 */

import { render } from "ink";
import { createRepl, ReplRunner, type Executor, type Repl, type ReplOptions } from "@replkit/core";
import { ReplApp } from "./components/ReplApp.js";
import { InkSurface } from "./ink-surface.js";
import type { Theme } from "./rendering/theme.js";

export interface TUIOptions<Ctx extends Executor<Ctx>> {
  /** Executor for submitted commands. */
  context: Ctx;
  /** REPL options; the surface is supplied by the TUI. */
  repl?: Omit<ReplOptions, "surface" | "size">;
  theme?: Theme;
  /** Use alternate screen buffer to avoid polluting terminal scrollback. */
  alternateScreen?: boolean;
}

export interface TUI<Ctx extends Executor<Ctx>> {
  repl: Repl<Ctx>;
  runner: ReplRunner<Ctx>;
  surface: InkSurface;
  start(): Promise<void>;
}

export function createTUI<Ctx extends Executor<Ctx>>(options: TUIOptions<Ctx>): TUI<Ctx> {
  const surface = new InkSurface();
  const repl = createRepl<Ctx>({ ...options.repl, surface });
  const runner = new ReplRunner(repl, options.context);

  return {
    repl,
    runner,
    surface,
    async start() {
      if (options.alternateScreen) {
        process.stdout.write("\x1b[?1049h\x1b[H\x1b[2J");
      }

      const { waitUntilExit } = render(<ReplApp runner={runner} surface={surface} theme={options.theme} />, {
        exitOnCtrlC: false,
      });

      try {
        await waitUntilExit();
      } finally {
        if (options.alternateScreen) {
          process.stdout.write("\x1b[?1049l");
        }
      }
    },
  };
}
