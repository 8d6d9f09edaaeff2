/**
 * @replkit/tui - Ink front end for replkit
 *
 * Draws a `Repl` with Ink: finished output scrolls away through `<Static>`,
 * the live prompt line is redrawn from each `ReplView`.
 *
 * @example
 * ```typescript
 * import { createTUI } from "@replkit/tui";
 *
 * await createTUI({ context: new MyExecutor(), repl: { completion: grammar } }).start();
 * ```
 *
 * @module @replkit/tui
 */

// Main entry point
export { createTUI, type TUI, type TUIOptions } from "./create-tui.js";

// Surface
export { InkSurface, type OutputLine } from "./ink-surface.js";

// Components
export { ReplApp, type ReplAppProps } from "./components/ReplApp.js";
export { ReplPrompt } from "./components/ReplPrompt.js";

// Hooks
export { useRepl, normalizeKeystroke, type UseReplOptions, type UseReplResult } from "./hooks/use-repl.js";

// Rendering
export { theme, createTheme, styleInput, formatPromptLine, type Theme } from "./rendering/index.js";

// Demo
export { DemoContext, HELP_TEXT, type DemoContextOptions } from "./demo/demo-context.js";
export { demoGrammar, validSeconds, validSides } from "./demo/grammar.js";
