/**
 * @replkit/core - line editing, history, grammar-driven completion and event
 * dispatch for terminal REPLs.
 *
 * @module @replkit/core
 */

// ============================================================================
// Shared primitives
// ============================================================================
export * from "@replkit/shared";
export { Logger, HookId, IdAllocator, setDefaultIdAllocator } from "@replkit/kernel";

// ============================================================================
// Engine
// ============================================================================
export { Repl, type ReplConfig, type ReplView } from "./repl.js";
export { EventLoop, type AsyncCallback, type EventLoopType } from "./event-loop.js";
export {
  createRepl,
  ReplOptionsSchema,
  TerminalSizeSchema,
  HistoryEntrySchema,
  type ReplOptions,
} from "./options.js";
export { ReplRunner, type ReplRunnerOptions } from "./runner.js";
export { CommandHandle, type Executor } from "./executor.js";
export {
  NullSurface,
  DEFAULT_SIZE,
  splitLines,
  type TerminalSize,
  type TerminalSurface,
} from "./surface.js";

// ============================================================================
// Input hooks
// ============================================================================
export {
  InputHook,
  HookedEvent,
  type HookControl,
  type HookHandler,
  type InputHookOptions,
} from "./input/input-hook.js";
export { HookQueue } from "./input/hook-queue.js";

// ============================================================================
// Line
// ============================================================================
export {
  LineBuffer,
  DEFAULT_PROMPT,
  DEFAULT_SEPARATOR,
  displayLength,
  promptLength,
  type LineBufferOptions,
} from "./line/line-buffer.js";
export { History, type HistoryEntry, type HistoryExportOptions } from "./line/history.js";
export {
  segmentInput,
  type Segment,
  type SegmentRole,
  type SegmentedInput,
} from "./line/segments.js";
export { tokenize, tryTokenize, quotesBalanced, joinTokens } from "./tokenize.js";

// ============================================================================
// Completion
// ============================================================================
export {
  argument,
  commandScheme,
  commands,
  countRange,
  endNode,
  flag,
  inRange,
  recData,
  uniqueRecEnd,
  userDefined,
  value,
  EMPTY_NODE,
  HELP_NODE,
  type ArgumentOptions,
  type CommandScheme,
  type CountRange,
  type InnerScheme,
  type Parent,
  type RecData,
  type RecKind,
  type RecKindType,
  type UserDefinedOptions,
  type Validator,
  type ValueOptions,
} from "./completion/grammar.js";
export {
  compileGrammar,
  nodesEqual,
  COMMANDS,
  INVALID,
  VALID,
  HELP,
  HELP_STR,
  HELP_ARG,
  HELP_ARG_SHORT,
  HELP_SHORT,
  type Registry,
} from "./completion/registry.js";
export {
  Completion,
  USER_INPUT,
  type CompletionResult,
  type Direction,
} from "./completion/resolver.js";
export { CompletionState, type Slice, type LineEnding, type OpenQuote } from "./completion/state.js";

// ============================================================================
// Testing
// ============================================================================
export * from "./testing/index.js";
