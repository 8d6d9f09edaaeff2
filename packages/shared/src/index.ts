/**
 * @replkit/shared - error types and the input event model used by every
 * replkit package.
 *
 * @module @replkit/shared
 */

export {
  ParseError,
  GrammarError,
  CallbackError,
  ConfigError,
  isParseError,
  isGrammarError,
  isCallbackError,
  isConfigError,
  type ParseErrorCode,
  type GrammarErrorCode,
  type HookIdentity,
  type ConfigIssue,
} from "./errors.js";

export {
  keyEvent,
  charEvent,
  ctrl,
  typed,
  isKeyPress,
  isCtrlChar,
  type KeyName,
  type KeyEventKind,
  type KeyEvent,
  type ResizeEvent,
  type PasteEvent,
  type ReplEvent,
} from "./events.js";
