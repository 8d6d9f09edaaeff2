/**
 * Terminal-agnostic input events.
 *
 * Front ends (Ink, raw stdin, tests) translate their own keystroke model into
 * these shapes before handing them to the REPL engine.
 */

// ── Keys ────────────────────────────────────────────────────────────────────

export type KeyName =
  | "char"
  | "enter"
  | "tab"
  | "backtab"
  | "backspace"
  | "delete"
  | "up"
  | "down"
  | "left"
  | "right"
  | "home"
  | "end"
  | "escape";

export type KeyEventKind = "press" | "release" | "repeat";

export interface KeyEvent {
  type: "key";
  key: KeyName;
  /** The typed character when `key` is `"char"`. */
  char?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
  /** Defaults to `"press"`. */
  kind?: KeyEventKind;
}

export interface ResizeEvent {
  type: "resize";
  columns: number;
  rows: number;
}

export interface PasteEvent {
  type: "paste";
  text: string;
}

export type ReplEvent = KeyEvent | ResizeEvent | PasteEvent;

// ── Constructors ────────────────────────────────────────────────────────────

export function keyEvent(key: KeyName, modifiers: Omit<KeyEvent, "type" | "key"> = {}): KeyEvent {
  return { type: "key", key, ...modifiers };
}

export function charEvent(char: string, modifiers: Omit<KeyEvent, "type" | "key" | "char"> = {}): KeyEvent {
  return { type: "key", key: "char", char, ...modifiers };
}

export function ctrl(char: string): KeyEvent {
  return charEvent(char, { ctrl: true });
}

/** One `char` event per code point of `text`. */
export function typed(text: string): KeyEvent[] {
  return Array.from(text, (char) => charEvent(char));
}

// ── Predicates ──────────────────────────────────────────────────────────────

export function isKeyPress(event: ReplEvent): event is KeyEvent {
  return event.type === "key" && (event.kind ?? "press") === "press";
}

export function isCtrlChar(event: KeyEvent, char: string): boolean {
  return event.key === "char" && event.ctrl === true && event.char?.toLowerCase() === char;
}
