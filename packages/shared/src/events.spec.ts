import { describe, it, expect } from "vitest";
import { charEvent, ctrl, isCtrlChar, isKeyPress, keyEvent, typed } from "./events.js";

describe("input events", () => {
  it("types one char event per code point", () => {
    expect(typed("aé😀").map((event) => event.char)).toEqual(["a", "é", "😀"]);
  });

  it("treats events without a kind as presses", () => {
    expect(isKeyPress(keyEvent("enter"))).toBe(true);
    expect(isKeyPress(charEvent("a", { kind: "release" }))).toBe(false);
    expect(isKeyPress({ type: "resize", columns: 80, rows: 24 })).toBe(false);
  });

  it("matches control characters case-insensitively", () => {
    expect(isCtrlChar(ctrl("C"), "c")).toBe(true);
    expect(isCtrlChar(charEvent("c"), "c")).toBe(false);
    expect(isCtrlChar(keyEvent("enter", { ctrl: true }), "c")).toBe(false);
  });
});
