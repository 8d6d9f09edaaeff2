import { describe, it, expect } from "vitest";
import { History } from "./history.js";

describe("History", () => {
  // ── push ────────────────────────────────────────────────────────────────

  it("stores trimmed text", () => {
    const history = new History();
    history.push("  ls -la  ");
    expect(history.last()).toBe("ls -la");
  });

  it("keeps a single entry when the same text is pushed twice", () => {
    const history = new History();
    history.push("status");
    history.push("status");
    expect(history.export()).toEqual(["status"]);
    expect(history.atTop).toBe(true);
  });

  it("moves re-submitted text to the top instead of duplicating it", () => {
    const history = new History();
    history.push("a");
    history.push("b");
    history.push("a");
    expect(history.export()).toEqual(["b", "a"]);
    expect(history.size).toBe(2);
  });

  it("seeds from an iterable oldest first", () => {
    const history = new History(["one", "two", { value: "three", tag: 2 }]);
    expect(history.export()).toEqual(["one", "two", "three"]);
    expect(history.last()).toBe("three");
  });

  // ── browsing ────────────────────────────────────────────────────────────

  it("is uneventful when empty", () => {
    const history = new History();
    expect(history.back("draft")).toBeUndefined();
    expect(history.forward()).toBeUndefined();
  });

  it("walks back and restores the unsubmitted buffer going forward", () => {
    const history = new History(["a", "b"]);

    expect(history.back("draft")).toBe("b");
    expect(history.back("b")).toBe("a");
    expect(history.back("a")).toBeUndefined();

    expect(history.forward()).toBe("b");
    expect(history.forward()).toBe("draft");
    expect(history.forward()).toBeUndefined();
    expect(history.atTop).toBe(true);
  });

  it("skips the gap left by a relocated entry", () => {
    const history = new History(["a", "b", "a"]);
    expect(history.back("")).toBe("a");
    expect(history.back("a")).toBe("b");
    expect(history.back("b")).toBeUndefined();
  });

  it("resets the browse position on push", () => {
    const history = new History(["a", "b"]);
    history.back("");
    history.push("c");
    expect(history.atTop).toBe(true);
    expect(history.back("")).toBe("c");
  });

  it("lists entries newest first with their order numbers", () => {
    const history = new History(["a", "b", "a"]);
    expect([...history.entries()]).toEqual([
      [2, { value: "a" }],
      [1, { value: "b" }],
    ]);
    expect(history.get(1)).toBe("b");
    expect(history.get(0)).toBeUndefined();
  });

  // ── export ──────────────────────────────────────────────────────────────

  it("exports the newest entries up to max, oldest first", () => {
    const history = new History(["a", "b", "c"]);
    expect(history.export({ max: 2 })).toEqual(["b", "c"]);
    expect(history.export({ max: 10 })).toEqual(["a", "b", "c"]);
    expect(history.export({ max: 0 })).toEqual([]);
  });

  it("filters exported entries by tag", () => {
    const history = new History();
    history.push("deploy", 1);
    history.push("status");
    history.push("rollback", 1);
    expect(history.export({ tag: 1 })).toEqual(["deploy", "rollback"]);
    expect(history.export({ tag: 1, max: 1 })).toEqual(["rollback"]);
  });

  it("keeps the tag of a relocated entry unless a new one is given", () => {
    const history = new History();
    history.push("deploy", 3);
    history.push("status");
    history.push("deploy");
    expect(history.export({ tag: 3 })).toEqual(["deploy"]);
  });
});
