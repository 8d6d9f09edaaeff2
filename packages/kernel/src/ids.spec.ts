import { describe, it, expect, afterEach } from "vitest";
import { HookId, IdAllocator, setDefaultIdAllocator } from "./ids.js";

describe("HookId", () => {
  let previous: IdAllocator | undefined;

  afterEach(() => {
    if (previous) setDefaultIdAllocator(previous);
    previous = undefined;
  });

  it("hands out increasing ids from the default allocator", () => {
    previous = setDefaultIdAllocator(new IdAllocator(10));
    const a = HookId.next();
    const b = HookId.next("confirm");
    expect(a.id).toBe(10);
    expect(b.id).toBe(11);
    expect(b.tag).toBe("confirm");
  });

  it("uses an explicit allocator when given", () => {
    const allocator = new IdAllocator(100);
    expect(HookId.next(undefined, allocator).id).toBe(100);
    expect(allocator.peek()).toBe(101);
  });

  it("compares by numeric id only", () => {
    const allocator = new IdAllocator();
    const a = HookId.next("x", allocator);
    expect(a.equals({ id: 0 })).toBe(true);
    expect(a.equals({ id: 1, tag: "x" })).toBe(false);
    expect(a.hasTag("x")).toBe(true);
    expect(a.toString()).toBe("0:x");
  });
});
