import { describe, it, expect } from "vitest";
import { InkSurface, type OutputLine } from "./ink-surface.js";

describe("InkSurface", () => {
  it("numbers printed lines and notifies subscribers", () => {
    const surface = new InkSurface({ columns: 40, rows: 10 });
    const seen: Array<readonly OutputLine[]> = [];
    const unsubscribe = surface.subscribe((lines) => seen.push(lines));

    surface.println("one");
    unsubscribe();
    surface.println("two");

    expect(seen).toEqual([[{ id: 0, text: "one" }]]);
    expect(surface.lines).toEqual([
      { id: 0, text: "one" },
      { id: 1, text: "two" },
    ]);
  });

  it("records the requested size", () => {
    const surface = new InkSurface({ columns: 40, rows: 10 });
    surface.resize({ columns: 100, rows: 30 });
    expect([surface.columns, surface.rows]).toEqual([100, 30]);
  });
});
