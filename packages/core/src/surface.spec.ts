import { NullSurface, splitLines } from "./surface.js";

describe("splitLines", () => {
  it("splits on LF and CRLF", () => {
    expect(splitLines("one\r\ntwo\nthree")).toEqual(["one", "two", "three"]);
  });

  it("drops a single trailing newline only", () => {
    expect(splitLines("one\n\n")).toEqual(["one", ""]);
    expect(splitLines("")).toEqual([""]);
  });
});

describe("NullSurface", () => {
  it("reports the size it was given", () => {
    const surface = new NullSurface({ columns: 30, rows: 5 });
    expect([surface.columns, surface.rows]).toEqual([30, 5]);
    surface.println("dropped");
  });
});
