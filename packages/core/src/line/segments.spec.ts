import { segmentInput } from "./segments.js";

describe("segmentInput", () => {
  it("returns nothing for an empty line", () => {
    expect(segmentInput("")).toEqual({ segments: [], mismatchedQuotes: false });
  });

  it("marks the command word, flags and plain arguments", () => {
    expect(segmentInput("echo --case upper").segments).toEqual([
      { text: "echo", role: "command" },
      { text: " ", role: "space" },
      { text: "--case", role: "flag" },
      { text: " ", role: "space" },
      { text: "upper", role: "text" },
    ]);
  });

  it("treats a dash before a digit as text", () => {
    expect(segmentInput("roll -5").segments).toEqual([
      { text: "roll", role: "command" },
      { text: " ", role: "space" },
      { text: "-5", role: "text" },
    ]);
  });

  it("keeps quoted spans whole, including their whitespace", () => {
    expect(segmentInput('echo "a b" -c')).toEqual({
      segments: [
        { text: "echo", role: "command" },
        { text: " ", role: "space" },
        { text: '"a b"', role: "quoted" },
        { text: " ", role: "space" },
        { text: "-c", role: "flag" },
      ],
      mismatchedQuotes: false,
    });
  });

  it("runs an open quote to the end and reports it", () => {
    expect(segmentInput("roll 'open end")).toEqual({
      segments: [
        { text: "roll", role: "command" },
        { text: " ", role: "space" },
        { text: "'open end", role: "quoted" },
      ],
      mismatchedQuotes: true,
    });
  });

  it("continues a word after a quote as text", () => {
    expect(segmentInput('"ec"ho x').segments).toEqual([
      { text: '"ec"', role: "quoted" },
      { text: "ho", role: "text" },
      { text: " ", role: "space" },
      { text: "x", role: "text" },
    ]);
  });

  it("keeps escaped whitespace inside the word", () => {
    expect(segmentInput("say it\\ now").segments).toEqual([
      { text: "say", role: "command" },
      { text: " ", role: "space" },
      { text: "it\\ now", role: "text" },
    ]);
  });

  it("merges adjacent quoted spans", () => {
    expect(segmentInput("echo 'a''b'").segments).toEqual([
      { text: "echo", role: "command" },
      { text: " ", role: "space" },
      { text: "'a''b'", role: "quoted" },
    ]);
  });
});
