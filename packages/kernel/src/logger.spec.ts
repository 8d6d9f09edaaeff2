import { describe, it, expect, afterEach } from "vitest";
import { Writable } from "node:stream";
import { Logger, parseLevel } from "./logger.js";

function capture() {
  const lines: Record<string, unknown>[] = [];
  const destination = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(JSON.parse(String(chunk)));
      callback();
    },
  });
  return { lines, destination };
}

describe("Logger", () => {
  afterEach(() => {
    Logger.configure({ level: "silent" });
  });

  it("tags records with the component name", () => {
    const { lines, destination } = capture();
    Logger.configure({ level: "debug", destination });

    Logger.for("Registry").debug({ nodes: 4 }, "compiled");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ component: "Registry", nodes: 4, msg: "compiled" });
  });

  it("picks up a root configured after the component logger was created", () => {
    const log = Logger.for("History");
    const { lines, destination } = capture();
    Logger.configure({ level: "info", destination });

    log.info("pushed");
    log.debug("ignored below level");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ component: "History", msg: "pushed" });
  });

  it("writes nothing when silent", () => {
    const { lines, destination } = capture();
    Logger.configure({ level: "silent", destination });
    Logger.for("Repl").error("hidden");
    expect(lines).toHaveLength(0);
  });
});

describe("parseLevel", () => {
  it("matches level names regardless of case and padding", () => {
    expect(parseLevel(" DEBUG ")).toBe("debug");
    expect(parseLevel("silent")).toBe("silent");
  });

  it("rejects unknown or empty names", () => {
    expect(parseLevel("verbose")).toBeUndefined();
    expect(parseLevel("")).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });
});
