import { describe, it, expect } from "vitest";
import { parseArgs } from "./cli-args.js";

const argv = (...args: string[]) => ["node", "replkit-demo", ...args];

describe("parseArgs", () => {
  it("defaults to a styled REPL with completion", () => {
    expect(parseArgs(argv())).toEqual({
      style: true,
      completion: true,
      alternateScreen: false,
      help: false,
      errors: [],
    });
  });

  it("reads every option", () => {
    const args = parseArgs(
      argv(
        "--prompt",
        "dice",
        "--separator",
        ":",
        "--no-style",
        "--no-completion",
        "--notify",
        "5",
        "--log-level",
        "Debug",
        "--log-file",
        "/tmp/replkit.log",
        "--alternate-screen",
        "-h",
      ),
    );
    expect(args).toEqual({
      prompt: "dice",
      separator: ":",
      style: false,
      completion: false,
      notifySeconds: 5,
      logLevel: "debug",
      logFile: "/tmp/replkit.log",
      alternateScreen: true,
      help: true,
      errors: [],
    });
  });

  it("collects errors for bad values and unknown options", () => {
    expect(parseArgs(argv("--notify", "0", "--log-level", "loud", "--colour")).errors).toEqual([
      "--notify expects a positive whole number of seconds, got 0",
      "Unknown log level: loud",
      "Unknown option: --colour",
    ]);
  });

  it("reports a missing value", () => {
    expect(parseArgs(argv("--log-level")).errors).toEqual(["Unknown log level: nothing"]);
  });
});
