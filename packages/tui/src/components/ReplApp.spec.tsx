import { describe, it, expect, vi } from "vitest";
import { render } from "ink-testing-library";
import { Chalk } from "chalk";
import { createRepl, ReplRunner } from "@replkit/core";
import { ReplApp } from "./ReplApp.js";
import { InkSurface } from "../ink-surface.js";
import { DemoContext } from "../demo/demo-context.js";
import { demoGrammar } from "../demo/grammar.js";
import { createTheme } from "../rendering/theme.js";
import { flush, typeInto, waitFor } from "../testing.js";

const plain = createTheme(new Chalk({ level: 0 }));

function lastLine(frame: string | undefined): string | undefined {
  return frame?.split("\n").pop();
}

function setup() {
  const surface = new InkSurface({ columns: 80, rows: 24 });
  const repl = createRepl<DemoContext>({ completion: demoGrammar(), surface });
  const runner = new ReplRunner(repl, new DemoContext({ random: () => 0 }));
  const onExit = vi.fn();
  const ui = render(<ReplApp runner={runner} surface={surface} theme={plain} onExit={onExit} />);
  return { ...ui, repl, runner, onExit };
}

describe("ReplApp", () => {
  it("draws an empty prompt", async () => {
    const { lastFrame } = setup();
    await flush();
    expect(lastLine(lastFrame())).toBe(">>");
  });

  it("shows the suggested completion as ghost text", async () => {
    const { stdin, lastFrame, repl } = setup();
    await flush();

    await typeInto(stdin, "ro");
    await waitFor(() => expect(lastLine(lastFrame())).toBe(">> roll"));
    expect(repl.input).toBe("ro");
  });

  it("completes on tab", async () => {
    const { stdin, lastFrame, repl } = setup();
    await flush();

    await typeInto(stdin, "w\t");
    await waitFor(() => expect(repl.input).toBe("wait"));
    expect(lastLine(lastFrame())).toBe(">> wait");
  });

  it("prints submitted lines and command output above the prompt", async () => {
    const { stdin, lastFrame } = setup();
    await flush();

    await typeInto(stdin, "roll\r");
    await waitFor(() => expect(lastFrame()).toContain(">> roll\nrolled 1 (d6)"));
    expect(lastLine(lastFrame())).toBe(">>");
  });

  it("asks before quitting and exits on yes", async () => {
    const { stdin, lastFrame, onExit } = setup();
    await flush();

    await typeInto(stdin, "quit\r");
    await waitFor(() => expect(lastLine(lastFrame())).toBe("Are you sure? ([y]es | [n]o)>"));

    await typeInto(stdin, "y");
    await waitFor(() => expect(onExit).toHaveBeenCalledTimes(1));
  });

  it("exits on Ctrl+D", async () => {
    const { stdin, onExit } = setup();
    await flush();

    stdin.write("\x04");
    await waitFor(() => expect(onExit).toHaveBeenCalledTimes(1));
  });
});
