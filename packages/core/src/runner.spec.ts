import { HookId, IdAllocator, Logger } from "@replkit/kernel";
import { CallbackError, charEvent, keyEvent, typed, type ReplEvent } from "@replkit/shared";
import { EventLoop } from "./event-loop.js";
import { CommandHandle, type Executor } from "./executor.js";
import { HookedEvent, InputHook } from "./input/input-hook.js";
import { Repl, type ReplView } from "./repl.js";
import { ReplRunner } from "./runner.js";
import { createDeferred, createEventSource, eventsFrom, waitFor } from "./testing/async-helpers.js";
import { createSampleGrammar } from "./testing/fixtures.js";
import { MemorySurface } from "./testing/memory-surface.js";

class EchoContext implements Executor<EchoContext> {
  readonly commands: string[][] = [];
  pending?: Promise<void>;
  onCommand?: (repl: Repl<EchoContext>, tokens: string[]) => CommandHandle<EchoContext> | undefined;

  async tryExecuteCommand(repl: Repl<EchoContext>, tokens: string[]): Promise<CommandHandle<EchoContext>> {
    this.commands.push(tokens);
    if (this.pending) await this.pending;

    const handled = this.onCommand?.(repl, tokens);
    if (handled) return handled;

    const [command, ...args] = tokens;
    switch (command) {
      case "echo":
        repl.println(args.join(" "));
        return CommandHandle.processed();
      case "quit":
      case "exit":
        return CommandHandle.exit();
      case "fail":
        throw new Error("boom");
      default:
        repl.println(`unknown command: ${command}`);
        return CommandHandle.processed();
    }
  }
}

function line(text: string): ReplEvent[] {
  return [...typed(text), keyEvent("enter")];
}

describe("ReplRunner", () => {
  let surface: MemorySurface;
  let repl: Repl<EchoContext>;
  let ctx: EchoContext;
  let views: ReplView[];
  let runner: ReplRunner<EchoContext>;

  beforeAll(() => {
    Logger.configure({ level: "silent" });
  });

  beforeEach(() => {
    surface = new MemorySurface();
    repl = new Repl<EchoContext>({ completion: createSampleGrammar(), surface });
    ctx = new EchoContext();
    views = [];
    runner = new ReplRunner(repl, ctx, { onRender: (view) => views.push(view) });
  });

  it("executes submitted commands until one exits", async () => {
    await runner.run(eventsFrom([...line("echo hello world"), ...line("quit"), ...line("echo late")]));

    expect(ctx.commands).toEqual([["echo", "hello", "world"], ["quit"]]);
    expect(surface.lines).toEqual([">> echo hello world", "hello world", ">> quit"]);
    expect(runner.stopped).toBe(true);
  });

  it("renders initially and after every eventful step", async () => {
    await runner.run(eventsFrom([charEvent("e"), keyEvent("backspace"), keyEvent("backspace")]));
    expect(views.map((view) => view.input)).toEqual(["", "e", ""]);
  });

  it("stops on break", async () => {
    await runner.run(eventsFrom([keyEvent("char", { char: "d", ctrl: true }), ...line("echo never")]));
    expect(ctx.commands).toEqual([]);
  });

  it("reports parse errors on the surface", async () => {
    await runner.run(eventsFrom(line('echo "open')));
    expect(surface.lines).toEqual(['>> echo "open', "Mismatched quotes"]);
    expect(ctx.commands).toEqual([]);
  });

  it("reports executor errors and keeps going", async () => {
    await runner.run(eventsFrom([...line("fail"), ...line("echo after")]));
    expect(surface.lines).toEqual([">> fail", "Error: boom", ">> echo after", "after"]);
    expect(runner.stopped).toBe(false);
  });

  it("ignores typing during a slow command but keeps resizes", async () => {
    const gate = createDeferred();
    ctx.pending = gate.promise;

    for (const event of typed("echo slow")) await runner.step(event);
    const submit = runner.step(keyEvent("enter"));
    await waitFor(() => runner.processing);

    await runner.step(charEvent("x"));
    await runner.step({ type: "resize", columns: 120, rows: 30 });
    expect(repl.input).toBe("");
    expect(repl.terminalSize).toEqual({ columns: 120, rows: 30 });

    gate.resolve();
    await submit;
    expect(runner.processing).toBe(false);
    expect(surface.lines).toEqual([">> echo slow", "slow"]);
  });

  it("prints notifications right away when idle and queues them while busy", async () => {
    runner.notify("idle message");
    expect(surface.lines).toEqual(["idle message"]);

    const gate = createDeferred();
    ctx.pending = gate.promise;
    for (const event of typed("echo x")) await runner.step(event);
    const submit = runner.step(keyEvent("enter"));
    await waitFor(() => runner.processing);

    runner.notify("background");
    expect(surface.lines).toEqual(["idle message", ">> echo x"]);

    gate.resolve();
    await submit;
    expect(surface.lines).toEqual(["idle message", ">> echo x", "x", "background"]);
  });

  it("runs events pushed while the loop is waiting", async () => {
    const source = createEventSource<ReplEvent>();
    const done = runner.run(source.events);

    for (const event of line("echo pushed")) source.push(event);
    await waitFor(() => surface.lines.length === 2);
    source.end();
    await done;

    expect(surface.lines).toEqual([">> echo pushed", "pushed"]);
  });

  it("registers hooks returned by the executor", async () => {
    ctx.onCommand = (_repl, tokens) =>
      tokens[0] === "quit"
        ? CommandHandle.insertHook(
            InputHook.from<EchoContext>({
              init: (r) => r.setPrompt("Are you sure?"),
              revert: (r) => r.setDefaultPrompt(),
              handleEvent: (_r, _c, event) =>
                event.char === "y" ? HookedEvent.breakRepl() : HookedEvent.releaseHook(),
            }),
          )
        : undefined;

    await runner.run(eventsFrom([...line("quit"), charEvent("n"), ...line("quit"), charEvent("y")]));

    expect(ctx.commands).toEqual([["quit"], ["quit"]]);
    expect(runner.stopped).toBe(true);
    expect(views.some((view) => view.prompt === "Are you sure?")).toBe(true);
  });

  it("runs async callbacks from the executor", async () => {
    const seen: string[] = [];
    ctx.onCommand = () =>
      CommandHandle.executeAsyncCallback(async (r) => {
        seen.push("ran");
        r.println("from callback");
      });

    await runner.run(eventsFrom(line("anything")));
    expect(seen).toEqual(["ran"]);
    expect(surface.lines).toEqual([">> anything", "from callback"]);
  });

  it("prints the failure of a callback that belongs to no hook", async () => {
    ctx.onCommand = () =>
      CommandHandle.executeAsyncCallback(async () => {
        throw new Error("timer broke");
      });

    await runner.run(eventsFrom(line("anything")));
    expect(surface.lines).toEqual([">> anything", "Error: timer broke"]);
    expect(runner.stopped).toBe(false);
  });

  it("removes the hook whose callback failed", async () => {
    const id = HookId.next("fetch", new IdAllocator(500));
    repl.registerInputHook(
      InputHook.from<EchoContext>(
        {
          handleEvent: () =>
            HookedEvent.of(
              EventLoop.asyncCallback(async () => {
                throw new CallbackError(id, "fetch failed");
              }),
              "continue",
            ),
        },
        { id },
      ),
    );

    await runner.run(eventsFrom([charEvent("a"), charEvent("b")]));
    expect(repl.pendingHooks).toBe(0);
    expect(repl.input).toBe("b");
  });

  it("attributes plain errors thrown by a hook callback to that hook", async () => {
    repl.registerInputHook(
      InputHook.from<EchoContext>({
        handleEvent: () =>
          HookedEvent.of(
            EventLoop.asyncCallback(async () => {
              throw new Error("test failure");
            }),
            "continue",
          ),
      }),
    );

    await runner.run(eventsFrom([charEvent("a")]));
    expect(repl.pendingHooks).toBe(0);
  });
});
