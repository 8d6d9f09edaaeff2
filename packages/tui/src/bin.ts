#!/usr/bin/env node

/**
 * CLI binary for the replkit demo REPL.
 *
 * Usage:
 *   replkit-demo
 *   replkit-demo --prompt dice --no-style
 *   replkit-demo --notify 5 --log-level debug --log-file ./replkit.log
 */

import { Logger } from "@replkit/kernel";
import { parseArgs } from "./cli-args.js";
import { createTUI } from "./create-tui.js";
import { DemoContext } from "./demo/demo-context.js";
import { demoGrammar } from "./demo/grammar.js";

// ============================================================================
// Usage
// ============================================================================

function printUsage() {
  console.log(
    `
replkit-demo: A small REPL with tab completion

Usage:
  replkit-demo [options]

Options:
  --prompt <text>       Prompt text (default: ">")
  --separator <text>    Prompt separator (default: ">")
  --no-style            Plain prompt line, no colours or ghost text
  --no-completion       Turn tab completion off
  --notify <seconds>    Print a background message every <seconds>
  --log-level <level>   trace | debug | info | warn | error | fatal | silent
  --log-file <path>     Write logs to <path> instead of stderr
  --alternate-screen    Use the terminal's alternate screen
  --help, -h            Show this help

Commands:
  echo, roll, wait, quit (Tab completes, Right accepts a suggestion)
  `.trim(),
  );
}

// ============================================================================
// Main
// ============================================================================

async function main() {
  const args = parseArgs(process.argv);

  if (args.help) {
    printUsage();
    process.exit(0);
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) console.error(`Error: ${error}`);
    console.error();
    printUsage();
    process.exit(1);
  }

  if (args.logLevel || args.logFile) {
    Logger.configure({ level: args.logLevel ?? "info", file: args.logFile });
  }

  const tui = createTUI({
    context: new DemoContext(),
    repl: {
      prompt: args.prompt,
      promptSeparator: args.separator,
      style: args.style,
      completion: demoGrammar(),
    },
    alternateScreen: args.alternateScreen,
  });
  if (!args.completion) tui.repl.disableCompletion();

  let ticks = 0;
  const timer = args.notifySeconds
    ? setInterval(() => tui.runner.notify(`tick ${++ticks}`), args.notifySeconds * 1000)
    : undefined;

  try {
    await tui.start();
  } finally {
    clearInterval(timer);
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
