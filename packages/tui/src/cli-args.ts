/**
 * Argument parsing for the demo binary.
 */

import { parseLevel, type LogLevel } from "@replkit/kernel";

// ============================================================================
// Arg parsing
// ============================================================================

export interface ParsedArgs {
  prompt?: string;
  separator?: string;
  style: boolean;
  completion: boolean;
  notifySeconds?: number;
  logLevel?: LogLevel;
  logFile?: string;
  alternateScreen: boolean;
  help: boolean;
  errors: string[];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    style: true,
    completion: true,
    alternateScreen: false,
    help: false,
    errors: [],
  };
  const positional = argv.slice(2);

  for (let i = 0; i < positional.length; i++) {
    const arg = positional[i];
    const next = positional[i + 1];

    switch (arg) {
      case "--prompt":
        args.prompt = next;
        i++;
        break;
      case "--separator":
        args.separator = next;
        i++;
        break;
      case "--no-style":
        args.style = false;
        break;
      case "--no-completion":
        args.completion = false;
        break;
      case "--notify": {
        const seconds = Number(next);
        if (Number.isInteger(seconds) && seconds > 0) args.notifySeconds = seconds;
        else args.errors.push(`--notify expects a positive whole number of seconds, got ${next ?? "nothing"}`);
        i++;
        break;
      }
      case "--log-level": {
        const level = parseLevel(next);
        if (level) args.logLevel = level;
        else args.errors.push(`Unknown log level: ${next ?? "nothing"}`);
        i++;
        break;
      }
      case "--log-file":
        args.logFile = next;
        i++;
        break;
      case "--alternate-screen":
        args.alternateScreen = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        args.errors.push(`Unknown option: ${arg}`);
    }
  }

  return args;
}
