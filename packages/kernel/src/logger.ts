/**
 * Logger: pino-backed structured logging.
 *
 * Components grab a named logger at module scope:
 *
 * ```typescript
 * const log = Logger.for("Registry");
 * log.debug({ nodes: 12 }, "compiled grammar");
 * ```
 *
 * The REPL owns the terminal, so the default level is `silent`. Set
 * `REPLKIT_LOG_LEVEL` (and optionally `REPLKIT_LOG_FILE`) or call
 * `Logger.configure()` to turn logging on. Named loggers resolve the root
 * lazily, so configuring after import still takes effect.
 */

import pino from "pino";
import type { DestinationStream, LevelWithSilent, Logger as PinoLogger } from "pino";

// ── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  /** Append to this file instead of stderr. */
  file?: string;
  /** Explicit destination; wins over `file`. */
  destination?: DestinationStream;
}

export interface LogFn {
  (message: string): void;
  (fields: Record<string, unknown>, message?: string): void;
}

export interface ComponentLogger {
  readonly component: string;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/** Match a level name case-insensitively. */
export function parseLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const normalized = raw.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized);
}

// ── Logger ──────────────────────────────────────────────────────────────────

type Method = "trace" | "debug" | "info" | "warn" | "error";

export class Logger {
  private static root: PinoLogger | undefined;
  private static generation = 0;

  /** Replace the root logger. Existing component loggers pick it up. */
  static configure(options: LoggerOptions = {}): PinoLogger {
    const level = options.level ?? parseLevel(process.env.REPLKIT_LOG_LEVEL) ?? "silent";
    const file = options.file ?? process.env.REPLKIT_LOG_FILE;
    const destination =
      options.destination ??
      (file ? pino.destination({ dest: file, sync: true, mkdir: true }) : pino.destination(2));

    Logger.root = pino({ name: "replkit", level }, destination);
    Logger.generation++;
    return Logger.root;
  }

  static get(): PinoLogger {
    return Logger.root ?? Logger.configure();
  }

  static for(component: string): ComponentLogger {
    let child: PinoLogger | undefined;
    let seen = -1;

    const resolve = (): PinoLogger => {
      if (!child || seen !== Logger.generation) {
        child = Logger.get().child({ component });
        seen = Logger.generation;
      }
      return child;
    };

    const method =
      (name: Method): LogFn =>
      (fieldsOrMessage: Record<string, unknown> | string, message?: string) => {
        const target = resolve();
        if (typeof fieldsOrMessage === "string") {
          target[name](fieldsOrMessage);
        } else {
          target[name](fieldsOrMessage, message);
        }
      };

    return {
      component,
      trace: method("trace"),
      debug: method("debug"),
      info: method("info"),
      warn: method("warn"),
      error: method("error"),
    };
  }
}
