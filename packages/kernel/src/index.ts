/**
 * # replkit Kernel
 *
 * Low-level primitives the rest of replkit builds on.
 *
 * - **Logger** - pino-backed structured logging, silent unless configured
 * - **HookId** - process-unique hook ids from a monotonic counter
 *
 * @module @replkit/kernel
 */

export {
  Logger,
  parseLevel,
  type LoggerOptions,
  type LogLevel,
  type LogFn,
  type ComponentLogger,
} from "./logger.js";

export { HookId, IdAllocator, setDefaultIdAllocator } from "./ids.js";
