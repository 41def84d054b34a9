/**
 * Conkit Shared Utilities
 *
 * Cross-cutting utilities used by the core library and the CLI.
 */

export const VERSION = "0.1.0";

// Logger
export {
  createLogger,
  silentLogger,
  LOG_LEVELS,
  type LogDestination,
  type LogLevel,
  type Logger,
  type LoggerOptions,
} from "./logger";
