/**
 * Observability module: structured logging with secret redaction.
 * @module observability
 */

export { LogLevel, parseLogLevel, type Logger, type LogEntry } from './types.js';
export {
  NoopLogger,
  ConsoleLogger,
  createLogger,
  createLogContext,
  type ConsoleLoggerOptions,
} from './logger.js';
