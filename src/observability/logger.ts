/**
 * Logger implementations for the search client.
 *
 * Provides NoopLogger and ConsoleLogger with structured logging and auto-redaction.
 */

import { LogLevel, type Logger, type LogEntry } from './types.js';

// ============================================================================
// NoopLogger Implementation
// ============================================================================

/**
 * No-op logger implementation
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

// ============================================================================
// ConsoleLogger Implementation
// ============================================================================

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Logger name/component */
  name?: string;
  /** Log level */
  level?: LogLevel;
  /** Use JSON output instead of formatted text */
  json?: boolean;
  /** Custom sensitive field names to redact */
  sensitiveFields?: string[];
}

const DEFAULT_SENSITIVE_FIELDS = [
  'apiKey',
  'api_key',
  'token',
  'password',
  'secret',
  'authorization',
  'bearer',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Console logger implementation with structured logging and auto-redaction
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name: string;
  private readonly json: boolean;
  private readonly sensitiveFields: Set<string>;

  constructor(options?: ConsoleLoggerOptions) {
    this.name = options?.name ?? 'search-client';
    this.json = options?.json ?? false;

    if (options?.level !== undefined) {
      this.level = options.level;
    }

    this.sensitiveFields = new Set(
      [...DEFAULT_SENSITIVE_FIELDS, ...(options?.sensitiveFields ?? [])].map((f) =>
        f.toLowerCase()
      )
    );
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const safeContext = context ? this.redactSensitive(context) : undefined;
    const logFn = this.getLogFunction(level);

    if (this.json) {
      const logEntry: LogEntry & { component: string } = {
        level,
        message,
        timestamp: Date.now(),
        context: safeContext,
        component: this.name,
      };
      logFn(JSON.stringify(logEntry));
      return;
    }

    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level].toUpperCase();
    const line = `${timestamp} ${levelStr}[${this.name}] ${message}`;

    if (safeContext && Object.keys(safeContext).length > 0) {
      logFn(line, safeContext);
    } else {
      logFn(line);
    }
  }

  private getLogFunction(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.Error:
        return console.error;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Debug:
        return console.debug;
      default:
        return console.log;
    }
  }

  /**
   * Replace sensitive values. Document arrays are summarized by length so
   * payloads never end up in logs.
   */
  redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (this.isSensitiveKey(key)) {
        result[key] = '[REDACTED]';
      } else if (key === 'documents' && Array.isArray(value)) {
        result[key] = `[documents:${value.length}]`;
      } else if (Array.isArray(value)) {
        result[key] = value.map((item) => (isRecord(item) ? this.redactSensitive(item) : item));
      } else if (value instanceof Error) {
        result[key] = { name: value.name, message: value.message };
      } else if (isRecord(value)) {
        result[key] = this.redactSensitive(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  private isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    for (const sensitive of this.sensitiveFields) {
      if (lowerKey.includes(sensitive)) {
        return true;
      }
    }
    return false;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a logger based on configuration
 */
export function createLogger(options?: {
  enabled?: boolean;
  type?: 'console' | 'noop';
  level?: LogLevel;
  json?: boolean;
  name?: string;
}): Logger {
  if (options?.enabled === false || options?.type === 'noop') {
    return new NoopLogger();
  }

  return new ConsoleLogger({
    name: options?.name ?? 'search-client',
    level: options?.level ?? LogLevel.Warn,
    json: options?.json ?? false,
  });
}

/**
 * Create a structured log context for client operations
 */
export function createLogContext(params: {
  operation?: string;
  indexUid?: string;
  durationMs?: number;
  error?: Error;
  [key: string]: unknown;
}): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (key === 'error' && value instanceof Error) {
      context.error = { name: value.name, message: value.message };
    } else {
      context[key] = value;
    }
  }

  return context;
}
