/**
 * Error category for classifying search client errors
 */
export type ErrorCategory =
  | 'configuration'
  | 'validation'
  | 'api'
  | 'network'
  | 'timeout'
  | 'task'
  | 'batch'
  | 'cancelled'
  | 'internal';

/**
 * Base error class for all search client errors.
 * Provides structured error information including category, HTTP status
 * and whether the condition is transient.
 */
export abstract class SearchClientError extends Error {
  /**
   * The category of error for classification and handling
   */
  public readonly category: ErrorCategory;

  /**
   * HTTP status code associated with the error, if applicable
   */
  public readonly statusCode?: number;

  /**
   * Whether the condition is transient. Informational only: the client never retries.
   */
  public readonly isRetryable: boolean;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  /**
   * The original error that caused this error, if any
   */
  public override readonly cause?: Error;

  constructor(options: {
    category: ErrorCategory;
    message: string;
    statusCode?: number;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super(options.message);
    this.name = 'SearchClientError';
    this.category = options.category;
    this.statusCode = options.statusCode;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      statusCode: this.statusCode,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Returns a human-readable string representation of the error
   */
  override toString(): string {
    let result = `${this.name}: ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.cause) {
      result += `\nCaused by: ${this.cause.message}`;
    }
    return result;
  }
}

/**
 * Type guard to check if an error is a SearchClientError
 */
export function isSearchClientError(error: unknown): error is SearchClientError {
  return error instanceof SearchClientError;
}

/**
 * Type guard to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  return isSearchClientError(error) && error.isRetryable;
}

/**
 * Type guard to check if an error belongs to a specific category
 */
export function isErrorCategory(error: unknown, category: ErrorCategory): boolean {
  return isSearchClientError(error) && error.category === category;
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : String(value));
}
