/**
 * Error types and base class for errors raised by the retry toolkit itself
 */

/**
 * Error categories for toolkit errors
 */
export enum ErrorCategory {
  /** Invalid options, schedules or policy files */
  CONFIGURATION = 'configuration',
  /** A retry event handler broke its calling contract */
  HANDLER = 'handler',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

/**
 * Metadata attached to every toolkit error
 */
export interface ErrorMetadata {
  /** Error category for domain-specific handling */
  category: ErrorCategory;
  /** Original error that caused this error (error chaining) */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
}

/**
 * Base error class with a stable code and category.
 *
 * Errors thrown by a wrapped operation never pass through this class: they reach the
 * caller unchanged. Only misuse of the toolkit is reported with a `ReboundError`.
 */
export abstract class ReboundError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, code: string, metadata: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.metadata.category,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }
}
