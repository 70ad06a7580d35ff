/**
 * Concrete toolkit errors
 */

import { ErrorCategory, ReboundError, type ErrorMetadata } from './types.js';

/**
 * Invalid configuration: bad option values, schedule parameters or policy files.
 * Raised when the configuration is built, never at first use.
 */
export class ConfigurationError extends ReboundError {
  public readonly issues: readonly string[];

  constructor(
    message: string,
    options: {
      code?: string;
      cause?: Error;
      issues?: readonly string[];
      data?: Record<string, unknown>;
    } = {}
  ) {
    const { code = 'CONFIGURATION_ERROR', cause, issues = [], data } = options;

    const metadata: ErrorMetadata = { category: ErrorCategory.CONFIGURATION };
    if (cause !== undefined) {
      metadata.cause = cause;
    }
    if (data !== undefined || issues.length > 0) {
      metadata.data = { ...data, ...(issues.length > 0 && { issues: [...issues] }) };
    }

    super(message, code, metadata);
    this.issues = issues;
  }

  /**
   * Get formatted issue lines, one per invalid field
   */
  getFormattedIssues(): string[] {
    return [...this.issues];
  }
}

/**
 * A handler returned a promise where the active driver cannot wait for one
 */
export class HandlerContractError extends ReboundError {
  constructor(
    message: string,
    options: {
      event?: string;
      target?: string;
    } = {}
  ) {
    super(message, 'HANDLER_CONTRACT_ERROR', {
      category: ErrorCategory.HANDLER,
      data: { ...options },
    });
  }
}
