/**
 * Error helpers shared by the retry packages
 */

import { ReboundError } from './types.js';

/**
 * Any error class, including abstract ones, usable on the right side of `instanceof`
 */
export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Check whether a thrown value is an instance of one of the given error classes
 */
export function matchesErrorType(
  error: unknown,
  types: ErrorClass | readonly ErrorClass[]
): boolean {
  const candidates: readonly ErrorClass[] = typeof types === 'function' ? [types] : types;
  return candidates.some(type => error instanceof type);
}

/**
 * One-line description of a thrown value, e.g. `TypeError: bad input`
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  return String(error);
}

/**
 * Extract loggable information from any thrown value
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof ReboundError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
