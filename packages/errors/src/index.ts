/**
 * Error module - errors raised by the retry toolkit and helpers for classifying thrown values
 */

// Core error types and enums
export { ErrorCategory, ReboundError, type ErrorMetadata } from './types.js';

// Concrete errors
export { ConfigurationError, HandlerContractError } from './domain-errors.js';

// Helpers
export {
  type ErrorClass,
  matchesErrorType,
  describeError,
  extractErrorInfo,
} from './utils.js';
