/**
 * Unified Error System Export
 *
 * All client errors should be imported from this file.
 */

// Core error system
export {
  ApplicationError,
  ErrorCode,
  type ErrorContext,
  type DecodeIssue,
} from './ApplicationError.js';

// Resource errors
export {
  ResourceNotFoundError,
  MatchNotFoundError,
} from './ApplicationError.js';

// Operational errors
export {
  OperationalError,
  TransportError,
  TimeoutError,
  RequestCancelledError,
  ProviderError,
  RateLimitError,
  ProviderServerError,
  DecodeError,
} from './ApplicationError.js';

// Permanent errors (not retryable)
export {
  PermanentError,
  ConfigurationError,
} from './ApplicationError.js';
