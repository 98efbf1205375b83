/**
 * Error system for the Mechanical Turk requester client
 * @module errors
 */

// Base error class
export { MTurkError, type MTurkErrorParams, type MTurkErrorType } from './error.js';

// Error categories
export {
  ConfigError,
  InvalidParameterError,
  MissingParameterError,
  NetworkError,
  NotAuthorizedError,
  RequestValidationError,
  UnclassifiedError,
} from './categories.js';

// Inspection utilities
export { isMTurkError, isErrorType } from './guards.js';
