/**
 * Error inspection utilities
 * @module errors/guards
 */

import { MTurkError, type MTurkErrorType } from './error.js';

/**
 * Checks if an error is an MTurkError
 */
export function isMTurkError(error: unknown): error is MTurkError {
  return error instanceof MTurkError;
}

/**
 * Checks if an error is an MTurkError of the given type
 *
 * @example
 * ```typescript
 * try {
 *   await client.assignments.approveAssignment({ AssignmentId: 'A1' });
 * } catch (error) {
 *   if (isErrorType(error, 'request_invalid')) {
 *     console.log(error.toJSON());
 *   }
 * }
 * ```
 */
export function isErrorType(error: unknown, type: MTurkErrorType): error is MTurkError {
  return isMTurkError(error) && error.type === type;
}
