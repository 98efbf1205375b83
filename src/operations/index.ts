/**
 * Operation declarations
 */

export type { OperationSpec } from './types.js';
export { OPERATIONS, defineOperation, type OperationName } from './definitions.js';
