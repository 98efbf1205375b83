/**
 * Operation declaration types
 * @module operations/types
 */

import type { StructuredField } from '../params/types.js';

/**
 * Static description of one API operation
 */
export interface OperationSpec {
  /** Wire operation name, e.g. `CreateHIT` */
  readonly operation: string;
  /** Scalar keys that must be present after defaults are merged */
  readonly required: readonly string[];
  /** Scalar keys sent only when present */
  readonly optional: readonly string[];
  /** Structured fields, each expanded by its encoder; all are required */
  readonly structured: readonly StructuredField[];
  /** Child of the decoded response carrying `Request.IsValid` */
  readonly resultKey: string;
}
