/**
 * Assignment Service
 *
 * Reviewing the work submitted for HITs.
 *
 * @module services/assignments
 */

import { BaseService } from './base.js';
import type {
  AssignmentFeedbackRequest,
  GetAssignmentRequest,
  GetAssignmentsForHITRequest,
  GetFileUploadURLRequest,
} from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * Assignment service.
 *
 * @example
 * ```typescript
 * const page = await client.assignments.getAssignmentsForHIT({
 *   HITId: '3XYZ...',
 *   AssignmentStatus: 'Submitted',
 * });
 * for (const assignment of normalizeArray(getNode(page, 'GetAssignmentsForHITResult', 'Assignment'))) {
 *   await client.assignments.approveAssignment({ AssignmentId: getText(assignment, 'AssignmentId') ?? '' });
 * }
 * ```
 */
export class AssignmentService extends BaseService {
  /**
   * List the assignments of a HIT, one page at a time.
   */
  async getAssignmentsForHIT(request: GetAssignmentsForHITRequest): Promise<ResponseTree> {
    return this.call('getAssignmentsForHIT', request);
  }

  async getAssignment(request: GetAssignmentRequest): Promise<ResponseTree> {
    return this.call('getAssignment', request);
  }

  /**
   * Approve a submitted assignment and pay the worker.
   */
  async approveAssignment(request: AssignmentFeedbackRequest): Promise<ResponseTree> {
    return this.call('approveAssignment', request);
  }

  async rejectAssignment(request: AssignmentFeedbackRequest): Promise<ResponseTree> {
    return this.call('rejectAssignment', request);
  }

  /**
   * Approve an assignment that was previously rejected.
   */
  async approveRejectedAssignment(request: AssignmentFeedbackRequest): Promise<ResponseTree> {
    return this.call('approveRejectedAssignment', request);
  }

  /**
   * Get a temporary URL for a file a worker uploaded as an answer.
   */
  async getFileUploadURL(request: GetFileUploadURLRequest): Promise<ResponseTree> {
    return this.call('getFileUploadURL', request);
  }
}
