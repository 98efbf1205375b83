/**
 * HIT Service
 *
 * Creating, inspecting and retiring HITs.
 *
 * @module services/hits
 */

import { BaseService } from './base.js';
import type {
  ChangeHITTypeOfHITRequest,
  CreateHITByLayoutIdRequest,
  CreateHITByTypeIdAndLayoutIdRequest,
  ExtendHITRequest,
  GetHITRequest,
  GetReviewableHITsRequest,
  HITIdRequest,
  SearchHITsRequest,
  SetHITAsReviewingRequest,
} from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * HIT service.
 *
 * @example
 * ```typescript
 * const created = await client.hits.createHITByTypeIdAndLayoutId({
 *   HITTypeId: '3ABC...',
 *   HITLayoutId: '2DEF...',
 *   LifetimeInSeconds: 86400,
 *   MaxAssignments: 3,
 *   HITLayoutParameter: [{ Name: 'image_url', Value: 'https://example.com/a.png' }],
 * });
 * getText(created, 'HIT', 'HITId');
 * ```
 */
export class HITService extends BaseService {
  /**
   * Create a HIT from an existing HIT type and layout.
   */
  async createHITByTypeIdAndLayoutId(
    request: CreateHITByTypeIdAndLayoutIdRequest = {}
  ): Promise<ResponseTree> {
    return this.call('createHITByTypeIdAndLayoutId', request);
  }

  /**
   * Create a HIT from a layout, describing the HIT type inline.
   */
  async createHITByLayoutId(request: CreateHITByLayoutIdRequest = {}): Promise<ResponseTree> {
    return this.call('createHITByLayoutId', request);
  }

  /**
   * Move a HIT to another HIT type.
   */
  async changeHITTypeOfHIT(request: ChangeHITTypeOfHITRequest): Promise<ResponseTree> {
    return this.call('changeHITTypeOfHIT', request);
  }

  async getHIT(request: GetHITRequest): Promise<ResponseTree> {
    return this.call('getHIT', request);
  }

  /**
   * List the requester's HITs, one page at a time.
   */
  async searchHITs(request: SearchHITsRequest = {}): Promise<ResponseTree> {
    return this.call('searchHITs', request);
  }

  /**
   * List HITs that are ready for review.
   */
  async getReviewableHITs(request: GetReviewableHITsRequest = {}): Promise<ResponseTree> {
    return this.call('getReviewableHITs', request);
  }

  /**
   * Mark a HIT as being reviewed, or revert it with `Revert: true`.
   */
  async setHITAsReviewing(request: SetHITAsReviewingRequest): Promise<ResponseTree> {
    return this.call('setHITAsReviewing', request);
  }

  /**
   * Add assignments to a HIT or push back its expiration.
   */
  async extendHIT(request: ExtendHITRequest): Promise<ResponseTree> {
    return this.call('extendHIT', request);
  }

  async forceExpireHIT(request: HITIdRequest): Promise<ResponseTree> {
    return this.call('forceExpireHIT', request);
  }

  async disableHIT(request: HITIdRequest): Promise<ResponseTree> {
    return this.call('disableHIT', request);
  }

  async disposeHIT(request: HITIdRequest): Promise<ResponseTree> {
    return this.call('disposeHIT', request);
  }
}
