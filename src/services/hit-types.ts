/**
 * HIT Type Service
 *
 * @module services/hit-types
 */

import { BaseService } from './base.js';
import type { RegisterHITTypeRequest, SetHITTypeNotificationRequest } from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * HIT type service: registering HIT types and their notifications.
 */
export class HITTypeService extends BaseService {
  /**
   * Register a HIT type. Registering the same properties twice returns the
   * same HIT type ID.
   */
  async registerHITType(request: RegisterHITTypeRequest = {}): Promise<ResponseTree> {
    return this.call('registerHITType', request);
  }

  /**
   * Set, replace or toggle the notification for a HIT type.
   */
  async setHITTypeNotification(request: SetHITTypeNotificationRequest): Promise<ResponseTree> {
    return this.call('setHITTypeNotification', request);
  }
}
