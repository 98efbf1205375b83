/**
 * Notification Service
 *
 * @module services/notifications
 */

import { BaseService } from './base.js';
import type { NotifyWorkersRequest, SendTestEventNotificationRequest } from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * Notification service.
 *
 * @example
 * ```typescript
 * await client.notifications.sendTestEventNotification({
 *   TestEventType: 'AssignmentSubmitted',
 *   Notification: [
 *     {
 *       Destination: 'https://example.com/notify',
 *       Transport: 'REST',
 *       Version: '2006-05-05',
 *       EventType: ['AssignmentSubmitted', 'HITReviewable'],
 *     },
 *   ],
 * });
 * ```
 */
export class NotificationService extends BaseService {
  /**
   * Send a test event to a notification destination.
   */
  async sendTestEventNotification(
    request: SendTestEventNotificationRequest
  ): Promise<ResponseTree> {
    return this.call('sendTestEventNotification', request);
  }

  /**
   * Send an email message to a worker.
   */
  async notifyWorkers(request: NotifyWorkersRequest): Promise<ResponseTree> {
    return this.call('notifyWorkers', request);
  }
}
