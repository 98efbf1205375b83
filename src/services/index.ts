/**
 * Services module
 *
 * @module services
 */

export { BaseService } from './base.js';
export { HITService } from './hits.js';
export { HITTypeService } from './hit-types.js';
export { AssignmentService } from './assignments.js';
export { WorkerService } from './workers.js';
export { NotificationService } from './notifications.js';
export { AccountService } from './account.js';
