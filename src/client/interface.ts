/**
 * Client interfaces
 * @module client/interface
 */

import type { EndpointConfig, Mode } from '../config/types.js';
import type { OperationSpec } from '../operations/types.js';
import type { ParameterBag } from '../params/types.js';
import type { SignedRequest } from '../request/types.js';
import type { AccountService } from '../services/account.js';
import type { AssignmentService } from '../services/assignments.js';
import type { HITTypeService } from '../services/hit-types.js';
import type { HITService } from '../services/hits.js';
import type { NotificationService } from '../services/notifications.js';
import type { WorkerService } from '../services/workers.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * What services need from a client: run one declared operation
 */
export interface OperationInvoker {
  /**
   * Builds, signs and sends one request, then decodes and classifies the
   * response.
   *
   * @returns The decoded response tree on success
   * @throws {MissingParameterError | InvalidParameterError} Before sending
   * @throws {NetworkError} If the transport fails
   * @throws {NotAuthorizedError | RequestValidationError | UnclassifiedError}
   * If the response is not a success
   */
  invoke(spec: OperationSpec, params?: ParameterBag): Promise<ResponseTree>;

  /**
   * Builds the signed request without sending it
   */
  buildRequest(spec: OperationSpec, params?: ParameterBag): SignedRequest;
}

/**
 * Requester API client
 */
export interface MTurkClient extends OperationInvoker {
  /** Current mode */
  readonly mode: Mode;

  /** Endpoint and defaults for the current mode */
  readonly endpoint: EndpointConfig;

  readonly hits: HITService;
  readonly hitTypes: HITTypeService;
  readonly assignments: AssignmentService;
  readonly workers: WorkerService;
  readonly notifications: NotificationService;
  readonly account: AccountService;

  /**
   * Returns a client for another mode. The current client is unchanged.
   */
  withMode(mode: Mode): MTurkClient;

  /** Same as `withMode('sandbox')` */
  sandbox(): MTurkClient;

  /** Same as `withMode('production')` */
  production(): MTurkClient;
}
