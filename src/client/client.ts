/**
 * Main requester API client implementation
 * @module client/client
 */

import type { EndpointConfig, Mode, NormalizedMTurkConfig } from '../config/types.js';
import { resolveEndpoint } from '../config/validation.js';
import { isMTurkError } from '../errors/index.js';
import { logFailure, logRequest, logSuccess, type Logger } from '../observability/logging.js';
import type { OperationSpec } from '../operations/types.js';
import type { ParameterBag } from '../params/types.js';
import { buildRequest } from '../request/builder.js';
import type { SignedRequest } from '../request/types.js';
import { classifyResponse } from '../response/classifier.js';
import { AccountService } from '../services/account.js';
import { AssignmentService } from '../services/assignments.js';
import { HITTypeService } from '../services/hit-types.js';
import { HITService } from '../services/hits.js';
import { NotificationService } from '../services/notifications.js';
import { WorkerService } from '../services/workers.js';
import { LegacySigner } from '../signing/signer.js';
import type { Clock } from '../signing/types.js';
import type { HttpTransport } from '../transport/types.js';
import { decodeResponse } from '../xml/parser.js';
import type { ResponseTree } from '../xml/types.js';
import type { MTurkClient } from './interface.js';

/**
 * Collaborators shared by every mode of a client
 */
export interface ClientDependencies {
  transport: HttpTransport;
  logger: Logger;
  clock?: Clock;
}

/**
 * Main requester API client implementation
 *
 * Credentials and endpoint are fixed at construction. Switching mode
 * returns a new client sharing the transport, logger and clock.
 */
export class MTurkClientImpl implements MTurkClient {
  readonly endpoint: EndpointConfig;

  readonly hits: HITService;
  readonly hitTypes: HITTypeService;
  readonly assignments: AssignmentService;
  readonly workers: WorkerService;
  readonly notifications: NotificationService;
  readonly account: AccountService;

  private readonly config: NormalizedMTurkConfig;
  private readonly deps: ClientDependencies;
  private readonly signer: LegacySigner;

  /**
   * @param config - Normalized configuration
   * @param deps - Transport, logger and optional clock
   * @param mode - Mode to use; defaults to the configured mode
   */
  constructor(config: NormalizedMTurkConfig, deps: ClientDependencies, mode: Mode = config.mode) {
    this.config = config;
    this.deps = deps;
    this.endpoint = resolveEndpoint(config, mode);
    this.signer = new LegacySigner({
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
      clock: deps.clock,
    });

    this.hits = new HITService(this);
    this.hitTypes = new HITTypeService(this);
    this.assignments = new AssignmentService(this);
    this.workers = new WorkerService(this);
    this.notifications = new NotificationService(this);
    this.account = new AccountService(this);
  }

  get mode(): Mode {
    return this.endpoint.mode;
  }

  withMode(mode: Mode): MTurkClient {
    return new MTurkClientImpl(this.config, this.deps, mode);
  }

  sandbox(): MTurkClient {
    return this.withMode('sandbox');
  }

  production(): MTurkClient {
    return this.withMode('production');
  }

  buildRequest(spec: OperationSpec, params: ParameterBag = {}): SignedRequest {
    return buildRequest(spec, params, {
      endpoint: this.endpoint.url,
      defaults: this.endpoint.defaults,
      signer: this.signer,
    });
  }

  async invoke(spec: OperationSpec, params: ParameterBag = {}): Promise<ResponseTree> {
    const { logger, transport } = this.deps;
    const started = Date.now();

    try {
      const request = this.buildRequest(spec, params);
      logRequest(logger, spec.operation, this.mode, this.endpoint.url);

      const response = await transport.send({ method: 'GET', url: request.url, headers: {} });
      const tree = decodeResponse(response.body, response.status);
      const result = classifyResponse(response.status, tree, spec.resultKey);

      logSuccess(logger, spec.operation, response.status, Date.now() - started);
      return result;
    } catch (error) {
      if (isMTurkError(error)) {
        logFailure(logger, spec.operation, error);
      }
      throw error;
    }
  }
}
