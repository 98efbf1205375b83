/**
 * Base Service Class
 *
 * Abstract base class for all service implementations.
 *
 * @module services/base
 */

import type { OperationInvoker } from '../client/interface.js';
import { OPERATIONS, type OperationName } from '../operations/definitions.js';
import type { ParameterBag } from '../params/types.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * Base service class for requester API operations.
 *
 * @example
 * ```typescript
 * class HITService extends BaseService {
 *   async getHIT(request: GetHITRequest): Promise<ResponseTree> {
 *     return this.call('getHIT', request);
 *   }
 * }
 * ```
 */
export abstract class BaseService {
  /**
   * Client that runs the operations.
   */
  protected readonly client: OperationInvoker;

  constructor(client: OperationInvoker) {
    this.client = client;
  }

  /**
   * Run a declared operation.
   *
   * @param name - Key of the operation in OPERATIONS
   * @param params - Call parameters; mode defaults fill the gaps
   */
  protected async call(name: OperationName, params: ParameterBag = {}): Promise<ResponseTree> {
    return this.client.invoke(OPERATIONS[name], params);
  }
}
