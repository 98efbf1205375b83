/**
 * Worker Service
 *
 * Bonuses and blocks.
 *
 * @module services/workers
 */

import { BaseService } from './base.js';
import type {
  BlockWorkerRequest,
  GetBlockedWorkersRequest,
  GetBonusPaymentsRequest,
  GrantBonusRequest,
  UnblockWorkerRequest,
} from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

export class WorkerService extends BaseService {
  /**
   * Pay a worker a bonus for an assignment. Pass `UniqueRequestToken` to
   * make the grant safe to repeat.
   */
  async grantBonus(request: GrantBonusRequest): Promise<ResponseTree> {
    return this.call('grantBonus', request);
  }

  async getBonusPayments(request: GetBonusPaymentsRequest = {}): Promise<ResponseTree> {
    return this.call('getBonusPayments', request);
  }

  async blockWorker(request: BlockWorkerRequest): Promise<ResponseTree> {
    return this.call('blockWorker', request);
  }

  async unblockWorker(request: UnblockWorkerRequest): Promise<ResponseTree> {
    return this.call('unblockWorker', request);
  }

  async getBlockedWorkers(request: GetBlockedWorkersRequest = {}): Promise<ResponseTree> {
    return this.call('getBlockedWorkers', request);
  }
}
