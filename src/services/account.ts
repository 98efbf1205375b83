/**
 * Account Service
 *
 * Balance and requester statistics.
 *
 * @module services/account
 */

import { BaseService } from './base.js';
import type {
  GetRequesterStatisticRequest,
  GetRequesterWorkerStatisticRequest,
} from '../types/requests.js';
import type { ResponseTree } from '../xml/types.js';

/**
 * Account service.
 *
 * @example
 * ```typescript
 * const balance = await client.account.getAccountBalance();
 * getText(balance, 'GetAccountBalanceResult', 'AvailableBalance', 'Amount'); // '10000.00'
 * ```
 */
export class AccountService extends BaseService {
  /**
   * Get the requester's available balance.
   */
  async getAccountBalance(): Promise<ResponseTree> {
    return this.call('getAccountBalance');
  }

  /**
   * Get a requester statistic over a time period.
   */
  async getRequesterStatistic(request: GetRequesterStatisticRequest): Promise<ResponseTree> {
    return this.call('getRequesterStatistic', request);
  }

  /**
   * Get a statistic for one worker's work on the requester's HITs.
   */
  async getRequesterWorkerStatistic(
    request: GetRequesterWorkerStatisticRequest
  ): Promise<ResponseTree> {
    return this.call('getRequesterWorkerStatistic', request);
  }
}
