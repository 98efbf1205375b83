/**
 * LegacySigner - query-string signature for the requester API
 */

import { legacyHmacSha1, toBase64 } from './crypto.js';
import { formatTimestamp } from './format.js';
import type { Clock, RequestSignature } from './types.js';

/**
 * Service name covered by every signature
 */
export const SERVICE_NAME = 'AWSMechanicalTurkRequester';

/**
 * Compute the signature for one request.
 *
 * The signed string is service + operation + timestamp with no separators.
 *
 * @example
 * ```typescript
 * sign('AWSMechanicalTurkRequester', 'GetAccountBalance', '2014-08-15T12:00:00Z', 'test-secret');
 * ```
 */
export function sign(
  service: string,
  operation: string,
  timestamp: string,
  secretKey: string | Uint8Array
): string {
  const keyBytes = typeof secretKey === 'string' ? new TextEncoder().encode(secretKey) : secretKey;
  return toBase64(legacyHmacSha1(keyBytes, service + operation + timestamp));
}

export interface LegacySignerConfig {
  accessKeyId: string;
  secretAccessKey: string;
  service?: string; // default: "AWSMechanicalTurkRequester"
  clock?: Clock; // default: current time
}

export class LegacySigner {
  private readonly accessKeyId: string;
  private readonly secretKey: Uint8Array;
  private readonly service: string;
  private readonly clock: Clock;

  constructor(config: LegacySignerConfig) {
    this.accessKeyId = config.accessKeyId;
    this.secretKey = new TextEncoder().encode(config.secretAccessKey);
    this.service = config.service ?? SERVICE_NAME;
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Sign an operation at an explicit timestamp
   */
  signAt(operation: string, timestamp: string): string {
    return sign(this.service, operation, timestamp, this.secretKey);
  }

  /**
   * Sign an operation at the clock's current time.
   * A fresh timestamp is taken on every call.
   */
  signOperation(operation: string): RequestSignature {
    const timestamp = formatTimestamp(this.clock());
    return {
      accessKeyId: this.accessKeyId,
      operation,
      timestamp,
      signature: this.signAt(operation, timestamp),
    };
  }
}
