/**
 * Request builder types
 * @module request/types
 */

import type { ParameterBag } from '../params/types.js';
import type { LegacySigner } from '../signing/signer.js';

/**
 * Everything besides the call's own parameters needed to build a request
 */
export interface BuildContext {
  /** Endpoint URL the query string is appended to */
  endpoint: string;
  /** Mode defaults; caller parameters override them key by key */
  defaults?: Readonly<ParameterBag>;
  /** Signer holding the credentials and clock */
  signer: LegacySigner;
}

/**
 * A fully assembled, signed GET request
 */
export interface SignedRequest {
  url: string;
  operation: string;
  timestamp: string;
  signature: string;
}
