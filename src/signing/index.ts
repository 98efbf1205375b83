/**
 * Legacy query-string signing
 *
 * - HMAC-SHA1 over service + operation + timestamp
 * - Timestamps in YYYY-MM-DDTHH:mm:ssZ (UTC)
 * - Injectable clock for reproducible signatures
 */

export type { Clock, RequestSignature } from './types.js';

export { LegacySigner, type LegacySignerConfig, SERVICE_NAME, sign } from './signer.js';

export { legacyHmacSha1, toBase64, SHA1_BLOCK_SIZE } from './crypto.js';

export { formatTimestamp, parseTimestamp } from './format.js';
