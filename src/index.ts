/**
 * Signed query-string client for the Mechanical Turk requester API
 *
 * @example
 * ```typescript
 * import { createClient, getText } from 'mturk-requester-client';
 *
 * const client = createClient({
 *   accessKeyId: process.env.MTURK_ACCESS_KEY_ID ?? '',
 *   secretAccessKey: process.env.MTURK_SECRET_ACCESS_KEY ?? '',
 * }).sandbox();
 *
 * const balance = await client.account.getAccountBalance();
 * getText(balance, 'GetAccountBalanceResult', 'AvailableBalance', 'FormattedPrice');
 * ```
 */

// Client
export * from './client/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Logging
export * from './observability/index.js';

// Operations
export * from './operations/index.js';

// Parameters and encoders
export * from './params/index.js';

// Request building
export * from './request/index.js';

// Response classification
export * from './response/index.js';

// Services
export * from './services/index.js';

// Signing
export * from './signing/index.js';

// Transport
export * from './transport/index.js';

// Request types
export * from './types/index.js';

// Response decoding
export * from './xml/index.js';
