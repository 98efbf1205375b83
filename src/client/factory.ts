/**
 * Factory functions for creating requester API clients
 * @module client/factory
 */

import { createConfigFromEnv } from '../config/env.js';
import type { MTurkConfig, NormalizedMTurkConfig } from '../config/types.js';
import { normalizeConfig } from '../config/validation.js';
import { createLogger, type Logger } from '../observability/logging.js';
import type { Clock } from '../signing/types.js';
import { createFetchTransport } from '../transport/fetch-transport.js';
import type { HttpTransport } from '../transport/types.js';
import { MTurkClientImpl } from './client.js';
import type { MTurkClient } from './interface.js';

/**
 * Optional collaborators for a client
 */
export interface ClientOptions {
  /** HTTP transport; defaults to a fetch transport with the configured timeout */
  transport?: HttpTransport;
  /** Logger; defaults to a console logger at the configured level, or none */
  logger?: Logger;
  /** Clock used for request timestamps */
  clock?: Clock;
}

function createFromNormalized(config: NormalizedMTurkConfig, options: ClientOptions): MTurkClient {
  return new MTurkClientImpl(config, {
    transport: options.transport ?? createFetchTransport(config.timeout),
    logger: options.logger ?? createLogger(config.logLevel),
    clock: options.clock,
  });
}

/**
 * Creates a client from a configuration object
 *
 * @throws {ConfigError} If configuration is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({
 *   accessKeyId: process.env.MTURK_ACCESS_KEY_ID ?? '',
 *   secretAccessKey: process.env.MTURK_SECRET_ACCESS_KEY ?? '',
 *   mode: 'sandbox',
 *   defaults: { production: { LifetimeInSeconds: 86400 } },
 * });
 *
 * const balance = await client.account.getAccountBalance();
 * ```
 */
export function createClient(config: MTurkConfig, options: ClientOptions = {}): MTurkClient {
  return createFromNormalized(normalizeConfig(config), options);
}

/**
 * Creates a client from MTURK_* environment variables
 *
 * @throws {ConfigError} If required environment variables are missing or invalid
 */
export function createClientFromEnv(options: ClientOptions = {}): MTurkClient {
  return createFromNormalized(createConfigFromEnv(), options);
}
