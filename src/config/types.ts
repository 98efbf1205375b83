/**
 * Configuration type definitions
 * @module config/types
 */

import type { LogLevel } from '../observability/logging.js';
import type { ParameterBag } from '../params/types.js';

/**
 * Which service environment requests go to
 */
export type Mode = 'production' | 'sandbox';

/**
 * Default parameters per mode.
 * Sandbox values override production values key by key.
 */
export interface ModeDefaults {
  production?: ParameterBag;
  sandbox?: ParameterBag;
}

/**
 * Client configuration.
 */
export interface MTurkConfig {
  /**
   * Requester access key ID.
   */
  accessKeyId: string;

  /**
   * Requester secret access key. Never logged.
   */
  secretAccessKey: string;

  /**
   * Initial mode.
   * @default 'production'
   */
  mode?: Mode;

  /**
   * Region of the production endpoint.
   * @default 'us-east-1'
   */
  region?: string;

  /**
   * Region of the sandbox endpoint.
   * @default 'us-east-1'
   */
  sandboxRegion?: string;

  /**
   * Custom production endpoint URL.
   * If not provided, will be constructed from region.
   */
  productionEndpoint?: string;

  /**
   * Custom sandbox endpoint URL.
   * If not provided, will be constructed from sandboxRegion.
   */
  sandboxEndpoint?: string;

  /**
   * Request timeout in milliseconds.
   * @default 30000
   */
  timeout?: number;

  /**
   * Default parameters merged into every call.
   */
  defaults?: ModeDefaults;

  /**
   * Enables console logging at this level.
   */
  logLevel?: LogLevel;
}

/**
 * Normalized configuration with all required fields populated.
 */
export interface NormalizedMTurkConfig {
  accessKeyId: string;
  secretAccessKey: string;
  mode: Mode;
  region: string;
  sandboxRegion: string;
  productionEndpoint: string;
  sandboxEndpoint: string;
  timeout: number;
  defaults: Required<ModeDefaults>;
  logLevel?: LogLevel;
}

/**
 * Endpoint and defaults in effect for one mode
 */
export interface EndpointConfig {
  readonly mode: Mode;
  readonly url: string;
  readonly region: string;
  readonly defaults: Readonly<ParameterBag>;
}
