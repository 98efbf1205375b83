/**
 * Fluent configuration builder
 * @module config/builder
 */

import type { LogLevel } from '../observability/logging.js';
import type { ParameterBag } from '../params/types.js';
import type { Mode, MTurkConfig, NormalizedMTurkConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing client configuration.
 *
 * @example
 * ```typescript
 * const config = new MTurkConfigBuilder()
 *   .credentials(accessKeyId, secretAccessKey)
 *   .sandbox()
 *   .defaults({ LifetimeInSeconds: 86400 })
 *   .build();
 * ```
 */
export class MTurkConfigBuilder {
  private config: Partial<MTurkConfig> = {};

  /**
   * Sets the requester credentials.
   */
  credentials(accessKeyId: string, secretAccessKey: string): this {
    this.config.accessKeyId = accessKeyId;
    this.config.secretAccessKey = secretAccessKey;
    return this;
  }

  /**
   * Sets the initial mode.
   */
  mode(mode: Mode): this {
    this.config.mode = mode;
    return this;
  }

  /**
   * Starts in sandbox mode.
   */
  sandbox(): this {
    return this.mode('sandbox');
  }

  /**
   * Sets the production endpoint region.
   */
  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets the sandbox endpoint region.
   */
  sandboxRegion(region: string): this {
    this.config.sandboxRegion = region;
    return this;
  }

  /**
   * Sets a custom production endpoint URL.
   */
  endpoint(url: string): this {
    this.config.productionEndpoint = url;
    return this;
  }

  /**
   * Sets a custom sandbox endpoint URL.
   */
  sandboxEndpoint(url: string): this {
    this.config.sandboxEndpoint = url;
    return this;
  }

  /**
   * Sets the request timeout in milliseconds.
   */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /**
   * Adds production default parameters. Repeated calls merge.
   */
  defaults(params: ParameterBag): this {
    this.config.defaults = {
      ...this.config.defaults,
      production: { ...this.config.defaults?.production, ...params },
    };
    return this;
  }

  /**
   * Adds sandbox overrides of the default parameters. Repeated calls merge.
   */
  sandboxDefaults(params: ParameterBag): this {
    this.config.defaults = {
      ...this.config.defaults,
      sandbox: { ...this.config.defaults?.sandbox, ...params },
    };
    return this;
  }

  /**
   * Enables console logging at a level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Builds and validates the configuration.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedMTurkConfig {
    return normalizeConfig(this.config);
  }
}
