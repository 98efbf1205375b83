/**
 * Configuration validation and normalization
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import { LOG_LEVELS } from '../observability/logging.js';
import type { ParameterBag } from '../params/types.js';
import {
  DEFAULT_MODE,
  DEFAULT_REGION,
  DEFAULT_TIMEOUT,
  productionEndpointUrl,
  sandboxEndpointUrl,
} from './defaults.js';
import type { EndpointConfig, Mode, MTurkConfig, NormalizedMTurkConfig } from './types.js';

const parameterBagSchema = z.custom<ParameterBag>(
  (value) => typeof value === 'object' && value !== null && !Array.isArray(value),
  { message: 'Expected a record of parameters' }
);

const endpointSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: 'Endpoint must use http or https' });

const regionSchema = z.string().regex(/^[a-z0-9-]+$/, 'Region must be lowercase letters, digits and hyphens');

const configSchema = z.object({
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  mode: z.enum(['production', 'sandbox']).optional(),
  region: regionSchema.optional(),
  sandboxRegion: regionSchema.optional(),
  productionEndpoint: endpointSchema.optional(),
  sandboxEndpoint: endpointSchema.optional(),
  timeout: z.number().int().positive().optional(),
  defaults: z
    .object({
      production: parameterBagSchema.optional(),
      sandbox: parameterBagSchema.optional(),
    })
    .optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
});

/**
 * Validates client configuration.
 *
 * @returns The configuration, typed
 * @throws {ConfigError} If credentials are missing or a field is invalid
 */
export function validateConfig(config: Partial<MTurkConfig>): MTurkConfig {
  if (!config.accessKeyId || !config.secretAccessKey) {
    throw ConfigError.missingCredentials();
  }

  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    const paramName = result.error.issues[0]?.path.join('.') ?? 'config';
    throw ConfigError.invalidConfig(paramName, `Invalid configuration: ${issues.join(', ')}`);
  }

  return result.data;
}

/**
 * Normalizes configuration by applying defaults and validating.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: Partial<MTurkConfig>): NormalizedMTurkConfig {
  const valid = validateConfig(config);

  const region = valid.region ?? DEFAULT_REGION;
  const sandboxRegion = valid.sandboxRegion ?? DEFAULT_REGION;

  return {
    accessKeyId: valid.accessKeyId,
    secretAccessKey: valid.secretAccessKey,
    mode: valid.mode ?? DEFAULT_MODE,
    region,
    sandboxRegion,
    productionEndpoint: valid.productionEndpoint ?? productionEndpointUrl(region),
    sandboxEndpoint: valid.sandboxEndpoint ?? sandboxEndpointUrl(sandboxRegion),
    timeout: valid.timeout ?? DEFAULT_TIMEOUT,
    defaults: {
      production: structuredClone({ ...valid.defaults?.production }),
      sandbox: structuredClone({ ...valid.defaults?.sandbox }),
    },
    logLevel: valid.logLevel,
  };
}

function freezeDeep<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      freezeDeep(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Resolves the endpoint and defaults for a mode.
 *
 * Production uses the production defaults alone. Sandbox uses the
 * production defaults overridden by the sandbox defaults. The resolved
 * defaults are a frozen copy.
 */
export function resolveEndpoint(
  config: NormalizedMTurkConfig,
  mode: Mode = config.mode
): EndpointConfig {
  if (mode === 'sandbox') {
    return {
      mode,
      url: config.sandboxEndpoint,
      region: config.sandboxRegion,
      defaults: freezeDeep(
        structuredClone({ ...config.defaults.production, ...config.defaults.sandbox })
      ),
    };
  }

  return {
    mode,
    url: config.productionEndpoint,
    region: config.region,
    defaults: freezeDeep(structuredClone({ ...config.defaults.production })),
  };
}
