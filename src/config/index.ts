/**
 * Configuration module
 * @module config
 */

export type {
  Mode,
  ModeDefaults,
  MTurkConfig,
  NormalizedMTurkConfig,
  EndpointConfig,
} from './types.js';

export {
  DEFAULT_TIMEOUT,
  DEFAULT_REGION,
  DEFAULT_MODE,
  productionEndpointUrl,
  sandboxEndpointUrl,
} from './defaults.js';

export { validateConfig, normalizeConfig, resolveEndpoint } from './validation.js';

export { createConfigFromEnv, ENV_VARS } from './env.js';

export { MTurkConfigBuilder } from './builder.js';
