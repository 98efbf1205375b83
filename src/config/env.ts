/**
 * Environment variable configuration loading
 * @module config/env
 */

import { ConfigError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/logging.js';
import type { Mode, MTurkConfig, NormalizedMTurkConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  ACCESS_KEY_ID: 'MTURK_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'MTURK_SECRET_ACCESS_KEY',
  MODE: 'MTURK_MODE',
  REGION: 'MTURK_REGION',
  SANDBOX_REGION: 'MTURK_SANDBOX_REGION',
  ENDPOINT: 'MTURK_ENDPOINT',
  SANDBOX_ENDPOINT: 'MTURK_SANDBOX_ENDPOINT',
  TIMEOUT_MS: 'MTURK_TIMEOUT_MS',
  LOG_LEVEL: 'MTURK_LOG_LEVEL',
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Parses an integer from an environment variable.
 *
 * @throws {ConfigError} If value is not a valid integer
 */
function parseIntEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw ConfigError.invalidConfig(name, `${name} must be a valid integer, got: ${value}`);
  }

  return parsed;
}

function parseModeEnv(value: string | undefined, name: string): Mode | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value !== 'production' && value !== 'sandbox') {
    throw ConfigError.invalidConfig(name, `${name} must be "production" or "sandbox", got: ${value}`);
  }
  return value;
}

function parseLogLevelEnv(value: string | undefined, name: string): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw ConfigError.invalidConfig(name, `${name} is not a log level: ${value}`);
  }
  return level;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables:
 * - MTURK_ACCESS_KEY_ID (required): requester access key ID
 * - MTURK_SECRET_ACCESS_KEY (required): requester secret access key
 * - MTURK_MODE (optional): "production" or "sandbox"
 * - MTURK_REGION (optional): production endpoint region
 * - MTURK_SANDBOX_REGION (optional): sandbox endpoint region
 * - MTURK_ENDPOINT (optional): custom production endpoint URL
 * - MTURK_SANDBOX_ENDPOINT (optional): custom sandbox endpoint URL
 * - MTURK_TIMEOUT_MS (optional): request timeout in milliseconds
 * - MTURK_LOG_LEVEL (optional): console log level
 *
 * @param env - Variables to read; defaults to `process.env`
 * @throws {ConfigError} If required variables are missing or invalid
 */
export function createConfigFromEnv(env: Env = process.env): NormalizedMTurkConfig {
  const config: Partial<MTurkConfig> = {
    accessKeyId: readEnv(env, ENV_VARS.ACCESS_KEY_ID),
    secretAccessKey: readEnv(env, ENV_VARS.SECRET_ACCESS_KEY),
    mode: parseModeEnv(readEnv(env, ENV_VARS.MODE), ENV_VARS.MODE),
    region: readEnv(env, ENV_VARS.REGION),
    sandboxRegion: readEnv(env, ENV_VARS.SANDBOX_REGION),
    productionEndpoint: readEnv(env, ENV_VARS.ENDPOINT),
    sandboxEndpoint: readEnv(env, ENV_VARS.SANDBOX_ENDPOINT),
    timeout: parseIntEnv(readEnv(env, ENV_VARS.TIMEOUT_MS), ENV_VARS.TIMEOUT_MS),
    logLevel: parseLogLevelEnv(readEnv(env, ENV_VARS.LOG_LEVEL), ENV_VARS.LOG_LEVEL),
  };

  return normalizeConfig(config);
}
