/**
 * Default configuration values
 * @module config/defaults
 */

import type { Mode } from './types.js';

/**
 * Default request timeout in milliseconds (30 seconds).
 */
export const DEFAULT_TIMEOUT = 30000;

/**
 * Default region for both endpoints.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Default mode.
 */
export const DEFAULT_MODE: Mode = 'production';

/**
 * Builds the production endpoint URL for a region.
 */
export function productionEndpointUrl(region: string): string {
  return `https://mturk-requester.${region}.amazonaws.com`;
}

/**
 * Builds the sandbox endpoint URL for a region.
 */
export function sandboxEndpointUrl(region: string): string {
  return `https://mturk-requester-sandbox.${region}.amazonaws.com`;
}
