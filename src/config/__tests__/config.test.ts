/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../errors/index.js';
import {
  MTurkConfigBuilder,
  createConfigFromEnv,
  normalizeConfig,
  resolveEndpoint,
} from '../index.js';

const CREDENTIALS = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };

function capture(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('normalizeConfig', () => {
  it('applies defaults', () => {
    expect(normalizeConfig(CREDENTIALS)).toEqual({
      ...CREDENTIALS,
      mode: 'production',
      region: 'us-east-1',
      sandboxRegion: 'us-east-1',
      productionEndpoint: 'https://mturk-requester.us-east-1.amazonaws.com',
      sandboxEndpoint: 'https://mturk-requester-sandbox.us-east-1.amazonaws.com',
      timeout: 30000,
      defaults: { production: {}, sandbox: {} },
      logLevel: undefined,
    });
  });

  it('builds endpoints from regions', () => {
    const config = normalizeConfig({ ...CREDENTIALS, region: 'eu-west-1', sandboxRegion: 'us-west-2' });
    expect(config.productionEndpoint).toBe('https://mturk-requester.eu-west-1.amazonaws.com');
    expect(config.sandboxEndpoint).toBe('https://mturk-requester-sandbox.us-west-2.amazonaws.com');
  });

  it('keeps custom endpoints', () => {
    const config = normalizeConfig({ ...CREDENTIALS, productionEndpoint: 'http://localhost:8080' });
    expect(config.productionEndpoint).toBe('http://localhost:8080');
  });

  it('requires credentials', () => {
    const error = capture(() => normalizeConfig({ accessKeyId: 'test-access-key' }));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ type: 'config_error', code: 'MISSING_CREDENTIALS' });
  });

  it('rejects an invalid timeout', () => {
    const error = capture(() => normalizeConfig({ ...CREDENTIALS, timeout: -5 }));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'INVALID_CONFIG', details: { paramName: 'timeout' } });
  });

  it('rejects a non-http endpoint', () => {
    expect(() => normalizeConfig({ ...CREDENTIALS, sandboxEndpoint: 'ftp://example.com' })).toThrow(
      ConfigError
    );
  });
});

describe('resolveEndpoint', () => {
  const config = normalizeConfig({
    ...CREDENTIALS,
    defaults: {
      production: { LifetimeInSeconds: 86400, MaxAssignments: 5 },
      sandbox: { MaxAssignments: 1 },
    },
  });

  it('uses production defaults alone in production', () => {
    expect(resolveEndpoint(config, 'production')).toEqual({
      mode: 'production',
      url: 'https://mturk-requester.us-east-1.amazonaws.com',
      region: 'us-east-1',
      defaults: { LifetimeInSeconds: 86400, MaxAssignments: 5 },
    });
  });

  it('layers sandbox defaults over production defaults', () => {
    expect(resolveEndpoint(config, 'sandbox')).toEqual({
      mode: 'sandbox',
      url: 'https://mturk-requester-sandbox.us-east-1.amazonaws.com',
      region: 'us-east-1',
      defaults: { LifetimeInSeconds: 86400, MaxAssignments: 1 },
    });
  });

  it('defaults to the configured mode', () => {
    expect(resolveEndpoint(config).mode).toBe('production');
  });

  it('returns frozen defaults', () => {
    const { defaults } = resolveEndpoint(config, 'sandbox');

    expect(Object.isFrozen(defaults)).toBe(true);
    expect(Reflect.set(defaults, 'MaxAssignments', 99)).toBe(false);
    expect(defaults.MaxAssignments).toBe(1);
  });

  it('copies nested defaults away from the caller', () => {
    const keywords = ['a'];
    const normalized = normalizeConfig({ ...CREDENTIALS, defaults: { production: { Keywords: keywords } } });
    keywords.push('injected');

    const { defaults } = resolveEndpoint(normalized, 'production');
    expect(defaults.Keywords).toEqual(['a']);
    expect(Object.isFrozen(defaults.Keywords)).toBe(true);
  });
});

describe('createConfigFromEnv', () => {
  it('reads every variable', () => {
    const config = createConfigFromEnv({
      MTURK_ACCESS_KEY_ID: 'test-access-key',
      MTURK_SECRET_ACCESS_KEY: 'test-secret',
      MTURK_MODE: 'sandbox',
      MTURK_REGION: 'eu-west-1',
      MTURK_SANDBOX_REGION: 'us-west-2',
      MTURK_SANDBOX_ENDPOINT: 'http://localhost:9000',
      MTURK_TIMEOUT_MS: '5000',
      MTURK_LOG_LEVEL: 'DEBUG',
    });

    expect(config).toMatchObject({
      mode: 'sandbox',
      region: 'eu-west-1',
      sandboxRegion: 'us-west-2',
      productionEndpoint: 'https://mturk-requester.eu-west-1.amazonaws.com',
      sandboxEndpoint: 'http://localhost:9000',
      timeout: 5000,
      logLevel: 'debug',
    });
  });

  it('treats blank variables as unset', () => {
    const config = createConfigFromEnv({
      MTURK_ACCESS_KEY_ID: 'test-access-key',
      MTURK_SECRET_ACCESS_KEY: 'test-secret',
      MTURK_MODE: '  ',
    });
    expect(config.mode).toBe('production');
  });

  it('fails without credentials', () => {
    expect(() => createConfigFromEnv({})).toThrow(ConfigError);
  });

  it('rejects an unknown mode', () => {
    expect(() =>
      createConfigFromEnv({ ...envCredentials(), MTURK_MODE: 'staging' })
    ).toThrow('MTURK_MODE must be "production" or "sandbox", got: staging');
  });

  it('rejects a non-numeric timeout', () => {
    expect(() => createConfigFromEnv({ ...envCredentials(), MTURK_TIMEOUT_MS: 'soon' })).toThrow(
      'MTURK_TIMEOUT_MS must be a valid integer, got: soon'
    );
  });

  it('rejects a timeout with trailing characters', () => {
    expect(() => createConfigFromEnv({ ...envCredentials(), MTURK_TIMEOUT_MS: '30s' })).toThrow(
      'MTURK_TIMEOUT_MS must be a valid integer, got: 30s'
    );
  });
});

function envCredentials(): Record<string, string> {
  return { MTURK_ACCESS_KEY_ID: 'test-access-key', MTURK_SECRET_ACCESS_KEY: 'test-secret' };
}

describe('MTurkConfigBuilder', () => {
  it('builds a sandbox configuration with merged defaults', () => {
    const config = new MTurkConfigBuilder()
      .credentials('test-access-key', 'test-secret')
      .sandbox()
      .timeout(1000)
      .defaults({ LifetimeInSeconds: 60 })
      .defaults({ MaxAssignments: 3 })
      .sandboxDefaults({ MaxAssignments: 1 })
      .logLevel('warn')
      .build();

    expect(config.mode).toBe('sandbox');
    expect(config.timeout).toBe(1000);
    expect(config.logLevel).toBe('warn');
    expect(config.defaults).toEqual({
      production: { LifetimeInSeconds: 60, MaxAssignments: 3 },
      sandbox: { MaxAssignments: 1 },
    });
  });

  it('validates on build', () => {
    expect(() => new MTurkConfigBuilder().build()).toThrow(ConfigError);
  });
});
