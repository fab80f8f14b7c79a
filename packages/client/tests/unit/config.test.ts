/**
 * Unit tests for environment parsing and client configuration.
 */
import { describe, it, expect } from 'vitest';
import { DEFAULT_API_URL, createConfig, loadConfig, normalizeApiUrl, parseEnv } from '../../src/config/index.js';
import { buildLoggerOptions } from '../../src/lib/logger.js';

describe('parseEnv', () => {
  it('should apply defaults when only the token is set', () => {
    expect(parseEnv({ EXAROTON_API_TOKEN: 'test-secret' })).toEqual({
      EXAROTON_API_TOKEN: 'test-secret',
      EXAROTON_API_URL: 'https://api.exaroton.com/v1/',
      EXAROTON_REQUEST_TIMEOUT_MS: 30000,
      EXAROTON_LOG_LEVEL: 'info',
      NODE_ENV: 'production',
    });
  });

  it('should coerce the timeout from a string', () => {
    const env = parseEnv({ EXAROTON_API_TOKEN: 'test-secret', EXAROTON_REQUEST_TIMEOUT_MS: '5000' });

    expect(env.EXAROTON_REQUEST_TIMEOUT_MS).toBe(5000);
  });

  it('should list every invalid variable', () => {
    expect(() => parseEnv({ EXAROTON_LOG_LEVEL: 'loud' })).toThrowError(
      /EXAROTON_API_TOKEN: Required[\s\S]*EXAROTON_LOG_LEVEL/,
    );
  });

  it('should reject a malformed base URL', () => {
    expect(() => parseEnv({ EXAROTON_API_TOKEN: 'test-secret', EXAROTON_API_URL: 'not a url' })).toThrowError(
      /EXAROTON_API_URL/,
    );
  });
});

describe('loadConfig', () => {
  it('should build a frozen config from the environment', () => {
    const config = loadConfig({
      EXAROTON_API_TOKEN: 'test-secret',
      EXAROTON_API_URL: 'https://api.test.local/v1',
      EXAROTON_LOG_LEVEL: 'silent',
      NODE_ENV: 'development',
    });

    expect(config).toEqual({
      apiUrl: 'https://api.test.local/v1/',
      apiToken: 'test-secret',
      requestTimeoutMs: 30000,
      logLevel: 'silent',
      prettyLogs: true,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });
});

describe('createConfig', () => {
  it('should default everything except the token', () => {
    expect(createConfig({ apiToken: 'test-secret' })).toEqual({
      apiUrl: DEFAULT_API_URL,
      apiToken: 'test-secret',
      requestTimeoutMs: 30000,
      logLevel: 'info',
      prettyLogs: false,
    });
  });

  it('should reject an empty token', () => {
    expect(() => createConfig({ apiToken: '' })).toThrowError('apiToken is required');
  });
});

describe('normalizeApiUrl', () => {
  it('should append a trailing slash once', () => {
    expect(normalizeApiUrl('https://api.test.local/v1')).toBe('https://api.test.local/v1/');
    expect(normalizeApiUrl('https://api.test.local/v1/')).toBe('https://api.test.local/v1/');
  });
});

describe('buildLoggerOptions', () => {
  it('should use pino-pretty only for pretty logs', () => {
    expect(buildLoggerOptions({ logLevel: 'debug', prettyLogs: false }).transport).toBeUndefined();
    expect(buildLoggerOptions({ logLevel: 'debug', prettyLogs: true }).transport).toMatchObject({
      target: 'pino-pretty',
    });
  });

  it('should pass the level through', () => {
    expect(buildLoggerOptions({ logLevel: 'silent', prettyLogs: false }).level).toBe('silent');
  });
});
