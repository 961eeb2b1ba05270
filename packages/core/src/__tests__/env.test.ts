import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_API_BASE_URL, DEFAULT_TIMEOUT_MS, loadFastlyEnv } from '../env.js';

describe('loadFastlyEnv', () => {
  it('should apply defaults when only the API key is set', () => {
    const env = loadFastlyEnv({ FASTLY_API_KEY: 'test-api-key' });

    expect(env.FASTLY_API_KEY).toBe('test-api-key');
    expect(env.FASTLY_API_BASE_URL).toBe(DEFAULT_API_BASE_URL);
    expect(env.FASTLY_TIMEOUT_MS).toBe(DEFAULT_TIMEOUT_MS);
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.FASTLY_USER).toBeUndefined();
  });

  it('should parse the timeout as milliseconds', () => {
    const env = loadFastlyEnv({ FASTLY_API_KEY: 'test-api-key', FASTLY_TIMEOUT_MS: '5000' });
    expect(env.FASTLY_TIMEOUT_MS).toBe(5000);
  });

  it('should accept user and password together', () => {
    const env = loadFastlyEnv({
      FASTLY_API_KEY: 'test-api-key',
      FASTLY_USER: 'ops@example.com',
      FASTLY_PASSWORD: 'test-password',
    });

    expect(env.FASTLY_USER).toBe('ops@example.com');
    expect(env.FASTLY_PASSWORD).toBe('test-password');
  });

  it('should throw ConfigurationError when the API key is missing', () => {
    expect(() => loadFastlyEnv({})).toThrow(ConfigurationError);
  });

  it('should reject a user without a password', () => {
    try {
      loadFastlyEnv({ FASTLY_API_KEY: 'test-api-key', FASTLY_USER: 'ops@example.com' });
      expect.fail('expected ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          'FASTLY_PASSWORD: FASTLY_USER and FASTLY_PASSWORD must be set together',
        ]);
      }
    }
  });

  it('should reject a plain-http base URL', () => {
    expect(() =>
      loadFastlyEnv({ FASTLY_API_KEY: 'test-api-key', FASTLY_API_BASE_URL: 'http://api.example.com' })
    ).toThrow('FASTLY_API_BASE_URL: must use https');
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => loadFastlyEnv({ FASTLY_API_KEY: 'test-api-key', FASTLY_TIMEOUT_MS: 'soon' })).toThrow(
      'FASTLY_TIMEOUT_MS: must be a whole number of milliseconds'
    );
  });
});
