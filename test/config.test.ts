// This test suite verifies environment configuration parsing and defaults.

import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config/config.js';
import { AppError } from '../src/utils/errors.js';

describe('config', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      host: '0.0.0.0',
      port: 8080,
      logLevel: 'info',
      bodyLimitBytes: 1_048_576,
      sseKeepaliveMs: 30_000,
      ads: {
        developerToken: undefined,
        clientId: undefined,
        clientSecret: undefined,
        refreshToken: undefined,
        loginCustomerId: undefined,
        apiVersion: 'v21',
        apiBaseUrl: 'https://googleads.googleapis.com',
        tokenUrl: 'https://oauth2.googleapis.com/token',
        requestTimeoutMs: 30_000,
        maxRetries: 2,
        retryBaseDelayMs: 300
      }
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads credentials and normalizes the login customer id', () => {
    const config = loadConfig({
      PORT: '9000',
      GOOGLE_ADS_DEVELOPER_TOKEN: 'test-developer-token',
      GOOGLE_ADS_CLIENT_SECRET: '   ',
      GOOGLE_ADS_LOGIN_CUSTOMER_ID: '123-456-7890',
      GOOGLE_ADS_API_BASE_URL: 'https://ads.test/'
    });

    expect(config.port).toBe(9000);
    expect(config.ads.developerToken).toBe('test-developer-token');
    expect(config.ads.clientSecret).toBeUndefined();
    expect(config.ads.loginCustomerId).toBe('1234567890');
    expect(config.ads.apiBaseUrl).toBe('https://ads.test');
  });

  it('rejects invalid values with one configuration error', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrowError(AppError);
    expect(() => loadConfig({ GOOGLE_ADS_LOGIN_CUSTOMER_ID: 'abc' })).toThrowError(
      'Invalid configuration: GOOGLE_ADS_LOGIN_CUSTOMER_ID: must contain digits only'
    );
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrowError(/^Invalid configuration: LOG_LEVEL: /);
  });
});
