// This test suite verifies that log payloads are sanitized before they reach the log stream.

import { describe, expect, it } from 'vitest';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from '../src/utils/logger.js';

describe('logger utilities', () => {
  it('redacts credential-like keys and keeps everything else', () => {
    const sanitized = sanitizeForLog({
      refreshToken: 'test-refresh-token',
      nested: { client_secret: 'test-secret', customerId: '123' },
      fields: ['campaign.id']
    });

    expect(sanitized).toMatchObject({
      nested: { customerId: '123' },
      fields: ['campaign.id']
    });
    expect(sanitized).toHaveProperty('refreshToken', expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/));
    expect(sanitized).toHaveProperty('nested.client_secret', expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/));
  });

  it('redacts Google Ads credential keys in any spelling', () => {
    const sanitized = sanitizeForLog({
      'developer-token': 'test-developer-token',
      GOOGLE_ADS_REFRESH_TOKEN: 'test-refresh-token',
      clientSecret: 'test-secret',
      api_key: 'test-key',
      'login-customer-id': '9999999999'
    });

    expect(sanitized).toEqual({
      'developer-token': expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/),
      GOOGLE_ADS_REFRESH_TOKEN: expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/),
      clientSecret: expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/),
      api_key: expect.stringMatching(/^\[redacted:[0-9a-f]{12}\]$/),
      'login-customer-id': '9999999999'
    });
  });

  it('bounds array length', () => {
    const values = Array.from({ length: 32 }, (_, index) => index);

    expect(sanitizeForLog(values)).toEqual([...values.slice(0, 30), '[truncated-items:2]']);
  });

  it('truncates long strings', () => {
    const sanitized = sanitizeForLog('x'.repeat(1030));

    expect(sanitized).toBe(`${'x'.repeat(1024)}...[truncated:6]`);
  });

  it('shapes errors and builds logger options', () => {
    expect(errorForLog('boom')).toEqual({ message: 'boom' });
    expect(buildLoggerOptions('debug')).toMatchObject({ level: 'debug', base: { service: 'google-ads-mcp' } });
  });
});
