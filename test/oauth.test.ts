// This test suite verifies OAuth access token refresh, caching, and failure reporting.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { OAuthTokenProvider, type OAuthCredentials } from '../src/ads/oauth.js';
import { AppError } from '../src/utils/errors.js';

const credentials: OAuthCredentials = {
  tokenUrl: 'https://oauth.test/token',
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  refreshToken: 'test-refresh-token',
  requestTimeoutMs: 1_000
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('oauth token provider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the refresh_token grant and caches the token until shortly before expiry', async () => {
    let clock = 1_000_000;
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OAuthTokenProvider(credentials, undefined, () => clock);

    await expect(provider.getAccessToken()).resolves.toBe('test-access-token');
    clock += 3_540_000 - 1;
    await expect(provider.getAccessToken()).resolves.toBe('test-access-token');
    expect(fetchMock).toHaveBeenCalledTimes(1);

    clock += 1;
    await provider.getAccessToken();
    expect(fetchMock).toHaveBeenCalledTimes(2);

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://oauth.test/token');
    expect(String(fetchMock.mock.calls[0]?.[1]?.body)).toBe(
      'grant_type=refresh_token&client_id=test-client-id&client_secret=test-secret&refresh_token=test-refresh-token'
    );
  });

  it('shares one refresh between concurrent callers', async () => {
    const fetchMock = vi.fn(async () => jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OAuthTokenProvider(credentials);
    const tokens = await Promise.all([provider.getAccessToken(), provider.getAccessToken()]);

    expect(tokens).toEqual(['test-access-token', 'test-access-token']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('explains rejected refresh tokens', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse(400, { error: 'invalid_grant', error_description: 'Bad Request' }))
    );

    const provider = new OAuthTokenProvider(credentials);
    const error = await provider.getAccessToken().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      statusCode: 401,
      code: 'ads_auth_failed',
      message:
        'Failed to refresh OAuth credentials: invalid_grant: Bad Request. Please verify your client_id, client_secret, and refresh_token are correct.'
    });
  });

  it('retries the refresh after a failure instead of caching it', async () => {
    const fetchMock = vi
      .fn(async () => jsonResponse(200, { access_token: 'test-access-token', expires_in: 3600 }))
      .mockImplementationOnce(async () => jsonResponse(500, {}));
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OAuthTokenProvider(credentials);

    await expect(provider.getAccessToken()).rejects.toMatchObject({
      message:
        'Failed to refresh OAuth credentials: HTTP 500. Please verify your client_id, client_secret, and refresh_token are correct.'
    });
    await expect(provider.getAccessToken()).resolves.toBe('test-access-token');
  });
});
