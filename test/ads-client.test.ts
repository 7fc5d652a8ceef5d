// This test suite verifies Google Ads REST calls, pagination, retries, and upstream error mapping.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { GoogleAdsClient, parseAdsApiError, type AdsClientSettings } from '../src/ads/client.js';
import { AdsApiError, AppError } from '../src/utils/errors.js';

const settings: AdsClientSettings = {
  apiBaseUrl: 'https://ads.test/',
  apiVersion: 'v21',
  developerToken: 'test-developer-token',
  loginCustomerId: '9999999999',
  requestTimeoutMs: 1_000,
  maxRetries: 1,
  retryBaseDelayMs: 1
};

const tokens = {
  getAccessToken: async () => 'test-access-token'
};

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

describe('google ads client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('lists accessible customers with authenticated headers', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(200, { resourceNames: ['customers/1111111111', 'customers/2222222222'] })
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = new GoogleAdsClient(settings, tokens);

    await expect(client.listAccessibleCustomers()).resolves.toEqual(['1111111111', '2222222222']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://ads.test/v21/customers:listAccessibleCustomers');
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({
      method: 'GET',
      headers: {
        Authorization: 'Bearer test-access-token',
        'developer-token': 'test-developer-token',
        'login-customer-id': '9999999999'
      }
    });
  });

  it('follows page tokens until the last page', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
      const body = typeof init?.body === 'string' ? init.body : '';
      if (body.includes('"pageToken":"page-2"')) {
        return jsonResponse(200, { results: [{ campaign: { id: '2' } }] });
      }
      return jsonResponse(200, { results: [{ campaign: { id: '1' } }], nextPageToken: 'page-2' });
    });
    vi.stubGlobal('fetch', fetchMock);

    const client = new GoogleAdsClient(settings, tokens);
    const rows = await client.search('1234567890', 'SELECT campaign.id FROM campaign');

    expect(rows).toEqual([{ campaign: { id: '1' } }, { campaign: { id: '2' } }]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://ads.test/v21/customers/1234567890/googleAds:search');
    expect(fetchMock.mock.calls[0]?.[1]?.body).toBe('{"query":"SELECT campaign.id FROM campaign"}');
    expect(fetchMock.mock.calls[1]?.[1]?.body).toBe('{"query":"SELECT campaign.id FROM campaign","pageToken":"page-2"}');
  });

  it('retries transient upstream failures', async () => {
    const fetchMock = vi
      .fn(async (_input: string | URL | Request, _init?: RequestInit) => jsonResponse(200, { resourceNames: [] }))
      .mockImplementationOnce(async () => jsonResponse(503, { error: { code: 503, status: 'UNAVAILABLE' } }));
    vi.stubGlobal('fetch', fetchMock);

    const client = new GoogleAdsClient(settings, tokens);

    await expect(client.listAccessibleCustomers()).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('raises structured Ads errors without retrying client failures', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(403, {
        error: {
          code: 403,
          message: 'The caller does not have permission',
          status: 'PERMISSION_DENIED',
          details: [
            {
              '@type': 'type.googleapis.com/google.ads.googleads.v21.errors.GoogleAdsFailure',
              errors: [
                {
                  errorCode: { authorizationError: 'USER_PERMISSION_DENIED' },
                  message: "User doesn't have permission to access customer."
                }
              ]
            }
          ]
        }
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = new GoogleAdsClient(settings, tokens);
    const error = await client.search('1234567890', 'SELECT campaign.id FROM campaign').catch((caught: unknown) => caught);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(AdsApiError);
    if (error instanceof AdsApiError) {
      expect(error.statusCode).toBe(403);
      expect(error.errorCodes).toEqual(['USER_PERMISSION_DENIED', 'PERMISSION_DENIED']);
      expect(error.message).toBe(
        "Google Ads API request failed (403 PERMISSION_DENIED): The caller does not have permission User doesn't have permission to access customer. [USER_PERMISSION_DENIED, PERMISSION_DENIED]"
      );
    }
  });

  it('reports unreachable upstreams after exhausting retries', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError('fetch failed');
    });
    vi.stubGlobal('fetch', fetchMock);

    const client = new GoogleAdsClient(settings, tokens);

    await expect(client.listAccessibleCustomers()).rejects.toMatchObject({
      code: 'ads_unreachable',
      message: 'Google Ads API request failed: fetch failed'
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects responses that do not match the expected payload', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse(200, { resourceNames: 'not-a-list' }))
    );

    const client = new GoogleAdsClient(settings, tokens);

    await expect(client.listAccessibleCustomers()).rejects.toBeInstanceOf(AppError);
  });

  it('keeps a preview of non-JSON error bodies', () => {
    const error = parseAdsApiError(502, '<html>bad gateway</html>');

    expect(error.message).toBe('Google Ads API request failed with HTTP 502: <html>bad gateway</html>');
    expect(error.errorCodes).toEqual([]);
    expect(error.upstreamStatus).toBeNull();
  });
});
