// This module wraps Google Ads REST calls with timeout, retry, and structured upstream error mapping.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { AdsRow } from '../types/ads.js';
import { AdsApiError, AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { AccessTokenProvider } from './oauth.js';

// Upper bound on followed page tokens for one search call.
const MAX_SEARCH_PAGES = 100;
const MAX_ERROR_BODY_PREVIEW = 500;

const searchPageSchema = z
  .object({
    results: z.array(z.record(z.unknown())).default([]),
    nextPageToken: z.string().optional()
  })
  .passthrough();

const accessibleCustomersSchema = z.object({
  resourceNames: z.array(z.string()).default([])
});

const adsErrorPayloadSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    details: z
      .array(
        z
          .object({
            errors: z
              .array(
                z
                  .object({
                    errorCode: z.record(z.unknown()).optional(),
                    message: z.string().optional()
                  })
                  .passthrough()
              )
              .optional()
          })
          .passthrough()
      )
      .optional()
  })
});

export interface AdsClientSettings {
  apiBaseUrl: string;
  apiVersion: string;
  developerToken: string;
  loginCustomerId?: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

// This helper converts a Google Ads REST error body into an AdsApiError with every reported error code.
export function parseAdsApiError(httpStatus: number, bodyText: string): AdsApiError {
  let payload: unknown = null;
  try {
    payload = JSON.parse(bodyText);
  } catch {
    payload = null;
  }

  const parsed = adsErrorPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const preview = bodyText.trim().slice(0, MAX_ERROR_BODY_PREVIEW);
    return new AdsApiError(
      httpStatus,
      `Google Ads API request failed with HTTP ${httpStatus}${preview ? `: ${preview}` : ''}`,
      null,
      []
    );
  }

  const upstream = parsed.data.error;
  const errorCodes: string[] = [];
  const detailMessages: string[] = [];

  for (const detail of upstream.details ?? []) {
    for (const entry of detail.errors ?? []) {
      for (const code of Object.values(entry.errorCode ?? {})) {
        if (typeof code === 'string' && !errorCodes.includes(code)) {
          errorCodes.push(code);
        }
      }
      if (entry.message) {
        detailMessages.push(entry.message);
      }
    }
  }

  const upstreamStatus = upstream.status ?? null;
  if (upstreamStatus && !errorCodes.includes(upstreamStatus)) {
    errorCodes.push(upstreamStatus);
  }

  const summary = [upstream.message, ...detailMessages].filter((part): part is string => Boolean(part)).join(' ');
  const statusLabel = upstreamStatus ? `${httpStatus} ${upstreamStatus}` : String(httpStatus);
  const codeLabel = errorCodes.length > 0 ? ` [${errorCodes.join(', ')}]` : '';

  return new AdsApiError(
    httpStatus,
    `Google Ads API request failed (${statusLabel}): ${summary || 'no details'}${codeLabel}`,
    upstreamStatus,
    errorCodes
  );
}

// This class executes authenticated Google Ads REST operations.
export class GoogleAdsClient {
  private readonly settings: AdsClientSettings;
  private readonly tokens: AccessTokenProvider;
  private readonly logger?: FastifyBaseLogger;

  public constructor(settings: AdsClientSettings, tokens: AccessTokenProvider, logger?: FastifyBaseLogger) {
    this.settings = {
      ...settings,
      apiBaseUrl: settings.apiBaseUrl.replace(/\/+$/, '')
    };
    this.tokens = tokens;
    this.logger = logger?.child({
      component: 'google_ads_client'
    });
  }

  // This helper applies exponential backoff with jitter between retries.
  private async waitWithBackoff(attempt: number): Promise<number> {
    const jitter = Math.floor(Math.random() * 100);
    const delay = this.settings.retryBaseDelayMs * 2 ** attempt + jitter;
    await sleep(delay);
    return delay;
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitizedDetails = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        details: sanitizedDetails
      },
      event
    );
  }

  private async buildHeaders(): Promise<Record<string, string>> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${await this.tokens.getAccessToken()}`,
      'developer-token': this.settings.developerToken,
      'Content-Type': 'application/json'
    };

    if (this.settings.loginCustomerId) {
      headers['login-customer-id'] = this.settings.loginCustomerId;
    }

    return headers;
  }

  // This helper executes one HTTP request with timeout and bounded retry policy for transient failures.
  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    body?: unknown
  ): Promise<z.output<S>> {
    const maxAttempts = Math.max(1, this.settings.maxRetries + 1);
    const url = `${this.settings.apiBaseUrl}/${this.settings.apiVersion}/${path}`;
    const startedAt = Date.now();

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const attemptNumber = attempt + 1;
      const abortController = new AbortController();
      const timer = setTimeout(() => abortController.abort(), this.settings.requestTimeoutMs);

      try {
        const response = await fetch(url, {
          method,
          headers: await this.buildHeaders(),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: abortController.signal
        });

        if ((response.status === 429 || response.status >= 500) && attempt < maxAttempts - 1) {
          const delayMs = await this.waitWithBackoff(attempt);
          this.log('warn', 'google_ads_request_retry_scheduled', {
            method,
            path,
            attempt: attemptNumber,
            status: response.status,
            delayMs
          });
          continue;
        }

        if (!response.ok) {
          const error = parseAdsApiError(response.status, await response.text());
          this.log('error', 'google_ads_request_http_error', {
            method,
            path,
            attempt: attemptNumber,
            status: response.status,
            errorCodes: error.errorCodes
          });
          throw error;
        }

        const payload: unknown = await response.json();
        const parsed = schema.safeParse(payload);
        if (!parsed.success) {
          throw new AppError(502, 'ads_unexpected_response', `Unexpected Google Ads API response for ${path}.`, parsed.error.flatten());
        }

        this.log('info', 'google_ads_request_completed', {
          method,
          path,
          attemptsUsed: attemptNumber,
          durationMs: Date.now() - startedAt,
          status: response.status
        });
        return parsed.data;
      } catch (error) {
        if (error instanceof AppError) {
          throw error;
        }

        if (attempt >= maxAttempts - 1) {
          const message = error instanceof Error ? error.message : 'unknown transport error';
          this.log('error', 'google_ads_request_failed_transport', {
            method,
            path,
            attempt: attemptNumber,
            error: errorForLog(error)
          });
          throw new AppError(502, 'ads_unreachable', `Google Ads API request failed: ${message}`);
        }

        const delayMs = await this.waitWithBackoff(attempt);
        this.log('warn', 'google_ads_request_retry_transport', {
          method,
          path,
          attempt: attemptNumber,
          delayMs,
          error: errorForLog(error)
        });
      } finally {
        clearTimeout(timer);
      }
    }

    throw new AppError(502, 'ads_unreachable', 'Google Ads API request failed after retries.');
  }

  // This method returns the ids of customers directly accessible by the authenticated user.
  public async listAccessibleCustomers(): Promise<string[]> {
    const payload = await this.request('GET', 'customers:listAccessibleCustomers', accessibleCustomersSchema);
    return payload.resourceNames.map((resourceName) => resourceName.replace(/^customers\//, ''));
  }

  // This method runs one GAQL query and follows page tokens until every row is collected.
  public async search(customerId: string, query: string): Promise<AdsRow[]> {
    const rows: AdsRow[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_SEARCH_PAGES; page += 1) {
      const payload = await this.request('POST', `customers/${customerId}/googleAds:search`, searchPageSchema, {
        query,
        ...(pageToken ? { pageToken } : {})
      });

      rows.push(...payload.results);
      pageToken = payload.nextPageToken;
      if (!pageToken) {
        return rows;
      }
    }

    this.log('warn', 'google_ads_search_page_limit_reached', { customerId, pages: MAX_SEARCH_PAGES });
    return rows;
  }
}
