// This module exchanges the configured refresh token for short-lived Google OAuth access tokens.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';

// Tokens are refreshed this long before Google reports them as expired.
const EXPIRY_SKEW_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive().default(3600)
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional()
});

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export interface OAuthCredentials {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  requestTimeoutMs: number;
}

// This class caches one access token and shares a single in-flight refresh between concurrent callers.
export class OAuthTokenProvider implements AccessTokenProvider {
  private readonly credentials: OAuthCredentials;
  private readonly logger?: FastifyBaseLogger;
  private readonly now: () => number;
  private cached: { token: string; expiresAt: number } | null = null;
  private inflight: Promise<string> | null = null;

  public constructor(credentials: OAuthCredentials, logger?: FastifyBaseLogger, now: () => number = Date.now) {
    this.credentials = credentials;
    this.logger = logger?.child({ component: 'oauth_token_provider' });
    this.now = now;
  }

  public async getAccessToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - EXPIRY_SKEW_MS > this.now()) {
      return this.cached.token;
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }

    return this.inflight;
  }

  // This helper performs the refresh_token grant and records the new expiry.
  private async refresh(): Promise<string> {
    const startedAt = Date.now();
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      refresh_token: this.credentials.refreshToken
    });

    let response: Response;
    try {
      response = await fetch(this.credentials.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded'
        },
        body,
        signal: AbortSignal.timeout(this.credentials.requestTimeoutMs)
      });
    } catch (error) {
      this.logger?.error({ event: 'oauth_refresh_unreachable', error: errorForLog(error) }, 'oauth_refresh_unreachable');
      const message = error instanceof Error ? error.message : 'unknown transport error';
      throw new AppError(502, 'ads_auth_failed', `Failed to refresh OAuth credentials: ${message}`);
    }

    const payload: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const parsedError = tokenErrorSchema.safeParse(payload);
      const reason = parsedError.success
        ? [parsedError.data.error, parsedError.data.error_description].filter(Boolean).join(': ')
        : `HTTP ${response.status}`;

      this.logger?.error(
        { event: 'oauth_refresh_rejected', status: response.status, reason },
        'oauth_refresh_rejected'
      );
      throw new AppError(
        401,
        'ads_auth_failed',
        `Failed to refresh OAuth credentials: ${reason}. Please verify your client_id, client_secret, and refresh_token are correct.`
      );
    }

    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AppError(502, 'ads_auth_failed', 'Failed to refresh OAuth credentials: token endpoint returned no access_token.');
    }

    this.cached = {
      token: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000
    };

    this.logger?.info(
      {
        event: 'oauth_refresh_completed',
        expiresInSeconds: parsed.data.expires_in,
        durationMs: Date.now() - startedAt
      },
      'oauth_refresh_completed'
    );

    return parsed.data.access_token;
  }
}
