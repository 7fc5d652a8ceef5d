// This module builds the shared Google Ads client lazily so bad credentials never block server startup.

import type { FastifyBaseLogger } from 'fastify';
import type { AdsApiConfig } from '../config/config.js';
import { AppError } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { GoogleAdsClient } from './client.js';
import { OAuthTokenProvider } from './oauth.js';

export type AdsClientBuilder = (config: AdsApiConfig, logger: FastifyBaseLogger) => Promise<GoogleAdsClient>;

// This helper validates credentials and performs the first token refresh before handing out a client.
export async function buildAdsClient(config: AdsApiConfig, logger: FastifyBaseLogger): Promise<GoogleAdsClient> {
  const { developerToken, clientId, clientSecret, refreshToken } = config;
  const missing = [
    developerToken ? null : 'GOOGLE_ADS_DEVELOPER_TOKEN',
    clientId ? null : 'GOOGLE_ADS_CLIENT_ID',
    clientSecret ? null : 'GOOGLE_ADS_CLIENT_SECRET',
    refreshToken ? null : 'GOOGLE_ADS_REFRESH_TOKEN'
  ].filter((name): name is string => name !== null);

  if (!developerToken || !clientId || !clientSecret || !refreshToken) {
    throw new AppError(503, 'ads_credentials_missing', `Missing environment variables: ${missing.join(', ')}`);
  }

  const tokens = new OAuthTokenProvider(
    {
      tokenUrl: config.tokenUrl,
      clientId,
      clientSecret,
      refreshToken,
      requestTimeoutMs: config.requestTimeoutMs
    },
    logger
  );
  await tokens.getAccessToken();

  return new GoogleAdsClient(
    {
      apiBaseUrl: config.apiBaseUrl,
      apiVersion: config.apiVersion,
      developerToken,
      loginCustomerId: config.loginCustomerId,
      requestTimeoutMs: config.requestTimeoutMs,
      maxRetries: config.maxRetries,
      retryBaseDelayMs: config.retryBaseDelayMs
    },
    tokens,
    logger
  );
}

/**
 * Returns an accessor for one process-wide Google Ads client.
 *
 * Concurrent first calls share the same construction; a failed construction is forgotten so the
 * next call can retry with corrected credentials.
 */
export function createLazyAdsClient(
  config: AdsApiConfig,
  logger: FastifyBaseLogger,
  build: AdsClientBuilder = buildAdsClient
): () => Promise<GoogleAdsClient> {
  let pending: Promise<GoogleAdsClient> | null = null;

  return () => {
    if (pending) {
      return pending;
    }

    logger.info({ event: 'google_ads_client_init_started' }, 'google_ads_client_init_started');
    pending = build(config, logger).then(
      (client) => {
        logger.info({ event: 'google_ads_client_init_completed' }, 'google_ads_client_init_completed');
        return client;
      },
      (error: unknown) => {
        pending = null;
        logger.error(
          { event: 'google_ads_client_init_failed', error: errorForLog(error) },
          'google_ads_client_init_failed'
        );
        const reason = error instanceof Error ? error.message : String(error);
        throw new AppError(
          503,
          'ads_client_init_failed',
          `Failed to initialize Google Ads client: ${reason}. Please check your OAuth credentials and developer token.`
        );
      }
    );

    return pending;
  };
}
