// This module loads and validates process configuration from environment variables.

import { z } from 'zod';
import { AppError } from '../utils/errors.js';

const optionalSecret = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  BODY_LIMIT_BYTES: positiveInt(1024 * 1024),
  SSE_KEEPALIVE_MS: positiveInt(30_000),
  GOOGLE_ADS_DEVELOPER_TOKEN: optionalSecret,
  GOOGLE_ADS_CLIENT_ID: optionalSecret,
  GOOGLE_ADS_CLIENT_SECRET: optionalSecret,
  GOOGLE_ADS_REFRESH_TOKEN: optionalSecret,
  GOOGLE_ADS_LOGIN_CUSTOMER_ID: z
    .string()
    .trim()
    .transform((value) => value.replace(/[-\s]/g, ''))
    .refine((value) => value === '' || /^\d+$/.test(value), 'must contain digits only')
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional(),
  GOOGLE_ADS_API_VERSION: z.string().trim().regex(/^v\d+$/).default('v21'),
  GOOGLE_ADS_API_BASE_URL: z.string().trim().url().default('https://googleads.googleapis.com'),
  GOOGLE_OAUTH_TOKEN_URL: z.string().trim().url().default('https://oauth2.googleapis.com/token'),
  GOOGLE_ADS_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  GOOGLE_ADS_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  GOOGLE_ADS_RETRY_BASE_DELAY_MS: positiveInt(300)
});

export interface AdsApiConfig {
  developerToken?: string;
  clientId?: string;
  clientSecret?: string;
  refreshToken?: string;
  loginCustomerId?: string;
  apiVersion: string;
  apiBaseUrl: string;
  tokenUrl: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export interface AppConfig {
  host: string;
  port: number;
  logLevel: string;
  bodyLimitBytes: number;
  sseKeepaliveMs: number;
  ads: AdsApiConfig;
}

// This function validates the environment once so every consumer reads typed, defaulted values.
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError(500, 'invalid_config', `Invalid configuration: ${problems.join('; ')}`, problems);
  }

  const values = parsed.data;
  return Object.freeze({
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    bodyLimitBytes: values.BODY_LIMIT_BYTES,
    sseKeepaliveMs: values.SSE_KEEPALIVE_MS,
    ads: Object.freeze({
      developerToken: values.GOOGLE_ADS_DEVELOPER_TOKEN,
      clientId: values.GOOGLE_ADS_CLIENT_ID,
      clientSecret: values.GOOGLE_ADS_CLIENT_SECRET,
      refreshToken: values.GOOGLE_ADS_REFRESH_TOKEN,
      loginCustomerId: values.GOOGLE_ADS_LOGIN_CUSTOMER_ID,
      apiVersion: values.GOOGLE_ADS_API_VERSION,
      apiBaseUrl: values.GOOGLE_ADS_API_BASE_URL.replace(/\/+$/, ''),
      tokenUrl: values.GOOGLE_OAUTH_TOKEN_URL,
      requestTimeoutMs: values.GOOGLE_ADS_REQUEST_TIMEOUT_MS,
      maxRetries: values.GOOGLE_ADS_MAX_RETRIES,
      retryBaseDelayMs: values.GOOGLE_ADS_RETRY_BASE_DELAY_MS
    })
  });
}
