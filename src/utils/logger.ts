// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';

// Credentials that must never reach the log stream.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["developer-token"]',
  'headers.authorization',
  'headers["developer-token"]',
  '*.authorization',
  '*.developerToken',
  '*.clientSecret',
  '*.refreshToken',
  '*.accessToken'
];

const LOG_LIMITS = {
  depth: 5,
  stringLength: 1024,
  arrayItems: 30,
  objectKeys: 30
} as const;

// Matched against lower-cased keys with separators removed: developer-token, refresh_token and clientSecret all hit.
const SENSITIVE_KEY_FRAGMENTS = ['token', 'secret', 'password', 'authorization', 'cookie', 'credential', 'apikey'];

function isSensitiveKey(key: string): boolean {
  const compact = key.toLowerCase().replace(/[-_\s]/g, '');
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => compact.includes(fragment));
}

// Correlates a redacted value across log lines without revealing it.
function fingerprint(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return createHash('sha256').update(text).digest('hex').slice(0, 12);
}

function clipString(value: string): string {
  const overflow = value.length - LOG_LIMITS.stringLength;
  return overflow > 0 ? `${value.slice(0, LOG_LIMITS.stringLength)}...[truncated:${overflow}]` : value;
}

function sanitizeArray(values: unknown[], depth: number): unknown[] {
  const kept = values.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
  const dropped = values.length - kept.length;
  return dropped > 0 ? [...kept, `[truncated-items:${dropped}]`] : kept;
}

function sanitizeObject(value: object, depth: number): Record<string, unknown> {
  const entries = Object.entries(value);
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, LOG_LIMITS.objectKeys)) {
    target[key] = isSensitiveKey(key) ? `[redacted:${fingerprint(entryValue)}]` : sanitizeForLog(entryValue, depth + 1);
  }

  if (entries.length > LOG_LIMITS.objectKeys) {
    target.__truncatedKeys = entries.length - LOG_LIMITS.objectKeys;
  }

  return target;
}

// Bounds the size of any payload before it is logged and redacts credential-like fields.
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (depth > LOG_LIMITS.depth) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return clipString(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return sanitizeArray(value, depth);
  }

  return typeof value === 'object' ? sanitizeObject(value, depth) : String(value);
}

// This helper normalizes unknown errors into a compact, structured shape for logs.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    message: String(error)
  };
}

// This helper builds one Fastify-compatible logger configuration with strict redaction.
export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
