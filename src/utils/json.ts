// This utility module keeps JSON parsing of transport payloads safe and explicit.

import { AppError } from './errors.js';

// This helper parses one raw request body and emits a controlled parse error on malformed content.
export function parseJsonBody(body: unknown): unknown {
  const raw = typeof body === 'string' ? body : '';

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new AppError(400, 'parse_error', 'Parse error', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
