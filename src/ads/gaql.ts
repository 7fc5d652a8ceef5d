// This module assembles GAQL statements and shapes search rows for tool output.

import type { AdsRow, GaqlQueryInput } from '../types/ads.js';
import { AppError } from '../utils/errors.js';
import { isPlainRecord } from '../utils/json.js';

const RESOURCE_PATTERN = /^[a-z][a-z0-9_]*$/;

// This helper strips the dashes agents copy from the Ads UI and rejects anything else that is not numeric.
export function normalizeCustomerId(value: string | number): string {
  const normalized = String(value).replace(/[-\s]/g, '');
  if (!/^\d+$/.test(normalized)) {
    throw new AppError(
      400,
      'invalid_customer_id',
      `Invalid customer_id "${String(value)}": expected digits only, optionally separated by dashes.`
    );
  }

  return normalized;
}

// Clients may send limit as a string after schema normalization.
export function coerceLimit(value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const text = String(value).trim();
  if (text === '') {
    return undefined;
  }

  const limit = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(limit) || limit <= 0) {
    throw new AppError(400, 'invalid_arguments', `Invalid limit "${String(value)}": expected a positive integer.`);
  }

  return limit;
}

export function buildGaqlQuery(input: GaqlQueryInput): string {
  if (!RESOURCE_PATTERN.test(input.resource)) {
    throw new AppError(400, 'invalid_arguments', `Invalid resource "${input.resource}": expected a GAQL resource name such as campaign.`);
  }

  const clauses = [`SELECT ${input.fields.join(', ')}`, `FROM ${input.resource}`];

  if (input.conditions && input.conditions.length > 0) {
    clauses.push(`WHERE ${input.conditions.join(' AND ')}`);
  }

  if (input.orderings && input.orderings.length > 0) {
    clauses.push(`ORDER BY ${input.orderings.join(', ')}`);
  }

  if (input.limit !== undefined) {
    clauses.push(`LIMIT ${input.limit}`);
  }

  return clauses.join(' ');
}

function toCamelCase(segment: string): string {
  return segment.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

// This helper resolves a snake_case GAQL field path against the camelCase REST row.
export function getFieldValue(row: AdsRow, fieldPath: string): unknown {
  let current: unknown = row;

  for (const segment of fieldPath.split('.')) {
    if (!isPlainRecord(current)) {
      return null;
    }

    if (Object.hasOwn(current, segment)) {
      current = current[segment];
      continue;
    }

    const camel = toCamelCase(segment);
    if (!Object.hasOwn(current, camel)) {
      return null;
    }
    current = current[camel];
  }

  return current ?? null;
}

export function formatOutputRow(row: AdsRow, fields: string[]): Record<string, unknown> {
  const output: Record<string, unknown> = {};
  for (const field of fields) {
    output[field] = getFieldValue(row, field);
  }
  return output;
}
