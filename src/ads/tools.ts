// This module implements the Google Ads tools exposed to MCP clients.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { listAccessibleCustomersSchema, searchSchema } from '../mcp/tool-schemas.js';
import type { AdsToolName } from '../types/ads.js';
import type { DirectToolHandler } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { sanitizeForLog } from '../utils/logger.js';
import type { GoogleAdsClient } from './client.js';
import { buildGaqlQuery, coerceLimit, formatOutputRow, normalizeCustomerId } from './gaql.js';

export interface AdsToolContext {
  getClient: () => Promise<GoogleAdsClient>;
  logger: FastifyBaseLogger;
}

export type AdsToolHandlers = Record<AdsToolName, DirectToolHandler>;

// An absent union value fails every branch with a missing-value issue rather than one invalid_type issue.
function isMissingValueIssue(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined';
  }

  if (issue.code === z.ZodIssueCode.invalid_union) {
    return issue.unionErrors.every((unionError) => unionError.issues.some((inner) => isMissingValueIssue(inner)));
  }

  return false;
}

// This helper validates tool arguments and separates missing fields from malformed ones.
function parseArguments<S extends z.ZodTypeAny>(schema: S, toolName: AdsToolName, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args);
  if (parsed.success) {
    return parsed.data;
  }

  const missing = parsed.error.issues
    .filter((issue) => isMissingValueIssue(issue))
    .map((issue) => issue.path.join('.'));

  if (missing.length > 0) {
    throw new AppError(
      400,
      'missing_required_field',
      `Missing required field(s) for ${toolName}: ${missing.join(', ')}`,
      parsed.error.flatten()
    );
  }

  const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(arguments)'} - ${issue.message}`);
  throw new AppError(400, 'invalid_arguments', `Invalid arguments for ${toolName}: ${problems.join('; ')}`, parsed.error.flatten());
}

async function handleSearch(args: unknown, context: AdsToolContext): Promise<Array<Record<string, unknown>>> {
  const input = parseArguments(searchSchema, 'search', args);
  const customerId = normalizeCustomerId(input.customer_id);
  const query = buildGaqlQuery({
    resource: input.resource,
    fields: input.fields,
    conditions: input.conditions,
    orderings: input.orderings,
    limit: coerceLimit(input.limit)
  });

  context.logger.info(
    {
      event: 'ads_search_started',
      customerId,
      query: sanitizeForLog(query)
    },
    'ads_search_started'
  );

  const client = await context.getClient();
  const rows = await client.search(customerId, query);

  context.logger.info(
    {
      event: 'ads_search_completed',
      customerId,
      rowCount: rows.length
    },
    'ads_search_completed'
  );

  return rows.map((row) => formatOutputRow(row, input.fields));
}

async function handleListAccessibleCustomers(args: unknown, context: AdsToolContext): Promise<string[]> {
  parseArguments(listAccessibleCustomersSchema, 'list_accessible_customers', args);

  const client = await context.getClient();
  const customerIds = await client.listAccessibleCustomers();

  context.logger.info(
    {
      event: 'ads_accessible_customers_listed',
      customerCount: customerIds.length
    },
    'ads_accessible_customers_listed'
  );

  return customerIds;
}

// This function binds every Google Ads tool to one shared client accessor.
export function createAdsToolHandlers(context: AdsToolContext): AdsToolHandlers {
  return {
    search: (args) => handleSearch(args, context),
    list_accessible_customers: (args) => handleListAccessibleCustomers(args, context)
  };
}
