// This module defines the Google Ads tool contracts and the static descriptors served when discovery fails.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { AdsToolName } from '../types/ads.js';
import type { McpTool } from '../types/mcp.js';
import { isPlainRecord } from '../utils/json.js';

const gaqlClauseList = z.array(z.string().trim().min(1)).max(200);

export const searchSchema = z.object({
  customer_id: z
    .union([z.string(), z.number()])
    .describe('Google Ads customer id to query, digits only (dashes are stripped).'),
  resource: z.string().trim().min(1).describe('GAQL resource to select from, for example campaign or ad_group.'),
  fields: gaqlClauseList.min(1).describe('GAQL field paths to select, for example campaign.id or metrics.clicks.'),
  conditions: gaqlClauseList.optional().describe('GAQL conditions joined with AND, for example campaign.status = \'ENABLED\'.'),
  orderings: gaqlClauseList.optional().describe('GAQL orderings, for example metrics.clicks DESC.'),
  limit: z.union([z.number(), z.string()]).optional().describe('Maximum number of rows to return.')
});

export const listAccessibleCustomersSchema = z.object({});

export const TOOL_DESCRIPTIONS: Record<AdsToolName, string> = {
  search: 'Retrieves information about the Google Ads account using GAQL queries',
  list_accessible_customers: 'Returns ids of customers directly accessible by the user authenticating the call'
};

export const toolSchemas: Record<AdsToolName, z.ZodTypeAny> = {
  search: searchSchema,
  list_accessible_customers: listAccessibleCustomersSchema
};

// This helper renders one tool descriptor from its zod contract.
export function buildToolDescriptor(name: AdsToolName): McpTool {
  const inputSchema = zodToJsonSchema(toolSchemas[name], { $refStrategy: 'none' });
  return {
    name,
    description: TOOL_DESCRIPTIONS[name],
    inputSchema: isPlainRecord(inputSchema) ? inputSchema : { type: 'object', properties: {} }
  };
}

// Served by tools/list whenever the registry cannot be queried or reports no tools.
export const FALLBACK_TOOLS: readonly McpTool[] = Object.freeze([
  {
    name: 'search',
    description: TOOL_DESCRIPTIONS.search,
    inputSchema: {
      type: 'object',
      properties: {
        customer_id: { type: 'string' },
        resource: { type: 'string' },
        fields: { type: 'array', items: { type: 'string' } },
        conditions: { type: 'array', items: { type: 'string' } },
        orderings: { type: 'array', items: { type: 'string' } },
        limit: { type: ['integer', 'string'] }
      },
      required: ['customer_id', 'fields', 'resource']
    }
  },
  {
    name: 'list_accessible_customers',
    description: TOOL_DESCRIPTIONS.list_accessible_customers,
    inputSchema: {
      type: 'object',
      properties: {}
    }
  }
]);
