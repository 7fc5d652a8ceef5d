// This file defines Google Ads payload shapes shared by the API client and the tool handlers.

// One row of a googleAds:search response, keyed by camelCase resource names.
export type AdsRow = Record<string, unknown>;

export interface GaqlQueryInput {
  resource: string;
  fields: string[];
  conditions?: string[];
  orderings?: string[];
  limit?: number;
}

export type AdsToolName = 'search' | 'list_accessible_customers';
