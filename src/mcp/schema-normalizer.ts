// This module relaxes tool input schemas for MCP clients whose validators reject JSON Schema type unions.

import { isPlainRecord } from '../utils/json.js';

// This helper describes a collapsed union so agents still know which values the tool expects.
function describeCollapsedUnion(types: string[]): string {
  if (types.length === 0) {
    return 'Sent as a string; the tool converts it to the expected type.';
  }

  return `Accepts a ${types.join(' or ')} value sent as a string; the tool converts it to the expected type.`;
}

function collapseTypeUnion(property: Record<string, unknown>, types: unknown[]): Record<string, unknown> {
  const existing = property.description;
  const description =
    typeof existing === 'string' && existing.trim().length > 0
      ? existing
      : describeCollapsedUnion(types.filter((entry): entry is string => typeof entry === 'string'));

  return {
    ...property,
    type: 'string',
    description
  };
}

/**
 * Returns a copy of `schema` where every top-level property declared with a type union
 * (`"type": ["integer", "string"]`) is declared as a plain string instead.
 *
 * Only the immediate `properties` map is rewritten; nested schemas are kept as they are.
 * The input is never mutated, and anything that is not a plain object is returned unchanged.
 */
export function normalizeInputSchema(schema: Record<string, unknown>): Record<string, unknown>;
export function normalizeInputSchema(schema: unknown): unknown;
export function normalizeInputSchema(schema: unknown): unknown {
  if (!isPlainRecord(schema)) {
    return schema;
  }

  const properties = schema.properties;
  if (!isPlainRecord(properties)) {
    return { ...schema };
  }

  const normalizedProperties: Record<string, unknown> = {};
  for (const [name, property] of Object.entries(properties)) {
    normalizedProperties[name] =
      isPlainRecord(property) && Array.isArray(property.type) ? collapseTypeUnion(property, property.type) : property;
  }

  return {
    ...schema,
    properties: normalizedProperties
  };
}
