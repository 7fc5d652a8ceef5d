// This module maps raw tool results into the uniform MCP `{ content: [...] }` result shape.

import type { ContentBlock, ToolCallResult, ToolOutcome } from '../types/mcp.js';
import { isPlainRecord } from '../utils/json.js';

// This helper tags one raw tool result so normalization never probes types twice.
export function classifyToolOutcome(raw: unknown): ToolOutcome {
  if (Array.isArray(raw)) {
    return { kind: 'content', items: raw };
  }

  if (isPlainRecord(raw) && 'content' in raw) {
    return { kind: 'wrapped', result: raw };
  }

  return { kind: 'value', value: raw };
}

export function valueOutcome(value: unknown): ToolOutcome {
  return { kind: 'value', value };
}

// This helper converts one sequence element into a content block.
function toContentBlock(item: unknown): ContentBlock {
  if (isPlainRecord(item)) {
    return item;
  }

  if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
    return { type: 'text', text: item.text };
  }

  return { type: 'text', text: String(item) };
}

// This helper renders a plain value the way agents read it best: strings verbatim, everything else as indented JSON.
function renderValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  return JSON.stringify(value, null, 2) ?? 'null';
}

export function normalizeToolOutcome(outcome: ToolOutcome): ToolCallResult | Record<string, unknown> {
  switch (outcome.kind) {
    case 'wrapped':
      return outcome.result;
    case 'content':
      return { content: outcome.items.map((item) => toContentBlock(item)) };
    case 'value':
      return { content: [{ type: 'text', text: renderValue(outcome.value) }] };
  }
}
