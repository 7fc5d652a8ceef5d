// This test suite verifies how raw tool results are mapped into MCP content results.

import { describe, expect, it } from 'vitest';
import { classifyToolOutcome, normalizeToolOutcome, valueOutcome } from '../src/mcp/tool-outcome.js';

class TextLike {
  public readonly text = 'from class';
}

describe('tool outcome', () => {
  it('classifies arrays, wrapped results and plain values', () => {
    expect(classifyToolOutcome([1])).toEqual({ kind: 'content', items: [1] });
    expect(classifyToolOutcome({ content: [] })).toEqual({ kind: 'wrapped', result: { content: [] } });
    expect(classifyToolOutcome({ rows: 1 })).toEqual({ kind: 'value', value: { rows: 1 } });
    expect(classifyToolOutcome('hello')).toEqual({ kind: 'value', value: 'hello' });
  });

  it('passes wrapped results through unchanged', () => {
    const result = { content: [{ type: 'text', text: 'ok' }], isError: false };

    expect(normalizeToolOutcome(classifyToolOutcome(result))).toBe(result);
  });

  it('maps every sequence element to a content block', () => {
    const image = { type: 'image', data: 'aGVsbG8=', mimeType: 'image/png' };

    expect(normalizeToolOutcome(classifyToolOutcome([image, new TextLike(), 42]))).toEqual({
      content: [image, { type: 'text', text: 'from class' }, { type: 'text', text: '42' }]
    });
  });

  it('renders strings verbatim and other values as indented JSON', () => {
    expect(normalizeToolOutcome(valueOutcome('plain'))).toEqual({ content: [{ type: 'text', text: 'plain' }] });
    expect(normalizeToolOutcome(valueOutcome({ a: 1 }))).toEqual({
      content: [{ type: 'text', text: '{\n  "a": 1\n}' }]
    });
    expect(normalizeToolOutcome(valueOutcome(undefined))).toEqual({ content: [{ type: 'text', text: 'null' }] });
  });
});
