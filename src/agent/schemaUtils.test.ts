import { describe, it, expect } from 'vitest';
import { z } from 'zod';

import { zodToJson } from './schemaUtils.js';
import { toolDefinitions } from './tooling.js';

describe('zodToJson', () => {
  it('describes the compare arguments', () => {
    const compare = toolDefinitions.find((tool) => tool.function.name === 'compare');
    expect(compare?.function.parameters).toEqual({
      type: 'object',
      properties: {
        symbol_a: { type: 'string', description: 'First ticker symbol' },
        symbol_b: { type: 'string', description: 'Second ticker symbol' },
      },
      required: ['symbol_a', 'symbol_b'],
    });
  });

  it('handles enums, bounded integers and optional fields', () => {
    const schema = z.object({
      period: z.enum(['1d', '5d']),
      count: z.number().int().min(1).max(50).optional(),
      note: z.string().nullable(),
    });
    expect(zodToJson(schema)).toEqual({
      type: 'object',
      properties: {
        period: { type: 'string', enum: ['1d', '5d'] },
        count: { type: 'integer', minimum: 1, maximum: 50 },
        note: { anyOf: [{ type: 'string' }, { type: 'null' }] },
      },
      required: ['period'],
    });
  });
});
