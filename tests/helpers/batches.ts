/**
 * Hand-built batches for formatter tests
 */

import type { Batch, FieldValue, OutputFormat, SchemaDef } from '../../src/types/data-model.js';

export const NOTE_SCHEMA: SchemaDef = {
  name: 'note',
  fields: [
    { name: 'id', type: 'sequence' },
    { name: 'body', type: 'string', nullable: true, nullRate: 0.5 },
    { name: 'score', type: 'decimal-range', min: 0, max: 10, precision: 1 },
    { name: 'written_at', type: 'date-range', start: '2024-01-01', end: '2024-12-31' },
    { name: 'due_on', type: 'date-range', start: '2024-01-01', end: '2024-12-31', granularity: 'date' },
  ],
};

export function makeBatch(
  schema: SchemaDef,
  records: Record<string, FieldValue>[],
  format: OutputFormat = 'json',
): Batch {
  return {
    schema,
    request: {
      schema: schema.name,
      count: records.length,
      format,
      overrides: {},
      seed: 'test-seed',
      referenceDate: '2025-01-01T00:00:00.000Z',
    },
    seed: 'test-seed',
    records,
  };
}

export const NOTE_RECORDS: Record<string, FieldValue>[] = [
  {
    id: 1,
    body: 'plain',
    score: 7.5,
    written_at: new Date('2024-02-03T04:05:06.000Z'),
    due_on: new Date('2024-02-10T00:00:00.000Z'),
  },
  {
    id: 2,
    body: null,
    score: 3,
    written_at: new Date('2024-11-30T23:59:59.000Z'),
    due_on: new Date('2024-12-01T00:00:00.000Z'),
  },
  {
    id: 3,
    body: 'says "hi", then\nleaves',
    score: 0.5,
    written_at: new Date('2024-06-01T12:00:00.000Z'),
    due_on: new Date('2024-06-02T00:00:00.000Z'),
  },
];
