import { describe, it, expect } from 'vitest';
import { buildRecordJsonSchema, symbolPatternToRegex } from '../../../src/lib/validator/record-schema.js';
import { validateRecords } from '../../../src/lib/validator/index.js';
import type { SchemaDef } from '../../../src/types/data-model.js';

describe('symbolPatternToRegex', () => {
  it('should translate symbols and escape literals', () => {
    expect(symbolPatternToRegex('??-##.*')).toBe('^[A-Za-z][A-Za-z]-[0-9][0-9]\\.[A-Za-z0-9]$');
  });
});

describe('buildRecordJsonSchema', () => {
  const schema: SchemaDef = {
    name: 'ticket',
    fields: [
      { name: 'id', type: 'sequence', start: 10 },
      { name: 'owner_id', type: 'foreign-key-ref', target: 'user' },
      { name: 'note', type: 'string', nullable: true },
      { name: 'opened_on', type: 'date-range', start: '2024-01-01', end: '2024-01-31', granularity: 'date' },
    ],
  };

  it('should describe every field as required with no extras', () => {
    const jsonSchema = buildRecordJsonSchema(schema);
    expect(jsonSchema.required).toEqual(['id', 'owner_id', 'note', 'opened_on']);
    expect(jsonSchema.additionalProperties).toBe(false);
    expect(jsonSchema.properties).toEqual({
      id: { type: 'integer', minimum: 10 },
      owner_id: { type: ['integer', 'string'] },
      note: { anyOf: [{ type: 'string', minLength: 1 }, { type: 'null' }] },
      opened_on: {
        type: 'string',
        pattern: '^\\d{4}-\\d{2}-\\d{2}$',
        'x-date-window': { start: '2024-01-01T00:00:00.000Z', end: '2024-01-31T23:59:59.999Z' },
      },
    });
  });

  it('should restrict pooled foreign keys to their pool', () => {
    const jsonSchema = buildRecordJsonSchema(schema, { owner_id: { kind: 'pool', ids: [4, 5] } });
    expect(jsonSchema.properties).toMatchObject({ owner_id: { enum: [4, 5] } });
  });
});

describe('validateRecords', () => {
  const schema: SchemaDef = {
    name: 'ticket',
    fields: [
      { name: 'id', type: 'sequence' },
      { name: 'priority', type: 'enum', values: ['low', 'high'] },
    ],
  };

  it('should pass conforming records with unique keys', () => {
    const report = validateRecords(
      [
        { id: 1, priority: 'low' },
        { id: 2, priority: 'high' },
      ],
      schema,
    );
    expect(report.passed).toBe(true);
    expect(report.schema).toBe('ticket');
    expect(report.keyUniqueness).toEqual([{ field: 'id', totalKeys: 2, uniqueKeys: 2, duplicates: 0, passed: true }]);
  });

  it('should fail duplicate keys even when every record conforms', () => {
    const report = validateRecords(
      [
        { id: 1, priority: 'low' },
        { id: 1, priority: 'high' },
      ],
      schema,
    );
    expect(report.schemaConformance.invalidRecords).toBe(0);
    expect(report.passed).toBe(false);
  });

  it('should fail records outside the overridden values', () => {
    const report = validateRecords([{ id: 1, priority: 'low' }], schema, {
      priority: { kind: 'values', values: ['high'] },
    });
    expect(report.passed).toBe(false);
    expect(report.schemaConformance.violations[0]?.errors[0]?.path).toBe('/priority');
  });
});
