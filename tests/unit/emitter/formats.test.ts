import { describe, it, expect } from 'vitest';
import { createFormatter, parseOutputFormat, renderBatch } from '../../../src/lib/emitter/index.js';
import { SqlSafetyGuard } from '../../../src/lib/guard/sql-guard.js';
import { SchemaRegistry } from '../../../src/lib/registry/index.js';
import { UnsupportedFormatError } from '../../../src/utils/errors.js';
import { makeBatch, NOTE_RECORDS, NOTE_SCHEMA } from '../../helpers/batches.js';

const guard = new SqlSafetyGuard(new SchemaRegistry().identifiers());

describe('output formats', () => {
  it('should normalize format tags', () => {
    expect(parseOutputFormat(' CSV ')).toBe('csv');
    expect(parseOutputFormat('ndjson')).toBe('ndjson');
  });

  it('should reject unknown formats', () => {
    expect(() => parseOutputFormat('xml')).toThrow(UnsupportedFormatError);
    expect(() => createFormatter('yaml', guard)).toThrow(UnsupportedFormatError);
  });

  it('should map each tag to its formatter', () => {
    expect(createFormatter('sql', guard).mediaType).toBe('application/sql');
    expect(createFormatter('csv', guard).mediaType).toBe('text/csv');
    expect(createFormatter('json', guard).mediaType).toBe('application/json');
    expect(createFormatter('ndjson', guard).mediaType).toBe('application/x-ndjson');
  });

  it('should wrap rendered content in an artifact', () => {
    const artifact = renderBatch(makeBatch(NOTE_SCHEMA, NOTE_RECORDS), 'csv', guard);
    expect(artifact).toMatchObject({
      format: 'csv',
      mediaType: 'text/csv',
      schema: 'note',
      recordCount: 3,
      seed: 'test-seed',
      referenceDate: '2025-01-01T00:00:00.000Z',
    });
    expect(artifact.content.startsWith('id,body,score,written_at,due_on\r\n')).toBe(true);
  });
});
