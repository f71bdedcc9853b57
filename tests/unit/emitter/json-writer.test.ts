/**
 * JSON Array Writer Tests
 * Verifies JSON array format output
 */

import { describe, it, expect } from 'vitest';
import { createJSONWriter, toJsonObject } from '../../../src/lib/emitter/json-writer.js';
import { makeBatch, NOTE_RECORDS, NOTE_SCHEMA } from '../../helpers/batches.js';

describe('JSON Array Writer', () => {
  it('should write one object per line inside an array', () => {
    const output = createJSONWriter().render(makeBatch(NOTE_SCHEMA, NOTE_RECORDS.slice(0, 2)));

    expect(output).toBe(
      '[\n' +
        '  {"id":1,"body":"plain","score":7.5,"written_at":"2024-02-03T04:05:06.000Z","due_on":"2024-02-10"},\n' +
        '  {"id":2,"body":null,"score":3,"written_at":"2024-11-30T23:59:59.000Z","due_on":"2024-12-01"}\n' +
        ']\n',
    );
  });

  it('should round-trip through JSON.parse', () => {
    const output = createJSONWriter().render(makeBatch(NOTE_SCHEMA, NOTE_RECORDS));
    const parsed: unknown = JSON.parse(output);

    expect(parsed).toEqual(NOTE_RECORDS.map((record) => toJsonObject(record, NOTE_SCHEMA)));
  });

  it('should handle an empty batch', () => {
    expect(createJSONWriter().render(makeBatch(NOTE_SCHEMA, []))).toBe('[]\n');
  });

  it('should report its media type', () => {
    const writer = createJSONWriter();
    expect(writer.format).toBe('json');
    expect(writer.mediaType).toBe('application/json');
  });
});

describe('toJsonObject', () => {
  it('should keep schema field order and explicit nulls', () => {
    const object = toJsonObject({ due_on: null, id: 9, body: null, score: 1, written_at: null }, NOTE_SCHEMA);
    expect(Object.keys(object)).toEqual(['id', 'body', 'score', 'written_at', 'due_on']);
    expect(object.body).toBeNull();
  });

  it('should fill missing fields with null', () => {
    expect(toJsonObject({ id: 1 }, NOTE_SCHEMA)).toEqual({
      id: 1,
      body: null,
      score: null,
      written_at: null,
      due_on: null,
    });
  });
});
