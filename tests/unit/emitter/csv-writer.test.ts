import { describe, it, expect } from 'vitest';
import { CSVWriter, createCSVWriter, escapeCsvField } from '../../../src/lib/emitter/csv-writer.js';
import { makeBatch, NOTE_RECORDS, NOTE_SCHEMA } from '../../helpers/batches.js';

describe('CSV Writer', () => {
  it('should write a header and CRLF-terminated rows', () => {
    const output = createCSVWriter().render(makeBatch(NOTE_SCHEMA, NOTE_RECORDS, 'csv'));

    expect(output).toBe(
      'id,body,score,written_at,due_on\r\n' +
        '1,plain,7.5,2024-02-03 04:05:06,2024-02-10\r\n' +
        '2,,3,2024-11-30 23:59:59,2024-12-01\r\n' +
        '3,"says ""hi"", then\nleaves",0.5,2024-06-01 12:00:00,2024-06-02\r\n',
    );
  });

  it('should write only the header for an empty batch', () => {
    expect(createCSVWriter().render(makeBatch(NOTE_SCHEMA, [], 'csv'))).toBe(
      'id,body,score,written_at,due_on\r\n',
    );
  });

  it('should keep an empty string apart from null', () => {
    const output = createCSVWriter().render(
      makeBatch(NOTE_SCHEMA, [
        { ...NOTE_RECORDS[0], body: '' },
        { ...NOTE_RECORDS[0], body: null },
      ], 'csv'),
    );
    expect(output).toBe(
      'id,body,score,written_at,due_on\r\n' +
        '1,"",7.5,2024-02-03 04:05:06,2024-02-10\r\n' +
        '1,,7.5,2024-02-03 04:05:06,2024-02-10\r\n',
    );
  });

  it('should accept another line ending', () => {
    const output = new CSVWriter('\n').render(makeBatch(NOTE_SCHEMA, NOTE_RECORDS.slice(0, 1), 'csv'));
    expect(output).toBe('id,body,score,written_at,due_on\n1,plain,7.5,2024-02-03 04:05:06,2024-02-10\n');
  });
});

describe('escapeCsvField', () => {
  it('should quote only when needed', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "x"')).toBe('"say ""x"""');
    expect(escapeCsvField('two\r\nlines')).toBe('"two\r\nlines"');
  });
});
