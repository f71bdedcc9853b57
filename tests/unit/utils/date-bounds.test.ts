import { describe, it, expect } from 'vitest';
import {
  formatIsoTimestamp,
  formatSqlTimestamp,
  isAbsoluteDateBound,
  isValidDateBound,
  parseTimestamp,
  resolveDateBound,
  yearWindow,
} from '../../../src/utils/date-bounds.js';

describe('date bounds', () => {
  const reference = new Date('2025-06-15T12:00:00.000Z');

  it('should accept now, relative offsets and ISO dates', () => {
    expect(isValidDateBound('now')).toBe(true);
    expect(isValidDateBound('-2y')).toBe(true);
    expect(isValidDateBound('+6mo')).toBe(true);
    expect(isValidDateBound('2024-01-01')).toBe(true);
    expect(isValidDateBound('yesterday')).toBe(false);
    expect(isValidDateBound('-2q')).toBe(false);
  });

  it('should tell absolute bounds from relative ones', () => {
    expect(isAbsoluteDateBound('2024-01-01')).toBe(true);
    expect(isAbsoluteDateBound('now')).toBe(false);
    expect(isAbsoluteDateBound('-30d')).toBe(false);
  });

  it('should resolve relative bounds against the reference date in UTC', () => {
    expect(resolveDateBound('now', reference, 'end')?.toISOString()).toBe('2025-06-15T12:00:00.000Z');
    expect(resolveDateBound('-2y', reference, 'start')?.toISOString()).toBe('2023-06-15T12:00:00.000Z');
    expect(resolveDateBound('-1mo', reference, 'start')?.toISOString()).toBe('2025-05-15T12:00:00.000Z');
    expect(resolveDateBound('+1w', reference, 'end')?.toISOString()).toBe('2025-06-22T12:00:00.000Z');
    expect(resolveDateBound('-3d', reference, 'start')?.toISOString()).toBe('2025-06-12T12:00:00.000Z');
    expect(resolveDateBound('+2h', reference, 'end')?.toISOString()).toBe('2025-06-15T14:00:00.000Z');
    expect(resolveDateBound('-30m', reference, 'start')?.toISOString()).toBe('2025-06-15T11:30:00.000Z');
  });

  it('should stretch a date-only end bound over the whole day', () => {
    expect(resolveDateBound('2024-12-31', reference, 'end')?.toISOString()).toBe('2024-12-31T23:59:59.999Z');
    expect(resolveDateBound('2024-12-31', reference, 'start')?.toISOString()).toBe('2024-12-31T00:00:00.000Z');
  });

  it('should return null for an unparseable bound', () => {
    expect(resolveDateBound('soon', reference, 'start')).toBeNull();
  });

  it('should read datetimes without an offset as UTC', () => {
    expect(parseTimestamp('2025-01-01T00:00:00')?.toISOString()).toBe('2025-01-01T00:00:00.000Z');
    expect(parseTimestamp('2024-03-01 10:00')?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(parseTimestamp('2024-03-01')?.toISOString()).toBe('2024-03-01T00:00:00.000Z');
    expect(resolveDateBound('2024-06-30T18:30:00', reference, 'end')?.toISOString()).toBe('2024-06-30T18:30:00.000Z');
  });

  it('should honor explicit offsets', () => {
    expect(parseTimestamp('2024-03-01T10:00:00+02:00')?.toISOString()).toBe('2024-03-01T08:00:00.000Z');
    expect(parseTimestamp('2024-03-01T10:00:00-0130')?.toISOString()).toBe('2024-03-01T11:30:00.000Z');
    expect(parseTimestamp('2024-03-01T10:00:00.250Z')?.toISOString()).toBe('2024-03-01T10:00:00.250Z');
  });

  it('should reject timestamps that are not ISO 8601', () => {
    expect(parseTimestamp('March 1, 2024')).toBeNull();
    expect(parseTimestamp('2024-13-01')).toBeNull();
    expect(isValidDateBound('03/01/2024')).toBe(false);
  });

  it('should build a calendar year window', () => {
    expect(yearWindow(2024)).toEqual({ start: '2024-01-01', end: '2024-12-31' });
  });

  it('should format timestamps for SQL and JSON', () => {
    const value = new Date('2024-03-05T07:08:09.123Z');
    expect(formatSqlTimestamp(value)).toBe('2024-03-05 07:08:09');
    expect(formatSqlTimestamp(value, true)).toBe('2024-03-05');
    expect(formatIsoTimestamp(value)).toBe('2024-03-05T07:08:09.123Z');
    expect(formatIsoTimestamp(value, true)).toBe('2024-03-05');
  });
});
