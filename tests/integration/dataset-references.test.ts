import { describe, it, expect } from 'vitest';
import { createEngine } from '../../src/lib/engine/index.js';

const REFERENCE_DATE = '2025-01-01T00:00:00.000Z';

describe('generateDataset', () => {
  it('should point foreign keys at keys generated earlier in the dataset', () => {
    const [users, orders, payments] = createEngine().generateDataset(
      [
        { schema: 'user', count: 4, referenceDate: REFERENCE_DATE },
        { schema: 'order', count: 12, referenceDate: REFERENCE_DATE },
        { schema: 'payment', count: 30, referenceDate: REFERENCE_DATE },
      ],
      { seed: 'test-seed', format: 'json' },
    );

    expect(users?.batch.records.map((record) => record.id)).toEqual([1, 2, 3, 4]);

    const userIds = new Set(users?.batch.records.map((record) => record.id));
    for (const record of orders?.batch.records ?? []) {
      expect(userIds.has(record.user_id ?? null)).toBe(true);
    }

    const orderIds = new Set(orders?.batch.records.map((record) => record.id));
    expect(payments?.batch.records).toHaveLength(30);
    for (const record of payments?.batch.records ?? []) {
      expect(orderIds.has(record.order_id ?? null)).toBe(true);
    }
  });

  it('should derive per-request seeds from the dataset seed', () => {
    const entries = createEngine().generateDataset(
      [
        { schema: 'user', count: 1 },
        { schema: 'order', count: 1, seed: 'own-seed' },
      ],
      { seed: 'test-seed' },
    );

    expect(entries.map((entry) => entry.artifact.seed)).toEqual(['test-seed:0', 'own-seed']);
  });

  it('should apply the dataset format only where a request names none', () => {
    const entries = createEngine().generateDataset(
      [
        { schema: 'user', count: 1 },
        { schema: 'product', count: 1, format: 'csv' },
      ],
      { format: 'ndjson' },
    );

    expect(entries.map((entry) => entry.artifact.format)).toEqual(['ndjson', 'csv']);
  });

  it('should keep explicit referents over generated ones', () => {
    const [, orders] = createEngine().generateDataset([
      { schema: 'user', count: 3 },
      { schema: 'order', count: 10, referents: { user: [42] } },
    ]);

    for (const record of orders?.batch.records ?? []) {
      expect(record.user_id).toBe(42);
    }
  });

  it('should fall back to the assumed pool when the referenced batch is empty', () => {
    const [, orders] = createEngine({ config: { assumedReferentCount: 5 } }).generateDataset([
      { schema: 'user', count: 0 },
      { schema: 'order', count: 20 },
    ]);

    for (const record of orders?.batch.records ?? []) {
      expect([1, 2, 3, 4, 5]).toContain(record.user_id);
    }
  });
});
