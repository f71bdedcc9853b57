import { describe, it, expect, beforeEach } from 'vitest';
import {
  AssumedReferencePool,
  ReferencePool,
  ReferenceResolver,
} from '../../../src/lib/generator/reference-pool.js';
import { createSeededFaker } from '../../../src/lib/generator/faker-engine.js';
import type { ForeignKeyFieldDef } from '../../../src/types/data-model.js';
import { AmbiguousRequestError } from '../../../src/utils/errors.js';

describe('ReferencePool', () => {
  let pool: ReferencePool;

  beforeEach(() => {
    pool = new ReferencePool();
  });

  it('should add keys and report size', () => {
    pool.add(1);
    pool.add('a');
    expect(pool.size()).toBe(2);
    expect(pool.has(1)).toBe(true);
    expect(pool.has('a')).toBe(true);
    expect(pool.has(2)).toBe(false);
  });

  it('should not add duplicate keys', () => {
    pool.add(1);
    pool.add(1);
    expect(pool.toArray()).toEqual([1]);
  });

  it('should pick keys from the pool', () => {
    const { faker } = createSeededFaker('test-seed');
    const filled = new ReferencePool([4, 5, 6]);
    for (let i = 0; i < 20; i++) {
      expect([4, 5, 6]).toContain(filled.pick(faker));
    }
  });

  it('should refuse to pick from an empty pool', () => {
    const { faker } = createSeededFaker('test-seed');
    expect(() => pool.pick(faker)).toThrow(AmbiguousRequestError);
  });
});

describe('AssumedReferencePool', () => {
  it('should stand for keys 1..count', () => {
    const assumed = new AssumedReferencePool(3);
    expect(assumed.size()).toBe(3);
    expect(assumed.has(1)).toBe(true);
    expect(assumed.has(3)).toBe(true);
    expect(assumed.has(4)).toBe(false);
    expect(assumed.has('1')).toBe(false);
  });
});

describe('ReferenceResolver', () => {
  const userRef: ForeignKeyFieldDef = { name: 'user_id', type: 'foreign-key-ref', target: 'user' };
  const ownerRef: ForeignKeyFieldDef = { name: 'owner_id', type: 'foreign-key-ref', target: 'user' };

  it('should prefer field pools over referents', () => {
    const { faker } = createSeededFaker('test-seed');
    const resolver = new ReferenceResolver({
      referents: { user: [1, 2] },
      fieldPools: { user_id: [42] },
      assumedReferentCount: 100,
    });
    resolver.beginRecord();
    expect(resolver.resolve(userRef, faker)).toBe(42);
  });

  it('should draw from known referents', () => {
    const { faker } = createSeededFaker('test-seed');
    const resolver = new ReferenceResolver({ referents: { user: [10, 20] }, assumedReferentCount: 100 });
    for (let i = 0; i < 20; i++) {
      resolver.beginRecord();
      expect([10, 20]).toContain(resolver.resolve(userRef, faker));
    }
  });

  it('should resolve references to the same target consistently within a record', () => {
    const { faker } = createSeededFaker('test-seed');
    const resolver = new ReferenceResolver({ assumedReferentCount: 1000 });
    for (let i = 0; i < 20; i++) {
      resolver.beginRecord();
      expect(resolver.resolve(ownerRef, faker)).toBe(resolver.resolve(userRef, faker));
    }
  });

  it('should honor a per-field assumed count', () => {
    const { faker } = createSeededFaker('test-seed');
    const resolver = new ReferenceResolver({ assumedReferentCount: 1000 });
    const narrow: ForeignKeyFieldDef = { ...userRef, assumedCount: 2 };
    for (let i = 0; i < 20; i++) {
      resolver.beginRecord();
      expect([1, 2]).toContain(resolver.resolve(narrow, faker));
    }
  });
});
