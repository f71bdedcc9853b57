/**
 * Referent pools for foreign-key fields
 */

import type { Faker } from "@faker-js/faker";
import type { ForeignKeyFieldDef, ReferentKey } from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";

export interface ReferenceSource {
  pick(faker: Faker): ReferentKey;
  has(key: ReferentKey): boolean;
  size(): number;
}

/**
 * ReferencePool holds the keys of a known referent batch.
 * Array + Map for O(1) random access and O(1) membership checks.
 */
export class ReferencePool implements ReferenceSource {
  private keys: ReferentKey[] = [];
  private indices: Map<ReferentKey, number> = new Map();

  constructor(keys: Iterable<ReferentKey> = []) {
    for (const key of keys) {
      this.add(key);
    }
  }

  /**
   * Adds a key; duplicates are ignored so every referent is equally likely
   */
  add(key: ReferentKey): void {
    if (this.indices.has(key)) {
      return;
    }
    this.indices.set(key, this.keys.length);
    this.keys.push(key);
  }

  pick(faker: Faker): ReferentKey {
    if (this.keys.length === 0) {
      throw new AmbiguousRequestError("Cannot reference an empty referent pool");
    }
    return faker.helpers.arrayElement(this.keys);
  }

  has(key: ReferentKey): boolean {
    return this.indices.has(key);
  }

  size(): number {
    return this.keys.length;
  }

  toArray(): ReferentKey[] {
    return [...this.keys];
  }
}

/**
 * Stand-in for a referent batch that was never generated: the ids a
 * sequence-keyed batch of `count` records would have, `1..count`
 */
export class AssumedReferencePool implements ReferenceSource {
  constructor(private readonly count: number) {}

  pick(faker: Faker): ReferentKey {
    return faker.number.int({ min: 1, max: this.count });
  }

  has(key: ReferentKey): boolean {
    return typeof key === "number" && Number.isInteger(key) && key >= 1 && key <= this.count;
  }

  size(): number {
    return this.count;
  }
}

export interface ReferenceResolverOptions {
  /** Known keys per target schema */
  referents?: Readonly<Record<string, readonly ReferentKey[]>>;
  /** Field-level pools from request overrides, keyed by field name */
  fieldPools?: Readonly<Record<string, readonly ReferentKey[]>>;
  assumedReferentCount: number;
}

/**
 * Resolves foreign-key values for one batch. Within a record, every
 * reference to the same target resolves to the same referent.
 */
export class ReferenceResolver {
  private readonly targetPools = new Map<string, ReferencePool>();
  private readonly assumedPools = new Map<string, AssumedReferencePool>();
  private readonly fieldPools = new Map<string, ReferencePool>();
  private readonly current = new Map<string, ReferentKey>();

  constructor(private readonly options: ReferenceResolverOptions) {
    for (const [target, keys] of Object.entries(options.referents ?? {})) {
      this.targetPools.set(target, new ReferencePool(keys));
    }
    for (const [field, keys] of Object.entries(options.fieldPools ?? {})) {
      this.fieldPools.set(field, new ReferencePool(keys));
    }
  }

  /**
   * Forget per-record choices; call before generating each record
   */
  beginRecord(): void {
    this.current.clear();
  }

  resolve(field: ForeignKeyFieldDef, faker: Faker): ReferentKey {
    const memoKey = `${field.target}.${field.targetField ?? "id"}`;
    const source = this.sourceFor(field);

    const chosen = this.current.get(memoKey);
    if (chosen !== undefined && source.has(chosen)) {
      return chosen;
    }

    const key = source.pick(faker);
    this.current.set(memoKey, key);
    return key;
  }

  private sourceFor(field: ForeignKeyFieldDef): ReferenceSource {
    const fieldPool = this.fieldPools.get(field.name);
    if (fieldPool) {
      return fieldPool;
    }

    const known = this.targetPools.get(field.target);
    if (known) {
      return known;
    }

    const count = field.assumedCount ?? this.options.assumedReferentCount;
    const cacheKey = `${field.target}#${count}`;
    let assumed = this.assumedPools.get(cacheKey);
    if (!assumed) {
      assumed = new AssumedReferencePool(count);
      this.assumedPools.set(cacheKey, assumed);
    }
    return assumed;
  }
}
