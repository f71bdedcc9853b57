import { describe, it, expect } from 'vitest';
import { SchemaRegistry, pluralize } from '../../../src/lib/registry/index.js';
import type { SchemaDef } from '../../../src/types/data-model.js';
import { DuplicateSchemaError, InvalidSchemaError, UnknownSchemaError } from '../../../src/utils/errors.js';

const WIDGET_SCHEMA: SchemaDef = {
  name: 'widget',
  fields: [
    { name: 'id', type: 'sequence' },
    { name: 'label', type: 'string', kind: 'word' },
  ],
};

describe('SchemaRegistry', () => {
  it('should register the built-in schemas by default', () => {
    const registry = new SchemaRegistry();
    expect(registry.list().map((schema) => schema.name)).toEqual(['user', 'order', 'payment', 'product']);
    expect(registry.isBuiltin('order')).toBe(true);
  });

  it('should start empty without built-ins', () => {
    const registry = new SchemaRegistry({ builtins: false });
    expect(registry.list()).toEqual([]);
  });

  it('should register a custom schema with a default version', () => {
    const registry = new SchemaRegistry({ builtins: false });
    const stored = registry.register(WIDGET_SCHEMA);
    expect(stored.version).toBe(1);
    expect(registry.get('widget').fields).toHaveLength(2);
    expect(registry.isBuiltin('widget')).toBe(false);
  });

  it('should reject a duplicate name', () => {
    const registry = new SchemaRegistry();
    expect(() => registry.register({ ...WIDGET_SCHEMA, name: 'user' })).toThrow(DuplicateSchemaError);
  });

  it('should refuse a field named after a prototype key and leave the registry unchanged', () => {
    const registry = new SchemaRegistry({ builtins: false });
    expect(() =>
      registry.register({
        name: 'widget',
        fields: [
          { name: 'id', type: 'sequence' },
          { name: '__proto__', type: 'string', kind: 'word' },
        ],
      }),
    ).toThrow(InvalidSchemaError);
    expect(registry.has('widget')).toBe(false);
  });

  it('should throw for an unknown schema', () => {
    const registry = new SchemaRegistry();
    expect(() => registry.get('invoice')).toThrow(UnknownSchemaError);
    expect(registry.has('invoice')).toBe(false);
  });

  it('should keep a frozen copy unaffected by later caller changes', () => {
    const registry = new SchemaRegistry({ builtins: false });
    const definition: SchemaDef = {
      name: 'gadget',
      fields: [{ name: 'size', type: 'integer-range', min: 1, max: 5 }],
    };
    registry.register(definition);

    definition.name = 'renamed';
    const stored = registry.get('gadget');
    expect(stored.name).toBe('gadget');
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.fields[0])).toBe(true);
  });

  it('should expose the identifier catalog', () => {
    const registry = new SchemaRegistry();
    const catalog = registry.identifiers();
    expect([...(catalog.get('order') ?? [])]).toEqual([
      'id',
      'user_id',
      'amount',
      'status',
      'order_date',
      'product_name',
      'quantity',
    ]);
  });

  it('should resolve names, plurals and synonyms through aliases', () => {
    const aliases = new SchemaRegistry().aliases();
    expect(aliases.get('orders')).toBe('order');
    expect(aliases.get('customers')).toBe('user');
    expect(aliases.get('transactions')).toBe('payment');
    expect(aliases.get('item')).toBe('product');
  });
});

describe('pluralize', () => {
  it('should pluralize schema names', () => {
    expect(pluralize('order')).toBe('orders');
    expect(pluralize('address')).toBe('addresses');
    expect(pluralize('category')).toBe('categories');
    expect(pluralize('day')).toBe('days');
  });
});
