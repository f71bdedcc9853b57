import { describe, it, expect } from 'vitest';
import { createSQLWriter } from '../../../src/lib/emitter/sql-writer.js';
import { SqlSafetyGuard } from '../../../src/lib/guard/sql-guard.js';
import { SchemaRegistry } from '../../../src/lib/registry/index.js';
import type { SchemaDef } from '../../../src/types/data-model.js';
import { UnsafeIdentifierError } from '../../../src/utils/errors.js';
import { makeBatch, NOTE_RECORDS, NOTE_SCHEMA } from '../../helpers/batches.js';

function guardFor(...schemas: SchemaDef[]): SqlSafetyGuard {
  const registry = new SchemaRegistry({ builtins: false });
  for (const schema of schemas) {
    registry.register(schema);
  }
  return new SqlSafetyGuard(registry.identifiers());
}

describe('SQL Writer', () => {
  it('should render one multi-row INSERT', () => {
    const output = createSQLWriter(guardFor(NOTE_SCHEMA)).render(makeBatch(NOTE_SCHEMA, NOTE_RECORDS, 'sql'));

    expect(output).toBe(
      'INSERT INTO note (id, body, score, written_at, due_on) VALUES\n' +
        "(1, 'plain', 7.5, '2024-02-03 04:05:06', '2024-02-10'),\n" +
        "(2, NULL, 3, '2024-11-30 23:59:59', '2024-12-01'),\n" +
        "(3, 'says \"hi\", then\nleaves', 0.5, '2024-06-01 12:00:00', '2024-06-02');\n",
    );
  });

  it('should render an empty script for an empty batch', () => {
    expect(createSQLWriter(guardFor(NOTE_SCHEMA)).render(makeBatch(NOTE_SCHEMA, [], 'sql'))).toBe('');
  });

  it('should refuse a schema the registry does not know', () => {
    const writer = createSQLWriter(guardFor());
    expect(() => writer.render(makeBatch(NOTE_SCHEMA, [], 'sql'))).toThrow(UnsafeIdentifierError);
  });

  it('should quote reserved table names', () => {
    const guard = new SqlSafetyGuard(new SchemaRegistry().identifiers());
    const order: SchemaDef = new SchemaRegistry().get('order');
    const output = createSQLWriter(guard).render(
      makeBatch(order, [
        {
          id: 1,
          user_id: 4,
          amount: 12.5,
          status: 'pending',
          order_date: new Date('2024-05-06T07:08:09.000Z'),
          product_name: "Kid's Chair",
          quantity: 2,
        },
      ], 'sql'),
    );

    expect(output).toBe(
      'INSERT INTO "order" (id, user_id, amount, status, order_date, product_name, quantity) VALUES\n' +
        "(1, 4, 12.5, 'pending', '2024-05-06 07:08:09', 'Kid''s Chair', 2);\n",
    );
  });
});
