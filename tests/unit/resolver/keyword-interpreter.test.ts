import { describe, it, expect } from 'vitest';
import { KeywordInterpreter } from '../../../src/lib/resolver/keyword-interpreter.js';
import type { InterpreterContext } from '../../../src/lib/resolver/types.js';
import { SchemaRegistry } from '../../../src/lib/registry/index.js';
import { AmbiguousRequestError } from '../../../src/utils/errors.js';

const registry = new SchemaRegistry();
const context: InterpreterContext = { schemas: registry.list(), aliases: registry.aliases() };
const interpreter = new KeywordInterpreter();

describe('KeywordInterpreter', () => {
  it('should read a count and an entity', async () => {
    expect(await interpreter.interpret('Generate 10 users', context)).toEqual({ schema: 'users', count: 10 });
  });

  it('should read a money range and a year', async () => {
    expect(await interpreter.interpret('20 orders $10-$500 in 2024', context)).toEqual({
      schema: 'orders',
      count: 20,
      constraints: { amount: [10, 500], year: 2024 },
    });
  });

  it('should read enum values named in the text', async () => {
    expect(await interpreter.interpret('5 failed payments', context)).toEqual({
      schema: 'payments',
      count: 5,
      constraints: { status: ['failed'] },
    });
  });

  it('should read an output format', async () => {
    expect(await interpreter.interpret('3 fake customers as csv', context)).toEqual({
      schema: 'customers',
      count: 3,
      format: 'csv',
    });
  });

  it('should take an entity without a count', async () => {
    expect(await interpreter.interpret('some products please', context)).toEqual({ schema: 'products' });
  });

  it('should treat a year pair without dollar signs as years, not money', async () => {
    expect(await interpreter.interpret('4 orders 2023-2024', context)).toEqual({
      schema: 'orders',
      count: 4,
      constraints: { year: 2023 },
    });
  });

  it('should name an unknown noun after a count', async () => {
    expect(await interpreter.interpret('7 mock invoices', context)).toEqual({ schema: 'invoices', count: 7 });
  });

  it('should reject text naming two kinds of record', async () => {
    await expect(interpreter.interpret('users and orders', context)).rejects.toThrow(AmbiguousRequestError);
  });

  it('should return null when nothing is recognized', async () => {
    expect(await interpreter.interpret('hello there', context)).toBeNull();
  });
});
