import { describe, it, expect } from 'vitest';
import {
  parseConstraintExpression,
  parseConstraintExpressions,
} from '../../../src/lib/resolver/expressions.js';
import { AmbiguousRequestError } from '../../../src/utils/errors.js';

describe('parseConstraintExpression', () => {
  it('should parse numeric ranges', () => {
    expect(parseConstraintExpression('amount=10..500')).toEqual(['amount', [10, 500]]);
    expect(parseConstraintExpression('amount = 9.5 .. 20')).toEqual(['amount', [9.5, 20]]);
  });

  it('should parse date ranges as strings', () => {
    expect(parseConstraintExpression('order_date=2024-01-01..2024-03-31')).toEqual([
      'order_date',
      ['2024-01-01', '2024-03-31'],
    ]);
  });

  it('should parse lists', () => {
    expect(parseConstraintExpression('status=failed, pending')).toEqual(['status', ['failed', 'pending']]);
  });

  it('should parse scalars', () => {
    expect(parseConstraintExpression('year=2024')).toEqual(['year', 2024]);
    expect(parseConstraintExpression('status=failed')).toEqual(['status', 'failed']);
  });

  it('should reject expressions without key and value', () => {
    expect(() => parseConstraintExpression('amount')).toThrow(AmbiguousRequestError);
    expect(() => parseConstraintExpression('=5')).toThrow(AmbiguousRequestError);
    expect(() => parseConstraintExpression('amount=')).toThrow(AmbiguousRequestError);
  });
});

describe('parseConstraintExpressions', () => {
  it('should fold repeated expressions, later ones winning', () => {
    expect(parseConstraintExpressions(['amount=1..2', 'status=failed', 'amount=3..4'])).toEqual({
      amount: [3, 4],
      status: 'failed',
    });
  });
});
