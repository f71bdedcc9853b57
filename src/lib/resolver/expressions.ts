/**
 * Constraint expressions as written on the command line
 *
 *   amount=10..500          range
 *   order_date=2024-01-01..2024-03-31
 *   status=failed,pending   list
 *   year=2024               scalar
 */

import type { RawConstraint } from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";

const NUMERIC = /^-?\d+(?:\.\d+)?$/;

function scalar(text: string): number | string {
  const trimmed = text.trim();
  return NUMERIC.test(trimmed) ? Number(trimmed) : trimmed;
}

/**
 * @throws AmbiguousRequestError when the expression has no `key=value` form
 */
export function parseConstraintExpression(expression: string): [string, RawConstraint] {
  const separator = expression.indexOf("=");
  const key = separator > 0 ? expression.slice(0, separator).trim() : "";
  const value = separator > 0 ? expression.slice(separator + 1).trim() : "";

  if (!key || !value) {
    throw new AmbiguousRequestError(`Constraint "${expression}" must look like field=value`, {
      expression,
    });
  }

  if (value.includes("..")) {
    const [low = "", high = ""] = value.split("..", 2);
    return [key, [scalar(low), scalar(high)]];
  }

  if (value.includes(",")) {
    return [
      key,
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
        .map(scalar),
    ];
  }

  return [key, scalar(value)];
}

/**
 * Fold repeated `--constraint` flags into one constraints object
 */
export function parseConstraintExpressions(expressions: readonly string[]): Record<string, RawConstraint> {
  const constraints: Record<string, RawConstraint> = {};
  for (const expression of expressions) {
    const [key, value] = parseConstraintExpression(expression);
    constraints[key] = value;
  }
  return constraints;
}
