/**
 * Request-level constraint overrides
 *
 * An override produces the effective field for one request. The registered
 * schema is never touched.
 */

import type { EnumFieldDef, FieldDef, FieldOverride, ReferentKey } from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";

const STRING_LIKE = new Set<FieldDef["type"]>(["string", "email", "phone", "address"]);

/**
 * Apply an override to a field and return the field to generate from.
 *
 * @throws AmbiguousRequestError when the override does not fit the field type
 */
export function applyOverride(field: FieldDef, override: FieldOverride | undefined): FieldDef {
  if (!override) {
    return field;
  }

  switch (override.kind) {
    case "range":
      if (field.type === "integer-range" || field.type === "decimal-range") {
        return { ...field, min: override.min, max: override.max };
      }
      break;
    case "window":
      if (field.type === "date-range") {
        return { ...field, start: override.start, end: override.end };
      }
      break;
    case "values":
      if (field.type === "enum") {
        const outside = override.values.filter((value) => !field.values.includes(value));
        if (outside.length > 0) {
          throw new AmbiguousRequestError(
            `Values ${outside.map((value) => `"${value}"`).join(", ")} are not allowed for "${field.name}"`,
            { field: field.name, allowed: [...field.values] },
          );
        }
        return { ...field, values: override.values };
      }
      if (STRING_LIKE.has(field.type)) {
        return pinnedValues(field, override.values);
      }
      break;
    case "pool":
      // Pools are handed to the reference resolver; the field stays as declared
      if (field.type === "foreign-key-ref") {
        return field;
      }
      break;
  }

  throw new AmbiguousRequestError(
    `A ${override.kind} constraint does not apply to ${field.type} field "${field.name}"`,
    { field: field.name, type: field.type, constraint: override.kind },
  );
}

function pinnedValues(field: FieldDef, values: readonly string[]): EnumFieldDef {
  return {
    name: field.name,
    type: "enum",
    values,
    ...(field.nullable !== undefined ? { nullable: field.nullable } : {}),
    ...(field.nullRate !== undefined ? { nullRate: field.nullRate } : {}),
    ...(field.presentWhen ? { presentWhen: field.presentWhen } : {}),
  };
}

/**
 * Field-level referent pools among a request's overrides
 */
export function collectFieldPools(
  overrides: Readonly<Record<string, FieldOverride>>,
): Record<string, readonly ReferentKey[]> {
  const pools: Record<string, readonly ReferentKey[]> = {};
  for (const [field, override] of Object.entries(overrides)) {
    if (override.kind === "pool") {
      pools[field] = override.ids;
    }
  }
  return pools;
}
