/**
 * Constraint resolution - raw caller constraints to typed field overrides
 */

import type {
  DateBound,
  FieldDef,
  FieldOverride,
  ReferentKey,
  SchemaDef,
} from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";
import { isValidDateBound, yearWindow } from "../../utils/date-bounds.js";

/** Constraint key that windows every date field of the schema */
export const YEAR_CONSTRAINT = "year";

type RangeField = Extract<FieldDef, { type: "integer-range" | "decimal-range" }>;
type DateField = Extract<FieldDef, { type: "date-range" }>;
type EnumField = Extract<FieldDef, { type: "enum" }>;

/**
 * Map raw constraints onto the schema's fields.
 *
 * @throws AmbiguousRequestError for a constraint on an unknown field or with
 * a shape its field type does not take
 */
export function resolveConstraints(
  schema: SchemaDef,
  raw: Readonly<Record<string, unknown>>,
): Record<string, FieldOverride> {
  const overrides: Record<string, FieldOverride> = {};

  for (const [name, value] of Object.entries(raw)) {
    if (name === YEAR_CONSTRAINT && !schema.fields.some((field) => field.name === name)) {
      continue;
    }
    const field = schema.fields.find((candidate) => candidate.name === name);
    if (!field) {
      throw new AmbiguousRequestError(`"${schema.name}" has no field "${name}" to constrain`, {
        schema: schema.name,
        field: name,
        fields: schema.fields.map((candidate) => candidate.name),
      });
    }
    overrides[name] = resolveFieldConstraint(field, value);
  }

  if (YEAR_CONSTRAINT in raw && !schema.fields.some((field) => field.name === YEAR_CONSTRAINT)) {
    const year = parseYear(raw[YEAR_CONSTRAINT]);
    if (year === null) {
      throw new AmbiguousRequestError(`"${String(raw[YEAR_CONSTRAINT])}" is not a year`);
    }
    const dateFields = schema.fields.filter((field) => field.type === "date-range");
    if (dateFields.length === 0) {
      throw new AmbiguousRequestError(`"${schema.name}" has no date fields to restrict to ${year}`, {
        schema: schema.name,
      });
    }
    for (const field of dateFields) {
      if (!overrides[field.name]) {
        overrides[field.name] = { kind: "window", ...yearWindow(year) };
      }
    }
  }

  return overrides;
}

/**
 * Resolve one raw constraint for one field
 */
export function resolveFieldConstraint(field: FieldDef, value: unknown): FieldOverride {
  switch (field.type) {
    case "integer-range":
    case "decimal-range":
      return resolveRange(field, value);
    case "date-range":
      return resolveWindow(field, value);
    case "enum":
      return { kind: "values", values: resolveEnumValues(field, value) };
    case "string":
    case "email":
    case "phone":
    case "address": {
      const values = stringList(value);
      if (values) {
        return { kind: "values", values };
      }
      break;
    }
    case "foreign-key-ref": {
      const ids = keyList(value);
      if (ids && ids.length > 0) {
        return { kind: "pool", ids };
      }
      break;
    }
    case "sequence":
      break;
  }

  throw unsupported(field, value);
}

function unsupported(field: FieldDef, value: unknown): AmbiguousRequestError {
  return new AmbiguousRequestError(
    `Cannot apply ${JSON.stringify(value)} to ${field.type} field "${field.name}"`,
    { field: field.name, type: field.type },
  );
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveRange(field: RangeField, value: unknown): FieldOverride {
  const single = toNumber(value);
  if (single !== null) {
    return { kind: "range", min: single, max: single };
  }

  if (Array.isArray(value) && value.length === 2) {
    const min = toNumber(value[0]);
    const max = toNumber(value[1]);
    if (min !== null && max !== null) {
      return { kind: "range", min, max };
    }
  }

  if (isRecord(value) && ("min" in value || "max" in value)) {
    const min = value.min === undefined ? field.min : toNumber(value.min);
    const max = value.max === undefined ? field.max : toNumber(value.max);
    if (min !== null && max !== null) {
      return { kind: "range", min, max };
    }
  }

  throw unsupported(field, value);
}

export function parseYear(value: unknown): number | null {
  const year = toNumber(value);
  return year !== null && Number.isInteger(year) && year >= 1 && year <= 9999 ? year : null;
}

function checkBound(field: DateField, bound: DateBound): DateBound {
  if (!isValidDateBound(bound)) {
    throw new AmbiguousRequestError(`"${bound}" is not a date for "${field.name}"`, {
      field: field.name,
      bound,
    });
  }
  return bound;
}

function resolveWindow(field: DateField, value: unknown): FieldOverride {
  if (typeof value === "number" || (typeof value === "string" && /^\d{4}$/.test(value.trim()))) {
    const year = parseYear(value);
    if (year !== null) {
      return { kind: "window", ...yearWindow(year) };
    }
  }

  if (typeof value === "string") {
    const day = checkBound(field, value.trim());
    return { kind: "window", start: day, end: day };
  }

  if (Array.isArray(value) && value.length === 2) {
    const [start, end] = value;
    if (typeof start === "string" && typeof end === "string") {
      return { kind: "window", start: checkBound(field, start), end: checkBound(field, end) };
    }
  }

  if (isRecord(value) && ("start" in value || "end" in value)) {
    const start = value.start ?? field.start;
    const end = value.end ?? field.end;
    if (typeof start === "string" && typeof end === "string") {
      return { kind: "window", start: checkBound(field, start), end: checkBound(field, end) };
    }
  }

  throw unsupported(field, value);
}

function isScalarList(value: unknown): value is (string | number)[] {
  return (
    Array.isArray(value) &&
    value.every((item: unknown) => typeof item === "string" || typeof item === "number")
  );
}

function stringList(value: unknown): string[] | null {
  if (typeof value === "string") return [value];
  if (typeof value === "number") return [String(value)];
  if (isScalarList(value)) return value.map((item) => String(item));
  return null;
}

function keyList(value: unknown): ReferentKey[] | null {
  if (typeof value === "string" || typeof value === "number") return [value];
  if (isScalarList(value)) return [...value];
  return null;
}

/**
 * Enum constraints must name declared values; matching ignores case and maps
 * to the declared spelling
 */
function resolveEnumValues(field: EnumField, value: unknown): string[] {
  const requested = stringList(value);
  if (!requested) {
    throw unsupported(field, value);
  }

  const resolved: string[] = [];
  const unknown: string[] = [];
  for (const candidate of requested) {
    const match = field.values.find((allowed) => allowed.toLowerCase() === candidate.trim().toLowerCase());
    if (match === undefined) {
      unknown.push(candidate);
    } else if (!resolved.includes(match)) {
      resolved.push(match);
    }
  }

  if (unknown.length > 0) {
    throw new AmbiguousRequestError(
      `${unknown.map((item) => `"${item}"`).join(", ")} not allowed for "${field.name}"`,
      { field: field.name, allowed: [...field.values] },
    );
  }

  return resolved;
}
