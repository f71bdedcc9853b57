/**
 * Translate a SchemaDef into a draft-07 JSON Schema for records in their
 * JSON form (dates as ISO strings)
 */

import type { FieldDef, FieldOverride, SchemaDef } from "../../types/data-model.js";
import { resolveDateBound } from "../../utils/date-bounds.js";
import { applyOverride } from "../generator/overrides.js";
import type { RecordSchemaOptions } from "./types.js";

type JsonSchema = Record<string, unknown>;

export const DATE_WINDOW_KEYWORD = "x-date-window";

const EMAIL_PATTERN = "^[^\\s@]+@[^\\s@]+\\.[^\\s@]+$";
const DATE_ONLY_PATTERN = "^\\d{4}-\\d{2}-\\d{2}$";

function escapePattern(char: string): string {
  return /[.*+?^${}()|[\]\\/]/.test(char) ? `\\${char}` : char;
}

/**
 * Regex source matching what a `#`/`?`/`*` symbol pattern can produce
 */
export function symbolPatternToRegex(pattern: string): string {
  let source = "^";
  for (const char of pattern) {
    if (char === "#") source += "[0-9]";
    else if (char === "?") source += "[A-Za-z]";
    else if (char === "*") source += "[A-Za-z0-9]";
    else source += escapePattern(char);
  }
  return source + "$";
}

function fieldSchema(field: FieldDef, referenceDate: Date, pooled: FieldOverride | undefined): JsonSchema {
  switch (field.type) {
    case "sequence":
      return { type: "integer", minimum: field.start ?? 1 };
    case "string":
      return {
        type: "string",
        ...(field.pattern ? { pattern: symbolPatternToRegex(field.pattern) } : { minLength: 1 }),
        ...(field.maxLength !== undefined ? { maxLength: field.maxLength } : {}),
      };
    case "email":
      return { type: "string", pattern: EMAIL_PATTERN };
    case "phone":
    case "address":
      return { type: "string", minLength: 1 };
    case "integer-range":
      return { type: "integer", minimum: field.min, maximum: field.max };
    case "decimal-range":
      return { type: "number", minimum: field.min, maximum: field.max };
    case "date-range": {
      const start = resolveDateBound(field.start, referenceDate, "start");
      const end = resolveDateBound(field.end, referenceDate, "end");
      return {
        type: "string",
        ...(field.granularity === "date" ? { pattern: DATE_ONLY_PATTERN } : {}),
        ...(start && end
          ? { [DATE_WINDOW_KEYWORD]: { start: start.toISOString(), end: end.toISOString() } }
          : {}),
      };
    }
    case "enum":
      return { type: "string", enum: [...field.values] };
    case "foreign-key-ref":
      return pooled?.kind === "pool"
        ? { enum: [...pooled.ids] }
        : { type: ["integer", "string"] };
  }
}

/**
 * Build the JSON Schema a record of `schema` must satisfy under the given
 * request overrides
 */
export function buildRecordJsonSchema(
  schema: SchemaDef,
  overrides: Readonly<Record<string, FieldOverride>> = {},
  options: RecordSchemaOptions = {},
): JsonSchema {
  const referenceDate = options.referenceDate ?? new Date();
  const properties: Record<string, JsonSchema> = {};
  const conditions: JsonSchema[] = [];

  for (const declared of schema.fields) {
    const override = overrides[declared.name];
    const field = applyOverride(declared, override);
    const base = fieldSchema(field, referenceDate, override);
    properties[field.name] = field.nullable ? { anyOf: [base, { type: "null" }] } : base;

    if (field.presentWhen) {
      conditions.push({
        if: {
          properties: { [field.presentWhen.field]: { enum: [...field.presentWhen.in] } },
          required: [field.presentWhen.field],
        },
        then: { properties: { [field.name]: { not: { type: "null" } } } },
        else: { properties: { [field.name]: { type: "null" } } },
      });
    }
  }

  return {
    $schema: "http://json-schema.org/draft-07/schema#",
    title: schema.name,
    type: "object",
    properties,
    required: schema.fields.map((field) => field.name),
    additionalProperties: false,
    ...(conditions.length > 0 ? { allOf: conditions } : {}),
  };
}
