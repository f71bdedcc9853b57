/**
 * Shared value presentation for the text formats
 */

import type { FieldValue, SchemaDef } from "../../types/data-model.js";
import { formatIsoTimestamp, formatSqlTimestamp } from "../../utils/date-bounds.js";

export type JsonValue = string | number | null;

/**
 * Names of date-range fields declared with date granularity
 */
export function dateOnlyFields(schema: SchemaDef): ReadonlySet<string> {
  return new Set(
    schema.fields
      .filter((field) => field.type === "date-range" && field.granularity === "date")
      .map((field) => field.name),
  );
}

export function toJsonValue(value: FieldValue, dateOnly: boolean): JsonValue {
  return value instanceof Date ? formatIsoTimestamp(value, dateOnly) : value;
}

export function toTextValue(value: FieldValue, dateOnly: boolean): string {
  if (value === null) return "";
  if (value instanceof Date) return formatSqlTimestamp(value, dateOnly);
  return String(value);
}
