/**
 * JSON array writer
 */

import type { Batch, GeneratedRecord, SchemaDef } from "../../types/data-model.js";
import type { Formatter } from "./types.js";
import { dateOnlyFields, toJsonValue, type JsonValue } from "./values.js";

/**
 * Plain object in schema field order, dates as ISO 8601, nulls explicit
 */
export function toJsonObject(
  record: GeneratedRecord,
  schema: SchemaDef,
  dateOnly: ReadonlySet<string> = dateOnlyFields(schema),
): Record<string, JsonValue> {
  const object: Record<string, JsonValue> = {};
  for (const field of schema.fields) {
    object[field.name] = toJsonValue(record[field.name] ?? null, dateOnly.has(field.name));
  }
  return object;
}

/**
 * Writes `[`, one compact object per line separated by commas, then `]`
 */
export class JSONWriter implements Formatter {
  readonly format = "json" as const;
  readonly mediaType = "application/json";

  render(batch: Batch): string {
    if (batch.records.length === 0) {
      return "[]\n";
    }

    const dateOnly = dateOnlyFields(batch.schema);
    const lines = batch.records.map(
      (record) => "  " + JSON.stringify(toJsonObject(record, batch.schema, dateOnly)),
    );

    return "[\n" + lines.join(",\n") + "\n]\n";
  }
}

export function createJSONWriter(): JSONWriter {
  return new JSONWriter();
}
