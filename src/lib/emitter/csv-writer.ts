/**
 * CSV writer - RFC 4180: CRLF rows, comma delimiter, quotes on demand.
 * Null and the empty string stay distinct: `,,` against `,"",`
 */

import type { Batch, FieldValue } from "../../types/data-model.js";
import type { Formatter } from "./types.js";
import { dateOnlyFields, toTextValue } from "./values.js";

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export class CSVWriter implements Formatter {
  readonly format = "csv" as const;
  readonly mediaType = "text/csv";

  constructor(private readonly lineEnding = "\r\n") {}

  render(batch: Batch): string {
    const columns = batch.schema.fields.map((field) => field.name);
    const dateOnly = dateOnlyFields(batch.schema);

    const lines = [columns.map(escapeCsvField).join(",")];
    for (const record of batch.records) {
      lines.push(columns.map((column) => this.renderField(record[column] ?? null, dateOnly.has(column))).join(","));
    }

    return lines.join(this.lineEnding) + this.lineEnding;
  }

  /**
   * Null is an empty field; an empty string is a quoted empty field
   */
  private renderField(value: FieldValue, dateOnly: boolean): string {
    return value === "" ? '""' : escapeCsvField(toTextValue(value, dateOnly));
  }
}

export function createCSVWriter(): CSVWriter {
  return new CSVWriter();
}
