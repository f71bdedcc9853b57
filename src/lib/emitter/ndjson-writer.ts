/**
 * NDJSON Writer - one JSON object per line
 */

import type { Batch } from "../../types/data-model.js";
import type { Formatter } from "./types.js";
import { toJsonObject } from "./json-writer.js";
import { dateOnlyFields } from "./values.js";

export class NDJSONWriter implements Formatter {
  readonly format = "ndjson" as const;
  readonly mediaType = "application/x-ndjson";

  render(batch: Batch): string {
    const dateOnly = dateOnlyFields(batch.schema);
    return batch.records
      .map((record) => JSON.stringify(toJsonObject(record, batch.schema, dateOnly)) + "\n")
      .join("");
  }
}

export function createNDJSONWriter(): NDJSONWriter {
  return new NDJSONWriter();
}
