/**
 * Emitter module - renders batches into artifacts
 */

import type { Artifact, Batch, OutputFormat } from "../../types/data-model.js";
import { OUTPUT_FORMATS } from "../../types/data-model.js";
import { UnsupportedFormatError } from "../../utils/errors.js";
import type { SqlSafetyGuard } from "../guard/index.js";
import { createCSVWriter } from "./csv-writer.js";
import { createJSONWriter } from "./json-writer.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import { createSQLWriter } from "./sql-writer.js";
import type { Formatter } from "./types.js";

export * from "./types.js";
export * from "./values.js";
export * from "./json-writer.js";
export * from "./ndjson-writer.js";
export * from "./csv-writer.js";
export * from "./sql-writer.js";

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * @throws UnsupportedFormatError for an unrecognized tag
 */
export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new UnsupportedFormatError(`Unsupported output format "${value}"`, {
      format: value,
      supported: [...OUTPUT_FORMATS],
    });
  }
  return normalized;
}

/**
 * Pure mapping from format tag to formatter
 */
export function createFormatter(format: string, guard: SqlSafetyGuard): Formatter {
  const tag = parseOutputFormat(format);
  switch (tag) {
    case "sql":
      return createSQLWriter(guard);
    case "csv":
      return createCSVWriter();
    case "json":
      return createJSONWriter();
    case "ndjson":
      return createNDJSONWriter();
  }
}

export function renderBatch(batch: Batch, format: string, guard: SqlSafetyGuard): Artifact {
  const formatter = createFormatter(format, guard);
  return {
    format: formatter.format,
    mediaType: formatter.mediaType,
    content: formatter.render(batch),
    schema: batch.schema.name,
    recordCount: batch.records.length,
    seed: batch.seed,
    referenceDate: batch.request.referenceDate,
  };
}
