/**
 * Record Synthesizer - builds a batch of records for one request
 */

import type {
  Batch,
  FieldDef,
  FieldValue,
  GeneratedRecord,
  GenerationRequest,
  SchemaDef,
} from "../../types/data-model.js";
import { AmbiguousRequestError, RequestTooLargeError } from "../../utils/errors.js";
import { parseTimestamp } from "../../utils/date-bounds.js";
import { logger } from "../../utils/logger.js";
import { createSeededFaker } from "./faker-engine.js";
import { generateFieldValue, type FieldContext } from "./field-generators.js";
import { applyOverride, collectFieldPools } from "./overrides.js";
import { ReferenceResolver } from "./reference-pool.js";
import type { SynthesizerOptions } from "./types.js";

/**
 * Reject counts the engine will not generate
 *
 * @throws AmbiguousRequestError for a negative or fractional count
 * @throws RequestTooLargeError above the configured ceiling
 */
export function checkRecordCount(count: number, maxRecords: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new AmbiguousRequestError(`Record count must be a non-negative integer, got ${count}`, { count });
  }
  if (count > maxRecords) {
    throw new RequestTooLargeError(`Cannot generate ${count} records; the limit is ${maxRecords}`, {
      count,
      maxRecords,
    });
  }
}

/**
 * Generate exactly `request.count` records. Any generator failure aborts the
 * whole batch; partial batches are never returned.
 */
export function synthesizeBatch(
  schema: SchemaDef,
  request: GenerationRequest,
  options: SynthesizerOptions,
): Batch {
  checkRecordCount(request.count, options.maxRecords);

  if (request.schema !== schema.name) {
    throw new AmbiguousRequestError(
      `Request targets "${request.schema}" but schema "${schema.name}" was supplied`,
      { requested: request.schema, schema: schema.name },
    );
  }

  const unknownFields = Object.keys(request.overrides).filter(
    (name) => !schema.fields.some((field) => field.name === name),
  );
  if (unknownFields.length > 0) {
    throw new AmbiguousRequestError(
      `Constraints name fields that "${schema.name}" does not have: ${unknownFields.join(", ")}`,
      { schema: schema.name, fields: unknownFields },
    );
  }

  const referenceDate = parseTimestamp(request.referenceDate);
  if (!referenceDate) {
    throw new AmbiguousRequestError(`Invalid reference date "${request.referenceDate}"`);
  }

  const fields: FieldDef[] = schema.fields.map((field) =>
    applyOverride(field, request.overrides[field.name]),
  );

  const { faker, seed } = createSeededFaker(request.seed);
  const references = new ReferenceResolver({
    referents: request.referents,
    fieldPools: collectFieldPools(request.overrides),
    assumedReferentCount: options.assumedReferentCount,
  });

  const records: GeneratedRecord[] = [];

  for (let index = 0; index < request.count; index++) {
    references.beginRecord();
    const context: FieldContext = { faker, index, referenceDate, references };
    const record: Record<string, FieldValue> = {};

    for (const field of fields) {
      record[field.name] = generateField(field, record, context);
    }

    records.push(Object.freeze(record));
  }

  logger.debug("Batch synthesized", {
    schema: schema.name,
    count: records.length,
    seed,
    overrides: Object.keys(request.overrides),
  });

  return Object.freeze({
    schema,
    request,
    seed,
    records: Object.freeze(records),
  });
}

function generateField(
  field: FieldDef,
  record: Readonly<Record<string, FieldValue>>,
  context: FieldContext,
): FieldValue {
  if (field.presentWhen) {
    const governing = record[field.presentWhen.field];
    if (typeof governing !== "string" || !field.presentWhen.in.includes(governing)) {
      return null;
    }
  }

  if (field.nullable && field.nullRate && context.faker.datatype.boolean({ probability: field.nullRate })) {
    return null;
  }

  return generateFieldValue(field, context);
}
