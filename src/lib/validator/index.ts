/**
 * Validator module - record conformance reports
 */

import type { Batch, FieldOverride, SchemaDef } from "../../types/data-model.js";
import { toJsonObject } from "../emitter/json-writer.js";
import { checkKeyUniqueness, SchemaValidator } from "./schema-validator.js";
import type { JsonRecord, RecordSchemaOptions, ValidationReport } from "./types.js";

export * from "./types.js";
export * from "./record-schema.js";
export { SchemaValidator, checkKeyUniqueness } from "./schema-validator.js";

/**
 * Validate JSON-form records against a schema: conformance of every record
 * plus uniqueness of its sequence keys
 */
export function validateRecords(
  records: readonly JsonRecord[],
  schema: SchemaDef,
  overrides: Readonly<Record<string, FieldOverride>> = {},
  options: RecordSchemaOptions = {},
): ValidationReport {
  const validator = new SchemaValidator();
  validator.compile(schema, overrides, options);
  const schemaConformance = validator.validateAll(records);

  const keyFields = schema.fields.filter((field) => field.type === "sequence").map((field) => field.name);
  const keyUniqueness = checkKeyUniqueness(records, keyFields);

  return {
    schema: schema.name,
    schemaConformance,
    keyUniqueness,
    passed: schemaConformance.invalidRecords === 0 && keyUniqueness.every((key) => key.passed),
  };
}

/**
 * Validate a generated batch under the overrides and reference date it was
 * generated with
 */
export function validateBatch(batch: Batch): ValidationReport {
  const records = batch.records.map((record) => toJsonObject(record, batch.schema));
  return validateRecords(records, batch.schema, batch.request.overrides, {
    referenceDate: new Date(batch.request.referenceDate),
  });
}
