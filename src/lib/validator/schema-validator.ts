/**
 * Record validation and conformance checking using Ajv
 */

import { Ajv } from "ajv";
import type { ValidateFunction } from "ajv";
import type { FieldOverride, SchemaDef } from "../../types/data-model.js";
import { parseTimestamp } from "../../utils/date-bounds.js";
import { buildRecordJsonSchema, DATE_WINDOW_KEYWORD } from "./record-schema.js";
import type {
  JsonRecord,
  KeyUniqueness,
  RecordSchemaOptions,
  RecordViolation,
  SchemaConformance,
} from "./types.js";

interface DateWindow {
  start: string;
  end: string;
}

function isDateWindow(value: unknown): value is DateWindow {
  return (
    typeof value === "object" &&
    value !== null &&
    "start" in value &&
    "end" in value &&
    typeof value.start === "string" &&
    typeof value.end === "string"
  );
}

function withinWindow(window: unknown, data: unknown): boolean {
  if (!isDateWindow(window) || typeof data !== "string") {
    return false;
  }
  const time = parseTimestamp(data)?.getTime();
  const start = parseTimestamp(window.start)?.getTime();
  const end = parseTimestamp(window.end)?.getTime();
  return time !== undefined && start !== undefined && end !== undefined && time >= start && time <= end;
}

/**
 * Validates records in their JSON form against a SchemaDef
 */
export class SchemaValidator {
  private ajv: Ajv;
  private validateFn: ValidateFunction | null = null;

  constructor() {
    this.ajv = new Ajv({
      strict: false,
      allErrors: true,
      verbose: true,
    });
    this.ajv.addKeyword({
      keyword: DATE_WINDOW_KEYWORD,
      type: "string",
      schemaType: "object",
      validate: withinWindow,
    });
  }

  /**
   * Compile the record schema for a SchemaDef and optional request overrides
   */
  compile(
    schema: SchemaDef,
    overrides: Readonly<Record<string, FieldOverride>> = {},
    options: RecordSchemaOptions = {},
  ): void {
    this.validateFn = this.ajv.compile(buildRecordJsonSchema(schema, overrides, options));
  }

  /**
   * Validate a single record against the compiled schema
   */
  validate(record: unknown): boolean {
    if (!this.validateFn) {
      throw new Error("Schema not compiled. Call compile() first.");
    }

    return this.validateFn(record);
  }

  /**
   * Get validation errors for the last validation
   */
  getErrors(): RecordViolation["errors"] {
    if (!this.validateFn || !this.validateFn.errors) {
      return [];
    }

    return this.validateFn.errors.map((error) => {
      // For missing required properties, Ajv puts the field name in params
      const path =
        error.keyword === "required" && "missingProperty" in error.params
          ? `/${String(error.params.missingProperty)}`
          : error.instancePath || error.schemaPath;

      return {
        path,
        message: `${error.message ?? "failed"} (keyword: ${error.keyword})`,
      };
    });
  }

  /**
   * Validate all records and collect violations
   */
  validateAll(records: readonly unknown[]): SchemaConformance {
    if (!this.validateFn) {
      throw new Error("Schema not compiled. Call compile() first.");
    }

    const violations: RecordViolation[] = [];
    let validCount = 0;

    records.forEach((record, index) => {
      if (this.validate(record)) {
        validCount++;
      } else {
        violations.push({
          recordIndex: index,
          errors: this.getErrors(),
        });
      }
    });

    const totalRecords = records.length;

    return {
      totalRecords,
      validRecords: validCount,
      invalidRecords: totalRecords - validCount,
      conformanceRate: totalRecords > 0 ? validCount / totalRecords : 1,
      violations,
    };
  }
}

/**
 * Check uniqueness of key fields across records
 */
export function checkKeyUniqueness(records: readonly JsonRecord[], fields: readonly string[]): KeyUniqueness[] {
  return fields.map((field) => {
    const values = new Set<string>();
    let totalKeys = 0;

    for (const record of records) {
      const value = record[field];
      if (value !== undefined && value !== null) {
        totalKeys++;
        values.add(String(value));
      }
    }

    const duplicates = totalKeys - values.size;
    return {
      field,
      totalKeys,
      uniqueKeys: values.size,
      duplicates,
      passed: duplicates === 0,
    };
  });
}
