/**
 * Validator module types
 */

export type JsonRecord = Record<string, unknown>;

export interface RecordViolation {
  recordIndex: number;
  errors: {
    path: string;
    message: string;
  }[];
}

export interface SchemaConformance {
  totalRecords: number;
  validRecords: number;
  invalidRecords: number;
  conformanceRate: number;
  violations: RecordViolation[];
}

export interface KeyUniqueness {
  field: string;
  totalKeys: number;
  uniqueKeys: number;
  duplicates: number;
  passed: boolean;
}

export interface ValidationReport {
  schema: string;
  schemaConformance: SchemaConformance;
  keyUniqueness: KeyUniqueness[];
  passed: boolean;
}

export interface RecordSchemaOptions {
  /** Date relative bounds are resolved against; defaults to now */
  referenceDate?: Date;
}
