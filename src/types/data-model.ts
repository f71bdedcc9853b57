/**
 * Core data model: schema definitions, generation requests, records and
 * artifacts
 */

// ---------------------------------------------------------------------------
// Schema definitions
// ---------------------------------------------------------------------------

export const FIELD_TYPES = [
  "sequence",
  "string",
  "email",
  "phone",
  "address",
  "integer-range",
  "decimal-range",
  "date-range",
  "enum",
  "foreign-key-ref",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export const STRING_KINDS = [
  "full-name",
  "first-name",
  "last-name",
  "word",
  "words",
  "sentence",
  "paragraph",
  "product-name",
  "company",
  "uuid",
] as const;

export type StringKind = (typeof STRING_KINDS)[number];

export type PhoneStyle = "human" | "national" | "international";

export type AddressPart = "full" | "street" | "city" | "state" | "zip" | "country";

export type DateGranularity = "date" | "datetime";

/**
 * A date bound: an ISO date or datetime, `now`, or a signed offset such as
 * `-2y`, `-6mo`, `-3w`, `-30d`, `+12h`
 */
export type DateBound = string;

/**
 * Generate the field only when an earlier enum field holds one of the values
 */
export interface FieldCondition {
  field: string;
  in: readonly string[];
}

interface FieldDefBase {
  name: string;
  nullable?: boolean;
  /** Probability (0..1) of emitting null; nullable fields only */
  nullRate?: number;
  presentWhen?: FieldCondition;
  description?: string;
}

export interface SequenceFieldDef extends FieldDefBase {
  type: "sequence";
  start?: number;
}

export interface StringFieldDef extends FieldDefBase {
  type: "string";
  kind?: StringKind;
  /** `#` digit, `?` letter, `*` either */
  pattern?: string;
  maxLength?: number;
}

export interface EmailFieldDef extends FieldDefBase {
  type: "email";
  domains?: readonly string[];
}

export interface PhoneFieldDef extends FieldDefBase {
  type: "phone";
  style?: PhoneStyle;
}

export interface AddressFieldDef extends FieldDefBase {
  type: "address";
  part?: AddressPart;
}

export interface IntegerRangeFieldDef extends FieldDefBase {
  type: "integer-range";
  min: number;
  max: number;
}

export interface DecimalRangeFieldDef extends FieldDefBase {
  type: "decimal-range";
  min: number;
  max: number;
  precision?: number;
}

export interface DateRangeFieldDef extends FieldDefBase {
  type: "date-range";
  start: DateBound;
  end: DateBound;
  granularity?: DateGranularity;
}

export interface EnumFieldDef extends FieldDefBase {
  type: "enum";
  values: readonly string[];
}

export interface ForeignKeyFieldDef extends FieldDefBase {
  type: "foreign-key-ref";
  target: string;
  targetField?: string;
  /** Size of the assumed referent batch when no referents are supplied */
  assumedCount?: number;
}

export type FieldDef =
  | SequenceFieldDef
  | StringFieldDef
  | EmailFieldDef
  | PhoneFieldDef
  | AddressFieldDef
  | IntegerRangeFieldDef
  | DecimalRangeFieldDef
  | DateRangeFieldDef
  | EnumFieldDef
  | ForeignKeyFieldDef;

export interface SchemaDef {
  name: string;
  version?: number;
  description?: string;
  fields: readonly FieldDef[];
}

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

export const OUTPUT_FORMATS = ["sql", "csv", "json", "ndjson"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type ReferentKey = string | number;

export type FieldOverride =
  | { kind: "range"; min: number; max: number }
  | { kind: "window"; start: DateBound; end: DateBound }
  | { kind: "values"; values: readonly string[] }
  | { kind: "pool"; ids: readonly ReferentKey[] };

/**
 * Constraint value as a caller writes it, before it is matched to a field
 */
export type RawConstraint =
  | number
  | string
  | readonly (number | string)[]
  | { min?: number; max?: number }
  | { start?: string; end?: string };

/**
 * Structured inbound request: the programmatic path, and the shape an
 * interpreter must return for free text
 */
export interface StructuredRequest {
  schema: string;
  count?: number;
  format?: string;
  constraints?: Record<string, RawConstraint>;
  seed?: string | number;
  referenceDate?: string;
  referents?: Record<string, ReferentKey[]>;
}

/**
 * Fully resolved request, ready for the synthesizer
 */
export interface GenerationRequest {
  readonly schema: string;
  readonly count: number;
  readonly format: OutputFormat;
  readonly overrides: Readonly<Record<string, FieldOverride>>;
  readonly seed?: string;
  /** ISO timestamp relative date bounds are resolved against */
  readonly referenceDate: string;
  readonly referents?: Readonly<Record<string, readonly ReferentKey[]>>;
}

// ---------------------------------------------------------------------------
// Records, batches, artifacts
// ---------------------------------------------------------------------------

export type FieldValue = string | number | Date | null;

export type GeneratedRecord = Readonly<Record<string, FieldValue>>;

export interface Batch {
  readonly schema: SchemaDef;
  readonly request: GenerationRequest;
  /** Seed actually used, reported even when the request had none */
  readonly seed: string;
  readonly records: readonly GeneratedRecord[];
}

export interface Artifact {
  readonly format: OutputFormat;
  readonly mediaType: string;
  readonly content: string;
  readonly schema: string;
  readonly recordCount: number;
  readonly seed: string;
  /** Reference date relative bounds were resolved against; replays need it with the seed */
  readonly referenceDate: string;
}
