/**
 * Schema definition validation
 *
 * Shape is checked with Ajv against a draft-07 description of SchemaDef;
 * cross-field rules (ranges, enum domains, conditions) are checked after.
 */

import { Ajv } from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import type {
  FieldDef,
  SchemaDef,
} from "../../types/data-model.js";
import { STRING_KINDS } from "../../types/data-model.js";
import {
  EmptyEnumError,
  InvalidRangeError,
  InvalidSchemaError,
} from "../../utils/errors.js";
import {
  isAbsoluteDateBound,
  isValidDateBound,
  resolveDateBound,
} from "../../utils/date-bounds.js";

/** Identifiers that may appear in SQL: lower-case, unquoted, portable */
export const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]{0,62}$/;

/** Names that collide with Object.prototype when used as record keys */
export const RESERVED_PROPERTY_NAMES: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !RESERVED_PROPERTY_NAMES.has(name);
}

const identifier = { type: "string", pattern: IDENTIFIER_PATTERN.source };

const fieldBase = {
  name: identifier,
  nullable: { type: "boolean" },
  nullRate: { type: "number", minimum: 0, maximum: 1 },
  presentWhen: {
    type: "object",
    required: ["field", "in"],
    additionalProperties: false,
    properties: {
      field: identifier,
      in: { type: "array", items: { type: "string" }, minItems: 1 },
    },
  },
  description: { type: "string" },
};

function fieldVariant(type: string, properties: Record<string, unknown>, required: string[] = []) {
  return {
    type: "object",
    required: ["name", "type", ...required],
    additionalProperties: false,
    properties: {
      ...fieldBase,
      type: { const: type },
      ...properties,
    },
  };
}

const finiteNumber = { type: "number" };

export const SCHEMA_DEFINITION_JSON_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["name", "fields"],
  additionalProperties: false,
  properties: {
    name: identifier,
    version: { type: "integer", minimum: 1 },
    description: { type: "string" },
    fields: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        required: ["type"],
        discriminator: { propertyName: "type" },
        oneOf: [
          fieldVariant("sequence", { start: { type: "integer" } }),
          fieldVariant("string", {
            kind: { enum: [...STRING_KINDS] },
            pattern: { type: "string", minLength: 1 },
            maxLength: { type: "integer", minimum: 1 },
          }),
          fieldVariant("email", {
            domains: { type: "array", items: { type: "string", minLength: 3 }, minItems: 1 },
          }),
          fieldVariant("phone", { style: { enum: ["human", "national", "international"] } }),
          fieldVariant("address", {
            part: { enum: ["full", "street", "city", "state", "zip", "country"] },
          }),
          fieldVariant("integer-range", { min: { type: "integer" }, max: { type: "integer" } }, ["min", "max"]),
          fieldVariant(
            "decimal-range",
            {
              min: finiteNumber,
              max: finiteNumber,
              precision: { type: "integer", minimum: 0, maximum: 10 },
            },
            ["min", "max"],
          ),
          fieldVariant(
            "date-range",
            {
              start: { type: "string", minLength: 1 },
              end: { type: "string", minLength: 1 },
              granularity: { enum: ["date", "datetime"] },
            },
            ["start", "end"],
          ),
          fieldVariant("enum", { values: { type: "array", items: { type: "string" } } }, ["values"]),
          fieldVariant(
            "foreign-key-ref",
            {
              target: identifier,
              targetField: identifier,
              assumedCount: { type: "integer", minimum: 1 },
            },
            ["target"],
          ),
        ],
      },
    },
  },
} as const;

let compiled: ValidateFunction<SchemaDef> | null = null;

function shapeValidator(): ValidateFunction<SchemaDef> {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: true, discriminator: true, strict: false });
    compiled = ajv.compile<SchemaDef>(SCHEMA_DEFINITION_JSON_SCHEMA);
  }
  return compiled;
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => `${error.instancePath || "/"} ${error.message ?? error.keyword}`);
}

/**
 * Validate an untrusted schema definition and return it typed.
 *
 * @throws InvalidSchemaError on a malformed definition
 * @throws InvalidRangeError when a range's bounds are inverted
 * @throws EmptyEnumError when an enum declares no values
 */
export function validateSchemaDefinition(input: unknown): SchemaDef {
  const validate = shapeValidator();
  if (!validate(input)) {
    throw new InvalidSchemaError("Schema definition does not match the expected shape", {
      errors: formatAjvErrors(validate.errors),
    });
  }

  const schema = input;
  const seen = new Map<string, FieldDef>();

  if (RESERVED_PROPERTY_NAMES.has(schema.name)) {
    throw new InvalidSchemaError(`"${schema.name}" is reserved and cannot name a schema`, {
      schema: schema.name,
    });
  }

  for (const field of schema.fields) {
    if (seen.has(field.name)) {
      throw new InvalidSchemaError(`Duplicate field "${field.name}" in schema "${schema.name}"`, {
        schema: schema.name,
        field: field.name,
      });
    }
    checkField(schema.name, field, seen);
    seen.set(field.name, field);
  }

  return schema;
}

function checkField(schemaName: string, field: FieldDef, earlier: ReadonlyMap<string, FieldDef>): void {
  const where = { schema: schemaName, field: field.name };

  const names = [field.name, field.presentWhen?.field, field.type === "foreign-key-ref" ? field.targetField : undefined];
  const reserved = names.find((name) => name !== undefined && RESERVED_PROPERTY_NAMES.has(name));
  if (reserved !== undefined) {
    throw new InvalidSchemaError(`"${reserved}" is reserved and cannot name a field`, where);
  }

  if ((field.nullRate !== undefined || field.presentWhen) && !field.nullable) {
    throw new InvalidSchemaError(
      `Field "${field.name}" uses nullRate or presentWhen but is not nullable`,
      where,
    );
  }

  if (field.presentWhen) {
    const condition = earlier.get(field.presentWhen.field);
    if (!condition || condition.type !== "enum") {
      throw new InvalidSchemaError(
        `Field "${field.name}" is conditioned on "${field.presentWhen.field}", which must be an earlier enum field`,
        where,
      );
    }
    const unknown = field.presentWhen.in.filter((value) => !condition.values.includes(value));
    if (unknown.length > 0) {
      throw new InvalidSchemaError(
        `Field "${field.name}" is conditioned on values not in "${condition.name}": ${unknown.join(", ")}`,
        where,
      );
    }
  }

  switch (field.type) {
    case "integer-range":
    case "decimal-range":
      if (field.min > field.max) {
        throw new InvalidRangeError(
          `Field "${field.name}" has min ${field.min} greater than max ${field.max}`,
          { ...where, min: field.min, max: field.max },
        );
      }
      break;
    case "date-range": {
      for (const bound of [field.start, field.end]) {
        if (!isValidDateBound(bound)) {
          throw new InvalidSchemaError(`Field "${field.name}" has an unparseable date bound "${bound}"`, where);
        }
      }
      if (isAbsoluteDateBound(field.start) && isAbsoluteDateBound(field.end)) {
        const epoch = new Date(0);
        const start = resolveDateBound(field.start, epoch, "start");
        const end = resolveDateBound(field.end, epoch, "end");
        if (start && end && start.getTime() > end.getTime()) {
          throw new InvalidRangeError(
            `Field "${field.name}" starts after it ends (${field.start} > ${field.end})`,
            { ...where, start: field.start, end: field.end },
          );
        }
      }
      break;
    }
    case "enum":
      if (field.values.length === 0) {
        throw new EmptyEnumError(`Enum field "${field.name}" declares no values`, where);
      }
      break;
    default:
      break;
  }
}
