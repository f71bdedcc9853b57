/**
 * JSON Schema for structured requests, applied to programmatic input and to
 * interpreter output alike
 */

import { Ajv } from "ajv";
import type { ValidateFunction } from "ajv";
import type { StructuredRequest } from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";
import { formatAjvErrors } from "../registry/definition.js";

const scalar = { type: ["number", "string"] };

export const STRUCTURED_REQUEST_JSON_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["schema"],
  additionalProperties: false,
  properties: {
    schema: { type: "string", minLength: 1 },
    count: { type: "number" },
    format: { type: "string", minLength: 1 },
    constraints: {
      type: "object",
      additionalProperties: {
        anyOf: [
          scalar,
          { type: "array", items: scalar },
          {
            type: "object",
            additionalProperties: false,
            minProperties: 1,
            properties: { min: { type: "number" }, max: { type: "number" } },
          },
          {
            type: "object",
            additionalProperties: false,
            minProperties: 1,
            properties: { start: { type: "string" }, end: { type: "string" } },
          },
        ],
      },
    },
    seed: scalar,
    referenceDate: { type: "string", minLength: 1 },
    referents: {
      type: "object",
      additionalProperties: { type: "array", items: scalar },
    },
  },
} as const;

let compiled: ValidateFunction<StructuredRequest> | null = null;

function requestValidator(): ValidateFunction<StructuredRequest> {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    compiled = ajv.compile<StructuredRequest>(STRUCTURED_REQUEST_JSON_SCHEMA);
  }
  return compiled;
}

/**
 * @throws AmbiguousRequestError when the value is not a structured request
 */
export function validateStructuredRequest(value: unknown, source = "request"): StructuredRequest {
  const validate = requestValidator();
  if (!validate(value)) {
    throw new AmbiguousRequestError(`The ${source} does not have the shape of a generation request`, {
      errors: formatAjvErrors(validate.errors),
    });
  }
  return value;
}
