/**
 * Custom schema files - JSON or YAML, a single schema or a list
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { SchemaDef } from "../../types/data-model.js";
import { FileIOError, InvalidSchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { validateSchemaDefinition } from "./definition.js";

/**
 * Parse schema definitions from file content. Accepts one definition, an
 * array of them, or an object with a `schemas` array.
 */
export function parseSchemaDefinitions(content: string, isYaml: boolean): SchemaDef[] {
  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new InvalidSchemaError("Schema file is not valid " + (isYaml ? "YAML" : "JSON"), undefined, {
      cause: error,
    });
  }

  const entries: unknown[] = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed) && Array.isArray(parsed.schemas)
      ? parsed.schemas
      : [parsed];

  return entries.map((entry) => validateSchemaDefinition(entry));
}

/**
 * Load schema definitions from a .json, .yaml or .yml file
 */
export function loadSchemaFile(filePath: string): SchemaDef[] {
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new FileIOError(
      `Unsupported schema file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read schema file: ${filePath}`, { filePath }, { cause: error });
  }

  const schemas = parseSchemaDefinitions(content, isYaml);
  logger.info("Schema file loaded", { filePath, schemas: schemas.map((schema) => schema.name) });
  return schemas;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
