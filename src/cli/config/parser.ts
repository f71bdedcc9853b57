/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { Ajv } from "ajv";
import { parse as parseYaml } from "yaml";
import { formatAjvErrors } from "../../lib/registry/definition.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { MocksmithConfig } from "./types.js";

const scalar = { type: ["number", "string"] };

export const CONFIG_FILE_JSON_SCHEMA = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: false,
  properties: {
    engine: {
      type: "object",
      additionalProperties: false,
      properties: {
        maxRecords: {},
        defaultCount: {},
        defaultFormat: {},
        sqlDialect: {},
        assumedReferentCount: {},
        logLevel: {},
      },
    },
    schemaFiles: { type: "array", items: { type: "string", minLength: 1 } },
    schemas: { type: "array" },
    generate: {
      type: "object",
      additionalProperties: false,
      properties: {
        schema: { type: "string" },
        count: { type: "number" },
        format: { type: "string" },
        seed: scalar,
        referenceDate: { type: "string" },
        constraints: { type: "object" },
        outputPath: { type: "string" },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfigShape = ajv.compile<MocksmithConfig>(CONFIG_FILE_JSON_SCHEMA);

/**
 * Parse configuration content. An empty document is an empty configuration.
 *
 * @throws ConfigError when the content is malformed or has unknown keys
 */
export function parseConfigContent(content: string, isYaml: boolean, source = "config"): MocksmithConfig {
  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${source}`, { source }, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!validateConfigShape(parsed)) {
    throw new ConfigError(`Invalid config file: ${source}`, {
      source,
      errors: formatAjvErrors(validateConfigShape.errors),
    });
  }

  return parsed;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): MocksmithConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, { filePath }, { cause: error });
  }

  const config = parseConfigContent(content, isYaml, filePath);

  logger.info("Configuration file parsed successfully", {
    hasEngineConfig: !!config.engine,
    hasGenerateConfig: !!config.generate,
    schemaFiles: config.schemaFiles?.length ?? 0,
  });

  return config;
}
