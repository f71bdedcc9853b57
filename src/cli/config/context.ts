/**
 * Engine construction and error reporting shared by CLI commands
 */

import { InvalidArgumentError } from "commander";
import { SyntheticDataEngine } from "../../lib/engine/index.js";
import { loadSchemaFile, SchemaRegistry, validateSchemaDefinition } from "../../lib/registry/index.js";
import { createKeywordInterpreter } from "../../lib/resolver/keyword-interpreter.js";
import { loadEngineConfig } from "../../utils/config-loader.js";
import { ErrorCode, isMocksmithError, MocksmithError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseConfigFile } from "./parser.js";
import type { EngineCommandOptions, MocksmithConfig } from "./types.js";

export interface CliContext {
  engine: SyntheticDataEngine;
  config: MocksmithConfig;
}

/**
 * Build an engine from CLI options and the optional config file: engine
 * settings, then custom schemas from the config file and --schema-file
 */
export function createCliContext(options: EngineCommandOptions, format?: string): CliContext {
  const config: MocksmithConfig = options.config ? parseConfigFile(options.config) : {};

  const engineConfig = loadEngineConfig(
    {
      maxRecords: options.maxRecords,
      dialect: options.dialect,
      logLevel: options.logLevel,
      format,
    },
    config.engine,
  );
  logger.setLevel(engineConfig.logLevel);

  const registry = new SchemaRegistry();
  for (const definition of config.schemas ?? []) {
    registry.register(validateSchemaDefinition(definition));
  }
  for (const filePath of [...(config.schemaFiles ?? []), ...(options.schemaFile ?? [])]) {
    for (const schema of loadSchemaFile(filePath)) {
      registry.register(schema);
    }
  }

  return {
    engine: new SyntheticDataEngine({
      registry,
      config: engineConfig,
      interpreter: createKeywordInterpreter(),
    }),
    config,
  };
}

/**
 * Print an error as a JSON status object and mark the process failed
 */
export function reportCommandError(error: unknown, phase: string): void {
  const wrapped = isMocksmithError(error)
    ? error
    : new MocksmithError(
        ErrorCode.GENERAL_ERROR,
        error instanceof Error ? error.message : String(error),
        undefined,
        { cause: error },
      );

  logger.debug("Command failed", { phase, code: wrapped.code });
  console.error(JSON.stringify(wrapped.toResponse(phase), null, 2));
  process.exitCode = 1;
}

/**
 * Commander argument parser for non-negative integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return parsed;
}

/**
 * Commander collector for repeatable options
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
