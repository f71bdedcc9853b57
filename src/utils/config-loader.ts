/**
 * Configuration loader for the engine
 */

import type { OutputFormat } from "../types/data-model.js";
import { OUTPUT_FORMATS } from "../types/data-model.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig, type SqlDialect } from "../types/config.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, LOG_LEVELS, logger } from "./logger.js";

const SQL_DIALECTS: readonly SqlDialect[] = ["ansi", "mysql"];

/**
 * CLI options that feed engine configuration
 */
export interface EngineCliOptions {
  maxRecords?: number;
  format?: string;
  dialect?: string;
  logLevel?: string;
}

/**
 * Config file section for the engine; values are unchecked until validated
 */
export interface EngineConfigSection {
  maxRecords?: unknown;
  defaultCount?: unknown;
  defaultFormat?: unknown;
  sqlDialect?: unknown;
  assumedReferentCount?: unknown;
  logLevel?: unknown;
}

type Env = Readonly<Record<string, string | undefined>>;

function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === "string" && (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function isSqlDialect(value: unknown): value is SqlDialect {
  return typeof value === "string" && (SQL_DIALECTS as readonly string[]).includes(value);
}

function parseEnvInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`, { variable: name, value: raw });
  }
  return value;
}

function positiveInteger(name: string, value: unknown, allowZero = false): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new ConfigError(
      `${name} must be a ${allowZero ? "non-negative" : "positive"} integer, got ${JSON.stringify(value)}`,
      { option: name, value },
    );
  }
  return value;
}

/**
 * Load engine configuration from CLI options, environment and config file
 *
 * Precedence: CLI > environment > config file > defaults
 *
 * @example
 * const config = loadEngineConfig({ maxRecords: 50 }, { maxRecords: 500 });
 * // config.maxRecords === 50
 */
export function loadEngineConfig(
  cliOptions: EngineCliOptions = {},
  configFile: EngineConfigSection = {},
  env: Env = process.env,
): EngineConfig {
  const merged: EngineConfigSection = {
    maxRecords:
      cliOptions.maxRecords ??
      parseEnvInteger(env, "MOCKSMITH_MAX_RECORDS") ??
      configFile.maxRecords ??
      DEFAULT_ENGINE_CONFIG.maxRecords,

    defaultCount: configFile.defaultCount ?? DEFAULT_ENGINE_CONFIG.defaultCount,

    defaultFormat:
      cliOptions.format ??
      env.MOCKSMITH_DEFAULT_FORMAT ??
      configFile.defaultFormat ??
      DEFAULT_ENGINE_CONFIG.defaultFormat,

    sqlDialect:
      cliOptions.dialect ??
      env.MOCKSMITH_SQL_DIALECT ??
      configFile.sqlDialect ??
      DEFAULT_ENGINE_CONFIG.sqlDialect,

    assumedReferentCount: configFile.assumedReferentCount ?? DEFAULT_ENGINE_CONFIG.assumedReferentCount,

    logLevel:
      cliOptions.logLevel ??
      env.MOCKSMITH_LOG_LEVEL ??
      configFile.logLevel ??
      DEFAULT_ENGINE_CONFIG.logLevel,
  };

  const config = validateEngineConfig(merged);

  logger.debug("Engine config loaded", { ...config });

  return config;
}

/**
 * Validate an engine configuration section
 *
 * @throws ConfigError if configuration is invalid
 */
export function validateEngineConfig(section: EngineConfigSection): EngineConfig {
  const maxRecords = positiveInteger("maxRecords", section.maxRecords);
  const defaultCount = positiveInteger("defaultCount", section.defaultCount, true);
  const assumedReferentCount = positiveInteger("assumedReferentCount", section.assumedReferentCount);

  if (defaultCount > maxRecords) {
    throw new ConfigError(`defaultCount (${defaultCount}) exceeds maxRecords (${maxRecords})`, {
      defaultCount,
      maxRecords,
    });
  }

  const defaultFormat =
    typeof section.defaultFormat === "string" ? section.defaultFormat.trim().toLowerCase() : section.defaultFormat;
  if (!isOutputFormat(defaultFormat)) {
    throw new ConfigError(`defaultFormat must be one of ${OUTPUT_FORMATS.join(", ")}`, {
      option: "defaultFormat",
      value: section.defaultFormat,
    });
  }

  if (!isSqlDialect(section.sqlDialect)) {
    throw new ConfigError(`sqlDialect must be one of ${SQL_DIALECTS.join(", ")}`, {
      option: "sqlDialect",
      value: section.sqlDialect,
    });
  }

  if (!isLogLevel(section.logLevel)) {
    throw new ConfigError(`logLevel must be one of ${LOG_LEVELS.join(", ")}`, {
      option: "logLevel",
      value: section.logLevel,
    });
  }

  return {
    maxRecords,
    defaultCount,
    defaultFormat,
    sqlDialect: section.sqlDialect,
    assumedReferentCount,
    logLevel: section.logLevel,
  };
}
