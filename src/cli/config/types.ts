/**
 * CLI configuration types
 */

import type { RawConstraint } from "../../types/data-model.js";
import type { EngineConfigSection } from "../../utils/config-loader.js";

/**
 * Generate command defaults
 */
export interface GenerateConfig {
  schema?: string;
  count?: number;
  format?: string;
  seed?: string | number;
  referenceDate?: string;
  constraints?: Record<string, RawConstraint>;
  outputPath?: string;
}

/**
 * Complete configuration file structure
 */
export interface MocksmithConfig {
  engine?: EngineConfigSection;
  /** Custom schema files (.json, .yaml, .yml), relative to the working directory */
  schemaFiles?: string[];
  /** Inline custom schema definitions */
  schemas?: unknown[];
  generate?: GenerateConfig;
}

/**
 * Options shared by every command that builds an engine
 */
export interface EngineCommandOptions {
  config?: string;
  schemaFile?: string[];
  maxRecords?: number;
  dialect?: string;
  logLevel?: string;
}

/**
 * CLI command options (from commander)
 */
export interface GenerateCommandOptions extends EngineCommandOptions {
  schema?: string;
  count?: number;
  format?: string;
  constraint?: string[];
  seed?: string;
  referenceDate?: string;
  outputPath?: string;
}

export type SchemasCommandOptions = EngineCommandOptions;

export interface ValidateCommandOptions extends EngineCommandOptions {
  schema: string;
  input: string;
  constraint?: string[];
  referenceDate?: string;
  outputPath?: string;
}
