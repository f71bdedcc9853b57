/**
 * Engine configuration
 */

import type { OutputFormat } from "./data-model.js";
import type { LogLevel } from "../utils/logger.js";

export type SqlDialect = "ansi" | "mysql";

export interface EngineConfig {
  /** Ceiling on records per request; the engine's only backpressure */
  maxRecords: number;
  defaultCount: number;
  defaultFormat: OutputFormat;
  sqlDialect: SqlDialect;
  /** Referent batch size assumed by foreign keys with no referents */
  assumedReferentCount: number;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  maxRecords: 1000,
  defaultCount: 10,
  defaultFormat: "sql",
  sqlDialect: "ansi",
  assumedReferentCount: 100,
  logLevel: "info",
});
