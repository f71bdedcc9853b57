/**
 * Mocksmith: schema-driven synthetic records and safe SQL insert scripts
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/registry/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/guard/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/resolver/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/engine/index.js";

// Utilities
export * from "./utils/config-loader.js";
export * from "./utils/date-bounds.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/seed-manager.js";
