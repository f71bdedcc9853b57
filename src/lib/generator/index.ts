/**
 * Generator module - synthetic record generation
 */

export * from "./types.js";
export * from "./faker-engine.js";
export * from "./field-generators.js";
export * from "./overrides.js";
export * from "./reference-pool.js";
export * from "./synthesizer.js";
