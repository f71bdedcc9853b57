/**
 * Guard module - SQL safety enforcement
 */
export * from "./sql-guard.js";
