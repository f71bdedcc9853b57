#!/usr/bin/env node

/**
 * Mocksmith CLI - schema-driven synthetic records and safe SQL inserts
 */

import { Command } from "commander";
import { createGenerateCommand } from "./commands/generate.js";
import { createSchemasCommand } from "./commands/schemas.js";
import { createValidateCommand } from "./commands/validate.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "mocksmith",
  version: "0.1.0",
  description: "Schema-driven synthetic records rendered as SQL inserts, CSV, JSON or NDJSON",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug");

  // Apply the global log level before any command runs
  program.hook("preAction", (thisCommand) => {
    const level: unknown = thisCommand.opts().logLevel;
    if (isLogLevel(level)) {
      logger.setLevel(level);
    }
  });

  // Add commands
  program.addCommand(createGenerateCommand());
  program.addCommand(createSchemasCommand());
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

// Run CLI
main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
