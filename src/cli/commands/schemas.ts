import { Command } from "commander";
import type { FieldDef } from "../../types/data-model.js";
import { collect, createCliContext, reportCommandError } from "../config/context.js";
import type { SchemasCommandOptions } from "../config/types.js";

function describeField(field: FieldDef): Record<string, unknown> {
  const { name, type, description, ...rest } = field;
  return { name, type, ...(description ? { description } : {}), ...rest };
}

/**
 * List registered schemas and their fields
 */
export function createSchemasCommand(): Command {
  return new Command("schemas")
    .description("List registered schemas with their fields")
    .option("--schema-file <path>", "Custom schema file, JSON or YAML (repeatable)", collect)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action((_options: SchemasCommandOptions, command: Command) => {
      try {
        const opts = command.optsWithGlobals<SchemasCommandOptions>();
        const { engine } = createCliContext(opts);
        const aliases = engine.registry.aliases();

        const schemas = engine.registry.list().map((schema) => ({
          name: schema.name,
          version: schema.version,
          builtin: engine.registry.isBuiltin(schema.name),
          ...(schema.description ? { description: schema.description } : {}),
          aliases: [...aliases.entries()]
            .filter(([alias, target]) => target === schema.name && alias !== schema.name)
            .map(([alias]) => alias),
          fields: schema.fields.map(describeField),
        }));

        console.log(JSON.stringify({ status: "success", phase: "schemas", schemas }, null, 2));
      } catch (error) {
        reportCommandError(error, "schemas");
      }
    });
}
