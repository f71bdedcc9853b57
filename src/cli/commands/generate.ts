import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { Artifact, StructuredRequest } from "../../types/data-model.js";
import { parseConstraintExpressions } from "../../lib/resolver/expressions.js";
import { AmbiguousRequestError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { collect, createCliContext, parseInteger, reportCommandError } from "../config/context.js";
import type { GenerateCommandOptions, GenerateConfig } from "../config/types.js";

/**
 * Merge CLI options with the config file's generate section (CLI options
 * take precedence; --constraint entries are merged over file constraints)
 */
export function mergeGenerateSettings(
  options: GenerateCommandOptions,
  configFile: GenerateConfig = {},
): Partial<StructuredRequest> {
  const constraints = {
    ...configFile.constraints,
    ...parseConstraintExpressions(options.constraint ?? []),
  };

  const schema = options.schema ?? configFile.schema;
  const count = options.count ?? configFile.count;
  const format = options.format ?? configFile.format;
  const seed = options.seed ?? configFile.seed;
  const referenceDate = options.referenceDate ?? configFile.referenceDate;

  return {
    ...(schema !== undefined ? { schema } : {}),
    ...(count !== undefined ? { count } : {}),
    ...(format !== undefined ? { format } : {}),
    ...(seed !== undefined ? { seed } : {}),
    ...(referenceDate !== undefined ? { referenceDate } : {}),
    ...(Object.keys(constraints).length > 0 ? { constraints } : {}),
  };
}

async function writeArtifact(artifact: Artifact, outputPath: string | undefined): Promise<void> {
  if (!outputPath || outputPath === "stdout") {
    process.stdout.write(artifact.content);
    logger.info("Generation complete", {
      schema: artifact.schema,
      format: artifact.format,
      records: artifact.recordCount,
      seed: artifact.seed,
      referenceDate: artifact.referenceDate,
    });
    return;
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, artifact.content, "utf8");
  } catch (error) {
    throw new FileIOError(`Failed to write output to ${outputPath}`, { outputPath }, { cause: error });
  }

  console.log(
    JSON.stringify(
      {
        status: "success",
        phase: "generation",
        output: {
          path: outputPath,
          schema: artifact.schema,
          format: artifact.format,
          mediaType: artifact.mediaType,
          recordCount: artifact.recordCount,
          seed: artifact.seed,
          referenceDate: artifact.referenceDate,
        },
      },
      null,
      2,
    ),
  );
}

/**
 * Create generate command
 * @returns Commander Command
 */
export function createGenerateCommand(): Command {
  return new Command("generate")
    .description("Generate synthetic records from a prompt or a named schema")
    .argument("[prompt...]", 'Free-text request, e.g. "20 orders $10-$500 in 2024"')
    .option("--schema <name>", "Schema name or alias")
    .option("--count <number>", "Number of records to generate", parseInteger)
    .option("--format <format>", "Output format: sql, csv, json, ndjson")
    .option("--constraint <key=value>", "Field constraint, e.g. amount=10..500 (repeatable)", collect)
    .option("--seed <seed>", "Seed for deterministic generation")
    .option("--reference-date <date>", "ISO date relative date bounds are resolved against")
    .option("--output-path <path>", 'Output path (or "stdout")')
    .option("--schema-file <path>", "Custom schema file, JSON or YAML (repeatable)", collect)
    .option("--max-records <number>", "Ceiling on records per request", parseInteger)
    .option("--dialect <dialect>", "SQL dialect: ansi, mysql")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (prompt: string[], _options: GenerateCommandOptions, command: Command) => {
      try {
        const opts = command.optsWithGlobals<GenerateCommandOptions>();
        const { engine, config } = createCliContext(opts);
        const settings = mergeGenerateSettings(opts, config.generate);

        let artifact: Artifact;
        if (prompt.length > 0) {
          artifact = await engine.generateFromText(prompt.join(" "), settings);
        } else if (settings.schema) {
          artifact = engine.generate({ ...settings, schema: settings.schema });
        } else {
          throw new AmbiguousRequestError("Provide a prompt or --schema");
        }

        await writeArtifact(artifact, opts.outputPath ?? config.generate?.outputPath);
      } catch (error) {
        reportCommandError(error, "generation");
      }
    });
}
