/**
 * Validate CLI command: JSON or NDJSON artifacts against a schema
 */

import { Command } from "commander";
import { createReadStream } from "fs";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import * as readline from "readline";
import { parseConstraintExpressions } from "../../lib/resolver/expressions.js";
import { resolveConstraints } from "../../lib/resolver/constraints.js";
import { validateRecords, type JsonRecord, type ValidationReport } from "../../lib/validator/index.js";
import { parseTimestamp } from "../../utils/date-bounds.js";
import { AmbiguousRequestError, FileIOError } from "../../utils/errors.js";
import { collect, createCliContext, reportCommandError } from "../config/context.js";
import type { ValidateCommandOptions } from "../config/types.js";

function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown, position: string): JsonRecord {
  if (!isJsonRecord(value)) {
    throw new FileIOError(`Input ${position} is not a JSON object`);
  }
  return value;
}

/**
 * NDJSON input reader as an async generator
 * Yields records from file or stdin
 */
export async function* streamNDJSONRecords(inputPath: string): AsyncIterableIterator<JsonRecord> {
  // Handle stdin vs file
  const input =
    inputPath === "stdin" || inputPath === "-"
      ? process.stdin
      : createReadStream(inputPath, { encoding: "utf8" });

  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue; // Skip empty lines

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      throw new FileIOError(
        `Failed to parse NDJSON line ${lineNumber}: ${trimmed.substring(0, 100)}`,
        { inputPath, line: lineNumber },
        { cause: err },
      );
    }
    yield toRecord(parsed, `line ${lineNumber}`);
  }
}

/**
 * Load a JSON array artifact
 */
export async function loadJSONRecords(inputPath: string): Promise<JsonRecord[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(inputPath, "utf8"));
  } catch (err) {
    throw new FileIOError(`Failed to load JSON records from ${inputPath}`, { inputPath }, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new FileIOError(`Expected a JSON array in ${inputPath}`, { inputPath });
  }
  return parsed.map((value: unknown, index) => toRecord(value, `record ${index}`));
}

async function readRecords(inputPath: string): Promise<JsonRecord[]> {
  if (inputPath.endsWith(".json")) {
    return loadJSONRecords(inputPath);
  }

  const records: JsonRecord[] = [];
  for await (const record of streamNDJSONRecords(inputPath)) {
    records.push(record);
  }
  return records;
}

/**
 * Create wrapped response for CLI output
 */
function createSuccessResponse(report: ValidationReport): Record<string, unknown> {
  return {
    status: "success",
    phase: "validation",
    report,
  };
}

/**
 * Create validate command
 */
export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Validate a JSON or NDJSON artifact against a schema")
    .requiredOption("--schema <name>", "Schema name or alias")
    .requiredOption("--input <path>", 'Artifact to validate: .json array, NDJSON, or "stdin"')
    .option("--constraint <key=value>", "Constraint the records were generated under (repeatable)", collect)
    .option("--reference-date <date>", "ISO date relative date bounds are resolved against")
    .option("--output-path <path>", "Path for validation report JSON (default: stdout)")
    .option("--schema-file <path>", "Custom schema file, JSON or YAML (repeatable)", collect)
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .action(async (_options: ValidateCommandOptions, command: Command) => {
      try {
        const opts = command.optsWithGlobals<ValidateCommandOptions>();
        const { engine } = createCliContext(opts);
        const schema = engine.resolveSchema(opts.schema);
        const overrides = resolveConstraints(schema, parseConstraintExpressions(opts.constraint ?? []));

        let referenceDate: Date | undefined;
        if (opts.referenceDate !== undefined) {
          const parsed = parseTimestamp(opts.referenceDate);
          if (!parsed) {
            throw new AmbiguousRequestError(`Invalid reference date "${opts.referenceDate}"`);
          }
          referenceDate = parsed;
        }

        const records = await readRecords(opts.input);
        if (records.length === 0) {
          throw new FileIOError("No records found in input", { input: opts.input });
        }

        const report = validateRecords(records, schema, overrides, { referenceDate });
        const output = JSON.stringify(createSuccessResponse(report), null, 2);

        // Write output
        if (opts.outputPath && opts.outputPath !== "stdout") {
          await mkdir(dirname(opts.outputPath), { recursive: true });
          await writeFile(opts.outputPath, output, "utf8");
          console.log(`Validation report written to: ${opts.outputPath}`);
        } else {
          console.log(output);
        }

        if (!report.passed) {
          process.exitCode = 1;
        }
      } catch (error) {
        reportCommandError(error, "validation");
      }
    });
}
