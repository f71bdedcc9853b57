/**
 * Synthetic Data Engine - the facade front ends talk to
 *
 * Resolves a request, synthesizes the batch and renders the artifact. The
 * engine is stateless apart from its registry; concurrent calls share no
 * random state.
 */

import type {
  Artifact,
  Batch,
  ForeignKeyFieldDef,
  OutputFormat,
  ReferentKey,
  SchemaDef,
  StructuredRequest,
} from "../../types/data-model.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../../types/config.js";
import { logger } from "../../utils/logger.js";
import { deriveSeed, normalizeSeed } from "../../utils/seed-manager.js";
import { renderBatch } from "../emitter/index.js";
import { synthesizeBatch } from "../generator/synthesizer.js";
import { SqlSafetyGuard } from "../guard/index.js";
import { SchemaRegistry } from "../registry/index.js";
import { RequestResolver } from "../resolver/index.js";
import type { RequestInterpreter } from "../resolver/types.js";
import { validateBatch, type ValidationReport } from "../validator/index.js";

export interface EngineOptions {
  registry?: SchemaRegistry;
  config?: Partial<EngineConfig>;
  /** Free-text interpreter; generateFromText fails without one */
  interpreter?: RequestInterpreter;
  /** Source of the default reference date */
  clock?: () => Date;
}

export interface DatasetOptions {
  /** Base seed; request n without its own seed uses `${seed}:${n}` */
  seed?: string | number;
  /** Format applied to requests that name none */
  format?: OutputFormat;
}

export interface DatasetEntry {
  batch: Batch;
  artifact: Artifact;
}

function isForeignKey(field: SchemaDef["fields"][number]): field is ForeignKeyFieldDef {
  return field.type === "foreign-key-ref";
}

export class SyntheticDataEngine {
  readonly registry: SchemaRegistry;
  readonly config: Readonly<EngineConfig>;
  private readonly resolver: RequestResolver;

  constructor(options: EngineOptions = {}) {
    this.registry = options.registry ?? new SchemaRegistry();
    this.config = Object.freeze({ ...DEFAULT_ENGINE_CONFIG, ...options.config });
    this.resolver = new RequestResolver({
      registry: this.registry,
      config: this.config,
      interpreter: options.interpreter,
      clock: options.clock,
    });
  }

  /**
   * Registered schema for a name or alias
   *
   * @throws UnknownEntityError when nothing matches
   */
  resolveSchema(nameOrAlias: string): SchemaDef {
    return this.registry.get(this.resolver.resolveSchemaName(nameOrAlias));
  }

  /**
   * Resolve and synthesize without rendering
   */
  generateBatch(structured: StructuredRequest): Batch {
    const request = this.resolver.resolveStructured(structured);
    return synthesizeBatch(this.registry.get(request.schema), request, {
      maxRecords: this.config.maxRecords,
      assumedReferentCount: this.config.assumedReferentCount,
    });
  }

  /**
   * Full pipeline for structured input
   */
  generate(structured: StructuredRequest): Artifact {
    return this.render(this.generateBatch(structured));
  }

  /**
   * Full pipeline for free text. Interpretation is the only step that may
   * suspend. Explicit settings win over what the text says; explicit
   * constraints are merged over interpreted ones.
   */
  async generateFromText(text: string, settings: Partial<StructuredRequest> = {}): Promise<Artifact> {
    const interpreted = await this.resolver.interpret(text);
    const constraints = { ...interpreted.constraints, ...settings.constraints };
    return this.generate({
      ...interpreted,
      ...settings,
      schema: settings.schema ?? interpreted.schema,
      ...(Object.keys(constraints).length > 0 ? { constraints } : {}),
    });
  }

  /**
   * Render a batch; the format defaults to the one it was requested in
   */
  render(batch: Batch, format: string = batch.request.format): Artifact {
    const guard = new SqlSafetyGuard(this.registry.identifiers(), this.config.sqlDialect);
    const artifact = renderBatch(batch, format, guard);

    logger.info("Artifact rendered", {
      schema: artifact.schema,
      format: artifact.format,
      records: artifact.recordCount,
      seed: artifact.seed,
      referenceDate: artifact.referenceDate,
    });

    return artifact;
  }

  /**
   * Conformance report for a batch against its schema and overrides
   */
  validate(batch: Batch): ValidationReport {
    return validateBatch(batch);
  }

  /**
   * Generate several requests in order. Keys of each generated batch become
   * the referents of later requests whose foreign keys target it, unless the
   * later request names its own referents.
   */
  generateDataset(requests: readonly StructuredRequest[], options: DatasetOptions = {}): DatasetEntry[] {
    const baseSeed = options.seed !== undefined ? normalizeSeed(options.seed) : undefined;
    const generated = new Map<string, Batch>();
    const entries: DatasetEntry[] = [];

    requests.forEach((structured, index) => {
      const schema = this.resolveSchema(structured.schema);

      const referents: Record<string, ReferentKey[]> = { ...structured.referents };
      for (const field of schema.fields.filter(isForeignKey)) {
        const referent = generated.get(field.target);
        if (!referent || referents[field.target] || referent.records.length === 0) {
          continue;
        }
        referents[field.target] = collectKeys(referent, field.targetField ?? "id");
      }

      const seed = structured.seed ?? (baseSeed !== undefined ? deriveSeed(baseSeed, index) : undefined);
      const batch = this.generateBatch({
        ...structured,
        ...(structured.format === undefined && options.format ? { format: options.format } : {}),
        ...(seed !== undefined ? { seed } : {}),
        ...(Object.keys(referents).length > 0 ? { referents } : {}),
      });

      generated.set(batch.schema.name, batch);
      entries.push({ batch, artifact: this.render(batch) });
    });

    return entries;
  }
}

function collectKeys(batch: Batch, field: string): ReferentKey[] {
  const keys: ReferentKey[] = [];
  for (const record of batch.records) {
    const value = record[field];
    if (typeof value === "string" || typeof value === "number") {
      keys.push(value);
    }
  }
  return keys;
}

export function createEngine(options: EngineOptions = {}): SyntheticDataEngine {
  return new SyntheticDataEngine(options);
}
