/**
 * Request Resolver - structured or free-text input to a GenerationRequest
 */

import type {
  GenerationRequest,
  ReferentKey,
  StructuredRequest,
} from "../../types/data-model.js";
import type { EngineConfig } from "../../types/config.js";
import { AmbiguousRequestError, UnknownEntityError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { parseTimestamp } from "../../utils/date-bounds.js";
import { normalizeSeed } from "../../utils/seed-manager.js";
import { parseOutputFormat } from "../emitter/index.js";
import { checkRecordCount } from "../generator/synthesizer.js";
import type { SchemaRegistry } from "../registry/index.js";
import { resolveConstraints } from "./constraints.js";
import { validateStructuredRequest } from "./request-schema.js";
import { isTextRequest, type RawRequest, type RequestInterpreter } from "./types.js";

export * from "./types.js";
export * from "./constraints.js";
export * from "./expressions.js";
export * from "./request-schema.js";
export * from "./keyword-interpreter.js";

export interface ResolverOptions {
  registry: SchemaRegistry;
  config: EngineConfig;
  interpreter?: RequestInterpreter;
  /** Source of the default reference date */
  clock?: () => Date;
}

export class RequestResolver {
  private readonly registry: SchemaRegistry;
  private readonly config: EngineConfig;
  private readonly interpreter?: RequestInterpreter;
  private readonly clock: () => Date;

  constructor(options: ResolverOptions) {
    this.registry = options.registry;
    this.config = options.config;
    this.interpreter = options.interpreter;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Resolve structured or free-text input
   *
   * @throws AmbiguousRequestError when the text cannot be interpreted
   */
  async resolve(raw: RawRequest): Promise<GenerationRequest> {
    if (!isTextRequest(raw)) {
      return this.resolveStructured(raw);
    }
    return this.resolveStructured(await this.interpret(raw.text));
  }

  /**
   * Free text to a structured request. The interpreter's output is
   * validated like any other untrusted input.
   *
   * @throws AmbiguousRequestError without an interpreter or when it finds nothing
   */
  async interpret(text: string): Promise<StructuredRequest> {
    if (!this.interpreter) {
      throw new AmbiguousRequestError("Free-text requests need an interpreter");
    }

    const interpreted = await this.interpreter.interpret(text, {
      schemas: this.registry.list(),
      aliases: this.registry.aliases(),
    });
    if (interpreted === null) {
      throw new AmbiguousRequestError(`Could not interpret "${text}"`, { text });
    }

    const structured = validateStructuredRequest(interpreted, "interpreted request");
    logger.debug("Free-text request interpreted", { text, structured });
    return structured;
  }

  /**
   * Direct mapping for structured input
   *
   * @throws UnknownEntityError for an unknown schema name or alias
   * @throws RequestTooLargeError when count exceeds the configured ceiling
   * @throws UnsupportedFormatError for an unknown format tag
   * @throws AmbiguousRequestError for malformed counts, dates or constraints
   */
  resolveStructured(input: StructuredRequest): GenerationRequest {
    const request = validateStructuredRequest(input);
    const schema = this.registry.get(this.resolveSchemaName(request.schema));

    const count = request.count ?? this.config.defaultCount;
    checkRecordCount(count, this.config.maxRecords);

    const format = parseOutputFormat(request.format ?? this.config.defaultFormat);
    const overrides = resolveConstraints(schema, request.constraints ?? {});

    const resolved: GenerationRequest = {
      schema: schema.name,
      count,
      format,
      overrides,
      referenceDate: this.resolveReferenceDate(request.referenceDate),
      ...(request.seed !== undefined ? { seed: normalizeSeed(request.seed) } : {}),
      ...(request.referents ? { referents: this.resolveReferents(request.referents) } : {}),
    };

    return Object.freeze(resolved);
  }

  /**
   * Schema name for a name or alias, case-insensitive
   */
  resolveSchemaName(nameOrAlias: string): string {
    const key = nameOrAlias.trim().toLowerCase();
    const name = this.registry.has(key) ? key : this.registry.aliases().get(key);
    if (!name) {
      throw new UnknownEntityError(`Unknown entity "${nameOrAlias}"`, {
        entity: nameOrAlias,
        known: this.registry.list().map((schema) => schema.name),
      });
    }
    return name;
  }

  private resolveReferenceDate(value: string | undefined): string {
    if (value === undefined) {
      return this.clock().toISOString();
    }
    const parsed = parseTimestamp(value);
    if (!parsed) {
      throw new AmbiguousRequestError(`Invalid reference date "${value}"`, { referenceDate: value });
    }
    return parsed.toISOString();
  }

  private resolveReferents(
    referents: Record<string, ReferentKey[]>,
  ): Record<string, readonly ReferentKey[]> {
    const resolved: Record<string, readonly ReferentKey[]> = {};
    for (const [target, keys] of Object.entries(referents)) {
      if (keys.length === 0) {
        throw new AmbiguousRequestError(`Referents for "${target}" are empty`, { target });
      }
      resolved[this.resolveSchemaName(target)] = Object.freeze([...keys]);
    }
    return resolved;
  }
}

export function createRequestResolver(options: ResolverOptions): RequestResolver {
  return new RequestResolver(options);
}
