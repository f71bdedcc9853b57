/**
 * Schema Registry - built-in and custom entity schemas
 *
 * Reads go through an immutable snapshot; registration builds a new snapshot
 * and swaps it in, so concurrent readers never observe a partial update.
 */

import type { FieldDef, SchemaDef } from "../../types/data-model.js";
import { DuplicateSchemaError, UnknownSchemaError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { BUILTIN_ALIASES, BUILTIN_SCHEMAS } from "./builtin-schemas.js";
import { validateSchemaDefinition } from "./definition.js";

export * from "./builtin-schemas.js";
export * from "./definition.js";
export * from "./schema-file.js";

/** Known SQL identifiers: table name -> column names */
export type IdentifierCatalog = ReadonlyMap<string, ReadonlySet<string>>;

export interface RegistryOptions {
  /** Register the built-in user/order/payment/product schemas (default true) */
  builtins?: boolean;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function cloneField(field: FieldDef): FieldDef {
  return structuredClone(field);
}

export class SchemaRegistry {
  private schemas: ReadonlyMap<string, SchemaDef> = new Map();
  private builtinNames: ReadonlySet<string> = new Set();

  constructor(options: RegistryOptions = {}) {
    if (options.builtins ?? true) {
      for (const schema of BUILTIN_SCHEMAS) {
        this.register(schema);
      }
      this.builtinNames = new Set(BUILTIN_SCHEMAS.map((schema) => schema.name));
    }
  }

  /**
   * Register a schema. The stored copy is deep-frozen; later changes to the
   * caller's object have no effect.
   *
   * @throws DuplicateSchemaError when the name is taken
   */
  register(definition: SchemaDef): SchemaDef {
    const validated = validateSchemaDefinition(definition);

    if (this.schemas.has(validated.name)) {
      throw new DuplicateSchemaError(`Schema "${validated.name}" is already registered`, {
        schema: validated.name,
      });
    }

    const stored = deepFreeze<SchemaDef>({
      ...validated,
      version: validated.version ?? 1,
      fields: validated.fields.map(cloneField),
    });

    const next = new Map(this.schemas);
    next.set(stored.name, stored);
    this.schemas = next;

    logger.debug("Schema registered", {
      schema: stored.name,
      fields: stored.fields.length,
    });

    return stored;
  }

  /**
   * @throws UnknownSchemaError when no schema has this name
   */
  get(name: string): SchemaDef {
    const schema = this.schemas.get(name);
    if (!schema) {
      throw new UnknownSchemaError(`Unknown schema "${name}"`, {
        schema: name,
        known: [...this.schemas.keys()],
      });
    }
    return schema;
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  isBuiltin(name: string): boolean {
    return this.builtinNames.has(name);
  }

  list(): SchemaDef[] {
    return [...this.schemas.values()];
  }

  /**
   * Every table and column name the SQL guard may emit
   */
  identifiers(): IdentifierCatalog {
    const catalog = new Map<string, ReadonlySet<string>>();
    for (const schema of this.schemas.values()) {
      catalog.set(schema.name, new Set(schema.fields.map((field) => field.name)));
    }
    return catalog;
  }

  /**
   * Alias -> schema name: the name itself, a plural, and built-in synonyms
   */
  aliases(): ReadonlyMap<string, string> {
    const aliases = new Map<string, string>();
    for (const name of this.schemas.keys()) {
      aliases.set(name, name);
      aliases.set(pluralize(name), name);
    }
    for (const [alias, target] of Object.entries(BUILTIN_ALIASES)) {
      if (this.schemas.has(target) && !aliases.has(alias)) {
        aliases.set(alias, target);
      }
    }
    return aliases;
  }
}

export function pluralize(name: string): string {
  if (/(s|x|z|ch|sh)$/.test(name)) return `${name}es`;
  if (/[^aeiou]y$/.test(name)) return `${name.slice(0, -1)}ies`;
  return `${name}s`;
}

export function createRegistry(options: RegistryOptions = {}): SchemaRegistry {
  return new SchemaRegistry(options);
}

/**
 * Process-wide registry, initialized once with the built-in schemas
 */
export const defaultRegistry = createRegistry();
