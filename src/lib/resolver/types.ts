/**
 * Resolver module types
 */

import type { SchemaDef, StructuredRequest } from "../../types/data-model.js";

export interface InterpreterContext {
  schemas: readonly SchemaDef[];
  /** Alias -> schema name */
  aliases: ReadonlyMap<string, string>;
}

/**
 * Free text -> structured parameters. Resolve to null when the text cannot be
 * interpreted. Implementations may be backed by a remote model; the resolver
 * validates whatever they return.
 */
export interface RequestInterpreter {
  interpret(text: string, context: InterpreterContext): Promise<StructuredRequest | null>;
}

export interface TextRequest {
  text: string;
}

export type RawRequest = StructuredRequest | TextRequest;

export function isTextRequest(raw: RawRequest): raw is TextRequest {
  return "text" in raw && typeof raw.text === "string";
}
