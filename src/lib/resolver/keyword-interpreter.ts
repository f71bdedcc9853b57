/**
 * Rule-based interpreter for free-text requests
 *
 * Offline stand-in for a model-backed interpreter. Understands phrasings like
 * "10 users", "20 orders $10-$500 in 2024", "5 failed payments as csv".
 */

import type { EnumFieldDef, RawConstraint, SchemaDef, StructuredRequest } from "../../types/data-model.js";
import { AmbiguousRequestError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import type { InterpreterContext, RequestInterpreter } from "./types.js";

const FILLER = "(?:mock|fake|test|sample|synthetic|random|dummy)";
const FORMAT = /\b(ndjson|csv|json|sql)\b/;
const MONEY_RANGE = /(\$?)\s*(\d+(?:\.\d+)?)\s*(?:-|–|to)\s*(\$?)\s*(\d+(?:\.\d+)?)/;
const YEAR = /\b((?:19|20)\d{2})\b/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isYearLike(text: string): boolean {
  return YEAR.test(text) && text.length === 4;
}

interface EntityMatch {
  schema: string;
  count?: number;
  span?: string;
}

export class KeywordInterpreter implements RequestInterpreter {
  async interpret(text: string, context: InterpreterContext): Promise<StructuredRequest | null> {
    const lower = text.toLowerCase();
    const entity = this.findEntity(lower, context.aliases);
    if (!entity) {
      logger.debug("No entity found in request text", { text });
      return null;
    }

    const request: StructuredRequest = { schema: entity.schema };
    if (entity.count !== undefined) {
      request.count = entity.count;
    }

    const format = FORMAT.exec(lower);
    if (format?.[1]) {
      request.format = format[1];
    }

    const schemaName = context.aliases.get(entity.schema);
    const schema = context.schemas.find((candidate) => candidate.name === schemaName);
    if (schema) {
      const constraints = this.findConstraints(lower, entity.span ?? "", schema);
      if (Object.keys(constraints).length > 0) {
        request.constraints = constraints;
      }
    }

    logger.debug("Interpreted request text", { text, request });
    return request;
  }

  private findEntity(lower: string, aliases: ReadonlyMap<string, string>): EntityMatch | null {
    const alternation = [...aliases.keys()]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp)
      .join("|");

    if (alternation) {
      const counted = new RegExp(`\\b(\\d+)\\s+(?:[a-z][\\w-]*\\s+){0,3}?(${alternation})\\b`).exec(lower);
      if (counted?.[1] && counted[2]) {
        return { schema: counted[2], count: Number(counted[1]), span: counted[0] };
      }

      const mentioned = [...lower.matchAll(new RegExp(`\\b(${alternation})\\b`, "g"))]
        .map((match) => match[1])
        .filter((alias): alias is string => alias !== undefined);
      const targets = new Set(mentioned.map((alias) => aliases.get(alias)));
      if (targets.size > 1) {
        throw new AmbiguousRequestError("The request mentions more than one kind of record", {
          entities: [...targets],
        });
      }
      const [first] = mentioned;
      if (first) {
        return { schema: first };
      }
    }

    // A count with an unrecognized noun still names an entity, just not one we know
    const unknown = new RegExp(`\\b(\\d+)\\s+(?:${FILLER}\\s+)*([a-z][a-z_]*)\\b`).exec(lower);
    if (unknown?.[1] && unknown[2]) {
      return { schema: unknown[2], count: Number(unknown[1]), span: unknown[0] };
    }

    return null;
  }

  private findConstraints(lower: string, entitySpan: string, schema: SchemaDef): Record<string, RawConstraint> {
    const constraints: Record<string, RawConstraint> = {};
    let remaining = entitySpan ? lower.replace(entitySpan, " ") : lower;

    const money = MONEY_RANGE.exec(remaining);
    if (money) {
      const [span, lowSign, low = "", highSign, high = ""] = money;
      const isMoney = Boolean(lowSign || highSign) || !(isYearLike(low) && isYearLike(high));
      const target =
        schema.fields.find((field) => field.type === "decimal-range") ??
        schema.fields.find((field) => field.type === "integer-range");
      if (isMoney && target) {
        constraints[target.name] = [Number(low), Number(high)];
        remaining = remaining.replace(span, " ");
      }
    }

    const year = YEAR.exec(remaining);
    if (year?.[1] && schema.fields.some((field) => field.type === "date-range")) {
      constraints.year = Number(year[1]);
    }

    const claimed = new Set<string>();
    for (const field of schema.fields) {
      if (field.type !== "enum") continue;
      const values = this.mentionedValues(lower, field, claimed);
      if (values.length > 0) {
        constraints[field.name] = values;
      }
    }

    return constraints;
  }

  /**
   * Enum values named in the text. A value listed by several fields goes to
   * the first of them.
   */
  private mentionedValues(lower: string, field: EnumFieldDef, claimed: Set<string>): string[] {
    const found: string[] = [];
    for (const value of field.values) {
      const key = value.toLowerCase();
      if (claimed.has(key)) continue;
      const pattern = new RegExp(`\\b${escapeRegExp(key).replace(/_/g, "[ _]")}\\b`);
      if (pattern.test(lower)) {
        found.push(value);
        claimed.add(key);
      }
    }
    return found;
  }
}

export function createKeywordInterpreter(): KeywordInterpreter {
  return new KeywordInterpreter();
}
