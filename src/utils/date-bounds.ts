/**
 * Date bound parsing for date-range fields and window overrides
 */

import type { DateBound } from "../types/data-model.js";

const RELATIVE_BOUND = /^([+-])(\d+)(y|mo|w|d|h|m)$/;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

export type BoundSide = "start" | "end";

/**
 * Parse an ISO 8601 date or datetime. A datetime without an offset is UTC,
 * never the host's local time. Returns null for anything else.
 */
export function parseTimestamp(text: string): Date | null {
  const trimmed = text.trim();
  if (DATE_ONLY.test(trimmed)) {
    return toDate(`${trimmed}T00:00:00.000Z`);
  }
  const match = ISO_DATETIME.exec(trimmed);
  if (!match) {
    return null;
  }
  const [, date = "", time = "", offset] = match;
  const zone = !offset || offset.toUpperCase() === "Z" ? "Z" : offset.replace(/^([+-]\d{2})(\d{2})$/, "$1:$2");
  return toDate(`${date}T${time}${zone}`);
}

function toDate(iso: string): Date | null {
  const parsed = Date.parse(iso);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * Whether a bound is syntactically valid, independent of any reference date
 */
export function isValidDateBound(bound: DateBound): boolean {
  const trimmed = bound.trim();
  if (trimmed === "now" || RELATIVE_BOUND.test(trimmed)) return true;
  return parseTimestamp(trimmed) !== null;
}

/**
 * Whether a bound is absolute, i.e. resolves the same for every reference date
 */
export function isAbsoluteDateBound(bound: DateBound): boolean {
  const trimmed = bound.trim();
  return trimmed !== "now" && !RELATIVE_BOUND.test(trimmed);
}

/**
 * Resolve a bound to a Date.
 *
 * A date-only end bound covers the whole day, so `2024-12-31` as an end
 * resolves to `2024-12-31T23:59:59.999Z`. Returns null for an unparseable
 * bound.
 */
export function resolveDateBound(
  bound: DateBound,
  referenceDate: Date,
  side: BoundSide,
): Date | null {
  const trimmed = bound.trim();

  if (trimmed === "now") {
    return new Date(referenceDate.getTime());
  }

  const relative = RELATIVE_BOUND.exec(trimmed);
  if (relative) {
    const [, sign, amountText, unit] = relative;
    const amount = Number(amountText) * (sign === "-" ? -1 : 1);
    const resolved = new Date(referenceDate.getTime());
    switch (unit) {
      case "y":
        resolved.setUTCFullYear(resolved.getUTCFullYear() + amount);
        break;
      case "mo":
        resolved.setUTCMonth(resolved.getUTCMonth() + amount);
        break;
      case "w":
        resolved.setUTCDate(resolved.getUTCDate() + amount * 7);
        break;
      case "d":
        resolved.setUTCDate(resolved.getUTCDate() + amount);
        break;
      case "h":
        resolved.setUTCHours(resolved.getUTCHours() + amount);
        break;
      default:
        resolved.setUTCMinutes(resolved.getUTCMinutes() + amount);
    }
    return resolved;
  }

  if (DATE_ONLY.test(trimmed) && side === "end") {
    return toDate(`${trimmed}T23:59:59.999Z`);
  }

  return parseTimestamp(trimmed);
}

/**
 * Inclusive window covering one calendar year in UTC
 */
export function yearWindow(year: number): { start: DateBound; end: DateBound } {
  const padded = String(year).padStart(4, "0");
  return { start: `${padded}-01-01`, end: `${padded}-12-31` };
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC, or `YYYY-MM-DD` for date granularity
 */
export function formatSqlTimestamp(value: Date, dateOnly = false): string {
  const iso = value.toISOString();
  return dateOnly ? iso.slice(0, 10) : `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
}

/**
 * ISO 8601 in UTC, or `YYYY-MM-DD` for date granularity
 */
export function formatIsoTimestamp(value: Date, dateOnly = false): string {
  const iso = value.toISOString();
  return dateOnly ? iso.slice(0, 10) : iso;
}
