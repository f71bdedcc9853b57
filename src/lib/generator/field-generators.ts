/**
 * Field generators - one synthesizer per declared field type
 *
 * Generators are pure apart from the entropy they draw from the faker
 * instance in the context; they keep no state of their own.
 */

import type { Faker } from "@faker-js/faker";
import type {
  AddressFieldDef,
  DateRangeFieldDef,
  DecimalRangeFieldDef,
  EmailFieldDef,
  EnumFieldDef,
  FieldDef,
  FieldValue,
  IntegerRangeFieldDef,
  StringFieldDef,
} from "../../types/data-model.js";
import { EmptyEnumError, InvalidRangeError } from "../../utils/errors.js";
import { resolveDateBound } from "../../utils/date-bounds.js";
import type { ReferenceResolver } from "./reference-pool.js";

const SECOND_MS = 1000;
const DAY_MS = 86_400_000;

export interface FieldContext {
  faker: Faker;
  /** Zero-based position of the record in its batch */
  index: number;
  referenceDate: Date;
  references: ReferenceResolver;
}

/**
 * Generate one value for a field
 *
 * @throws InvalidRangeError for inverted or empty ranges and windows
 * @throws EmptyEnumError for an enum with no values
 */
export function generateFieldValue(field: FieldDef, context: FieldContext): FieldValue {
  const { faker } = context;

  switch (field.type) {
    case "sequence":
      return (field.start ?? 1) + context.index;
    case "string":
      return generateString(field, faker);
    case "email":
      return generateEmail(field, faker);
    case "phone":
      return faker.phone.number({ style: field.style ?? "human" });
    case "address":
      return generateAddress(field, faker);
    case "integer-range":
      return generateInteger(field, faker);
    case "decimal-range":
      return generateDecimal(field, faker);
    case "date-range":
      return generateDate(field, context);
    case "enum":
      return generateEnum(field, faker);
    case "foreign-key-ref":
      return context.references.resolve(field, faker);
    default:
      return assertNever(field);
  }
}

function assertNever(field: never): never {
  throw new Error(`Unhandled field type: ${JSON.stringify(field)}`);
}

function generateString(field: StringFieldDef, faker: Faker): string {
  let value: string;

  if (field.pattern) {
    value = faker.helpers.replaceSymbols(field.pattern);
  } else {
    switch (field.kind ?? "words") {
      case "full-name":
        value = faker.person.fullName();
        break;
      case "first-name":
        value = faker.person.firstName();
        break;
      case "last-name":
        value = faker.person.lastName();
        break;
      case "word":
        value = faker.lorem.word();
        break;
      case "words":
        value = faker.lorem.words(2);
        break;
      case "sentence":
        value = faker.lorem.sentence();
        break;
      case "paragraph":
        value = faker.lorem.paragraph();
        break;
      case "product-name":
        value = faker.commerce.productName();
        break;
      case "company":
        value = faker.company.name();
        break;
      case "uuid":
        value = faker.string.uuid();
        break;
    }
  }

  return field.maxLength !== undefined ? value.slice(0, field.maxLength).trimEnd() : value;
}

function generateEmail(field: EmailFieldDef, faker: Faker): string {
  const email = field.domains
    ? faker.internet.email({ provider: faker.helpers.arrayElement(field.domains) })
    : faker.internet.email();
  return email.toLowerCase();
}

function generateAddress(field: AddressFieldDef, faker: Faker): string {
  switch (field.part ?? "full") {
    case "street":
      return faker.location.streetAddress();
    case "city":
      return faker.location.city();
    case "state":
      return faker.location.state();
    case "zip":
      return faker.location.zipCode();
    case "country":
      return faker.location.country();
    case "full":
      return [
        faker.location.streetAddress(),
        faker.location.city(),
        `${faker.location.state({ abbreviated: true })} ${faker.location.zipCode()}`,
      ].join(", ");
  }
}

/**
 * Scale a bound onto an integer grid, rounding inward. Values within 1e-6 of
 * a grid point snap to it so that 10.1 * 100 lands on 1010, not 1010.0000001.
 */
function scaleBound(value: number, scale: number, direction: "up" | "down"): number {
  const scaled = Number((value * scale).toFixed(6));
  return direction === "up" ? Math.ceil(scaled) : Math.floor(scaled);
}

function generateInteger(field: IntegerRangeFieldDef, faker: Faker): number {
  checkRange(field.name, field.min, field.max);
  const min = Math.ceil(field.min);
  const max = Math.floor(field.max);
  if (min > max) {
    throw new InvalidRangeError(`Range [${field.min}, ${field.max}] of "${field.name}" contains no integer`, {
      field: field.name,
      min: field.min,
      max: field.max,
    });
  }
  return faker.number.int({ min, max });
}

function generateDecimal(field: DecimalRangeFieldDef, faker: Faker): number {
  checkRange(field.name, field.min, field.max);
  const precision = field.precision ?? 2;
  const scale = 10 ** precision;
  const min = scaleBound(field.min, scale, "up");
  const max = scaleBound(field.max, scale, "down");
  if (min > max) {
    throw new InvalidRangeError(
      `Range [${field.min}, ${field.max}] of "${field.name}" has no value at ${precision} decimal places`,
      { field: field.name, min: field.min, max: field.max, precision },
    );
  }
  return faker.number.int({ min, max }) / scale;
}

function checkRange(name: string, min: number, max: number): void {
  if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
    throw new InvalidRangeError(`Invalid range [${min}, ${max}] for "${name}"`, {
      field: name,
      min,
      max,
    });
  }
}

function generateDate(field: DateRangeFieldDef, context: FieldContext): Date {
  const start = resolveDateBound(field.start, context.referenceDate, "start");
  const end = resolveDateBound(field.end, context.referenceDate, "end");

  if (!start || !end) {
    throw new InvalidRangeError(`Unparseable date window [${field.start}, ${field.end}] for "${field.name}"`, {
      field: field.name,
      start: field.start,
      end: field.end,
    });
  }
  if (start.getTime() > end.getTime()) {
    throw new InvalidRangeError(`Date window of "${field.name}" starts after it ends`, {
      field: field.name,
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }

  const unit = field.granularity === "date" ? DAY_MS : SECOND_MS;
  const min = Math.ceil(start.getTime() / unit);
  const max = Math.floor(end.getTime() / unit);
  if (min > max) {
    throw new InvalidRangeError(`Date window of "${field.name}" contains no whole ${field.granularity ?? "datetime"}`, {
      field: field.name,
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }

  return new Date(context.faker.number.int({ min, max }) * unit);
}

function generateEnum(field: EnumFieldDef, faker: Faker): string {
  if (field.values.length === 0) {
    throw new EmptyEnumError(`Enum field "${field.name}" has no values to choose from`, {
      field: field.name,
    });
  }
  return faker.helpers.arrayElement(field.values);
}
