/**
 * SQL Safety Guard
 *
 * The only place the "INSERT only, registry identifiers only" policy is
 * enforced mechanically. Identifiers never come from request text: they are
 * checked against the registry catalog before a statement is assembled, and
 * every value is rendered as a dialect-escaped literal.
 */

import type { FieldValue } from "../../types/data-model.js";
import type { SqlDialect } from "../../types/config.js";
import { UnsafeIdentifierError, UnsafeLiteralError, UnsafeStatementError } from "../../utils/errors.js";
import { formatSqlTimestamp } from "../../utils/date-bounds.js";
import type { IdentifierCatalog } from "../registry/index.js";
import { isSafeIdentifier } from "../registry/definition.js";
import reservedWords from "./reserved-words.json" with { type: "json" };

export interface RenderValueOptions {
  /** Render dates as `YYYY-MM-DD` */
  dateOnly?: boolean;
}

const MYSQL_ESCAPES: Readonly<Record<string, string>> = {
  "\0": "\\0",
  "\n": "\\n",
  "\r": "\\r",
  "\x1a": "\\Z",
  "\\": "\\\\",
  "'": "''",
};

/**
 * Reserved words of PostgreSQL and MySQL 8 that registry names may collide
 * with (`order`, `user`, `rank`); quoted under either dialect so the same
 * schema renders valid SQL for both
 */
const RESERVED_WORDS: ReadonlySet<string> = new Set([...reservedWords.ansi, ...reservedWords.mysql]);

/** Stands in for a masked string literal; never accepted in raw input */
const LITERAL = "\uE000";

const HEADER = /^INSERT INTO ([a-z0-9_"`]+) \(([a-z0-9_, "`]+)\) VALUES\s*/;
const NUMBER = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;
const VALUE_TOKEN = /\uE000|NULL|-?\d+(?:\.\d+)?(?:e[+-]?\d+)?|[(),;]|\S+?(?=[\s(),;]|$)/gi;

export class SqlSafetyGuard {
  constructor(
    private readonly catalog: IdentifierCatalog,
    readonly dialect: SqlDialect = "ansi",
  ) {}

  private get identifierQuote(): string {
    return this.dialect === "mysql" ? "`" : '"';
  }

  /**
   * Quote a registry identifier when it is a reserved word. Callers must have
   * checked the name with assertKnownIdentifiers first.
   */
  quoteIdentifier(name: string): string {
    return RESERVED_WORDS.has(name) ? `${this.identifierQuote}${name}${this.identifierQuote}` : name;
  }

  private unquoteIdentifier(name: string): string {
    const quote = this.identifierQuote;
    return name.startsWith(quote) && name.endsWith(quote) && name.length > 2 ? name.slice(1, -1) : name;
  }

  /**
   * Render one value as a SQL literal
   *
   * @throws UnsafeLiteralError for non-finite numbers, and for NUL characters
   * under the ansi dialect
   */
  renderValue(value: FieldValue, options: RenderValueOptions = {}): string {
    if (value === null) {
      return "NULL";
    }
    if (typeof value === "number") {
      if (!Number.isFinite(value)) {
        throw new UnsafeLiteralError(`Cannot render non-finite number ${value} as SQL`);
      }
      return String(value);
    }
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new UnsafeLiteralError("Cannot render an invalid date as SQL");
      }
      return `'${formatSqlTimestamp(value, options.dateOnly)}'`;
    }
    return this.quoteString(value);
  }

  private quoteString(value: string): string {
    if (this.dialect === "mysql") {
      return `'${value.replace(/[\0\n\r\x1a\\']/g, (char) => MYSQL_ESCAPES[char] ?? char)}'`;
    }
    if (value.includes("\0")) {
      throw new UnsafeLiteralError("String literal contains a NUL character", {
        dialect: this.dialect,
      });
    }
    return `'${value.replace(/'/g, "''")}'`;
  }

  /**
   * Check a table and its columns against the registry catalog
   *
   * @throws UnsafeIdentifierError for any name the registry does not know
   */
  assertKnownIdentifiers(table: string, columns: readonly string[]): void {
    const known = this.catalog.get(table);
    if (!known || !isSafeIdentifier(table)) {
      throw new UnsafeIdentifierError(`Table "${table}" is not a registered schema`, { table });
    }
    if (columns.length === 0) {
      throw new UnsafeIdentifierError(`No columns given for table "${table}"`, { table });
    }
    for (const column of columns) {
      if (!known.has(column) || !isSafeIdentifier(column)) {
        throw new UnsafeIdentifierError(`Column "${column}" is not a field of "${table}"`, {
          table,
          column,
        });
      }
    }
  }

  /**
   * Assemble one multi-row INSERT from pre-rendered literals
   *
   * @throws UnsafeIdentifierError for unknown identifiers
   * @throws UnsafeStatementError when a row's width differs from the column list
   */
  renderStatement(table: string, columns: readonly string[], rows: readonly (readonly string[])[]): string {
    this.assertKnownIdentifiers(table, columns);

    if (rows.length === 0) {
      throw new UnsafeStatementError(`INSERT into "${table}" needs at least one row`, { table });
    }

    const tuples = rows.map((row, index) => {
      if (row.length !== columns.length) {
        throw new UnsafeStatementError(
          `Row ${index} has ${row.length} values for ${columns.length} columns`,
          { table, row: index },
        );
      }
      return `(${row.join(", ")})`;
    });

    const columnList = columns.map((column) => this.quoteIdentifier(column)).join(", ");
    return `INSERT INTO ${this.quoteIdentifier(table)} (${columnList}) VALUES\n${tuples.join(",\n")};`;
  }

  /**
   * Verify that finished SQL is exactly one INSERT into a known table, with
   * nothing but literals, NULL and numbers in value position
   *
   * @throws UnsafeStatementError or UnsafeIdentifierError otherwise
   */
  assertInsertOnly(sql: string): void {
    const code = this.maskLiterals(sql).trim();

    const header = HEADER.exec(code);
    if (!header) {
      throw new UnsafeStatementError("Statement is not a plain INSERT INTO ... VALUES", {
        statement: code.slice(0, 80),
      });
    }

    const [matched, table = "", columnList = ""] = header;
    const columns = columnList.split(",").map((column) => this.unquoteIdentifier(column.trim()));
    this.assertKnownIdentifiers(this.unquoteIdentifier(table), columns);

    const tokens = code.slice(matched.length).match(VALUE_TOKEN) ?? [];
    let position = 0;
    const consume = (wanted: string): void => {
      const token = tokens[position++];
      if (token !== wanted) {
        throw new UnsafeStatementError(`Expected "${wanted}" in VALUES, found "${token ?? "end of input"}"`, {
          token,
        });
      }
    };

    for (;;) {
      consume("(");
      for (let index = 0; index < columns.length; index++) {
        if (index > 0) consume(",");
        const token = tokens[position++] ?? "";
        if (token !== LITERAL && token.toUpperCase() !== "NULL" && !NUMBER.test(token)) {
          throw new UnsafeStatementError(`Unexpected token "${token || "end of input"}" in VALUES`, { token });
        }
      }
      consume(")");

      const separator = tokens[position++];
      if (separator === ";") break;
      if (separator !== ",") {
        throw new UnsafeStatementError("Statement must end with exactly one terminator", { token: separator });
      }
    }

    if (position !== tokens.length) {
      throw new UnsafeStatementError("Content after the statement terminator", { token: tokens[position] });
    }
  }

  /**
   * Replace every string literal with a sentinel so only code remains. Quoted
   * identifiers are kept but must hold a plain identifier; comments and the
   * other dialect's quotes are rejected.
   */
  private maskLiterals(sql: string): string {
    let code = "";
    let index = 0;

    while (index < sql.length) {
      const char = sql[index];

      if (char === "'") {
        index = this.skipLiteral(sql, index + 1);
        code += LITERAL;
        continue;
      }
      if (char === this.identifierQuote) {
        const close = sql.indexOf(char, index + 1);
        const name = close === -1 ? "" : sql.slice(index + 1, close);
        if (!isSafeIdentifier(name)) {
          throw new UnsafeStatementError("Quoted identifier is not a plain registry name", { offset: index });
        }
        code += sql.slice(index, close + 1);
        index = close + 1;
        continue;
      }
      if (char === '"' || char === "`" || char === "#" || char === LITERAL) {
        throw new UnsafeStatementError(`Unexpected "${char}" outside a literal`, { offset: index });
      }
      if ((char === "-" && sql[index + 1] === "-") || (char === "/" && sql[index + 1] === "*")) {
        throw new UnsafeStatementError("Comments are not allowed in generated SQL", { offset: index });
      }

      code += char;
      index++;
    }

    return code;
  }

  /** Index just past the closing quote of a literal whose body starts at `start` */
  private skipLiteral(sql: string, start: number): number {
    let index = start;
    while (index < sql.length) {
      const char = sql[index];
      if (this.dialect === "mysql" && char === "\\") {
        index += 2;
        continue;
      }
      if (char === "'") {
        if (sql[index + 1] === "'") {
          index += 2;
          continue;
        }
        return index + 1;
      }
      index++;
    }
    throw new UnsafeStatementError("Unterminated string literal", { offset: start - 1 });
  }
}
