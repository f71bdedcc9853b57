/**
 * SQL writer - one multi-row INSERT per batch, assembled by the guard
 */

import type { Batch } from "../../types/data-model.js";
import type { SqlSafetyGuard } from "../guard/index.js";
import type { Formatter } from "./types.js";
import { dateOnlyFields } from "./values.js";

export class SQLWriter implements Formatter {
  readonly format = "sql" as const;
  readonly mediaType = "application/sql";

  constructor(private readonly guard: SqlSafetyGuard) {}

  /**
   * An empty batch renders as an empty script, which inserts nothing
   */
  render(batch: Batch): string {
    const table = batch.schema.name;
    const columns = batch.schema.fields.map((field) => field.name);

    // Identifiers are checked before any value is rendered
    this.guard.assertKnownIdentifiers(table, columns);

    if (batch.records.length === 0) {
      return "";
    }

    const dateOnly = dateOnlyFields(batch.schema);
    const rows = batch.records.map((record) =>
      columns.map((column) =>
        this.guard.renderValue(record[column] ?? null, { dateOnly: dateOnly.has(column) }),
      ),
    );

    const statement = this.guard.renderStatement(table, columns, rows);
    this.guard.assertInsertOnly(statement);

    return statement + "\n";
  }
}

export function createSQLWriter(guard: SqlSafetyGuard): SQLWriter {
  return new SQLWriter(guard);
}
