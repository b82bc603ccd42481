import type { TableName } from "../domain/entities/campaign.js";

/** A required column is absent from an input table. Fatal to the call. */
export class SchemaError extends Error {
  readonly table: TableName;
  readonly missingColumns: readonly string[];

  constructor(table: TableName, missingColumns: readonly string[]) {
    super(`Table "${table}" is missing required columns: ${missingColumns.join(", ")}`);
    this.name = "SchemaError";
    this.table = table;
    this.missingColumns = missingColumns;
  }
}

/** Columns are present but one or more values do not fit the table's schema. */
export class TableValidationError extends Error {
  readonly table: TableName;
  readonly issues: readonly string[];

  constructor(table: TableName, issues: readonly string[]) {
    super(`Table "${table}" has ${issues.length} invalid value(s): ${issues.slice(0, 5).join("; ")}`);
    this.name = "TableValidationError";
    this.table = table;
    this.issues = issues;
  }
}
