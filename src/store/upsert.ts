import type { QueryExecutor, SqlValue } from "./executor.js";
import type { ColumnSpec, TableSchema } from "./schema.js";
import { keyColumn, quoteIdentifier, writableColumns } from "./schema.js";

/** Row as produced by the pipeline, keyed by column name. */
export type InputRow = Readonly<Record<string, unknown>>;

/** Row ready for binding: one value per writable column. */
export type SanitizedRow = Map<string, SqlValue>;

function textValue(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return value.replace(/\0/g, "");
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value).replace(/\0/g, "");
}

function numericValue(value: unknown, integer: boolean): number | null {
  let parsed: number | null = null;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "bigint") {
    parsed = Number(value);
  } else if (typeof value === "string" && value.trim()) {
    parsed = Number(value.trim());
  }
  if (parsed === null || !Number.isFinite(parsed)) {
    return null;
  }
  return integer ? Math.round(parsed) : parsed;
}

function coerce(column: ColumnSpec, value: unknown): SqlValue {
  switch (column.type) {
    case "text":
      return textValue(value);
    case "real":
      return numericValue(value, false);
    case "integer":
      return numericValue(value, true);
  }
}

/**
 * Bindable view of a row: NUL characters removed from text, numeric columns
 * coerced to a number or null. Missing columns become null.
 */
export function sanitizeRow(schema: TableSchema, row: InputRow): SanitizedRow {
  const sanitized: SanitizedRow = new Map();
  for (const column of writableColumns(schema)) {
    sanitized.set(column.name, coerce(column, row[column.name]));
  }
  return sanitized;
}

export function buildUpsertSql(schema: TableSchema): string {
  const key = keyColumn(schema);
  const columns = writableColumns(schema);
  const names = columns.map((column) => quoteIdentifier(column.name));
  const updates = columns
    .filter((column) => column.role === "extracted")
    .map((column) => `${quoteIdentifier(column.name)} = excluded.${quoteIdentifier(column.name)}`);
  const conflict = updates.length > 0 ? `DO UPDATE SET ${updates.join(", ")}` : "DO NOTHING";
  return (
    `INSERT INTO ${quoteIdentifier(schema.name)} (${names.join(", ")}) ` +
    `VALUES (${names.map(() => "?").join(", ")}) ` +
    `ON CONFLICT(${quoteIdentifier(key.name)}) ${conflict}`
  );
}

export type UpsertOptions = {
  /** Runs inside the transaction before each row is written. */
  beforeRow?: (row: SanitizedRow, db: QueryExecutor) => void;
};

/**
 * Insert or update `rows` in one transaction. Extracted columns are
 * overwritten on conflict; insert-only and preserved columns keep their
 * stored values. Any failure rolls back the whole call.
 */
export function upsertRows(
  db: QueryExecutor,
  schema: TableSchema,
  rows: readonly InputRow[],
  options: UpsertOptions = {},
): number {
  if (rows.length === 0) {
    return 0;
  }
  const sql = buildUpsertSql(schema);
  const columns = writableColumns(schema);
  return db.transaction(() => {
    for (const row of rows) {
      const sanitized = sanitizeRow(schema, row);
      options.beforeRow?.(sanitized, db);
      db.run(sql, columns.map((column) => sanitized.get(column.name) ?? null));
    }
    return rows.length;
  });
}

/** Stored watermark per key, read once before a run. */
export function fetchWatermarks(
  db: QueryExecutor,
  schema: TableSchema,
  watermarkColumn = "last_modified",
): Map<string, number | null> {
  const key = keyColumn(schema);
  const watermarks = new Map<string, number | null>();
  const rows = db.all(
    `SELECT ${quoteIdentifier(key.name)} AS row_key, ${quoteIdentifier(watermarkColumn)} AS row_watermark ` +
      `FROM ${quoteIdentifier(schema.name)}`,
  );
  for (const row of rows) {
    if (typeof row !== "object" || row === null || !("row_key" in row) || !("row_watermark" in row)) {
      continue;
    }
    if (typeof row.row_key !== "string") {
      continue;
    }
    watermarks.set(row.row_key, typeof row.row_watermark === "number" ? row.row_watermark : null);
  }
  return watermarks;
}
