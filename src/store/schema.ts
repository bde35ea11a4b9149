import type { Logger } from "../logging/logger.js";
import type { QueryExecutor } from "./executor.js";

export type ColumnType = "text" | "real" | "integer";

/**
 * - `key`: conflict target, one per table.
 * - `extracted`: written on insert and overwritten on every re-extraction.
 * - `insert_only`: written on insert, kept on conflict (user-editable values).
 * - `preserved`: owned by the database, never written by extraction.
 */
export type ColumnRole = "key" | "extracted" | "insert_only" | "preserved";

export type ColumnSpec = {
  name: string;
  type: ColumnType;
  role: ColumnRole;
  /** SQL literal used as the column default. */
  default?: string;
};

export type TableSchema = {
  name: string;
  columns: readonly ColumnSpec[];
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`invalid SQL identifier: ${name}`);
  }
  return `"${name}"`;
}

export function keyColumn(schema: TableSchema): ColumnSpec {
  const keys = schema.columns.filter((column) => column.role === "key");
  if (keys.length !== 1) {
    throw new Error(`table ${schema.name} must have exactly one key column, found ${keys.length}`);
  }
  return keys[0];
}

/** Columns extraction writes: everything except `preserved`. */
export function writableColumns(schema: TableSchema): ColumnSpec[] {
  return schema.columns.filter((column) => column.role !== "preserved");
}

function columnDefinition(column: ColumnSpec): string {
  const parts = [quoteIdentifier(column.name), column.type.toUpperCase()];
  if (column.role === "key") {
    parts.push("PRIMARY KEY");
  }
  if (column.default !== undefined) {
    parts.push(`DEFAULT ${column.default}`);
  }
  return parts.join(" ");
}

function existingColumns(db: QueryExecutor, table: string): Set<string> {
  const names = new Set<string>();
  for (const row of db.all(`PRAGMA table_info(${quoteIdentifier(table)})`)) {
    if (typeof row === "object" && row !== null && "name" in row && typeof row.name === "string") {
      names.add(row.name);
    }
  }
  return names;
}

export type EnsureTableResult = {
  created: boolean;
  added: string[];
  failed: string[];
};

/**
 * Create the table when missing, then add every schema column the live
 * table lacks, one `ALTER TABLE` each. A column that cannot be added is
 * logged and reported; the remaining columns are still attempted.
 */
export function ensureTable(
  db: QueryExecutor,
  schema: TableSchema,
  logger?: Logger,
): EnsureTableResult {
  keyColumn(schema);
  const table = quoteIdentifier(schema.name);
  const before = existingColumns(db, schema.name);
  if (before.size === 0) {
    db.exec(`CREATE TABLE IF NOT EXISTS ${table} (${schema.columns.map(columnDefinition).join(", ")})`);
    return { created: true, added: [], failed: [] };
  }

  const added: string[] = [];
  const failed: string[] = [];
  for (const column of schema.columns) {
    if (before.has(column.name)) {
      continue;
    }
    const definition = columnDefinition({ ...column, role: column.role === "key" ? "extracted" : column.role });
    try {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${definition}`);
      added.push(column.name);
      logger?.info(`added column ${schema.name}.${column.name}`);
    } catch (err) {
      failed.push(column.name);
      logger?.error(`could not add column ${schema.name}.${column.name}`, err);
    }
  }
  return { created: false, added, failed };
}
