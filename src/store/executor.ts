import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type SqlValue = string | number | bigint | Buffer | null;

/**
 * Parameterized access to the relational store. Rows come back unknown and
 * are narrowed by the caller.
 */
export interface QueryExecutor {
  all(sql: string, params?: readonly SqlValue[]): unknown[];
  run(sql: string, params?: readonly SqlValue[]): { changes: number };
  exec(sql: string): void;
  /** Run `work` in one transaction; a throw rolls everything back. */
  transaction<T>(work: () => T): T;
}

export function createSqliteExecutor(db: Database.Database): QueryExecutor {
  return {
    all: (sql, params = []) => db.prepare(sql).all(...params),
    run: (sql, params = []) => {
      const result = db.prepare(sql).run(...params);
      return { changes: result.changes };
    },
    exec: (sql) => {
      db.exec(sql);
    },
    transaction<T>(work: () => T): T {
      return db.transaction(work)();
    },
  };
}

export type CatalogDatabase = {
  db: Database.Database;
  executor: QueryExecutor;
  close: () => void;
};

/** Open (creating if needed) a SQLite catalog; `:memory:` is accepted. */
export function openCatalogDatabase(dbPath: string): CatalogDatabase {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  return {
    db,
    executor: createSqliteExecutor(db),
    close: () => db.close(),
  };
}
