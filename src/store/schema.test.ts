import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CatalogDatabase } from "./executor.js";
import type { TableSchema } from "./schema.js";
import { createMemoryLogger } from "../logging/logger.js";
import { openCatalogDatabase } from "./executor.js";
import { ensureTable, keyColumn, quoteIdentifier } from "./schema.js";
import { ITEMS_TABLE } from "./test-tables.js";

function columnNames(store: CatalogDatabase, table: string): string[] {
  return store.db
    .prepare(`PRAGMA table_info(${quoteIdentifier(table)})`)
    .all()
    .map((row) =>
      typeof row === "object" && row !== null && "name" in row ? String(row.name) : "",
    );
}

describe("ensureTable", () => {
  let store: CatalogDatabase;

  beforeEach(() => {
    store = openCatalogDatabase(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("creates a missing table with every column", () => {
    expect(ensureTable(store.executor, ITEMS_TABLE)).toEqual({ created: true, added: [], failed: [] });
    expect(columnNames(store, "items")).toEqual(["id", "label", "score", "count", "title", "views"]);
  });

  it("adds the columns an older table lacks", () => {
    store.db.exec('CREATE TABLE "items" ("id" TEXT PRIMARY KEY, "label" TEXT)');
    const logger = createMemoryLogger();

    expect(ensureTable(store.executor, ITEMS_TABLE, logger)).toEqual({
      created: false,
      added: ["score", "count", "title", "views"],
      failed: [],
    });
    expect(logger.lines[0]).toBe("info added column items.score");
    expect(ensureTable(store.executor, ITEMS_TABLE)).toEqual({ created: false, added: [], failed: [] });
  });

  it("keeps going when one column cannot be added", () => {
    store.db.exec('CREATE TABLE "items" ("id" TEXT PRIMARY KEY)');
    store.db.exec("INSERT INTO \"items\" (\"id\") VALUES ('a')");
    const schema: TableSchema = {
      name: "items",
      columns: [
        { name: "id", type: "text", role: "key" },
        { name: "noise", type: "real", role: "extracted", default: "(random())" },
        { name: "label", type: "text", role: "extracted" },
      ],
    };
    const logger = createMemoryLogger();

    const result = ensureTable(store.executor, schema, logger);
    expect(result).toEqual({ created: false, added: ["label"], failed: ["noise"] });
    expect(logger.lines[0]?.startsWith("error could not add column items.noise: ")).toBe(true);
  });
});

describe("keyColumn", () => {
  it("requires exactly one key", () => {
    expect(keyColumn(ITEMS_TABLE).name).toBe("id");
    expect(() => keyColumn({ name: "t", columns: [{ name: "a", type: "text", role: "extracted" }] })).toThrow(
      "table t must have exactly one key column, found 0",
    );
  });
});

describe("quoteIdentifier", () => {
  it("quotes plain identifiers and rejects anything else", () => {
    expect(quoteIdentifier("catalog_photos")).toBe('"catalog_photos"');
    expect(() => quoteIdentifier('x"; DROP TABLE y')).toThrow("invalid SQL identifier");
  });
});
