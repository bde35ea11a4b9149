import fs from "node:fs";
import { fileURLToPath } from "node:url";

export type TagTables = {
  exif: ReadonlyMap<number, string>;
  gps: ReadonlyMap<number, string>;
  /** Keyed by `"<record>:<dataset>"`. */
  iptc: ReadonlyMap<string, string>;
};

function dataFile(name: string): string {
  // Resolves to <repo>/data both from src/catalog and dist/catalog.
  return fileURLToPath(new URL(`../../data/${name}`, import.meta.url));
}

function readNameTable(name: string): Record<string, string> {
  const parsed: unknown = JSON.parse(fs.readFileSync(dataFile(name), "utf-8"));
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`tag table ${name} must be a JSON object`);
  }
  const table: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new Error(`tag table ${name}: entry ${key} is not a string`);
    }
    table[key] = value;
  }
  return table;
}

function numericTable(name: string): ReadonlyMap<number, string> {
  const entries = Object.entries(readNameTable(name)).map(
    ([key, value]) => [Number.parseInt(key, 10), value] as const,
  );
  return new Map(entries.filter(([key]) => Number.isFinite(key)));
}

let tables: TagTables | null = null;

/** Tag name tables, loaded once per process and never mutated afterwards. */
export function getTagTables(): TagTables {
  if (!tables) {
    tables = Object.freeze({
      exif: numericTable("exif-tags.json"),
      gps: numericTable("gps-tags.json"),
      iptc: new Map(Object.entries(readNameTable("iptc-tags.json"))),
    });
  }
  return tables;
}
