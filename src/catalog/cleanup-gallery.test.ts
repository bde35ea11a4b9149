import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import type { CatalogDatabase } from "../store/executor.js";
import { ConfigError } from "../config/config.js";
import { loadUrlMapping } from "../config/url-mapping.js";
import { createMemoryLogger } from "../logging/logger.js";
import { openCatalogDatabase } from "../store/executor.js";
import { ensureTable } from "../store/schema.js";
import { GALLERY_TABLE } from "../store/tables.js";
import { cleanupGallery } from "./cleanup-gallery.js";

const KEPT_URL = "https://cdn.example.test/upload/v1/kept.jpg";
const GONE_URL = "https://cdn.example.test/upload/v1/gone.jpg";

describe("cleanupGallery", () => {
  let tmpDir: string;
  let store: CatalogDatabase;

  const filenames = (): unknown[] =>
    store.db.prepare('SELECT filename FROM "gallery" ORDER BY filename').all();

  async function makeDoneDir(name: string, mapping: unknown): Promise<string> {
    const doneDir = path.join(tmpDir, name);
    await fs.mkdir(doneDir);
    await fs.writeFile(path.join(doneDir, "kept.jpg"), "kept");
    if (mapping !== undefined) {
      await fs.writeFile(path.join(doneDir, "photo_urls.json"), JSON.stringify(mapping));
    }
    return doneDir;
  }

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "photo-catalog-cleanup-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    store = openCatalogDatabase(":memory:");
    ensureTable(store.executor, GALLERY_TABLE);
    const insert = store.db.prepare('INSERT INTO "gallery" (filename, title) VALUES (?, ?)');
    for (const filename of ["kept", "gone", "gone.jpg", "gone.jpg.bak", "scan"]) {
      insert.run(filename, filename);
    }
  });

  afterEach(() => {
    store.close();
  });

  it("removes rows and mapping entries of files gone from the done directory", async () => {
    const doneDir = await makeDoneDir("prune", {
      "kept.jpg": KEPT_URL,
      "gone.jpg": { original: GONE_URL, thumbnail: "https://t.example.test/gone.jpg" },
      "scan.png": "https://cdn.example.test/upload/v1/scan.png",
    });
    const logger = createMemoryLogger();

    const summary = await cleanupGallery({ doneDir }, { db: store.executor, logger });

    expect(summary).toEqual({
      mapping_path: path.join(doneDir, "photo_urls.json"),
      removed_files: ["gone.jpg", "scan.png"],
      rows_deleted: 3,
    });
    expect(filenames()).toEqual([{ filename: "gone.jpg.bak" }, { filename: "kept" }]);
    expect([...(await loadUrlMapping(path.join(doneDir, "photo_urls.json")))]).toEqual([
      [
        "kept.jpg",
        {
          original: KEPT_URL,
          thumbnail: "https://cdn.example.test/upload/w_300,h_300,c_fill/v1/kept.jpg",
        },
      ],
    ]);
    expect(logger.lines).toContain(
      `info cleanup: 2 missing files, 3 gallery rows deleted, ${path.join(doneDir, "photo_urls.json")} rewritten`,
    );
  });

  it("leaves everything alone when no mapped file is missing", async () => {
    const doneDir = await makeDoneDir("clean", { "kept.jpg": KEPT_URL });
    const before = await fs.readFile(path.join(doneDir, "photo_urls.json"), "utf-8");

    const summary = await cleanupGallery({ doneDir }, { db: store.executor });

    expect(summary).toMatchObject({ removed_files: [], rows_deleted: 0 });
    expect(filenames()).toHaveLength(5);
    expect(await fs.readFile(path.join(doneDir, "photo_urls.json"), "utf-8")).toBe(before);
  });

  it("treats a missing mapping file as nothing to do", async () => {
    const doneDir = await makeDoneDir("unmapped", undefined);
    const logger = createMemoryLogger();

    const summary = await cleanupGallery({ doneDir }, { db: store.executor, logger });

    expect(summary.removed_files).toEqual([]);
    expect(filenames()).toHaveLength(5);
    expect(logger.lines).toEqual([
      `info no URL mapping at ${path.join(doneDir, "photo_urls.json")}; nothing to clean up`,
    ]);
  });

  it("reads an explicit mapping path", async () => {
    const doneDir = await makeDoneDir("explicit", undefined);
    const urlMapPath = path.join(tmpDir, "explicit-urls.json");
    await fs.writeFile(urlMapPath, JSON.stringify({ "kept.jpg": KEPT_URL, "gone.jpg": GONE_URL }));

    const summary = await cleanupGallery({ doneDir, urlMapPath }, { db: store.executor });

    expect(summary).toMatchObject({ removed_files: ["gone.jpg"], rows_deleted: 2 });
    expect(JSON.parse(await fs.readFile(urlMapPath, "utf-8"))).toEqual({
      "kept.jpg": {
        original: KEPT_URL,
        thumbnail: "https://cdn.example.test/upload/w_300,h_300,c_fill/v1/kept.jpg",
      },
    });
  });

  it("rejects an invalid mapping file", async () => {
    const doneDir = await makeDoneDir("invalid", ["not", "a", "map"]);
    await expect(cleanupGallery({ doneDir }, { db: store.executor })).rejects.toThrow(ConfigError);
    expect(filenames()).toHaveLength(5);
  });
});
