import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../logging/logger.js";
import type { QueryExecutor } from "../store/executor.js";
import { DEFAULT_URL_MAP_NAME, loadUrlMapping, writeUrlMapping } from "../config/url-mapping.js";
import { ensureTable, quoteIdentifier } from "../store/schema.js";
import { GALLERY_TABLE } from "../store/tables.js";
import { assertDirectory } from "./pipeline.js";
import { isMissingFileError } from "./xmp/xmp-sidecar.js";

export type CleanupParams = {
  doneDir: string;
  /** Mapping file; defaults to `photo_urls.json` in `doneDir`. */
  urlMapPath?: string;
};

export type CleanupDeps = {
  db: QueryExecutor;
  logger?: Logger;
};

export type CleanupSummary = {
  mapping_path: string;
  /** Mapped file names with no file left in the done directory. */
  removed_files: string[];
  rows_deleted: number;
};

async function isGone(filePath: string, logger: Logger | undefined): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return false;
  } catch (err) {
    if (isMissingFileError(err)) {
      return true;
    }
    logger?.warn(
      `keeping ${filePath}: cannot check it (${err instanceof Error ? err.message : String(err)})`,
    );
    return false;
  }
}

/**
 * Unpublish photos deleted from the done directory: every mapping entry
 * whose file is gone loses its gallery rows (under the stem and under the
 * full file name) and its mapping entry. Rows go in one transaction, then
 * the mapping file is rewritten. Storage objects are left alone.
 */
export async function cleanupGallery(
  params: CleanupParams,
  deps: CleanupDeps,
): Promise<CleanupSummary> {
  const doneDir = await assertDirectory(params.doneDir);
  const mappingPath = path.resolve(params.urlMapPath ?? path.join(doneDir, DEFAULT_URL_MAP_NAME));
  const logger = deps.logger;
  const summary: CleanupSummary = { mapping_path: mappingPath, removed_files: [], rows_deleted: 0 };

  if (await isGone(mappingPath, logger)) {
    logger?.info(`no URL mapping at ${mappingPath}; nothing to clean up`);
    return summary;
  }
  const mapping = await loadUrlMapping(mappingPath);

  for (const fileName of mapping.keys()) {
    if (await isGone(path.join(doneDir, fileName), logger)) {
      summary.removed_files.push(fileName);
    }
  }
  if (summary.removed_files.length === 0) {
    logger?.info("no missing files; cleanup not needed");
    return summary;
  }

  ensureTable(deps.db, GALLERY_TABLE, logger);
  const column = quoteIdentifier("filename");
  const sql = `DELETE FROM ${quoteIdentifier(GALLERY_TABLE.name)} WHERE ${column} = ? OR ${column} = ?`;
  summary.rows_deleted = deps.db.transaction(() => {
    let deleted = 0;
    for (const fileName of summary.removed_files) {
      const stem = path.basename(fileName, path.extname(fileName));
      deleted += deps.db.run(sql, [stem, fileName]).changes;
    }
    return deleted;
  });

  for (const fileName of summary.removed_files) {
    mapping.delete(fileName);
  }
  await writeUrlMapping(mappingPath, mapping);
  logger?.info(
    `cleanup: ${summary.removed_files.length} missing files, ${summary.rows_deleted} gallery rows deleted, ${mappingPath} rewritten`,
  );
  return summary;
}
