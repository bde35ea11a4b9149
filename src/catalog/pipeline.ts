import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../logging/logger.js";
import type { QueryExecutor } from "../store/executor.js";
import type { TableSchema } from "../store/schema.js";
import type { InputRow, UpsertOptions } from "../store/upsert.js";
import type { MetadataReader } from "./exif-extract.js";
import type { PrecedenceTable } from "./precedence.js";
import type { ImageNotice, ScannedImage } from "./scan.js";
import type { BatchSummary, CanonicalPhotoRecord, CatalogMode, OnProgress } from "./types.js";
import { ConfigError } from "../config/config.js";
import { BatchUpserter } from "../store/batch.js";
import { extractPhotoRecord, readRawMetadata } from "./exif-extract.js";
import { resolvePrecedence } from "./precedence.js";
import { isCatalogImage, statImage } from "./scan.js";

const EXTRACT_PROGRESS_INTERVAL = 100;

export type PipelineDeps = {
  db: QueryExecutor;
  /** Defaults to the file-backed reader (exifr, sharp, file-type, XMP). */
  reader?: MetadataReader;
  logger?: Logger;
};

export type RowBuilder = (record: CanonicalPhotoRecord, image: ScannedImage) => InputRow;

export type ExtractParams = {
  images: readonly ScannedImage[];
  schema: TableSchema;
  precedence: PrecedenceTable;
  batchSize: number;
  toRow: RowBuilder;
  upsert?: UpsertOptions;
};

export type ExtractSummary = BatchSummary & {
  extracted_count: number;
  failed_count: number;
};

/**
 * Extract every image in order and stream the rows through a batch
 * upserter. A failed image is reported and left out; its watermark is not
 * written, so the next run retries it.
 */
export async function extractAndUpsert(
  params: ExtractParams,
  deps: PipelineDeps,
  onProgress?: OnProgress,
): Promise<ExtractSummary> {
  const { images, schema, precedence, toRow } = params;
  const reader = deps.reader ?? readRawMetadata;
  const logger = deps.logger;
  const upserter = new BatchUpserter({
    db: deps.db,
    schema,
    batchSize: params.batchSize,
    upsert: params.upsert,
    logger,
    onProgress,
  });

  let extracted = 0;
  let failed = 0;
  for (const [index, image] of images.entries()) {
    const processed = index + 1;
    if (processed % EXTRACT_PROGRESS_INTERVAL === 0 || processed === images.length) {
      onProgress?.({
        type: "catalog.extract.progress",
        processed_count: processed,
        total_count: images.length,
        file_name: image.file_name,
      });
    }

    const result = await extractPhotoRecord(image, precedence, reader);
    if (!result.ok) {
      failed += 1;
      logger?.error(`${result.error.kind} ${image.file_path}: ${result.error.message}`);
      onProgress?.({
        type: "catalog.image.error",
        file_path: image.file_path,
        kind: result.error.kind,
        error: result.error.message,
      });
      continue;
    }

    for (const warning of result.warnings) {
      logger?.warn(`${image.file_path}: ${warning}`);
      onProgress?.({ type: "catalog.image.warning", file_path: image.file_path, warning });
    }
    extracted += 1;
    upserter.add(toRow(result.record, image));
  }

  return { ...upserter.finish(), extracted_count: extracted, failed_count: failed };
}

export async function assertDirectory(dir: string): Promise<string> {
  const resolved = path.resolve(dir);
  try {
    const stat = await fs.stat(resolved);
    if (stat.isDirectory()) {
      return resolved;
    }
  } catch (err) {
    throw new ConfigError(
      `cannot read directory ${resolved}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  throw new ConfigError(`${resolved} is not a directory`);
}

export function defaultPrecedence(): PrecedenceTable {
  const result = resolvePrecedence();
  if (!result.ok) {
    throw new ConfigError(result.error);
  }
  return result.table;
}

export function runMode(refresh: boolean | undefined, targets: readonly string[] | undefined): CatalogMode {
  if (targets && targets.length > 0) {
    return "targets";
  }
  return refresh ? "refresh" : "incremental";
}

export type ImageNotices = {
  onSkip: ImageNotice;
  onWarning: ImageNotice;
  skippedCount: () => number;
};

/** Skip and warning reporters shared by a run's scan and target stats. */
export function imageNotices(logger: Logger | undefined, onProgress?: OnProgress): ImageNotices {
  let skipped = 0;
  return {
    onSkip: (filePath, reason) => {
      skipped += 1;
      logger?.warn(`skipping ${filePath}: ${reason}`);
      onProgress?.({ type: "catalog.image.skipped", file_path: filePath, reason });
    },
    onWarning: (filePath, warning) => {
      logger?.warn(`${filePath}: ${warning}`);
      onProgress?.({ type: "catalog.image.warning", file_path: filePath, warning });
    },
    skippedCount: () => skipped,
  };
}

/**
 * Stat explicitly named images. Missing files and non-catalog extensions
 * are reported as skipped rather than failing the run.
 */
export async function statTargets(
  filePaths: readonly string[],
  onSkip: ImageNotice,
  onWarning?: ImageNotice,
): Promise<ScannedImage[]> {
  const images: ScannedImage[] = [];
  const seen = new Set<string>();
  for (const filePath of filePaths) {
    const absPath = path.resolve(filePath);
    if (seen.has(absPath)) {
      continue;
    }
    seen.add(absPath);
    if (!isCatalogImage(absPath)) {
      onSkip(absPath, "not a catalog image type");
      continue;
    }
    try {
      images.push(await statImage(absPath, onWarning));
    } catch (err) {
      onSkip(absPath, err instanceof Error ? err.message : String(err));
    }
  }
  return images;
}
