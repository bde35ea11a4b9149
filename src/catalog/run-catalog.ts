import path from "node:path";
import type { PipelineDeps } from "./pipeline.js";
import type { PrecedenceTable } from "./precedence.js";
import type { CatalogRunSummary, OnProgress } from "./types.js";
import { DEFAULT_BATCH_SIZE } from "../store/batch.js";
import { ensureTable } from "../store/schema.js";
import { CATALOG_TABLE, catalogRow } from "../store/tables.js";
import { fetchWatermarks } from "../store/upsert.js";
import {
  assertDirectory,
  defaultPrecedence,
  extractAndUpsert,
  imageNotices,
  runMode,
  statTargets,
} from "./pipeline.js";
import { planReprocessing, scanImageFiles } from "./scan.js";

export type CatalogRunParams = {
  root: string;
  /** Re-extract every image regardless of watermarks. */
  refresh?: boolean;
  /** Only these files, always re-extracted. */
  targets?: readonly string[];
  batchSize?: number;
  precedence?: PrecedenceTable;
};

/**
 * Catalog every image under `root` (recursively) into `catalog_photos`,
 * keyed by absolute path. Incremental by default: only images whose
 * effective mtime differs from the stored watermark are re-extracted.
 */
export async function runCatalog(
  params: CatalogRunParams,
  deps: PipelineDeps,
  onProgress?: OnProgress,
): Promise<CatalogRunSummary> {
  const startedAt = Date.now();
  const root = await assertDirectory(params.root);
  const mode = runMode(params.refresh, params.targets);
  const precedence = params.precedence ?? defaultPrecedence();
  const logger = deps.logger;
  onProgress?.({ type: "catalog.start", table: CATALOG_TABLE.name, root, mode });

  ensureTable(deps.db, CATALOG_TABLE, logger);

  const notices = imageNotices(logger, onProgress);

  const images =
    mode === "targets"
      ? await statTargets(
          (params.targets ?? []).map((target) => path.resolve(root, target)),
          notices.onSkip,
          notices.onWarning,
        )
      : await scanImageFiles(root, {
          recursive: true,
          onProgress,
          onSkip: notices.onSkip,
          onWarning: notices.onWarning,
        });

  const watermarks = fetchWatermarks(deps.db, CATALOG_TABLE);
  const plan = planReprocessing(images, watermarks, {
    keyOf: (image) => image.file_path,
    refresh: mode === "refresh",
    targets: mode === "targets" ? new Set(images.map((image) => image.file_path)) : undefined,
  });
  onProgress?.({
    type: "catalog.plan",
    to_process_count: plan.to_process.length,
    unchanged_count: plan.unchanged_count,
  });

  const extraction = await extractAndUpsert(
    {
      images: plan.to_process,
      schema: CATALOG_TABLE,
      precedence,
      batchSize: params.batchSize ?? DEFAULT_BATCH_SIZE,
      toRow: (record) => catalogRow(record),
    },
    deps,
    onProgress,
  );

  const summary: CatalogRunSummary = {
    ...extraction,
    table: CATALOG_TABLE.name,
    mode,
    scanned_count: images.length,
    updated_count: plan.to_process.length,
    skipped_count: notices.skippedCount(),
    unchanged_count: plan.unchanged_count,
    elapsed_ms: Date.now() - startedAt,
  };
  logger?.info(
    `finished: ${summary.scanned_count} images found, ${summary.updated_count} new or updated`,
  );
  onProgress?.({ type: "catalog.done", summary });
  return summary;
}
