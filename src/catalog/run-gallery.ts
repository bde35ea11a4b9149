import path from "node:path";
import type { UrlMapping } from "../config/url-mapping.js";
import type { PipelineDeps } from "./pipeline.js";
import type { PrecedenceTable } from "./precedence.js";
import type { ScannedImage } from "./scan.js";
import type { CatalogRunSummary, OnProgress } from "./types.js";
import { DEFAULT_URL_MAP_NAME, loadUrlMapping } from "../config/url-mapping.js";
import { DEFAULT_BATCH_SIZE } from "../store/batch.js";
import { ensureTable } from "../store/schema.js";
import { GALLERY_TABLE, galleryRow, purgeLegacyGalleryRows } from "../store/tables.js";
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

export type GalleryRunParams = {
  /** Directory of uploaded ("done") images; not searched recursively. */
  doneDir: string;
  /** Mapping file; defaults to `photo_urls.json` in `doneDir`. */
  urlMapPath?: string;
  /** Already loaded mapping, takes precedence over `urlMapPath`. */
  urlMapping?: UrlMapping;
  refresh?: boolean;
  /** File names inside `doneDir`, always re-extracted (used right after an upload). */
  specificFiles?: readonly string[];
  batchSize?: number;
  precedence?: PrecedenceTable;
};

/**
 * Publish the images of the done directory into the `gallery` table, keyed
 * by file stem. Titles are only set on first insert and `view_count` is
 * never written, so edits and counters survive re-extraction.
 */
export async function runGallery(
  params: GalleryRunParams,
  deps: PipelineDeps,
  onProgress?: OnProgress,
): Promise<CatalogRunSummary> {
  const startedAt = Date.now();
  const doneDir = await assertDirectory(params.doneDir);
  const urlMapping =
    params.urlMapping ??
    (await loadUrlMapping(params.urlMapPath ?? path.join(doneDir, DEFAULT_URL_MAP_NAME)));
  const mode = runMode(params.refresh, params.specificFiles);
  const precedence = params.precedence ?? defaultPrecedence();
  const logger = deps.logger;
  onProgress?.({ type: "catalog.start", table: GALLERY_TABLE.name, root: doneDir, mode });

  ensureTable(deps.db, GALLERY_TABLE, logger);

  const notices = imageNotices(logger, onProgress);

  const images =
    mode === "targets"
      ? await statTargets(
          (params.specificFiles ?? []).map((name) => path.join(doneDir, path.basename(name))),
          notices.onSkip,
          notices.onWarning,
        )
      : await scanImageFiles(doneDir, {
          recursive: false,
          onProgress,
          onSkip: notices.onSkip,
          onWarning: notices.onWarning,
        });

  const watermarks = fetchWatermarks(deps.db, GALLERY_TABLE);
  const plan = planReprocessing(images, watermarks, {
    keyOf: (image) => image.identifier,
    refresh: mode === "refresh",
    targets: mode === "targets" ? new Set(images.map((image) => image.identifier)) : undefined,
  });
  onProgress?.({
    type: "catalog.plan",
    to_process_count: plan.to_process.length,
    unchanged_count: plan.unchanged_count,
  });

  const publishable: ScannedImage[] = [];
  for (const image of plan.to_process) {
    if (urlMapping.has(image.file_name)) {
      publishable.push(image);
    } else {
      notices.onSkip(image.file_path, "missing from the URL mapping; it may need to be re-uploaded");
    }
  }

  const extraction = await extractAndUpsert(
    {
      images: publishable,
      schema: GALLERY_TABLE,
      precedence,
      batchSize: params.batchSize ?? DEFAULT_BATCH_SIZE,
      toRow: (record, image) => {
        const urls = urlMapping.get(image.file_name);
        return galleryRow({
          ...record,
          title: record.identifier,
          original_url: urls?.original ?? "",
          thumbnail_url: urls?.thumbnail ?? "",
        });
      },
      upsert: { beforeRow: purgeLegacyGalleryRows },
    },
    deps,
    onProgress,
  );

  const summary: CatalogRunSummary = {
    ...extraction,
    table: GALLERY_TABLE.name,
    mode,
    scanned_count: images.length,
    updated_count: publishable.length,
    skipped_count: notices.skippedCount(),
    unchanged_count: plan.unchanged_count,
    elapsed_ms: Date.now() - startedAt,
  };
  logger?.info(
    `finished: ${summary.scanned_count} images found, ${summary.extracted_count} upserted into ${GALLERY_TABLE.name}`,
  );
  onProgress?.({ type: "catalog.done", summary });
  return summary;
}
