import type { CleanupSummary } from "../catalog/cleanup-gallery.js";
import type { CatalogProgressEvent, CatalogRunSummary } from "../catalog/types.js";

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatSummary(summary: CatalogRunSummary): string {
  const parts = [
    `${summary.scanned_count} scanned`,
    `${summary.updated_count} new or updated`,
    `${summary.unchanged_count} unchanged`,
    `${summary.extracted_count} extracted`,
    `${summary.failed_count} failed`,
    `${summary.skipped_count} skipped`,
    `${summary.batches_flushed} batches written`,
  ];
  if (summary.batches_failed > 0) {
    parts.push(`${summary.batches_failed} batches failed (${summary.rows_failed} rows)`);
  }
  return `${summary.table}: ${parts.join(", ")} in ${formatSeconds(summary.elapsed_ms)}`;
}

export function formatCleanupSummary(summary: CleanupSummary): string {
  if (summary.removed_files.length === 0) {
    return `Nothing to clean up in ${summary.mapping_path}`;
  }
  return (
    `Removed ${summary.removed_files.length} missing files (${summary.removed_files.join(", ")}): ` +
    `${summary.rows_deleted} gallery rows deleted, ${summary.mapping_path} updated`
  );
}

/**
 * One console line per progress event. Warnings, errors and batch results
 * are already logged where they happen, so those events render as null.
 */
export function formatProgressEvent(event: CatalogProgressEvent): string | null {
  switch (event.type) {
    case "catalog.start":
      return `Cataloging ${event.root} into ${event.table} (${event.mode})`;
    case "catalog.scan.progress":
      return `Scanned ${event.scanned_count} images...`;
    case "catalog.plan":
      return `${event.to_process_count} to process, ${event.unchanged_count} unchanged`;
    case "catalog.extract.progress":
      return `Processing ${event.processed_count}/${event.total_count}: ${event.file_name}`;
    case "catalog.done":
      return `Finished. ${formatSummary(event.summary)}`;
    case "catalog.image.warning":
    case "catalog.image.error":
    case "catalog.image.skipped":
    case "catalog.batch.flushed":
    case "catalog.batch.failed":
      return null;
  }
}
