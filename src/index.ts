export type {
  CanonicalPhotoRecord,
  CatalogProgressEvent,
  CatalogRunSummary,
  GalleryRecord,
  MetadataSources,
  OnProgress,
} from "./catalog/types.js";
export type { MetaValue, RawTagSet } from "./catalog/meta-value.js";
export { fromUnknown, isPresent } from "./catalog/meta-value.js";
export {
  decodeBytes,
  decodeIptcBlock,
  decodeIptcValue,
  decodeTagBlock,
  decodeTagValue,
  exifTagName,
  gpsTagName,
  iptcTagName,
} from "./catalog/tag-decode.js";
export type { XmpTree } from "./catalog/xmp/xmp-tree.js";
export { parseXmpTree, stripXmlNamespaces } from "./catalog/xmp/xmp-tree.js";
export type { FlatXmp } from "./catalog/xmp/xmp-flatten.js";
export { flattenXmp, mergeXmpSources } from "./catalog/xmp/xmp-flatten.js";
export { findSidecarPath, loadXmpSources, readXmpSidecar } from "./catalog/xmp/xmp-sidecar.js";
export { normalizeShutterSpeed } from "./catalog/units/shutter.js";
export { dmsToDecimal, parseXmpCoordinate, resolveGps } from "./catalog/units/gps.js";
export { normalizeCaptureDate } from "./catalog/units/date-format.js";
export type { PrecedenceTable, SourceRef } from "./catalog/precedence.js";
export { DEFAULT_PRECEDENCE, resolvePrecedence } from "./catalog/precedence.js";
export { reconcileRecord } from "./catalog/reconcile.js";
export type { ExtractionResult, MetadataReader } from "./catalog/exif-extract.js";
export { ExtractionError, extractPhotoRecord, readRawMetadata } from "./catalog/exif-extract.js";
export type { ScannedImage } from "./catalog/scan.js";
export { effectiveMtime, planReprocessing, scanImageFiles } from "./catalog/scan.js";
export { runCatalog } from "./catalog/run-catalog.js";
export { runGallery } from "./catalog/run-gallery.js";
export type { CleanupSummary } from "./catalog/cleanup-gallery.js";
export { cleanupGallery } from "./catalog/cleanup-gallery.js";
export type { QueryExecutor } from "./store/executor.js";
export { createSqliteExecutor, openCatalogDatabase } from "./store/executor.js";
export type { TableSchema } from "./store/schema.js";
export { ensureTable } from "./store/schema.js";
export { fetchWatermarks, sanitizeRow, upsertRows } from "./store/upsert.js";
export { BatchUpserter } from "./store/batch.js";
export { CATALOG_TABLE, GALLERY_TABLE } from "./store/tables.js";
export { ConfigError, loadCatalogConfig } from "./config/config.js";
export { loadUrlMapping, parseUrlMapping, writeUrlMapping } from "./config/url-mapping.js";
export { createConsoleLogger } from "./logging/logger.js";
