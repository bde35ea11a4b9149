import type { RawTagSet } from "./meta-value.js";
import type { FlatXmp } from "./xmp/xmp-flatten.js";

/** Per-source raw metadata of one image, before reconciliation. */
export type MetadataSources = {
  exif: RawTagSet;
  gps: RawTagSet;
  iptc: RawTagSet;
  xmp: FlatXmp;
  /** Facts read from the image container itself (`Width`, `Height`). */
  file: RawTagSet;
};

/** Filesystem facts of one image, independent of its metadata. */
export type FileFacts = {
  identifier: string;
  file_path: string;
  file_size: number;
  extension: string;
  last_modified: number;
};

export type CanonicalPhotoRecord = FileFacts & {
  camera_model: string;
  lens_model: string;
  focal_length: string;
  shutter: string;
  aperture: string;
  iso: string;
  creation_date: string | null;
  genre: string;
  keywords: string;
  description: string;
  city: string;
  sub_location: string;
  province_state: string;
  software: string;
  serial_number: string;
  exposure_bias: string;
  metering_mode: string;
  flash: string;
  white_balance: string;
  focal_length_35mm: string;
  exposure_program: string;
  subject_distance: string;
  rating: string;
  artist: string;
  copyright: string;
  latitude: number | null;
  longitude: number | null;
  altitude: number | null;
  width: number | null;
  height: number | null;
};

export type GalleryRecord = CanonicalPhotoRecord & {
  title: string;
  original_url: string;
  thumbnail_url: string;
};

export type CatalogMode = "incremental" | "refresh" | "targets";

export type BatchSummary = {
  batches_flushed: number;
  batches_failed: number;
  rows_written: number;
  rows_failed: number;
};

export type CatalogRunSummary = BatchSummary & {
  table: string;
  mode: CatalogMode;
  scanned_count: number;
  /** Images selected for extraction (new, changed or targeted). */
  updated_count: number;
  extracted_count: number;
  failed_count: number;
  skipped_count: number;
  unchanged_count: number;
  elapsed_ms: number;
};

export type CatalogProgressEvent =
  | { type: "catalog.start"; table: string; root: string; mode: CatalogMode }
  | { type: "catalog.scan.progress"; scanned_count: number }
  | { type: "catalog.plan"; to_process_count: number; unchanged_count: number }
  | {
      type: "catalog.extract.progress";
      processed_count: number;
      total_count: number;
      file_name: string;
    }
  | { type: "catalog.image.warning"; file_path: string; warning: string }
  | { type: "catalog.image.error"; file_path: string; kind: string; error: string }
  | { type: "catalog.image.skipped"; file_path: string; reason: string }
  | { type: "catalog.batch.flushed"; table: string; row_count: number; batch_index: number }
  | {
      type: "catalog.batch.failed";
      table: string;
      row_count: number;
      batch_index: number;
      error: string;
    }
  | { type: "catalog.done"; summary: CatalogRunSummary };

export type OnProgress = (event: CatalogProgressEvent) => void;
