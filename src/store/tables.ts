import type { CanonicalPhotoRecord, GalleryRecord } from "../catalog/types.js";
import type { QueryExecutor } from "./executor.js";
import type { ColumnSpec, TableSchema } from "./schema.js";
import type { InputRow, SanitizedRow } from "./upsert.js";
import { IMAGE_EXTENSIONS } from "../catalog/scan.js";
import { quoteIdentifier } from "./schema.js";

const extracted = (name: string, type: ColumnSpec["type"] = "text"): ColumnSpec => ({
  name,
  type,
  role: "extracted",
});

/** Metadata columns shared by both tables. */
const METADATA_COLUMNS: readonly ColumnSpec[] = [
  extracted("camera_model"),
  extracted("lens_model"),
  extracted("focal_length"),
  extracted("shutter"),
  extracted("aperture"),
  extracted("iso"),
  extracted("creation_date"),
  extracted("genre"),
  extracted("keywords"),
  extracted("description"),
  extracted("city"),
  extracted("sub_location"),
  extracted("province_state"),
  extracted("software"),
  extracted("serial_number"),
  extracted("exposure_bias"),
  extracted("metering_mode"),
  extracted("flash"),
  extracted("white_balance"),
  extracted("focal_length_35mm"),
  extracted("exposure_program"),
  extracted("subject_distance"),
  extracted("rating"),
  extracted("artist"),
  extracted("copyright"),
  extracted("latitude", "real"),
  extracted("longitude", "real"),
  extracted("altitude", "real"),
  extracted("width", "integer"),
  extracted("height", "integer"),
  extracted("file_size", "integer"),
  extracted("extension"),
  extracted("last_modified", "real"),
];

/** Administrative catalog: every image under the library root, keyed by absolute path. */
export const CATALOG_TABLE: TableSchema = {
  name: "catalog_photos",
  columns: [
    { name: "file_path", type: "text", role: "key" },
    extracted("identifier"),
    ...METADATA_COLUMNS,
  ],
};

/** Public gallery: published images keyed by file stem. */
export const GALLERY_TABLE: TableSchema = {
  name: "gallery",
  columns: [
    { name: "filename", type: "text", role: "key" },
    { name: "title", type: "text", role: "insert_only" },
    extracted("original_url"),
    extracted("thumbnail_url"),
    extracted("file_path"),
    ...METADATA_COLUMNS,
    { name: "view_count", type: "integer", role: "preserved", default: "0" },
  ],
};

export function catalogRow(record: CanonicalPhotoRecord): InputRow {
  return { ...record };
}

export function galleryRow(record: GalleryRecord): InputRow {
  const { identifier, ...rest } = record;
  return { ...rest, filename: identifier };
}

/**
 * Remove rows stored under `<stem>.<ext>` before the stem-keyed row is
 * written, so an image never appears twice. The stem matches
 * case-sensitively; only catalog image extensions count, so the row of
 * another image whose stem merely starts with `<stem>.` survives.
 */
export function purgeLegacyGalleryRows(row: SanitizedRow, db: QueryExecutor): void {
  const stem = row.get("filename");
  if (typeof stem !== "string" || !stem) {
    return;
  }
  const prefix = `${stem}.`;
  const column = quoteIdentifier("filename");
  const extensions = [...IMAGE_EXTENSIONS].map((ext) => ext.slice(1));
  db.run(
    `DELETE FROM ${quoteIdentifier(GALLERY_TABLE.name)} ` +
      `WHERE substr(${column}, 1, length(?)) = ? ` +
      `AND lower(substr(${column}, length(?) + 1)) IN (${extensions.map(() => "?").join(", ")})`,
    [prefix, prefix, prefix, ...extensions],
  );
}
