import type { MetaValue } from "./meta-value.js";
import type { PrecedenceField, PrecedenceTable, SourceRef } from "./precedence.js";
import type { CanonicalPhotoRecord, FileFacts, MetadataSources } from "./types.js";
import { isPresent, metaToNumber, text } from "./meta-value.js";
import { valueToText } from "./tag-decode.js";
import { resolveGps } from "./units/gps.js";
import { normalizeCaptureDate } from "./units/date-format.js";
import { normalizeShutterSpeed } from "./units/shutter.js";

function lookup(sources: MetadataSources, ref: SourceRef): MetaValue | undefined {
  if (ref.source === "xmp") {
    const value = sources.xmp.get(ref.key);
    return value === undefined ? undefined : text(value);
  }
  return sources[ref.source].get(ref.key);
}

/** First present value along a field's chain, or null when every source is empty. */
export function pickFirst(
  sources: MetadataSources,
  chain: readonly SourceRef[],
): MetaValue | null {
  for (const ref of chain) {
    const value = lookup(sources, ref);
    if (isPresent(value)) {
      return value;
    }
  }
  return null;
}

function chainOf(precedence: PrecedenceTable, field: PrecedenceField): readonly SourceRef[] {
  return precedence.get(field) ?? [];
}

function pickText(
  sources: MetadataSources,
  precedence: PrecedenceTable,
  field: PrecedenceField,
): string {
  return valueToText(pickFirst(sources, chainOf(precedence, field)))?.trim() ?? "";
}

function pickDimension(
  sources: MetadataSources,
  precedence: PrecedenceTable,
  field: "width" | "height",
): number | null {
  for (const ref of chainOf(precedence, field)) {
    const value = metaToNumber(lookup(sources, ref));
    if (value !== null && value > 0) {
      return Math.round(value);
    }
  }
  return null;
}

function pickShutter(sources: MetadataSources, precedence: PrecedenceTable): string {
  const value = pickFirst(sources, chainOf(precedence, "shutter"));
  if (!value) {
    return normalizeShutterSpeed(null);
  }
  return normalizeShutterSpeed(value.kind === "number" ? value.value : valueToText(value));
}

/**
 * Merge the per-source metadata of one image into its canonical record.
 * Pure: every field takes the first present value along its precedence chain.
 */
export function reconcileRecord(
  sources: MetadataSources,
  facts: FileFacts,
  precedence: PrecedenceTable,
): CanonicalPhotoRecord {
  const field = (name: PrecedenceField) => pickText(sources, precedence, name);
  const gps = resolveGps(sources.gps, sources.xmp);
  const rawDate = valueToText(pickFirst(sources, chainOf(precedence, "creation_date")));

  return {
    ...facts,
    camera_model: field("camera_model"),
    lens_model: field("lens_model"),
    focal_length: field("focal_length"),
    shutter: pickShutter(sources, precedence),
    aperture: field("aperture"),
    iso: field("iso"),
    creation_date: normalizeCaptureDate(rawDate?.trim()),
    genre: field("genre"),
    keywords: field("keywords"),
    description: field("description"),
    city: field("city"),
    sub_location: field("sub_location"),
    province_state: field("province_state"),
    software: field("software"),
    serial_number: field("serial_number"),
    exposure_bias: field("exposure_bias"),
    metering_mode: field("metering_mode"),
    flash: field("flash"),
    white_balance: field("white_balance"),
    focal_length_35mm: field("focal_length_35mm"),
    exposure_program: field("exposure_program"),
    subject_distance: field("subject_distance"),
    rating: field("rating"),
    artist: field("artist"),
    copyright: field("copyright"),
    latitude: gps.latitude,
    longitude: gps.longitude,
    altitude: gps.altitude,
    width: pickDimension(sources, precedence, "width"),
    height: pickDimension(sources, precedence, "height"),
  };
}

export function emptySources(): MetadataSources {
  return { exif: new Map(), gps: new Map(), iptc: new Map(), xmp: new Map(), file: new Map() };
}
