import type { MetaValue, RawTagSet } from "../meta-value.js";
import type { FlatXmp } from "../xmp/xmp-flatten.js";
import { metaToNumber, parseNumericText } from "../meta-value.js";
import { valueToText } from "../tag-decode.js";

export type GpsPosition = {
  latitude: number | null;
  longitude: number | null;
  altitude: number | null;
};

const NEGATIVE_REFS = new Set(["S", "W"]);

function components(dms: MetaValue | readonly number[] | null | undefined): number[] | null {
  if (!dms) {
    return null;
  }
  if ("kind" in dms) {
    return dms.kind === "list" ? dms.items.map((item) => metaToNumber(item) ?? Number.NaN) : null;
  }
  return [...dms];
}

/**
 * Degrees/minutes/seconds to signed decimal degrees. South and West
 * references negate the result; anything malformed yields null.
 */
export function dmsToDecimal(
  dms: MetaValue | readonly number[] | null | undefined,
  ref?: string | null,
): number | null {
  const parts = components(dms);
  if (!parts || parts.length < 3) {
    return null;
  }
  const [degrees, minutes, seconds] = parts;
  if (![degrees, minutes, seconds].every(Number.isFinite)) {
    return null;
  }
  const decimal = degrees + minutes / 60 + seconds / 3600;
  const hemisphere = ref?.trim().toUpperCase();
  return hemisphere && NEGATIVE_REFS.has(hemisphere) ? -decimal : decimal;
}

/**
 * XMP coordinates: plain decimal degrees, or the XMP GPSCoordinate forms
 * `DDD,MM.mmk` and `DDD,MM,SSk` where k is N, S, E or W.
 */
export function parseXmpCoordinate(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }
  const trimmed = raw.trim();
  const match = /^(\d+(?:\.\d+)?),(\d+(?:\.\d+)?)(?:,(\d+(?:\.\d+)?))?\s*([NSEW])$/i.exec(trimmed);
  if (match) {
    return dmsToDecimal(
      [Number(match[1]), Number(match[2]), match[3] ? Number(match[3]) : 0],
      match[4],
    );
  }
  return parseNumericText(trimmed);
}

function altitudeBelowSeaLevel(ref: MetaValue | undefined): boolean {
  if (!ref) {
    return false;
  }
  if (ref.kind === "bytes") {
    return ref.value[0] === 1;
  }
  if (ref.kind === "list") {
    return metaToNumber(ref.items[0]) === 1;
  }
  return metaToNumber(ref) === 1 || valueToText(ref) === "\u0001";
}

/**
 * Position from the EXIF GPS IFD, falling back per component to XMP
 * `GPSLatitude` / `GPSLongitude` / `GPSAltitude` when EXIF has nothing.
 */
export function resolveGps(gps: RawTagSet, xmp: FlatXmp): GpsPosition {
  let latitude: number | null = null;
  let longitude: number | null = null;
  let altitude: number | null = null;

  const latRef = valueToText(gps.get("GPSLatitudeRef"));
  if (gps.has("GPSLatitude") && latRef) {
    latitude = dmsToDecimal(gps.get("GPSLatitude"), latRef);
  }
  const lonRef = valueToText(gps.get("GPSLongitudeRef"));
  if (gps.has("GPSLongitude") && lonRef) {
    longitude = dmsToDecimal(gps.get("GPSLongitude"), lonRef);
  }
  const rawAltitude = metaToNumber(gps.get("GPSAltitude"));
  if (rawAltitude !== null) {
    altitude = altitudeBelowSeaLevel(gps.get("GPSAltitudeRef")) ? -rawAltitude : rawAltitude;
  }

  latitude ??= parseXmpCoordinate(xmp.get("GPSLatitude"));
  longitude ??= parseXmpCoordinate(xmp.get("GPSLongitude"));
  altitude ??= parseNumericText(xmp.get("GPSAltitude") ?? "");
  return { latitude, longitude, altitude };
}
