export const SOURCE_NAMES = ["exif", "gps", "iptc", "xmp", "file"] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

/** One entry of a precedence chain: `exif:Model` → `{ source: "exif", key: "Model" }`. */
export type SourceRef = { source: SourceName; key: string };

/** Record fields whose value is chosen through a precedence chain. */
export const PRECEDENCE_FIELDS = [
  "camera_model",
  "lens_model",
  "focal_length",
  "shutter",
  "aperture",
  "iso",
  "creation_date",
  "genre",
  "keywords",
  "description",
  "city",
  "sub_location",
  "province_state",
  "software",
  "serial_number",
  "exposure_bias",
  "metering_mode",
  "flash",
  "white_balance",
  "focal_length_35mm",
  "exposure_program",
  "subject_distance",
  "width",
  "height",
  "rating",
  "artist",
  "copyright",
] as const;
export type PrecedenceField = (typeof PRECEDENCE_FIELDS)[number];

export type PrecedenceTable = ReadonlyMap<PrecedenceField, readonly SourceRef[]>;

/**
 * Default chains. EXIF comes first for camera facts, IPTC for the captioning
 * fields, XMP rating first because Lightroom writes ratings there. The APEX
 * `ShutterSpeedValue` / `ApertureValue` tags are left out: they are log2
 * encodings, not seconds or f-numbers.
 */
export const DEFAULT_PRECEDENCE: Readonly<Record<PrecedenceField, readonly string[]>> = {
  camera_model: ["exif:Model", "xmp:Model", "xmp:CameraModel"],
  lens_model: ["exif:LensModel", "xmp:LensModel", "xmp:Lens", "xmp:LensInfo"],
  focal_length: ["exif:FocalLength", "xmp:FocalLength", "xmp:focalLength"],
  shutter: ["exif:ExposureTime", "xmp:ExposureTime", "xmp:shutterSpeed"],
  aperture: ["exif:FNumber", "xmp:FNumber", "xmp:aperture"],
  iso: [
    "exif:ISOSpeedRatings",
    "xmp:ISOSpeedRatings",
    "xmp:ISO",
    "xmp:ISOSpeed",
    "xmp:iso",
    "xmp:isoSpeedRatings",
  ],
  creation_date: ["exif:DateTimeOriginal", "xmp:DateTimeOriginal", "xmp:CreateDate", "xmp:DateCreated"],
  genre: ["exif:Genre", "xmp:genre", "xmp:Genre"],
  keywords: ["iptc:Keywords", "xmp:Keywords", "xmp:subject"],
  description: [
    "exif:ImageDescription",
    "iptc:Caption",
    "xmp:ImageDescription",
    "xmp:description",
    "xmp:title",
  ],
  city: ["iptc:City", "xmp:City", "xmp:Iptc4xmpCore_City", "xmp:city"],
  sub_location: [
    "iptc:SubLocation",
    "xmp:Sublocation",
    "xmp:Iptc4xmpCore_Sublocation",
    "xmp:sublocation",
  ],
  province_state: [
    "iptc:ProvinceState",
    "xmp:ProvinceState",
    "xmp:Iptc4xmpCore_ProvinceState",
    "xmp:state",
  ],
  software: ["exif:Software", "xmp:CreatorTool", "xmp:Software"],
  serial_number: ["exif:BodySerialNumber", "exif:SerialNumber", "xmp:SerialNumber"],
  exposure_bias: ["exif:ExposureBiasValue", "xmp:ExposureBiasValue"],
  metering_mode: ["exif:MeteringMode", "xmp:MeteringMode"],
  flash: ["exif:Flash", "xmp:Flash"],
  white_balance: ["exif:WhiteBalance", "xmp:WhiteBalance"],
  focal_length_35mm: ["exif:FocalLengthIn35mmFilm", "xmp:FocalLengthIn35mmFilm"],
  exposure_program: ["exif:ExposureProgram", "xmp:ExposureProgram"],
  subject_distance: ["exif:SubjectDistance", "xmp:ApproximateFocusDistance"],
  width: ["file:Width", "exif:ImageWidth", "exif:ExifImageWidth", "xmp:PixelXDimension", "xmp:ImageWidth"],
  height: [
    "file:Height",
    "exif:ImageLength",
    "exif:ExifImageHeight",
    "xmp:PixelYDimension",
    "xmp:ImageLength",
    "xmp:ImageHeight",
  ],
  rating: ["xmp:Rating", "exif:Rating"],
  artist: ["exif:Artist", "xmp:Creator", "xmp:creator"],
  copyright: ["exif:Copyright", "xmp:Copyright", "xmp:Rights", "xmp:rights"],
};

function isSourceName(value: string): value is SourceName {
  return SOURCE_NAMES.some((name) => name === value);
}

export function isPrecedenceField(value: string): value is PrecedenceField {
  return PRECEDENCE_FIELDS.some((field) => field === value);
}

export function parseSourceRef(ref: string): SourceRef | null {
  const colon = ref.indexOf(":");
  if (colon <= 0) {
    return null;
  }
  const source = ref.slice(0, colon).trim().toLowerCase();
  const key = ref.slice(colon + 1).trim();
  if (!isSourceName(source) || !key) {
    return null;
  }
  return { source, key };
}

export type PrecedenceResult = { ok: true; table: PrecedenceTable } | { ok: false; error: string };

/**
 * Build the effective precedence table: defaults, with whole chains replaced
 * per field by `overrides`. Unknown fields and malformed references are errors.
 */
export function resolvePrecedence(
  overrides: Readonly<Record<string, readonly string[]>> = {},
): PrecedenceResult {
  for (const field of Object.keys(overrides)) {
    if (!isPrecedenceField(field)) {
      return { ok: false, error: `unknown precedence field "${field}"` };
    }
  }

  const table = new Map<PrecedenceField, readonly SourceRef[]>();
  for (const field of PRECEDENCE_FIELDS) {
    const chain = overrides[field] ?? DEFAULT_PRECEDENCE[field];
    const refs: SourceRef[] = [];
    for (const raw of chain) {
      const ref = parseSourceRef(raw);
      if (!ref) {
        return {
          ok: false,
          error: `invalid source "${raw}" for ${field} (expected <${SOURCE_NAMES.join("|")}>:<tag>)`,
        };
      }
      refs.push(ref);
    }
    table.set(field, Object.freeze(refs));
  }
  return { ok: true, table };
}
