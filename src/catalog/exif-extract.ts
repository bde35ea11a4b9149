import fs from "node:fs/promises";
import type { RawTagSet } from "./meta-value.js";
import type { PrecedenceTable } from "./precedence.js";
import type { ScannedImage } from "./scan.js";
import type { CanonicalPhotoRecord, MetadataSources } from "./types.js";
import { num } from "./meta-value.js";
import { reconcileRecord } from "./reconcile.js";
import { decodeIptcBlock, decodeTagBlock, gpsTagName } from "./tag-decode.js";
import { loadXmpSources } from "./xmp/xmp-sidecar.js";

type Sharp = typeof import("sharp");

async function loadSharp(): Promise<Sharp> {
  const mod = (await import("sharp")) as unknown as { default?: Sharp };
  return mod.default ?? (mod as unknown as Sharp);
}

export type ExtractionErrorKind = "unreadable" | "unsupported_container";

/** Per-image failure. The image is left out of the batch and retried next run. */
export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly filePath: string;

  constructor(kind: ExtractionErrorKind, filePath: string, message: string) {
    super(message);
    this.name = "ExtractionError";
    this.kind = kind;
    this.filePath = filePath;
  }
}

export type RawMetadataResult =
  | { ok: true; sources: MetadataSources; warnings: string[] }
  | { ok: false; error: ExtractionError };

/** Reads every metadata source of one image. Swappable for tests. */
export type MetadataReader = (image: ScannedImage) => Promise<RawMetadataResult>;

export type ExtractionResult =
  | { ok: true; record: CanonicalPhotoRecord; warnings: string[] }
  | { ok: false; error: ExtractionError };

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function block(output: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = output[name];
  return isRecord(value) ? value : {};
}

type TagBlocks = Pick<MetadataSources, "exif" | "gps" | "iptc">;

/**
 * Parse the TIFF/EXIF, GPS and IPTC blocks with exifr. Keys are kept numeric
 * so names come from our own tables, and values are left unrevived.
 */
async function readTagBlocks(buffer: Buffer): Promise<TagBlocks> {
  const exifr = await import("exifr");
  const output: unknown = await exifr.parse(buffer, {
    tiff: true,
    ifd1: false,
    exif: true,
    gps: true,
    interop: false,
    iptc: true,
    xmp: false,
    icc: false,
    jfif: false,
    ihdr: false,
    makerNote: false,
    userComment: false,
    mergeOutput: false,
    translateKeys: false,
    translateValues: false,
    reviveValues: false,
    sanitize: true,
  });
  if (!isRecord(output)) {
    return { exif: new Map(), gps: new Map(), iptc: new Map() };
  }
  const exif: RawTagSet = decodeTagBlock(block(output, "ifd0"));
  for (const [name, value] of decodeTagBlock(block(output, "exif"))) {
    exif.set(name, value);
  }
  return {
    exif,
    gps: decodeTagBlock(block(output, "gps"), gpsTagName),
    iptc: decodeIptcBlock(block(output, "iptc")),
  };
}

async function readPixelSize(buffer: Buffer): Promise<RawTagSet> {
  const sharp = await loadSharp();
  const { width, height } = await sharp(buffer).metadata();
  const tags: RawTagSet = new Map();
  if (width) {
    tags.set("Width", num(width));
  }
  if (height) {
    tags.set("Height", num(height));
  }
  return tags;
}

/**
 * Default reader: file bytes, container sniffing with file-type, tag blocks
 * with exifr, pixel size with sharp, XMP from the embedded packet and the
 * sidecar. Only an unreadable file or a non-image container is an error;
 * a failing source becomes a warning and contributes nothing.
 */
export async function readRawMetadata(image: ScannedImage): Promise<RawMetadataResult> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(image.file_path);
  } catch (err) {
    return {
      ok: false,
      error: new ExtractionError("unreadable", image.file_path, errorMessage(err)),
    };
  }
  if (buffer.length === 0) {
    return {
      ok: false,
      error: new ExtractionError("unreadable", image.file_path, "file is empty"),
    };
  }

  const { fileTypeFromBuffer } = await import("file-type");
  const detected = await fileTypeFromBuffer(buffer);
  if (!detected || !detected.mime.startsWith("image/")) {
    return {
      ok: false,
      error: new ExtractionError(
        "unsupported_container",
        image.file_path,
        detected ? `detected ${detected.mime}, not an image` : "container format not recognized",
      ),
    };
  }

  const warnings: string[] = [];
  let blocks: TagBlocks = { exif: new Map(), gps: new Map(), iptc: new Map() };
  try {
    blocks = await readTagBlocks(buffer);
  } catch (err) {
    warnings.push(`exif: ${errorMessage(err)}`);
  }

  let file: RawTagSet = new Map();
  try {
    file = await readPixelSize(buffer);
  } catch (err) {
    warnings.push(`dimensions: ${errorMessage(err)}`);
  }

  const xmp = await loadXmpSources(buffer, image.sidecar_path);
  warnings.push(...xmp.warnings);

  return { ok: true, sources: { ...blocks, xmp: xmp.flat, file }, warnings };
}

/** Read, decode and reconcile one image into its canonical record. */
export async function extractPhotoRecord(
  image: ScannedImage,
  precedence: PrecedenceTable,
  reader: MetadataReader = readRawMetadata,
): Promise<ExtractionResult> {
  let raw: RawMetadataResult;
  try {
    raw = await reader(image);
  } catch (err) {
    raw = {
      ok: false,
      error: new ExtractionError("unreadable", image.file_path, errorMessage(err)),
    };
  }
  if (!raw.ok) {
    return raw;
  }
  const record = reconcileRecord(
    raw.sources,
    {
      identifier: image.identifier,
      file_path: image.file_path,
      file_size: image.size,
      extension: image.extension,
      last_modified: image.last_modified,
    },
    precedence,
  );
  return { ok: true, record, warnings: raw.warnings };
}
