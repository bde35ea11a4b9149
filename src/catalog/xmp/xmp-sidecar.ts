import fs from "node:fs/promises";
import path from "node:path";
import type { FlatXmp } from "./xmp-flatten.js";
import { flattenXmp, mergeXmpSources } from "./xmp-flatten.js";
import { parseXmpTree } from "./xmp-tree.js";

export type XmpReadResult = { ok: true; flat: FlatXmp } | { ok: false; error: string };

/**
 * Sidecar candidates for a media file, in lookup order:
 * `IMG_0001.xmp` (Lightroom) then `IMG_0001.dng.xmp` (darktable and friends).
 */
export function sidecarCandidates(mediaPath: string): string[] {
  const ext = path.extname(mediaPath);
  const stemPath = ext ? mediaPath.slice(0, -ext.length) : mediaPath;
  return [`${stemPath}.xmp`, `${mediaPath}.xmp`];
}

/**
 * First existing sidecar file for a media file, or null. A candidate that
 * cannot be stat'ed for any reason other than being absent (name too long,
 * symlink loop, permissions) counts as no sidecar and is reported through
 * `onWarning`.
 */
export async function findSidecarPath(
  mediaPath: string,
  onWarning?: (warning: string) => void,
): Promise<string | null> {
  for (const candidate of sidecarCandidates(mediaPath)) {
    try {
      const stat = await fs.stat(candidate);
      if (stat.isFile()) {
        return candidate;
      }
    } catch (err) {
      if (!isMissingFileError(err)) {
        onWarning?.(
          `sidecar ${path.basename(candidate)} ignored: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
  }
  return null;
}

export function isMissingFileError(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

const PACKET_MARKERS = [
  { open: "<x:xmpmeta", close: "</x:xmpmeta>" },
  { open: "<x:xapmeta", close: "</x:xapmeta>" },
] as const;

/**
 * Locate the embedded XMP packet in an image's bytes (JPEG APP1, TIFF/DNG
 * tag 700, PNG iTXt all carry it as plain UTF-8 text).
 */
export function extractEmbeddedXmp(buffer: Buffer): string | null {
  for (const { open, close } of PACKET_MARKERS) {
    const start = buffer.indexOf(open);
    if (start === -1) {
      continue;
    }
    const end = buffer.indexOf(close, start);
    if (end === -1) {
      continue;
    }
    return buffer.subarray(start, end + close.length).toString("utf-8");
  }
  return null;
}

/** Parse and flatten one XMP document. */
export function readXmpText(xml: string): XmpReadResult {
  const parsed = parseXmpTree(xml);
  if (!parsed.ok) {
    return parsed;
  }
  return { ok: true, flat: flattenXmp(parsed.tree) };
}

/** Read, parse and flatten a sidecar file. Never throws. */
export async function readXmpSidecar(sidecarPath: string): Promise<XmpReadResult> {
  try {
    const content = await fs.readFile(sidecarPath, "utf-8");
    return readXmpText(content);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Combined XMP view of an image: embedded packet overlaid by the sidecar,
 * which reflects later catalog edits. Parse problems come back as warnings.
 */
export async function loadXmpSources(
  buffer: Buffer,
  sidecarPath: string | null,
): Promise<{ flat: FlatXmp; warnings: string[] }> {
  const warnings: string[] = [];
  let embedded: FlatXmp = new Map();
  const packet = extractEmbeddedXmp(buffer);
  if (packet) {
    const result = readXmpText(packet);
    if (result.ok) {
      embedded = result.flat;
    } else {
      warnings.push(`embedded XMP: ${result.error}`);
    }
  }

  if (!sidecarPath) {
    return { flat: embedded, warnings };
  }
  const sidecar = await readXmpSidecar(sidecarPath);
  if (!sidecar.ok) {
    warnings.push(`sidecar ${path.basename(sidecarPath)}: ${sidecar.error}`);
    return { flat: embedded, warnings };
  }
  return { flat: mergeXmpSources(embedded, sidecar.flat), warnings };
}
