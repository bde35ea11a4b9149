import fs from "node:fs/promises";
import { ConfigError } from "./config.js";

export type PhotoUrls = { original: string; thumbnail: string };

/** File name (with extension) → storage URLs. */
export type UrlMapping = Map<string, PhotoUrls>;

/** Name of the mapping file the upload step writes into the done directory. */
export const DEFAULT_URL_MAP_NAME = "photo_urls.json";

const THUMBNAIL_TRANSFORM = "w_300,h_300,c_fill/";

/** Thumbnail URL of an uploaded original: the resize transform goes after `/upload/`. */
export function thumbnailFromOriginal(originalUrl: string): string {
  return originalUrl.replaceAll("/upload/", `/upload/${THUMBNAIL_TRANSFORM}`);
}

export type UrlMappingResult = { ok: true; mapping: UrlMapping } | { ok: false; error: string };

/**
 * Validate a parsed mapping document. Entries are `{ original, thumbnail }`
 * objects; a bare string is the legacy form and only names the original.
 */
export function parseUrlMapping(document: unknown): UrlMappingResult {
  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    return { ok: false, error: "URL mapping must be a JSON object keyed by file name" };
  }
  const mapping: UrlMapping = new Map();
  for (const [fileName, entry] of Object.entries(document)) {
    if (typeof entry === "string") {
      mapping.set(fileName, { original: entry, thumbnail: thumbnailFromOriginal(entry) });
      continue;
    }
    if (typeof entry !== "object" || entry === null || !("original" in entry)) {
      return { ok: false, error: `${fileName}: expected a URL string or { original, thumbnail }` };
    }
    const { original } = entry;
    if (typeof original !== "string" || !original) {
      return { ok: false, error: `${fileName}: "original" must be a non-empty string` };
    }
    const thumbnail = "thumbnail" in entry ? entry.thumbnail : undefined;
    if (thumbnail !== undefined && typeof thumbnail !== "string") {
      return { ok: false, error: `${fileName}: "thumbnail" must be a string` };
    }
    mapping.set(fileName, { original, thumbnail: thumbnail || thumbnailFromOriginal(original) });
  }
  return { ok: true, mapping };
}

/** Read and validate a mapping file. Throws ConfigError. */
export async function loadUrlMapping(filePath: string): Promise<UrlMapping> {
  let document: unknown;
  try {
    document = JSON.parse(await fs.readFile(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `cannot read URL mapping ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  const result = parseUrlMapping(document);
  if (!result.ok) {
    throw new ConfigError(`invalid URL mapping ${filePath}: ${result.error}`);
  }
  return result.mapping;
}

/** Rewrite a mapping file, entries as `{ original, thumbnail }`, two-space indented. */
export async function writeUrlMapping(filePath: string, mapping: UrlMapping): Promise<void> {
  const document: Record<string, PhotoUrls> = {};
  for (const [fileName, urls] of mapping) {
    document[fileName] = { original: urls.original, thumbnail: urls.thumbnail };
  }
  await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
}
