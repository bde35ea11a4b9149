import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { OnProgress } from "./types.js";
import { findSidecarPath } from "./xmp/xmp-sidecar.js";

/** Extensions the catalog reads, compared case-insensitively. */
export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".bmp",
  ".tiff",
  ".nef",
  ".dng",
]);

const SCAN_PROGRESS_INTERVAL = 1000;

export type ScannedImage = {
  /** Absolute path. */
  file_path: string;
  file_name: string;
  /** File name without extension. */
  identifier: string;
  /** Lower-case, with the leading dot. */
  extension: string;
  size: number;
  sidecar_path: string | null;
  /** max(image mtime, sidecar mtime), in ms. */
  last_modified: number;
};

export function isCatalogImage(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

function imageGlob(recursive: boolean): string {
  const exts = [...IMAGE_EXTENSIONS].map((ext) => ext.slice(1)).join(",");
  return recursive ? `**/*.{${exts}}` : `*.{${exts}}`;
}

/**
 * Change watermark of an image: the later of its own mtime and its sidecar's,
 * so editing only the `.xmp` still marks the image as changed.
 */
export async function effectiveMtime(
  imageMtimeMs: number,
  sidecarPath: string | null,
): Promise<number> {
  if (!sidecarPath) {
    return imageMtimeMs;
  }
  const sidecar = await fs.stat(sidecarPath);
  return Math.max(imageMtimeMs, sidecar.mtimeMs);
}

/** Reports a per-image problem by absolute path. */
export type ImageNotice = (filePath: string, message: string) => void;

/** Stat one image and its sidecar. Throws when the image itself cannot be stat'ed. */
export async function statImage(filePath: string, onWarning?: ImageNotice): Promise<ScannedImage> {
  const absPath = path.resolve(filePath);
  const stat = await fs.stat(absPath);
  const sidecarPath = await findSidecarPath(absPath, (warning) => onWarning?.(absPath, warning));
  const extension = path.extname(absPath);
  return {
    file_path: absPath,
    file_name: path.basename(absPath),
    identifier: path.basename(absPath, extension),
    extension: extension.toLowerCase(),
    size: stat.size,
    sidecar_path: sidecarPath,
    last_modified: await effectiveMtime(stat.mtimeMs, sidecarPath),
  };
}

export type ScanOptions = {
  recursive: boolean;
  onProgress?: OnProgress;
  /** An image that could not be stat'ed; it is left out of the result. */
  onSkip?: ImageNotice;
  onWarning?: ImageNotice;
};

/**
 * List the catalog images under `root`, sorted by path. Hidden files and
 * directories are included. Sidecars are not listed themselves; they only
 * feed each image's watermark. Unreadable directories are passed over and a
 * file that fails to stat goes to `onSkip` without ending the scan.
 */
export async function scanImageFiles(root: string, options: ScanOptions): Promise<ScannedImage[]> {
  const matches = await fg(imageGlob(options.recursive), {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    unique: true,
    caseSensitiveMatch: false,
    dot: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });
  matches.sort((a, b) => a.localeCompare(b));

  const images: ScannedImage[] = [];
  for (const match of matches) {
    const filePath = path.normalize(match);
    try {
      images.push(await statImage(filePath, options.onWarning));
    } catch (err) {
      options.onSkip?.(filePath, err instanceof Error ? err.message : String(err));
      continue;
    }
    if (options.onProgress && images.length % SCAN_PROGRESS_INTERVAL === 0) {
      options.onProgress({ type: "catalog.scan.progress", scanned_count: images.length });
    }
  }
  return images;
}

export type ReprocessingPlan = {
  to_process: ScannedImage[];
  unchanged_count: number;
};

export type PlanOptions = {
  /** Table key of an image (absolute path, stem, ...). */
  keyOf: (image: ScannedImage) => string;
  refresh?: boolean;
  /** Keys that are reprocessed regardless of their watermark. */
  targets?: ReadonlySet<string>;
};

/**
 * Select the images whose stored watermark is missing or differs from the
 * effective mtime. `refresh` selects everything.
 */
export function planReprocessing(
  images: readonly ScannedImage[],
  watermarks: ReadonlyMap<string, number | null>,
  options: PlanOptions,
): ReprocessingPlan {
  const toProcess: ScannedImage[] = [];
  let unchangedCount = 0;

  for (const image of images) {
    const key = options.keyOf(image);
    if (options.refresh || options.targets?.has(key)) {
      toProcess.push(image);
      continue;
    }
    const stored = watermarks.get(key);
    if (stored === undefined || stored === null || stored !== image.last_modified) {
      toProcess.push(image);
      continue;
    }
    unchangedCount += 1;
  }

  return { to_process: toProcess, unchanged_count: unchangedCount };
}
