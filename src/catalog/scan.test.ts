import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import type { ScannedImage } from "./scan.js";
import { isCatalogImage, planReprocessing, scanImageFiles, statImage } from "./scan.js";

describe("scan", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "photo-catalog-scan-test-"));
    await fs.mkdir(path.join(tmpDir, "sub"));
    await fs.writeFile(path.join(tmpDir, "a.JPG"), "jpeg-bytes");
    await fs.writeFile(path.join(tmpDir, "b.png"), "png");
    await fs.writeFile(path.join(tmpDir, "b.xmp"), "<x:xmpmeta/>");
    await fs.writeFile(path.join(tmpDir, "notes.txt"), "not an image");
    await fs.writeFile(path.join(tmpDir, "sub", "c.nef"), "raw");
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("isCatalogImage()", () => {
    it("matches extensions case-insensitively", () => {
      expect(isCatalogImage("/x/IMG.DNG")).toBe(true);
      expect(isCatalogImage("/x/photo.jpeg")).toBe(true);
      expect(isCatalogImage("/x/photo.heic")).toBe(false);
      expect(isCatalogImage("/x/photo.xmp")).toBe(false);
    });
  });

  describe("scanImageFiles()", () => {
    it("lists only top-level images when not recursive", async () => {
      const images = await scanImageFiles(tmpDir, { recursive: false });
      expect(images.map((image) => image.file_name)).toEqual(["a.JPG", "b.png"]);
    });

    it("descends into subdirectories when recursive", async () => {
      const images = await scanImageFiles(tmpDir, { recursive: true });
      expect(images.map((image) => path.relative(tmpDir, image.file_path))).toEqual([
        "a.JPG",
        "b.png",
        path.join("sub", "c.nef"),
      ]);
    });

    it("records identifier, extension, size and sidecar", async () => {
      const [a, b] = await scanImageFiles(tmpDir, { recursive: false });
      expect(a).toMatchObject({
        file_path: path.join(tmpDir, "a.JPG"),
        identifier: "a",
        extension: ".jpg",
        size: 10,
        sidecar_path: null,
      });
      expect(b?.sidecar_path).toBe(path.join(tmpDir, "b.xmp"));
    });

    it("includes hidden directories and files", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "photo-catalog-scan-hidden-test-"));
      try {
        await fs.mkdir(path.join(root, ".hidden"));
        await fs.writeFile(path.join(root, ".hidden", "d.jpg"), "jpeg");
        await fs.writeFile(path.join(root, ".e.png"), "png");
        const images = await scanImageFiles(root, { recursive: true });
        expect(images.map((image) => path.relative(root, image.file_path)).sort()).toEqual([
          ".e.png",
          path.join(".hidden", "d.jpg"),
        ]);
      } finally {
        await fs.rm(root, { recursive: true, force: true });
      }
    });

    it("keeps scanning when a sidecar candidate name is too long", async () => {
      const root = await fs.mkdtemp(path.join(os.tmpdir(), "photo-catalog-scan-long-test-"));
      try {
        const longName = `${"a".repeat(248)}.jpg`;
        await fs.writeFile(path.join(root, longName), "jpeg");
        await fs.writeFile(path.join(root, "ok.jpg"), "jpeg");
        const skipped: string[] = [];
        const warnings: Array<{ filePath: string; message: string }> = [];
        const images = await scanImageFiles(root, {
          recursive: true,
          onSkip: (filePath) => skipped.push(filePath),
          onWarning: (filePath, message) => warnings.push({ filePath, message }),
        });

        expect(images.map((image) => image.file_name).sort()).toEqual([longName, "ok.jpg"].sort());
        expect(images.every((image) => image.sidecar_path === null)).toBe(true);
        expect(skipped).toEqual([]);
        expect(warnings).toHaveLength(1);
        expect(warnings[0]?.filePath).toBe(path.join(root, longName));
        expect(warnings[0]?.message).toContain("ENAMETOOLONG");
      } finally {
        await fs.rm(root, { recursive: true, force: true });
      }
    });
  });

  describe("statImage()", () => {
    it("uses the sidecar mtime when it is newer", async () => {
      const image = path.join(tmpDir, "b.png");
      await fs.utimes(image, 1_600_000_000, 1_600_000_000);
      await fs.utimes(path.join(tmpDir, "b.xmp"), 1_650_000_000, 1_650_000_000);
      expect((await statImage(image)).last_modified).toBe(1_650_000_000_000);

      await fs.utimes(image, 1_700_000_000, 1_700_000_000);
      expect((await statImage(image)).last_modified).toBe(1_700_000_000_000);
    });
  });
});

describe("planReprocessing", () => {
  const image = (identifier: string, lastModified: number): ScannedImage => ({
    file_path: `/library/${identifier}.jpg`,
    file_name: `${identifier}.jpg`,
    identifier,
    extension: ".jpg",
    size: 1,
    sidecar_path: null,
    last_modified: lastModified,
  });
  const images = [image("same", 100), image("changed", 200), image("new", 300), image("nulled", 400)];
  const watermarks = new Map<string, number | null>([
    ["same", 100],
    ["changed", 150],
    ["nulled", null],
  ]);
  const keyOf = (img: ScannedImage) => img.identifier;

  it("selects new, changed and unstamped images", () => {
    const plan = planReprocessing(images, watermarks, { keyOf });
    expect(plan.to_process.map((img) => img.identifier)).toEqual(["changed", "new", "nulled"]);
    expect(plan.unchanged_count).toBe(1);
  });

  it("selects everything on refresh", () => {
    const plan = planReprocessing(images, watermarks, { keyOf, refresh: true });
    expect(plan.to_process).toHaveLength(4);
    expect(plan.unchanged_count).toBe(0);
  });

  it("always selects targets", () => {
    const plan = planReprocessing(images.slice(0, 2), watermarks, {
      keyOf,
      targets: new Set(["same"]),
    });
    expect(plan.to_process.map((img) => img.identifier)).toEqual(["same", "changed"]);
  });
});
