import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  extractEmbeddedXmp,
  findSidecarPath,
  loadXmpSources,
  readXmpSidecar,
  sidecarCandidates,
} from "./xmp-sidecar.js";

const packet = (attrs: string) =>
  `<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF><rdf:Description ${attrs}/></rdf:RDF></x:xmpmeta>`;

const FULL_ATTRS =
  'xmp:Rating="2" photoshop:City="Harbor" tiff:Model="Cam" exif:FNumber="4" aux:Lens="Zoom"';

describe("xmp-sidecar", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "photo-catalog-xmp-test-"));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe("sidecarCandidates()", () => {
    it("lists the stem form before the full-name form", () => {
      expect(sidecarCandidates("/photos/IMG_0001.NEF")).toEqual([
        "/photos/IMG_0001.xmp",
        "/photos/IMG_0001.NEF.xmp",
      ]);
    });

    it("handles files without an extension", () => {
      expect(sidecarCandidates("/photos/scan")).toEqual(["/photos/scan.xmp", "/photos/scan.xmp"]);
    });
  });

  describe("findSidecarPath()", () => {
    it("returns null when there is no sidecar", async () => {
      await fs.writeFile(path.join(tmpDir, "lonely.jpg"), "x");
      expect(await findSidecarPath(path.join(tmpDir, "lonely.jpg"))).toBeNull();
    });

    it("treats an unreadable candidate as no sidecar and reports it", async () => {
      const media = path.join(tmpDir, "loop.jpg");
      await fs.writeFile(media, "x");
      await fs.symlink("loop.xmp", path.join(tmpDir, "loop.xmp"));
      const warnings: string[] = [];
      expect(await findSidecarPath(media, (warning) => warnings.push(warning))).toBeNull();
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toMatch(/^sidecar loop\.xmp ignored: ELOOP/);
    });

    it("prefers the stem sidecar", async () => {
      const media = path.join(tmpDir, "both.dng");
      await fs.writeFile(media, "x");
      await fs.writeFile(path.join(tmpDir, "both.xmp"), packet(""));
      await fs.writeFile(path.join(tmpDir, "both.dng.xmp"), packet(""));
      expect(await findSidecarPath(media)).toBe(path.join(tmpDir, "both.xmp"));
    });

    it("falls back to the full-name sidecar", async () => {
      const media = path.join(tmpDir, "dark.nef");
      await fs.writeFile(media, "x");
      await fs.writeFile(path.join(tmpDir, "dark.nef.xmp"), packet(""));
      expect(await findSidecarPath(media)).toBe(path.join(tmpDir, "dark.nef.xmp"));
    });
  });

  describe("extractEmbeddedXmp()", () => {
    it("finds a packet between binary data", () => {
      const xml = packet('tiff:Model="Cam"');
      const buffer = Buffer.concat([
        Buffer.from([0xff, 0xd8, 0xff, 0xe1]),
        Buffer.from(`http://ns.adobe.com/xap/1.0/\0${xml}`),
        Buffer.from([0xff, 0xd9]),
      ]);
      expect(extractEmbeddedXmp(buffer)).toBe(xml);
    });

    it("returns null without a packet or with an unterminated one", () => {
      expect(extractEmbeddedXmp(Buffer.from("no metadata here"))).toBeNull();
      expect(extractEmbeddedXmp(Buffer.from("<x:xmpmeta><rdf:RDF>"))).toBeNull();
    });
  });

  describe("readXmpSidecar()", () => {
    it("reports a missing file as an error result", async () => {
      const result = await readXmpSidecar(path.join(tmpDir, "missing.xmp"));
      expect(result.ok).toBe(false);
    });
  });

  describe("loadXmpSources()", () => {
    it("overlays the sidecar on the embedded packet", async () => {
      const sidecar = path.join(tmpDir, "overlay.xmp");
      await fs.writeFile(sidecar, packet('xmp:Rating="5" xmp:Label="Red"'));
      const buffer = Buffer.from(`junk${packet(FULL_ATTRS)}junk`);

      const { flat, warnings } = await loadXmpSources(buffer, sidecar);
      expect(warnings).toEqual([]);
      expect(flat.get("Rating")).toBe("5");
      expect(flat.get("City")).toBe("Harbor");
      expect(flat.get("Label")).toBe("Red");
    });

    it("keeps the embedded values and warns when the sidecar is malformed", async () => {
      const sidecar = path.join(tmpDir, "broken.xmp");
      await fs.writeFile(sidecar, "<x:xmpmeta><rdf:RDF>");
      const buffer = Buffer.from(packet(FULL_ATTRS));

      const { flat, warnings } = await loadXmpSources(buffer, sidecar);
      expect(flat.get("Rating")).toBe("2");
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.startsWith("sidecar broken.xmp: XML parse error")).toBe(true);
    });

    it("returns an empty view for an image without XMP", async () => {
      const { flat, warnings } = await loadXmpSources(Buffer.from("plain"), null);
      expect(flat.size).toBe(0);
      expect(warnings).toEqual([]);
    });
  });
});
