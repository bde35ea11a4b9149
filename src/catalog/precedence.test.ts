import { describe, expect, it } from "vitest";
import { PRECEDENCE_FIELDS, parseSourceRef, resolvePrecedence } from "./precedence.js";

describe("parseSourceRef", () => {
  it("splits source and tag", () => {
    expect(parseSourceRef("exif:Model")).toEqual({ source: "exif", key: "Model" });
    expect(parseSourceRef(" XMP : Rating ")).toEqual({ source: "xmp", key: "Rating" });
  });

  it("rejects unknown sources and missing parts", () => {
    expect(parseSourceRef("raw:Model")).toBeNull();
    expect(parseSourceRef("Model")).toBeNull();
    expect(parseSourceRef(":Model")).toBeNull();
    expect(parseSourceRef("exif:")).toBeNull();
  });
});

describe("resolvePrecedence", () => {
  it("builds the default table for every field", () => {
    const result = resolvePrecedence();
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect([...result.table.keys()]).toEqual([...PRECEDENCE_FIELDS]);
    expect(result.table.get("width")?.[0]).toEqual({ source: "file", key: "Width" });
    expect(result.table.get("rating")?.[0]).toEqual({ source: "xmp", key: "Rating" });
  });

  it("replaces whole chains per field", () => {
    const result = resolvePrecedence({ rating: ["exif:Rating"] });
    if (!result.ok) {
      throw new Error(result.error);
    }
    expect(result.table.get("rating")).toEqual([{ source: "exif", key: "Rating" }]);
    expect(result.table.get("camera_model")?.length).toBe(3);
  });

  it("rejects unknown fields", () => {
    expect(resolvePrecedence({ colour: ["exif:ColorSpace"] })).toEqual({
      ok: false,
      error: 'unknown precedence field "colour"',
    });
  });

  it("rejects malformed references", () => {
    expect(resolvePrecedence({ camera_model: ["Model"] })).toEqual({
      ok: false,
      error: 'invalid source "Model" for camera_model (expected <exif|gps|iptc|xmp|file>:<tag>)',
    });
  });
});
