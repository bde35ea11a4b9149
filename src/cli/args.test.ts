import { describe, expect, it } from "vitest";
import { parseCatalogArgs } from "./args.js";

const argv = (...args: string[]) => ["node", "photo-catalog", ...args];

describe("parseCatalogArgs", () => {
  it("returns help without arguments or with --help", () => {
    expect(parseCatalogArgs(argv())).toEqual({ ok: true, command: { kind: "help" } });
    expect(parseCatalogArgs(argv("scan", "--help"))).toEqual({ ok: true, command: { kind: "help" } });
  });

  it("parses a scan with repeated files", () => {
    expect(parseCatalogArgs(argv("scan", "/photos", "-r", "--file", "a.jpg", "-f", "b.nef", "--batch-size", "100"))).toEqual({
      ok: true,
      command: {
        kind: "scan",
        root: "/photos",
        refresh: true,
        files: ["a.jpg", "b.nef"],
        batchSize: 100,
      },
    });
  });

  it("parses a gallery run", () => {
    expect(parseCatalogArgs(argv("gallery", "/done", "--urls", "/done/urls.json"))).toEqual({
      ok: true,
      command: {
        kind: "gallery",
        doneDir: "/done",
        urlMapPath: "/done/urls.json",
        refresh: false,
        files: [],
        batchSize: null,
      },
    });
  });

  it("parses a cleanup run", () => {
    expect(parseCatalogArgs(argv("cleanup", "/done"))).toEqual({
      ok: true,
      command: { kind: "cleanup", doneDir: "/done", urlMapPath: null },
    });
    expect(parseCatalogArgs(argv("cleanup", "/done", "--urls", "m.json"))).toEqual({
      ok: true,
      command: { kind: "cleanup", doneDir: "/done", urlMapPath: "m.json" },
    });
  });

  it("reports usage errors", () => {
    expect(parseCatalogArgs(argv("sync", "/photos"))).toEqual({ ok: false, error: 'unknown command "sync"' });
    expect(parseCatalogArgs(argv("scan"))).toEqual({ ok: false, error: "scan requires a directory" });
    expect(parseCatalogArgs(argv("scan", "/a", "/b"))).toEqual({ ok: false, error: "unexpected argument /b" });
    expect(parseCatalogArgs(argv("scan", "/a", "--verbose"))).toEqual({
      ok: false,
      error: "unknown option --verbose",
    });
    expect(parseCatalogArgs(argv("scan", "/a", "--file"))).toEqual({
      ok: false,
      error: "--file requires a value",
    });
    expect(parseCatalogArgs(argv("scan", "/a", "--batch-size", "0"))).toEqual({
      ok: false,
      error: '--batch-size must be a positive integer, got "0"',
    });
    expect(parseCatalogArgs(argv("scan", "/a", "--urls", "u.json"))).toEqual({
      ok: false,
      error: "--urls is only valid for gallery and cleanup",
    });
    expect(parseCatalogArgs(argv("cleanup", "/done", "--refresh"))).toEqual({
      ok: false,
      error: "cleanup only takes a directory and --urls",
    });
  });
});
