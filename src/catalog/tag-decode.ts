import type { MetaValue, RawTagSet } from "./meta-value.js";
import { fromUnknown, metaToText, text } from "./meta-value.js";
import { getTagTables } from "./tag-tables.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

export function exifTagName(id: number): string {
  return getTagTables().exif.get(id) ?? String(id);
}

export function gpsTagName(id: number): string {
  return getTagTables().gps.get(id) ?? String(id);
}

export function iptcTagName(record: number, dataset: number): string {
  return getTagTables().iptc.get(`${record}:${dataset}`) ?? `IPTC_${record}_${dataset}`;
}

/**
 * Decode a byte string as UTF-8, falling back to Latin-1 when the bytes are not
 * valid UTF-8. Trailing NUL padding is removed.
 */
export function decodeBytes(bytes: Uint8Array): string {
  let decoded: string;
  try {
    decoded = utf8.decode(bytes);
  } catch {
    decoded = Buffer.from(bytes).toString("latin1");
  }
  return decoded.replace(/\0+$/, "");
}

/** Display text of any value, decoding byte strings on the way. */
export function valueToText(value: MetaValue | null | undefined): string | null {
  return metaToText(value, decodeBytes);
}

/** Convert one raw tag value, turning byte strings into text. */
export function decodeTagValue(raw: unknown): MetaValue | null {
  const value = fromUnknown(raw);
  if (!value) {
    return null;
  }
  return decodeBytesDeep(value);
}

function decodeBytesDeep(value: MetaValue): MetaValue {
  switch (value.kind) {
    case "bytes":
      return text(decodeBytes(value.value));
    case "list":
      return { kind: "list", items: value.items.map(decodeBytesDeep) };
    case "node": {
      const entries = new Map<string, MetaValue>();
      for (const [key, item] of value.entries) {
        entries.set(key, decodeBytesDeep(item));
      }
      return { kind: "node", entries };
    }
    default:
      return value;
  }
}

/**
 * IPTC datasets may repeat (keywords, supplemental categories). Several
 * values are joined into one comma-separated string; a single one is unwrapped.
 */
export function decodeIptcValue(raw: unknown): MetaValue | null {
  const value = decodeTagValue(raw);
  if (!value || value.kind !== "list") {
    return value;
  }
  const parts = value.items
    .map((item) => valueToText(item))
    .filter((part): part is string => part !== null);
  if (parts.length === 0) {
    return text("");
  }
  return text(parts.length === 1 ? parts[0] : parts.join(", "));
}

function parseTagId(key: string): number | null {
  if (!/^\d+$/.test(key)) {
    return null;
  }
  return Number.parseInt(key, 10);
}

/**
 * Decode a block of tags keyed by numeric id (as exifr emits it with
 * `translateKeys: false`). Keys that are already names pass through.
 */
export function decodeTagBlock(
  block: Record<string, unknown>,
  nameOf: (id: number) => string = exifTagName,
): RawTagSet {
  const tags: RawTagSet = new Map();
  for (const [key, raw] of Object.entries(block)) {
    const id = parseTagId(key);
    const name = id === null ? key : nameOf(id);
    const value = decodeTagValue(raw);
    if (value) {
      tags.set(name, value);
    }
  }
  return tags;
}

/** Decode an IPTC application record (record 2) keyed by dataset number. */
export function decodeIptcBlock(block: Record<string, unknown>, record = 2): RawTagSet {
  const tags: RawTagSet = new Map();
  for (const [key, raw] of Object.entries(block)) {
    const id = parseTagId(key);
    const name = id === null ? key : iptcTagName(record, id);
    const value = decodeIptcValue(raw);
    if (value) {
      tags.set(name, value);
    }
  }
  return tags;
}
