/**
 * Closed representation of a raw metadata value, whatever source it came from.
 * Library output (exifr blocks, parsed XML) is converted with `fromUnknown` at
 * the edge; everything downstream switches on `kind`.
 */
export type MetaValue =
  | { kind: "text"; value: string }
  | { kind: "number"; value: number }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "list"; items: MetaValue[] }
  | { kind: "node"; entries: Map<string, MetaValue> };

/** Tag name → value, for one metadata source of one image. */
export type RawTagSet = Map<string, MetaValue>;

export const text = (value: string): MetaValue => ({ kind: "text", value });
export const num = (value: number): MetaValue => ({ kind: "number", value });
export const list = (items: MetaValue[]): MetaValue => ({ kind: "list", items });
export const node = (entries: Map<string, MetaValue>): MetaValue => ({ kind: "node", entries });

/**
 * Convert an arbitrary JS value into a MetaValue.
 * Returns null for values that carry no data (null, undefined, NaN, functions).
 */
export function fromUnknown(value: unknown): MetaValue | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return text(value);
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? num(value) : null;
  }
  if (typeof value === "bigint") {
    return num(Number(value));
  }
  if (typeof value === "boolean") {
    return text(value ? "True" : "False");
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", value };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : text(value.toISOString());
  }
  if (Array.isArray(value)) {
    const items: MetaValue[] = [];
    for (const item of value) {
      const converted = fromUnknown(item);
      if (converted) {
        items.push(converted);
      }
    }
    return list(items);
  }
  if (ArrayBuffer.isView(value)) {
    // Typed arrays other than Uint8Array (e.g. Uint16Array for XP* tags).
    return list(Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength), num));
  }
  if (typeof value === "object") {
    const entries = new Map<string, MetaValue>();
    for (const [key, item] of Object.entries(value)) {
      const converted = fromUnknown(item);
      if (converted) {
        entries.set(key, converted);
      }
    }
    return node(entries);
  }
  return null;
}

/** Whether a value counts as present for precedence purposes. */
export function isPresent(value: MetaValue | null | undefined): value is MetaValue {
  if (!value) {
    return false;
  }
  switch (value.kind) {
    case "text":
      return value.value.trim().length > 0;
    case "number":
      return Number.isFinite(value.value);
    case "bytes":
      return value.value.length > 0;
    case "list":
      return value.items.some((item) => isPresent(item));
    case "node":
      return value.entries.size > 0;
  }
}

/**
 * Render a value as display text. Lists are joined with ", "; nodes have no
 * scalar rendering unless they carry `_text`.
 */
export function metaToText(
  value: MetaValue | null | undefined,
  decode: (bytes: Uint8Array) => string,
): string | null {
  if (!value) {
    return null;
  }
  switch (value.kind) {
    case "text":
      return value.value;
    case "number":
      return String(value.value);
    case "bytes":
      return decode(value.value);
    case "list": {
      const parts = value.items
        .map((item) => metaToText(item, decode))
        .filter((part): part is string => part !== null && part.trim().length > 0);
      return parts.length > 0 ? parts.join(", ") : null;
    }
    case "node": {
      const inner = value.entries.get("_text");
      return inner ? metaToText(inner, decode) : null;
    }
  }
}

/** Numeric view of a value: numbers, numeric text and `num/den` text. */
export function metaToNumber(value: MetaValue | null | undefined): number | null {
  if (!value) {
    return null;
  }
  switch (value.kind) {
    case "number":
      return Number.isFinite(value.value) ? value.value : null;
    case "text":
      return parseNumericText(value.value);
    case "list":
      return value.items.length === 1 ? metaToNumber(value.items[0]) : null;
    case "node":
      return metaToNumber(value.entries.get("_text"));
    case "bytes":
      return null;
  }
}

export function parseNumericText(raw: string): number | null {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }
  const slash = trimmed.indexOf("/");
  if (slash > 0) {
    const numerator = Number(trimmed.slice(0, slash));
    const denominator = Number(trimmed.slice(slash + 1));
    if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
      return null;
    }
    return numerator / denominator;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}
