import type { MetaValue } from "../meta-value.js";
import type { XmpTree } from "./xmp-tree.js";
import { valueToText } from "../tag-decode.js";
import { TEXT_KEY } from "./xmp-tree.js";

/** Flat projection of an XMP tree: `Model`, `Flash_Fired`, `subject`, ... */
export type FlatXmp = Map<string, string>;

/** RDF container elements whose `li` children hold the actual values. */
const RDF_CONTAINERS = new Set(["Bag", "Seq", "Alt"]);

/** Below this many keys the Description pass is considered a miss. */
export const MIN_DESCRIPTION_KEYS = 5;

function setFirst(flat: FlatXmp, key: string, value: string | null): void {
  if (!value || !value.trim()) {
    return;
  }
  if (!flat.get(key)) {
    flat.set(key, value);
  }
}

function pushDescriptions(target: Map<string, MetaValue>[], value: MetaValue | undefined): void {
  if (!value) {
    return;
  }
  if (value.kind === "node") {
    target.push(value.entries);
  } else if (value.kind === "list") {
    for (const item of value.items) {
      if (item.kind === "node") {
        target.push(item.entries);
      }
    }
  }
}

/**
 * Locate every rdf:Description, whether under `xmpmeta → RDF` or a bare
 * top-level `RDF`, and whether RDF itself repeats.
 */
export function findDescriptions(tree: XmpTree): Map<string, MetaValue>[] {
  const rdfSources: MetaValue[] = [];
  const meta = tree.get("xmpmeta");
  if (meta?.kind === "node") {
    const rdf = meta.entries.get("RDF");
    if (rdf) {
      rdfSources.push(rdf);
    }
  }
  const topRdf = tree.get("RDF");
  if (topRdf) {
    rdfSources.push(topRdf);
  }

  const descriptions: Map<string, MetaValue>[] = [];
  for (const rdf of rdfSources) {
    if (rdf.kind === "node") {
      pushDescriptions(descriptions, rdf.entries.get("Description"));
    } else if (rdf.kind === "list") {
      for (const item of rdf.items) {
        if (item.kind === "node") {
          pushDescriptions(descriptions, item.entries.get("Description"));
        }
      }
    }
  }
  return descriptions;
}

function containerText(value: MetaValue): string | null {
  if (value.kind === "node") {
    return valueToText(value.entries.get("li"));
  }
  return valueToText(value);
}

function flattenDescription(description: Map<string, MetaValue>, flat: FlatXmp): void {
  for (const [key, value] of description) {
    if (value.kind === "text" || value.kind === "number") {
      setFirst(flat, key, valueToText(value));
      continue;
    }
    if (value.kind !== "node") {
      continue;
    }
    const ownText = value.entries.get(TEXT_KEY);
    if (ownText) {
      setFirst(flat, key, valueToText(ownText));
    }
    for (const [subKey, subValue] of value.entries) {
      if (subKey === TEXT_KEY) {
        continue;
      }
      if (subValue.kind === "text" || subValue.kind === "number") {
        setFirst(flat, `${key}_${subKey}`, valueToText(subValue));
      } else if (subKey === "li") {
        setFirst(flat, key, valueToText(subValue));
      } else if (RDF_CONTAINERS.has(subKey)) {
        setFirst(flat, key, containerText(subValue));
      }
    }
  }
}

function flattenGeneric(entries: Map<string, MetaValue>, prefix: string, flat: FlatXmp): void {
  for (const [key, value] of entries) {
    if (value.kind === "node") {
      flattenGeneric(value.entries, `${prefix}${key}_`, flat);
      continue;
    }
    const rendered = valueToText(value);
    if (rendered !== null) {
      flat.set(`${prefix}${key}`, rendered);
    }
  }
}

/**
 * Flatten the Description entries of an XMP tree into one string map.
 * When that yields fewer than MIN_DESCRIPTION_KEYS keys, the whole tree is
 * flattened generically with `_`-joined key paths as well.
 */
export function flattenXmp(tree: XmpTree): FlatXmp {
  const flat: FlatXmp = new Map();
  for (const description of findDescriptions(tree)) {
    flattenDescription(description, flat);
  }
  if (flat.size < MIN_DESCRIPTION_KEYS) {
    flattenGeneric(tree, "", flat);
  }
  return flat;
}

/** Overlay sidecar values on the embedded ones; empty sidecar values do not erase. */
export function mergeXmpSources(embedded: FlatXmp, sidecar: FlatXmp): FlatXmp {
  const merged: FlatXmp = new Map(embedded);
  for (const [key, value] of sidecar) {
    if (value.trim()) {
      merged.set(key, value);
    }
  }
  return merged;
}
