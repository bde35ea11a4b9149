import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { MetaValue } from "../meta-value.js";
import { list, node, text } from "../meta-value.js";

export type XmpTree = Map<string, MetaValue>;

export type XmpParseResult = { ok: true; tree: XmpTree } | { ok: false; error: string };

/** Key under which an element's own text is stored. */
export const TEXT_KEY = "_text";

/** Element as read from the document, before any merging or collapsing. */
export type XmlElement = {
  tag: string;
  attributes: Array<[string, string]>;
  text: string;
  children: XmlElement[];
};

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

/**
 * Remove namespace declarations and prefixes from tags and attributes.
 * `<rdf:Description exif:Model="X">` becomes `<Description Model="X">`.
 */
export function stripXmlNamespaces(xml: string): string {
  return xml
    .replace(/^\uFEFF/, "")
    .replace(/\sxmlns(?::[\w.-]+)?\s*=\s*(?:"[^"]*"|'[^']*')/g, "")
    .replace(/(<\/?)[\w.-]+:/g, "$1")
    .replace(/(\s)[\w.-]+:([\w.-]+\s*=\s*["'])/g, "$1$2");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function scalarText(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return "";
}

/** Convert fast-xml-parser's ordered output into plain elements. */
function readElements(ordered: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  const textParts: string[] = [];
  if (!Array.isArray(ordered)) {
    return { elements, text: "" };
  }
  for (const entry of ordered) {
    if (!isRecord(entry)) {
      continue;
    }
    const attrs = entry[":@"];
    for (const [key, value] of Object.entries(entry)) {
      if (key === ":@") {
        continue;
      }
      if (key === "#text") {
        textParts.push(scalarText(value));
        continue;
      }
      if (key.startsWith("?") || key === "#comment") {
        continue;
      }
      const inner = readElements(value);
      elements.push({
        tag: key,
        attributes: isRecord(attrs)
          ? Object.entries(attrs).map(([name, attr]): [string, string] => [name, scalarText(attr)])
          : [],
        text: inner.text,
        children: inner.elements,
      });
    }
  }
  return { elements, text: textParts.join("").trim() };
}

/**
 * Build the uncollapsed node for an element. Attributes and text become
 * entries; a child tag seen more than once is promoted to a list.
 */
export function buildXmpNode(element: XmlElement): MetaValue {
  const entries = new Map<string, MetaValue>();
  for (const [name, value] of element.attributes) {
    entries.set(name, text(value));
  }
  if (element.text) {
    entries.set(TEXT_KEY, text(element.text));
  }
  for (const child of element.children) {
    const built = buildXmpNode(child);
    const existing = entries.get(child.tag);
    if (!existing) {
      entries.set(child.tag, built);
    } else if (existing.kind === "list") {
      existing.items.push(built);
    } else {
      entries.set(child.tag, list([existing, built]));
    }
  }
  return node(entries);
}

/**
 * Bottom-up collapse pass over a built tree:
 * empty nodes and empty lists disappear, and a node holding only `_text`
 * becomes that text.
 */
export function collapseXmpValue(value: MetaValue): MetaValue | null {
  if (value.kind === "node") {
    const entries = new Map<string, MetaValue>();
    for (const [key, child] of value.entries) {
      const collapsed = collapseXmpValue(child);
      if (collapsed) {
        entries.set(key, collapsed);
      }
    }
    if (entries.size === 0) {
      return null;
    }
    const only = entries.get(TEXT_KEY);
    if (entries.size === 1 && only) {
      return only;
    }
    return node(entries);
  }
  if (value.kind === "list") {
    const items: MetaValue[] = [];
    for (const item of value.items) {
      const collapsed = collapseXmpValue(item);
      if (collapsed) {
        items.push(collapsed);
      }
    }
    return items.length > 0 ? list(items) : null;
  }
  return value;
}

/**
 * Parse an XMP packet or sidecar document into a prefix-free tree keyed by
 * the root element's tag. Malformed XML is reported, never thrown.
 */
export function parseXmpTree(xml: string): XmpParseResult {
  const cleaned = stripXmlNamespaces(xml).trim();
  if (!cleaned) {
    return { ok: false, error: "XML parse error: empty document" };
  }
  const validation = XMLValidator.validate(cleaned);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, error: `XML parse error: ${msg} (line ${line}, column ${col})` };
  }

  let ordered: unknown;
  try {
    ordered = parser.parse(cleaned);
  } catch (err) {
    return {
      ok: false,
      error: `XML parse error: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const { elements } = readElements(ordered);
  const root = elements[0];
  if (!root) {
    return { ok: false, error: "XML parse error: no root element" };
  }
  const tree: XmpTree = new Map();
  const collapsed = collapseXmpValue(buildXmpNode(root));
  if (collapsed) {
    tree.set(root.tag, collapsed);
  }
  return { ok: true, tree };
}
