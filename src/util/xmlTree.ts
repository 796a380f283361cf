// src/util/xmlTree.ts
/**
 * Narrowing helpers for the loosely-typed trees fast-xml-parser returns.
 */

export type XmlNode = Record<string, unknown>;

export const ATTR_PREFIX = "@_";

export function isRecord(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Child elements under `key` that are element nodes (text-only children are skipped). */
export function children(node: XmlNode, key: string): XmlNode[] {
  return asArray(node[key]).filter(isRecord);
}

export function firstChild(node: XmlNode, key: string): XmlNode | undefined {
  return children(node, key)[0];
}

export function attr(node: XmlNode, name: string): string | undefined {
  const v = node[`${ATTR_PREFIX}${name}`];
  return typeof v === "string" ? v : undefined;
}

/** "tns:Ping" → "Ping" */
export function localName(qname: string): string {
  const i = qname.indexOf(":");
  return i >= 0 ? qname.slice(i + 1) : qname;
}

/**
 * Look up a child by local name, whether or not prefixes were stripped
 * when the document was parsed.
 */
export function childByLocalName(
  node: XmlNode,
  name: string
): unknown {
  if (name in node) return node[name];
  for (const [key, value] of Object.entries(node)) {
    if (!key.startsWith(ATTR_PREFIX) && localName(key) === name) return value;
  }
  return undefined;
}

/** Text content of a parsed element that may carry attributes. */
export function textOf(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean")
    return String(value);
  if (isRecord(value)) return textOf(value["#text"]);
  if (Array.isArray(value)) return textOf(value[0]);
  return undefined;
}
