// src/soap/envelope.ts
/**
 * Purpose:
 * - Render SOAP 1.1 / 1.2 envelopes from caller messages.
 *
 * Notes:
 * - Fragments are rendered with fast-xml-parser's XMLBuilder (which escapes
 *   text and attribute values) and assembled into the envelope as strings,
 *   so raw-XML header fragments pass through untouched.
 */

import { XMLBuilder } from "fast-xml-parser";
import type { KeyConversion } from "../contracts/clientOptions.contract";
import type { XmlMessage, XmlValue } from "../contracts/message.contract";
import { ATTR_PREFIX, isRecord } from "../util/xmlTree";

export const SOAP_ENV_NS: Record<1 | 2, string> = {
  1: "http://schemas.xmlsoap.org/soap/envelope/",
  2: "http://www.w3.org/2003/05/soap-envelope",
};

export const XSD_NS = "http://www.w3.org/2001/XMLSchema";
export const XSI_NS = "http://www.w3.org/2001/XMLSchema-instance";

const TEXT_KEY = "#text";

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  suppressBooleanAttributes: false,
});

export function convertKey(key: string, conversion: KeyConversion): string {
  switch (conversion) {
    case "none":
      return key;
    case "lowerCamelcase":
      return key
        .replace(/[_-]+([A-Za-z0-9])/g, (_m, c: string) => c.toUpperCase())
        .replace(/^[A-Z]/, (c) => c.toLowerCase());
    case "camelcase":
      return key
        .replace(/[_-]+([A-Za-z0-9])/g, (_m, c: string) => c.toUpperCase())
        .replace(/^[a-z]/, (c) => c.toUpperCase());
    case "snakecase":
      return key
        .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
        .replace(/-+/g, "_")
        .toLowerCase();
  }
}

type TreeValue = string | TreeNode | TreeValue[];
type TreeNode = { [key: string]: TreeValue };

type ShapeOptions = {
  conversion: KeyConversion;
  /** Prefix applied to element names, e.g. "tns" for qualified forms. */
  prefix?: string;
};

function shapeValue(value: XmlValue, opts: ShapeOptions): TreeValue {
  if (value === null) return { "@_xsi:nil": "true" };
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((v) => shapeValue(v, opts));
  if (isRecord(value)) return shapeMessage(value, opts);
  return String(value);
}

/** Apply key conversion and element qualification to a caller message. */
export function shapeMessage(message: XmlMessage, opts: ShapeOptions): TreeNode {
  const out: TreeNode = {};
  for (const [key, value] of Object.entries(message)) {
    if (key === TEXT_KEY || key.startsWith(ATTR_PREFIX)) {
      out[key] = value === null ? "" : String(value);
      continue;
    }
    const converted = convertKey(key, opts.conversion);
    const name =
      opts.prefix && !converted.includes(":")
        ? `${opts.prefix}:${converted}`
        : converted;
    out[name] = shapeValue(value, opts);
  }
  return out;
}

export function renderXml(tree: TreeNode | XmlMessage): string {
  const xml: string = builder.build(tree);
  return xml;
}

export type EnvelopeParts = {
  soapVersion: 1 | 2;
  envNamespace: string;
  namespaceIdentifier: string;
  namespace?: string;
  namespaces: Record<string, string>;
  /** Already-rendered header fragments, in order. */
  headerFragments: string[];
  messageTag: string;
  messageAttributes?: Record<string, string>;
  body: string;
};

export function buildEnvelope(parts: EnvelopeParts): string {
  const env = parts.envNamespace;
  const nsId = parts.namespaceIdentifier;

  const declarations: Record<string, string> = {
    "xmlns:xsd": XSD_NS,
    "xmlns:xsi": XSI_NS,
  };
  if (parts.namespace) declarations[`xmlns:${nsId}`] = parts.namespace;
  declarations[`xmlns:${env}`] = SOAP_ENV_NS[parts.soapVersion];
  for (const [name, uri] of Object.entries(parts.namespaces)) {
    declarations[name.startsWith("xmlns") ? name : `xmlns:${name}`] = uri;
  }

  const attrs = Object.entries(declarations)
    .map(([k, v]) => ` ${k}="${escapeAttr(v)}"`)
    .join("");

  const header = parts.headerFragments.join("");
  const headerXml = header ? `<${env}:Header>${header}</${env}:Header>` : "";

  const tag = parts.namespace ? `${nsId}:${parts.messageTag}` : parts.messageTag;
  const tagAttrs = Object.entries(parts.messageAttributes ?? {})
    .map(([k, v]) => ` ${k}="${escapeAttr(v)}"`)
    .join("");

  return (
    `<?xml version="1.0" encoding="UTF-8"?>` +
    `<${env}:Envelope${attrs}>` +
    headerXml +
    `<${env}:Body><${tag}${tagAttrs}>${parts.body}</${tag}></${env}:Body>` +
    `</${env}:Envelope>`
  );
}

function escapeAttr(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/"/g, "&quot;");
}
