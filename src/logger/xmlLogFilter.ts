// src/logger/xmlLogFilter.ts
/**
 * Purpose:
 * - Mask configured XML element text and trim payloads before they reach
 *   log meta.
 *
 * Notes:
 * - Elements match by local name, so a prefixed element is masked too.
 * - Only text-only elements are masked; an element holding child elements
 *   is left as is.
 */

export const FILTERED = "***FILTERED***";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Mask the text content of the named elements (matched by local name, with
 * or without a prefix) before XML reaches a log sink.
 */
export function filterXmlForLog(
  xml: string | undefined,
  filters: readonly string[]
): string | undefined {
  if (!xml || filters.length === 0) return xml;

  let out = xml;
  for (const name of filters) {
    const tag = `(?:[A-Za-z_][\\w.-]*:)?${escapeRegExp(name)}`;
    const re = new RegExp(`<(${tag})(\\s[^>]*)?>[^<]*</\\1>`, "g");
    out = out.replace(re, (_m, qname: string, attrs: string | undefined) => {
      return `<${qname}${attrs ?? ""}>${FILTERED}</${qname}>`;
    });
  }
  return out;
}

/** Trim long payloads for debug logs. */
export function snippet(text: string | undefined, max = 512): string {
  if (!text) return "<empty>";
  return text.length > max ? `${text.slice(0, max)}…` : text;
}
