// src/soap/SoapResponse.ts
/**
 * Purpose:
 * - Wrap a RawResponse with SOAP-aware accessors (body, header, fault).
 *
 * Behavior:
 * - With `raiseErrors` (default), construction throws SoapFaultError for a
 *   SOAP fault and HttpError for any other non-2xx status.
 * - Parsing is lazy and cached; tag values stay strings.
 * - Works for SOAP 1.1 (faultcode/faultstring) and 1.2 (Code/Reason) faults.
 */

import { XMLParser } from "fast-xml-parser";
import { CookieJar } from "../http/CookieJar";
import type { RawResponse } from "../http/SoapTransport.types";
import { HttpError, SoapFaultError } from "../problem/SoapClientError";
import {
  childByLocalName,
  isRecord,
  textOf,
  type XmlNode,
} from "../util/xmlTree";

export type SoapFault = {
  code: string;
  reason: string;
  detail?: unknown;
};

export type SoapResponseOptions = {
  raiseErrors: boolean;
  stripNamespaces: boolean;
};

export class SoapResponse {
  public readonly http: RawResponse;
  private readonly parser: XMLParser;
  private parsed?: XmlNode;

  public constructor(http: RawResponse, opts: SoapResponseOptions) {
    this.http = http;
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: "@_",
      removeNSPrefix: opts.stripNamespaces,
      ignoreDeclaration: true,
      parseTagValue: false,
    });

    if (opts.raiseErrors) {
      const fault = this.fault();
      if (fault) throw new SoapFaultError(fault, http.status);
      if (this.httpError()) throw new HttpError(http.status, http.body);
    }
  }

  public get xml(): string {
    return this.http.body;
  }

  public success(): boolean {
    return !this.soapFault() && !this.httpError();
  }

  public httpError(): boolean {
    return this.http.status < 200 || this.http.status >= 300;
  }

  public soapFault(): boolean {
    return this.fault() !== undefined;
  }

  public fault(): SoapFault | undefined {
    const raw = childByLocalName(this.body(), "Fault");
    if (raw === undefined) return undefined;
    const fault = isRecord(raw) ? raw : {};

    const code11 = textOf(childByLocalName(fault, "faultcode"));
    if (code11 !== undefined) {
      return {
        code: code11,
        reason: textOf(childByLocalName(fault, "faultstring")) ?? "",
        detail: childByLocalName(fault, "detail"),
      };
    }

    const code = childByLocalName(fault, "Code");
    const reason = childByLocalName(fault, "Reason");
    return {
      code: (isRecord(code) && textOf(childByLocalName(code, "Value"))) || "",
      reason: (isRecord(reason) && textOf(childByLocalName(reason, "Text"))) || "",
      detail: childByLocalName(fault, "Detail"),
    };
  }

  /** Whole parsed document. */
  public hash(): XmlNode {
    if (!this.parsed) {
      const tree: unknown = this.http.body.trim()
        ? this.parser.parse(this.http.body)
        : {};
      this.parsed = isRecord(tree) ? tree : {};
    }
    return this.parsed;
  }

  public header(): XmlNode {
    return this.envelopeChild("Header");
  }

  public body(): XmlNode {
    return this.envelopeChild("Body");
  }

  /** Cookies set by this response (name → value). */
  public cookies(): Record<string, string> {
    const jar = new CookieJar();
    jar.absorb(this.http.setCookies);
    return Object.fromEntries(jar.entries());
  }

  private envelopeChild(name: "Header" | "Body"): XmlNode {
    const envelope = childByLocalName(this.hash(), "Envelope");
    if (!isRecord(envelope)) return {};
    const child = childByLocalName(envelope, name);
    return isRecord(child) ? child : {};
  }
}
