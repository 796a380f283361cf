// src/wsse/SignatureVerifier.ts
/**
 * Purpose:
 * - Check the XML digital signature carried in a SOAP response.
 *
 * Behavior:
 * - Key material: `publicCert` when configured, otherwise the X.509
 *   certificate in the response's wsse:BinarySecurityToken.
 * - Outcome is a value; SoapClient decides that a failed outcome is fatal.
 */

import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { SignedXml } from "xml-crypto";
import { WSSE_NS } from "./WsseSettings";

export const DSIG_NS = "http://www.w3.org/2000/09/xmldsig#";

export type SignatureVerification =
  | { ok: true }
  | { ok: false; reason: string };

export type ISignatureVerifier = {
  verify: (xml: string) => SignatureVerification;
};

function toPem(base64Der: string): string {
  const body = base64Der.replace(/\s+/g, "");
  const lines = body.match(/.{1,64}/g) ?? [];
  return `-----BEGIN CERTIFICATE-----\n${lines.join("\n")}\n-----END CERTIFICATE-----\n`;
}

export class XmlDsigSignatureVerifier implements ISignatureVerifier {
  private readonly publicCert?: string;

  public constructor(opts: { publicCert?: string } = {}) {
    this.publicCert = opts.publicCert;
  }

  public verify(xml: string): SignatureVerification {
    const doc = new DOMParser().parseFromString(xml, "text/xml");

    const signatureNode = doc.getElementsByTagNameNS(DSIG_NS, "Signature").item(0);
    if (!signatureNode) {
      return { ok: false, reason: "response carries no ds:Signature element" };
    }

    const key = this.publicCert ?? this.certificateFromSecurityToken(doc);
    if (!key) {
      return {
        ok: false,
        reason: "no verification key: configure verificationCert or include a wsse:BinarySecurityToken",
      };
    }

    const signed = new SignedXml({ publicCert: key });
    try {
      signed.loadSignature(new XMLSerializer().serializeToString(signatureNode));
      return signed.checkSignature(xml)
        ? { ok: true }
        : { ok: false, reason: "signature references do not match the signed content" };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }

  private certificateFromSecurityToken(doc: Document): string | undefined {
    const token = doc.getElementsByTagNameNS(WSSE_NS, "BinarySecurityToken").item(0);
    const text = token?.textContent?.trim();
    return text ? toPem(text) : undefined;
  }
}
