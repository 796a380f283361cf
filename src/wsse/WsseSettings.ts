// src/wsse/WsseSettings.ts
/**
 * Purpose:
 * - WS-Security state for a client or a prepared request: UsernameToken
 *   credentials, timestamp, and whether responses must be signature-checked.
 * - Renders the <wsse:Security> header tree.
 *
 * Notes:
 * - PasswordDigest = Base64(SHA-1(nonce + created + password)), with the
 *   raw nonce bytes; the Nonce element carries Base64(nonce).
 * - Timestamp expiry is fixed at five minutes after creation.
 */

import { createHash, randomBytes } from "node:crypto";
import type { FrozenClientOptions } from "../contracts/clientOptions.contract";
import type { XmlMessage } from "../contracts/message.contract";

export const WSSE_NS =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-secext-1.0.xsd";
export const WSU_NS =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-wssecurity-utility-1.0.xsd";

const PASSWORD_TEXT =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordText";
const PASSWORD_DIGEST =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordDigest";
const BASE64_ENCODING =
  "http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-soap-message-security-1.0#Base64Binary";

const TIMESTAMP_TTL_MS = 5 * 60 * 1000;

export type WsseCredentials = {
  username: string;
  password: string;
  digest: boolean;
};

export function passwordDigest(
  nonce: Buffer,
  created: string,
  password: string
): string {
  return createHash("sha1")
    .update(Buffer.concat([nonce, Buffer.from(created, "utf8"), Buffer.from(password, "utf8")]))
    .digest("base64");
}

export class WsseSettings {
  public credentials?: WsseCredentials;
  public timestamp: boolean;
  public verifyResponse: boolean;

  public constructor(init: {
    credentials?: WsseCredentials;
    timestamp?: boolean;
    verifyResponse?: boolean;
  } = {}) {
    this.credentials = init.credentials ? { ...init.credentials } : undefined;
    this.timestamp = init.timestamp ?? false;
    this.verifyResponse = init.verifyResponse ?? false;
  }

  public static fromOptions(options: FrozenClientOptions): WsseSettings {
    return new WsseSettings({
      credentials: options.wsseAuth,
      timestamp: options.wsseTimestamp,
      verifyResponse: options.verifyResponse,
    });
  }

  public clone(): WsseSettings {
    return new WsseSettings({
      credentials: this.credentials,
      timestamp: this.timestamp,
      verifyResponse: this.verifyResponse,
    });
  }

  public hasHeader(): boolean {
    return this.credentials !== undefined || this.timestamp;
  }

  /**
   * Header tree for XMLBuilder, or undefined when nothing is configured.
   * `now` and `nonce` exist for deterministic output in tests.
   */
  public toHeader(
    now: Date = new Date(),
    nonce: Buffer = randomBytes(16)
  ): XmlMessage | undefined {
    if (!this.hasHeader()) return undefined;

    const created = now.toISOString();
    const security: XmlMessage = {
      "@_xmlns:wsse": WSSE_NS,
      "@_xmlns:wsu": WSU_NS,
    };

    if (this.timestamp) {
      security["wsu:Timestamp"] = {
        "@_wsu:Id": "Timestamp-1",
        "wsu:Created": created,
        "wsu:Expires": new Date(now.getTime() + TIMESTAMP_TTL_MS).toISOString(),
      };
    }

    if (this.credentials) {
      const { username, password, digest } = this.credentials;
      security["wsse:UsernameToken"] = digest
        ? {
            "@_wsu:Id": "UsernameToken-1",
            "wsse:Username": username,
            "wsse:Password": {
              "@_Type": PASSWORD_DIGEST,
              "#text": passwordDigest(nonce, created, password),
            },
            "wsse:Nonce": {
              "@_EncodingType": BASE64_ENCODING,
              "#text": nonce.toString("base64"),
            },
            "wsu:Created": created,
          }
        : {
            "@_wsu:Id": "UsernameToken-1",
            "wsse:Username": username,
            "wsse:Password": { "@_Type": PASSWORD_TEXT, "#text": password },
          };
    }

    return { "wsse:Security": security };
  }
}
