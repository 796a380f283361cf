// src/http/HttpSettings.ts
/**
 * Purpose:
 * - Mutable HTTP state for one client (ambient session) or one prepared
 *   request (url, headers, body about to be sent).
 *
 * Invariants:
 * - clone() is structural: headers, basic auth and the cookie jar are
 *   copied, so mutating a clone never reaches the original and vice versa.
 * - The Cookie header is rendered from the jar by toTransportRequest(), so
 *   jar edits made after a request is built still reach the wire. A
 *   non-empty jar replaces any Cookie header set by hand.
 */

import type { FrozenClientOptions } from "../contracts/clientOptions.contract";
import { CookieJar } from "./CookieJar";
import type { RawResponse, TransportRequest } from "./SoapTransport.types";

export class HttpSettings {
  public url?: string;
  public headers: Record<string, string>;
  public body?: string;
  public timeoutMs?: number;
  public proxy?: string;
  public basicAuth?: [string, string];
  public readonly cookies: CookieJar;

  public constructor(init: {
    url?: string;
    headers?: Record<string, string>;
    body?: string;
    timeoutMs?: number;
    proxy?: string;
    basicAuth?: readonly [string, string];
    cookies?: CookieJar;
  } = {}) {
    this.url = init.url;
    this.headers = { ...(init.headers ?? {}) };
    this.body = init.body;
    this.timeoutMs = init.timeoutMs;
    this.proxy = init.proxy;
    this.basicAuth = init.basicAuth
      ? [init.basicAuth[0], init.basicAuth[1]]
      : undefined;
    this.cookies = init.cookies ?? new CookieJar();
  }

  public static fromOptions(options: FrozenClientOptions): HttpSettings {
    return new HttpSettings({
      headers: options.headers,
      timeoutMs: options.timeoutMs,
      proxy: options.proxy,
      basicAuth: options.basicAuth,
    });
  }

  public clone(): HttpSettings {
    return new HttpSettings({
      url: this.url,
      headers: this.headers,
      body: this.body,
      timeoutMs: this.timeoutMs,
      proxy: this.proxy,
      basicAuth: this.basicAuth,
      cookies: this.cookies.clone(),
    });
  }

  /** Keep cookies the service handed back for the next request. */
  public setCookies(response: RawResponse): void {
    this.cookies.absorb(response.setCookies);
  }

  public toTransportRequest(): TransportRequest {
    if (!this.url) {
      throw new Error(
        "HttpSettings.toTransportRequest: url is not set. Ops: assign http.url before sending."
      );
    }
    const headers = { ...this.headers };
    const cookie = this.cookies.toHeader();
    if (cookie) headers["Cookie"] = cookie;

    return {
      url: this.url,
      method: "POST",
      headers,
      body: this.body,
      timeoutMs: this.timeoutMs,
      proxy: this.proxy,
      basicAuth: this.basicAuth,
    };
  }
}
