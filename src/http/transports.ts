// src/http/transports.ts
/**
 * Purpose:
 * - Concrete ISoapTransport implementations selected by the `adapter` option.
 *   - "axios" (default): timeout, proxy, basic auth.
 *   - "fetch": global WHATWG fetch with AbortController timeout.
 * - Callers may inject their own ISoapTransport instead of a name.
 *
 * Notes:
 * - Bodies are always read as text; XML parsing happens in SoapResponse.
 * - validateStatus accepts everything; status handling is not a transport
 *   concern.
 */

import axios, { type AxiosProxyConfig } from "axios";
import type {
  ISoapTransport,
  RawResponse,
  TransportAdapter,
  TransportRequest,
} from "./SoapTransport.types";

function toProxyConfig(proxy: string): AxiosProxyConfig {
  const u = new URL(proxy);
  const protocol = u.protocol.replace(/:$/, "");
  const port = u.port
    ? Number(u.port)
    : protocol === "https"
    ? 443
    : 80;
  return {
    protocol,
    host: u.hostname,
    port,
    auth: u.username
      ? {
          username: decodeURIComponent(u.username),
          password: decodeURIComponent(u.password),
        }
      : undefined,
  };
}

function normalizeHeaders(entries: Array<[string, unknown]>): {
  headers: Record<string, string>;
  setCookies: string[];
} {
  const headers: Record<string, string> = {};
  const setCookies: string[] = [];

  for (const [rawKey, value] of entries) {
    const key = rawKey.toLowerCase();
    if (value === undefined || value === null) continue;

    if (key === "set-cookie") {
      for (const v of Array.isArray(value) ? value : [value]) {
        setCookies.push(String(v));
      }
      continue;
    }

    headers[key] = Array.isArray(value)
      ? value.map((v) => String(v)).join(", ")
      : String(value);
  }

  return { headers, setCookies };
}

export class AxiosSoapTransport implements ISoapTransport {
  public async execute(request: TransportRequest): Promise<RawResponse> {
    const response = await axios.request<string>({
      url: request.url,
      method: request.method,
      headers: request.headers,
      data: request.body,
      timeout: request.timeoutMs ?? 0,
      proxy: request.proxy ? toProxyConfig(request.proxy) : undefined,
      auth: request.basicAuth
        ? { username: request.basicAuth[0], password: request.basicAuth[1] }
        : undefined,
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });

    const entries: Array<[string, unknown]> = Object.entries(response.headers);
    const { headers, setCookies } = normalizeHeaders(entries);
    const data: unknown = response.data;

    return {
      status: response.status,
      headers,
      setCookies,
      body: typeof data === "string" ? data : data == null ? "" : String(data),
    };
  }
}

export class FetchSoapTransport implements ISoapTransport {
  public async execute(request: TransportRequest): Promise<RawResponse> {
    if (request.proxy) {
      throw new Error(
        `FetchSoapTransport: proxy "${request.proxy}" is not supported by the fetch adapter. ` +
          'Ops: use adapter "axios" when a proxy is required.'
      );
    }

    const headers: Record<string, string> = { ...request.headers };
    if (request.basicAuth) {
      const [user, pass] = request.basicAuth;
      headers["Authorization"] = `Basic ${Buffer.from(`${user}:${pass}`).toString("base64")}`;
    }

    const controller = new AbortController();
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
    const timeoutMs = request.timeoutMs ?? 0;

    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);
    }

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers,
        body: request.method === "GET" ? undefined : request.body,
        signal: controller.signal,
      });

      const body = await response.text();
      const entries: Array<[string, unknown]> = [];
      response.headers.forEach((value, key) => {
        if (key.toLowerCase() !== "set-cookie") entries.push([key, value]);
      });
      const normalized = normalizeHeaders(entries);

      return {
        status: response.status,
        headers: normalized.headers,
        setCookies: response.headers.getSetCookie(),
        body,
      };
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }
  }
}

export function createTransport(adapter: TransportAdapter | undefined): ISoapTransport {
  if (adapter === undefined || adapter === "axios") return new AxiosSoapTransport();
  if (adapter === "fetch") return new FetchSoapTransport();
  return adapter;
}
