// src/http/SoapTransport.types.ts
/**
 * Purpose:
 * - Transport boundary for the client. Anything that can turn a
 *   TransportRequest into a RawResponse can carry SOAP traffic.
 *
 * Invariants:
 * - Transports never throw on a non-2xx status; status handling belongs to
 *   SoapResponse. They throw only for I/O failures (timeouts, DNS, resets).
 * - Response header keys are lowercased; Set-Cookie values are kept apart
 *   in `setCookies` since they cannot be comma-joined.
 */

export type HttpMethod = "GET" | "POST";

export type TransportRequest = {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  proxy?: string;
  basicAuth?: readonly [string, string];
};

export type RawResponse = {
  status: number;
  headers: Record<string, string>;
  setCookies: string[];
  body: string;
};

export type ISoapTransport = {
  execute: (request: TransportRequest) => Promise<RawResponse>;
};

export type TransportAdapterName = "axios" | "fetch";

export type TransportAdapter = TransportAdapterName | ISoapTransport;

export function isSoapTransport(value: unknown): value is ISoapTransport {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}
