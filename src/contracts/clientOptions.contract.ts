// src/contracts/clientOptions.contract.ts
/**
 * Purpose:
 * - Canonical contract for client-wide ("global") options.
 * - One schema owns every recognized key and its default; unknown keys are
 *   rejected so typos fail at construction instead of being ignored.
 *
 * Invariants:
 * - `wsdl` OR (`endpoint` AND `namespace`) is checked by SoapClient before
 *   this schema runs, so its error stays distinguishable.
 * - A client holds its options through freezeClientOptions(): every nested
 *   record and array is frozen too. Behavior objects (adapter, observer
 *   instances) are shared and left as they are.
 * - Prepared requests receive cloneClientOptions() copies, which are
 *   mutable and detached from the frozen original.
 */

import { z } from "zod";
import type { ISoapObserver } from "../soap/observers";
import {
  isSoapTransport,
  type ISoapTransport,
} from "../http/SoapTransport.types";
import { XmlMessageSchema } from "./message.contract";
import { isRecord } from "../util/xmlTree";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const KEY_CONVERSIONS = [
  "none",
  "lowerCamelcase",
  "camelcase",
  "snakecase",
] as const;

export type KeyConversion = (typeof KEY_CONVERSIONS)[number];

const TransportSchema = z.custom<ISoapTransport>(isSoapTransport, {
  message: "expected an object with an execute(request) function",
});

const ObserverSchema = z.custom<ISoapObserver>(
  (value) => isRecord(value) && typeof value.notify === "function",
  { message: "expected an object with a notify(event) function" }
);

export const WsseAuthSchema = z
  .object({
    username: z.string().min(1),
    password: z.string(),
    digest: z.boolean().default(false),
  })
  .strict();

export const ClientOptionsSchema = z
  .object({
    wsdl: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    namespace: z.string().min(1).optional(),
    adapter: z.union([z.enum(["axios", "fetch"]), TransportSchema]).optional(),

    soapVersion: z.union([z.literal(1), z.literal(2)]).default(1),
    envNamespace: z.string().min(1).default("env"),
    namespaceIdentifier: z.string().min(1).default("tns"),
    namespaces: z.record(z.string()).default(() => ({})),
    elementFormDefault: z.enum(["qualified", "unqualified"]).optional(),
    convertRequestKeysTo: z.enum(KEY_CONVERSIONS).default("none"),

    headers: z.record(z.string()).default(() => ({})),
    soapHeader: z.union([z.string(), XmlMessageSchema]).optional(),
    timeoutMs: z.number().int().positive().optional(),
    proxy: z.string().url().optional(),
    basicAuth: z.tuple([z.string(), z.string()]).optional(),

    wsseAuth: WsseAuthSchema.optional(),
    wsseTimestamp: z.boolean().default(false),
    verifyResponse: z.boolean().default(false),
    verificationCert: z.string().min(1).optional(),

    raiseErrors: z.boolean().default(true),
    stripNamespaces: z.boolean().default(true),
    observers: z.array(ObserverSchema).default(() => []),

    log: z.boolean().default(false),
    logLevel: z.enum(LOG_LEVELS).default("info"),
    filters: z.array(z.string().min(1)).default(() => []),
  })
  .strict();

export type ClientOptionsInput = z.input<typeof ClientOptionsSchema>;
export type ClientOptions = z.output<typeof ClientOptionsSchema>;

type NestedOptionKeys =
  | "headers"
  | "namespaces"
  | "basicAuth"
  | "wsseAuth"
  | "observers"
  | "filters";

/** Read-only view of parsed options, down to nested records and arrays. */
export type FrozenClientOptions = Readonly<Omit<ClientOptions, NestedOptionKeys>> & {
  readonly headers: Readonly<Record<string, string>>;
  readonly namespaces: Readonly<Record<string, string>>;
  readonly basicAuth?: readonly [string, string];
  readonly wsseAuth?: Readonly<NonNullable<ClientOptions["wsseAuth"]>>;
  readonly observers: readonly ISoapObserver[];
  readonly filters: readonly string[];
};

function freezeMessage(value: unknown): void {
  if (Array.isArray(value)) {
    value.forEach(freezeMessage);
    Object.freeze(value);
  } else if (isRecord(value) && !(value instanceof Date)) {
    Object.values(value).forEach(freezeMessage);
    Object.freeze(value);
  }
}

/**
 * Freeze parsed options in place, nested collections included. An object
 * soapHeader is frozen all the way down.
 */
export function freezeClientOptions(options: ClientOptions): FrozenClientOptions {
  Object.freeze(options.headers);
  Object.freeze(options.namespaces);
  Object.freeze(options.observers);
  Object.freeze(options.filters);
  if (options.basicAuth) Object.freeze(options.basicAuth);
  if (options.wsseAuth) Object.freeze(options.wsseAuth);
  if (typeof options.soapHeader === "object") freezeMessage(options.soapHeader);
  return Object.freeze(options);
}

/** Structural copy; behavior objects (transport, observers) are shared. */
export function cloneClientOptions(options: FrozenClientOptions): ClientOptions {
  return {
    ...options,
    namespaces: { ...options.namespaces },
    headers: { ...options.headers },
    soapHeader:
      options.soapHeader === undefined || typeof options.soapHeader === "string"
        ? options.soapHeader
        : structuredClone(options.soapHeader),
    basicAuth: options.basicAuth
      ? [options.basicAuth[0], options.basicAuth[1]]
      : undefined,
    wsseAuth: options.wsseAuth ? { ...options.wsseAuth } : undefined,
    observers: [...options.observers],
    filters: [...options.filters],
  };
}

/** "path: message" lines for error text. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join(".") : "<root>"}: ${i.message}`)
    .join("; ");
}
