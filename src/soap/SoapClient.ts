// src/soap/SoapClient.ts
/**
 * Purpose:
 * - Entry point for talking to one SOAP service.
 * - Validates options, resolves the service contract exactly once, and
 *   dispatches operations through two paths:
 *   - single-phase: call() / buildRequest() via a fresh SoapOperation.
 *   - two-phase: prepareInvocation() builds a request from isolated copies
 *     of the client's session state; finalizeInvocation() sends it,
 *     absorbs response cookies and, when configured, verifies the response
 *     signature.
 *
 * Invariants:
 * - No client exists until its contract is resolved (private constructor,
 *   async create()).
 * - `globals` (frozen down to nested records and arrays) and `wsdl` never
 *   change after create(). `http` (cookie jar)
 *   is the only session state, and only finalizeInvocation() writes it.
 * - Errors from the resolver, builder, transport and verifier propagate
 *   unwrapped; a failed call leaves contract and options untouched.
 *
 * Notes:
 * - The pending-invocation slot is per client. Concurrent two-phase callers
 *   should pass the returned request to finalizeInvocation(request), or use
 *   one client each.
 */

import {
  ClientOptionsSchema,
  cloneClientOptions,
  formatIssues,
  freezeClientOptions,
  type ClientOptions,
  type ClientOptionsInput,
  type FrozenClientOptions,
} from "../contracts/clientOptions.contract";
import type { LocalOptionsInput } from "../contracts/localOptions.contract";
import { HttpSettings } from "../http/HttpSettings";
import type { ISoapTransport } from "../http/SoapTransport.types";
import { createTransport } from "../http/transports";
import { createSoapLogger, type ISoapLogger } from "../logger/SoapLogger";
import { GlobalOptions, type OptionsBlock } from "../options/GlobalOptions";
import {
  InitializationError,
  InvocationArgumentError,
  MissingContractError,
  NoPendingInvocationError,
  SignatureVerificationError,
} from "../problem/SoapClientError";
import { isPlainObject } from "../util/xmlTree";
import type { WsdlContract } from "../wsdl/WsdlContract";
import {
  WsdlContractResolver,
  type IContractResolver,
} from "../wsdl/WsdlContractResolver";
import {
  XmlDsigSignatureVerifier,
  type ISignatureVerifier,
} from "../wsse/SignatureVerifier";
import { WsseSettings } from "../wsse/WsseSettings";
import type { PreparedRequest } from "./PreparedRequest";
import { SoapOperation } from "./SoapOperation";
import { SoapRequestBuilder } from "./SoapRequestBuilder";
import type { SoapResponse } from "./SoapResponse";

/** Call shapes of the old positional API (a bare WSDL location). */
export type LegacyClientInit = string | URL | readonly unknown[] | null;

export type SoapClientDeps = {
  logger?: ISoapLogger;
  resolver?: IContractResolver;
  verifier?: ISignatureVerifier;
};

export type InvocationTarget = LocalOptionsInput & { operation: string };

/** Runs during prepareInvocation(), after the request is built. */
export type PreparedCallback = (request: PreparedRequest, attempt: 0) => void;

export type PrepareArgs =
  | []
  | [
      target: string | InvocationTarget,
      locals?: LocalOptionsInput,
      onPrepared?: PreparedCallback,
    ];

export class SoapClient {
  public readonly globals: FrozenClientOptions;
  public readonly wsdl: WsdlContract;
  public readonly http: HttpSettings;
  public readonly wsse: WsseSettings;

  private readonly builder: SoapRequestBuilder;
  private readonly verifier: ISignatureVerifier;
  private readonly logger: ISoapLogger;
  private pending: PreparedRequest | undefined;

  private constructor(init: {
    globals: ClientOptions;
    wsdl: WsdlContract;
    transport: ISoapTransport;
    verifier: ISignatureVerifier;
    logger: ISoapLogger;
  }) {
    this.globals = freezeClientOptions(init.globals);
    this.wsdl = init.wsdl;
    this.http = HttpSettings.fromOptions(init.globals);
    this.wsse = WsseSettings.fromOptions(init.globals);
    this.verifier = init.verifier;
    this.logger = init.logger;
    this.builder = new SoapRequestBuilder({
      contract: init.wsdl,
      transport: init.transport,
      logger: init.logger,
    });
  }

  /**
   * Validate options, run the customization block, and resolve the
   * contract. Resolves to a ready client or rejects with the first error.
   */
  public static async create(
    globals: ClientOptionsInput | LegacyClientInit,
    block?: OptionsBlock,
    deps: SoapClientDeps = {}
  ): Promise<SoapClient> {
    if (!isPlainObject(globals)) {
      throw SoapClient.legacyInitError(globals);
    }

    const options = new GlobalOptions(globals);
    if (block) block(options);

    const hasWsdl = options.include("wsdl");
    const hasEndpointAndNamespace =
      options.include("endpoint") && options.include("namespace");
    if (!hasWsdl && !hasEndpointAndNamespace) {
      throw new InitializationError(
        "INIT_INSUFFICIENT_CONFIGURATION",
        "Expected either a WSDL document or the SOAP endpoint and target namespace options.\n" +
          '  SoapClient.create({ wsdl: "/path/to/service.wsdl" })                               // local WSDL document\n' +
          '  SoapClient.create({ wsdl: "http://example.com?wsdl" })                              // remote WSDL document\n' +
          '  SoapClient.create({ endpoint: "http://example.com", namespace: "http://v1.example.com" }) // no WSDL document'
      );
    }

    const parsed = ClientOptionsSchema.safeParse(options.toInput());
    if (!parsed.success) {
      throw new InitializationError(
        "INIT_INVALID_OPTIONS",
        `Invalid client options: ${formatIssues(parsed.error)}`,
        { cause: parsed.error }
      );
    }
    const resolved = parsed.data;

    const logger =
      deps.logger ??
      createSoapLogger({ log: resolved.log, logLevel: resolved.logLevel });
    const transport = createTransport(resolved.adapter);
    const resolver =
      deps.resolver ?? new WsdlContractResolver({ transport, logger });

    const wsdl = await resolver.resolve(resolved);

    logger.info("SoapClient.create.resolved", {
      hasDocument: wsdl.hasDocument(),
      serviceName: wsdl.serviceName,
      endpoint: wsdl.endpoint,
      namespace: wsdl.namespace,
    });

    return new SoapClient({
      globals: resolved,
      wsdl,
      transport,
      verifier:
        deps.verifier ??
        new XmlDsigSignatureVerifier({ publicCert: resolved.verificationCert }),
      logger,
    });
  }

  // ───────────────── INTROSPECTION ─────────────────

  public operations(): ReadonlySet<string> {
    if (!this.wsdl.hasDocument()) throw new MissingContractError();
    return new Set(this.wsdl.operationNames());
  }

  public serviceName(): string {
    if (!this.wsdl.hasDocument()) throw new MissingContractError();
    return this.wsdl.serviceName ?? "";
  }

  // ───────────────── SINGLE-PHASE PATH ─────────────────

  public operation(operationName: string): SoapOperation {
    return SoapOperation.create(
      operationName,
      this.wsdl,
      this.globals,
      this.builder
    );
  }

  public async call(
    operationName: string,
    locals: LocalOptionsInput = {}
  ): Promise<SoapResponse> {
    return this.operation(operationName).call(locals);
  }

  public buildRequest(
    operationName: string,
    locals: LocalOptionsInput = {}
  ): PreparedRequest {
    return this.operation(operationName).request(locals);
  }

  // ───────────────── TWO-PHASE PATH ─────────────────

  /**
   * Build a request the caller may still change, e.g.:
   *
   *   const req = client.prepareInvocation("Ping");
   *   req.http.body = signedEnvelope;
   *   const res = await client.finalizeInvocation();
   */
  public prepareInvocation(...args: PrepareArgs): PreparedRequest {
    if (args.length === 0) {
      throw new InvocationArgumentError(
        "prepareInvocation() requires at least one argument: an operation name or { operation, ...locals }."
      );
    }

    const [target, extraLocals, onPrepared] = args;
    const { operationName, locals } = SoapClient.splitTarget(target, extraLocals);

    const request = this.builder.build(operationName, locals, {
      http: this.http.clone(),
      wsse: this.wsse.clone(),
      config: cloneClientOptions(this.globals),
    });

    if (onPrepared) onPrepared(request, 0);

    if (this.pending) {
      this.logger.warn("SoapClient.prepare.discarded_pending", {
        discarded: this.pending.operationName,
        operation: operationName,
      });
    }
    this.pending = request;
    return request;
  }

  public hasPendingInvocation(): boolean {
    return this.pending !== undefined;
  }

  public async finalizeInvocation(
    request?: PreparedRequest
  ): Promise<SoapResponse> {
    const target = request ?? this.pending;
    if (!target) throw new NoPendingInvocationError();
    if (target === this.pending) this.pending = undefined;

    const response = await this.builder.send(target);

    this.http.setCookies(response.http);

    if (this.wsse.verifyResponse) {
      const outcome = this.verifier.verify(response.http.body);
      if (!outcome.ok) {
        this.logger.warn("SoapClient.finalize.signature_rejected", {
          operation: target.operationName,
          reason: outcome.reason,
        });
        throw new SignatureVerificationError(outcome.reason);
      }
    }

    return response;
  }

  // ───────────────── INTERNAL HELPERS ─────────────────

  private static splitTarget(
    target: string | InvocationTarget,
    extra: LocalOptionsInput | undefined
  ): { operationName: string; locals: LocalOptionsInput } {
    if (typeof target === "string") {
      return { operationName: target, locals: extra ?? {} };
    }
    const { operation, ...locals } = target;
    return { operationName: operation, locals: { ...locals, ...(extra ?? {}) } };
  }

  private static legacyInitError(value: unknown): InitializationError {
    let shown: string;
    try {
      shown = JSON.stringify(value) ?? String(value);
    } catch {
      shown = String(value);
    }
    const kind =
      value === null ? "null" : Array.isArray(value) ? "array" : typeof value;

    return new InitializationError(
      "INIT_LEGACY_CALL_SHAPE",
      `SoapClient.create() was called with ${shown} (${kind}).\n` +
        "Clients are created from an options object, not a positional WSDL location.\n" +
        'Ops: replace SoapClient.create(location) with SoapClient.create({ wsdl: location }).'
    );
  }
}
