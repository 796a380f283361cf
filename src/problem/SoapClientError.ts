// src/problem/SoapClientError.ts
/**
 * Purpose:
 * - Typed error family for the SOAP client and its collaborators.
 * - Callers branch on `code`, never on message text.
 *
 * Invariants:
 * - Message always starts with the code ("CODE: detail").
 * - Errors raised by collaborators (resolver, builder, transport, verifier)
 *   reach the caller unwrapped.
 */

import type { SoapFault } from "../soap/SoapResponse";

export type SoapErrorCode =
  | "INIT_LEGACY_CALL_SHAPE"
  | "INIT_INSUFFICIENT_CONFIGURATION"
  | "INIT_INVALID_OPTIONS"
  | "MISSING_CONTRACT"
  | "INVOCATION_ARGUMENT"
  | "NO_PENDING_INVOCATION"
  | "SIGNATURE_VERIFICATION_FAILED"
  | "UNKNOWN_OPERATION"
  | "MISSING_ENDPOINT"
  | "INVALID_LOCAL_OPTIONS"
  | "CONTRACT_LOAD_FAILED"
  | "CONTRACT_PARSE_FAILED"
  | "SOAP_FAULT"
  | "HTTP_ERROR";

export class SoapClientError extends Error {
  public readonly code: SoapErrorCode;

  public constructor(
    code: SoapErrorCode,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${code}: ${detail}`, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InitializationError extends SoapClientError {
  public constructor(
    code:
      | "INIT_LEGACY_CALL_SHAPE"
      | "INIT_INSUFFICIENT_CONFIGURATION"
      | "INIT_INVALID_OPTIONS",
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(code, detail, options);
  }
}

export class MissingContractError extends SoapClientError {
  public constructor() {
    super(
      "MISSING_CONTRACT",
      "Unable to inspect the service without a WSDL document. " +
        "Ops: create the client with the `wsdl` option to use introspection."
    );
  }
}

export class InvocationArgumentError extends SoapClientError {
  public constructor(detail: string) {
    super("INVOCATION_ARGUMENT", detail);
  }
}

export class NoPendingInvocationError extends SoapClientError {
  public constructor() {
    super(
      "NO_PENDING_INVOCATION",
      "finalizeInvocation() has no prepared request to send. " +
        "Ops: call prepareInvocation() first, or pass the prepared request explicitly."
    );
  }
}

export class SignatureVerificationError extends SoapClientError {
  public readonly reason: string;

  public constructor(reason: string) {
    super(
      "SIGNATURE_VERIFICATION_FAILED",
      `Response signature could not be verified: ${reason}`
    );
    this.reason = reason;
  }
}

export class UnknownOperationError extends SoapClientError {
  public readonly operationName: string;

  public constructor(operationName: string, known: readonly string[]) {
    super(
      "UNKNOWN_OPERATION",
      `Unable to find SOAP operation "${operationName}". ` +
        `Operations provided by the service: ${
          known.length ? known.map((n) => `"${n}"`).join(", ") : "<none>"
        }.`
    );
    this.operationName = operationName;
  }
}

export class MissingEndpointError extends SoapClientError {
  public constructor(operationName: string) {
    super(
      "MISSING_ENDPOINT",
      `No endpoint is known for operation "${operationName}". ` +
        "Ops: pass the `endpoint` option or use a WSDL that declares a service address."
    );
  }
}

export class InvalidLocalOptionsError extends SoapClientError {
  public constructor(operationName: string, issues: string, cause?: unknown) {
    super(
      "INVALID_LOCAL_OPTIONS",
      `Invalid options for operation "${operationName}": ${issues}`,
      { cause }
    );
  }
}

export class ContractLoadError extends SoapClientError {
  public readonly status?: number;

  public constructor(
    location: string,
    detail: string,
    opts: { status?: number; cause?: unknown } = {}
  ) {
    super(
      "CONTRACT_LOAD_FAILED",
      `Unable to load WSDL from "${location}": ${detail}`,
      { cause: opts.cause }
    );
    this.status = opts.status;
  }
}

export class ContractParseError extends SoapClientError {
  public constructor(detail: string, cause?: unknown) {
    super("CONTRACT_PARSE_FAILED", detail, { cause });
  }
}

export class SoapFaultError extends SoapClientError {
  public readonly fault: SoapFault;
  public readonly status: number;

  public constructor(fault: SoapFault, status: number) {
    super("SOAP_FAULT", `(${fault.code}) ${fault.reason}`);
    this.fault = fault;
    this.status = status;
  }
}

export class HttpError extends SoapClientError {
  public readonly status: number;
  public readonly body: string;

  public constructor(status: number, body: string) {
    super(
      "HTTP_ERROR",
      `Non-success response from service (status=${status}).`
    );
    this.status = status;
    this.body = body;
  }
}
