// src/soap/SoapClient.test.ts
/**
 * Purpose:
 * - Client lifecycle: construction rules, one-time contract resolution,
 *   introspection, single-phase and two-phase dispatch, cookie
 *   propagation and response verification.
 * - Everything runs against FakeTransport and the ping.wsdl fixture.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import type {
  ClientOptions,
  ClientOptionsInput,
} from "../contracts/clientOptions.contract";
import type { ISoapLogger } from "../logger/SoapLogger";
import {
  ContractLoadError,
  InitializationError,
  InvocationArgumentError,
  MissingContractError,
  NoPendingInvocationError,
  SignatureVerificationError,
  SoapFaultError,
  UnknownOperationError,
} from "../problem/SoapClientError";
import { FakeTransport, rawResponse, soapEnvelope } from "../testing/FakeTransport";
import { WsdlContract } from "../wsdl/WsdlContract";
import { parseWsdl } from "../wsdl/wsdlParser";
import type { SignatureVerification } from "../wsse/SignatureVerifier";
import type { ISoapObserver } from "./observers";
import { SoapClient, type LegacyClientInit, type SoapClientDeps } from "./SoapClient";

const PING_WSDL = fileURLToPath(
  new URL("../../test/fixtures/ping.wsdl", import.meta.url)
);

const ENV_OPEN =
  '<?xml version="1.0" encoding="UTF-8"?>' +
  '<env:Envelope xmlns:xsd="http://www.w3.org/2001/XMLSchema"' +
  ' xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"';

function quietLogger(): ISoapLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function pong(init: Parameters<typeof rawResponse>[1] = {}) {
  return rawResponse(
    soapEnvelope("<PingResponse><result>pong</result></PingResponse>"),
    init
  );
}

async function wsdlClient(
  extra: ClientOptionsInput = {},
  deps: SoapClientDeps = {}
) {
  const transport = new FakeTransport();
  const logger = quietLogger();
  const client = await SoapClient.create(
    { wsdl: PING_WSDL, adapter: transport, ...extra },
    undefined,
    { logger, ...deps }
  );
  return { client, transport, logger };
}

async function directClient(extra: ClientOptionsInput = {}) {
  const transport = new FakeTransport();
  const logger = quietLogger();
  const client = await SoapClient.create(
    {
      endpoint: "http://svc.example/direct",
      namespace: "urn:example:direct",
      adapter: transport,
      ...extra,
    },
    undefined,
    { logger }
  );
  return { client, transport, logger };
}

describe("SoapClient.create", () => {
  const legacyShapes: Array<[string, LegacyClientInit]> = [
    ["string", "svc.wsdl"],
    ["URL", new URL("http://svc.example/ping?wsdl")],
    ["array", ["svc.wsdl"]],
    ["null", null],
  ];

  for (const [label, value] of legacyShapes) {
    it(`rejects a bare ${label} with INIT_LEGACY_CALL_SHAPE`, async () => {
      const resolve = vi.fn(async (_options: ClientOptions) => new WsdlContract({ document: null }));

      const attempt = SoapClient.create(value, undefined, {
        logger: quietLogger(),
        resolver: { resolve },
      });

      await expect(attempt).rejects.toBeInstanceOf(InitializationError);
      await expect(attempt).rejects.toMatchObject({ code: "INIT_LEGACY_CALL_SHAPE" });
      await expect(attempt).rejects.toThrow(/SoapClient\.create\(\{ wsdl: location \}\)/);
      expect(resolve).not.toHaveBeenCalled();
    });
  }

  it("requires a wsdl or both endpoint and namespace", async () => {
    await expect(SoapClient.create({})).rejects.toMatchObject({
      code: "INIT_INSUFFICIENT_CONFIGURATION",
    });
    await expect(
      SoapClient.create({ endpoint: "http://svc.example/direct" })
    ).rejects.toMatchObject({ code: "INIT_INSUFFICIENT_CONFIGURATION" });
    await expect(
      SoapClient.create({ namespace: "urn:example:direct" })
    ).rejects.toMatchObject({ code: "INIT_INSUFFICIENT_CONFIGURATION" });
  });

  it("lets the customization block supply the required options", async () => {
    const transport = new FakeTransport();
    const client = await SoapClient.create(
      { adapter: transport },
      (globals) => {
        globals
          .set("endpoint", "http://svc.example/direct")
          .set("namespace", "urn:example:direct")
          .set("timeoutMs", 2500);
      },
      { logger: quietLogger() }
    );

    expect(client.globals.endpoint).toBe("http://svc.example/direct");
    expect(client.globals.namespace).toBe("urn:example:direct");
    expect(client.http.timeoutMs).toBe(2500);
  });

  it("rejects option values that fail validation before resolving", async () => {
    const resolve = vi.fn(async (_options: ClientOptions) => new WsdlContract({ document: null }));

    const attempt = SoapClient.create(
      { wsdl: PING_WSDL, timeoutMs: -1 },
      undefined,
      { logger: quietLogger(), resolver: { resolve } }
    );

    await expect(attempt).rejects.toMatchObject({ code: "INIT_INVALID_OPTIONS" });
    await expect(attempt).rejects.toThrow(/timeoutMs:/);
    expect(resolve).not.toHaveBeenCalled();
  });

  it("resolves the contract exactly once for the client's lifetime", async () => {
    const contract = new WsdlContract({
      document: parseWsdl(await readFile(PING_WSDL, "utf8")),
    });
    const resolve = vi.fn(async (_options: ClientOptions) => contract);
    const transport = new FakeTransport().respondWith(pong());

    const client = await SoapClient.create(
      { wsdl: "ping.wsdl", adapter: transport },
      undefined,
      { logger: quietLogger(), resolver: { resolve } }
    );

    client.operations();
    client.serviceName();
    client.buildRequest("Ping");
    client.prepareInvocation("Echo", { message: { text: "hi" } });
    await client.call("Ping");

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(resolve).toHaveBeenCalledWith(
      expect.objectContaining({ wsdl: "ping.wsdl", soapVersion: 1 })
    );
    expect(client.wsdl).toBe(contract);
  });

  it("propagates resolver failures unchanged", async () => {
    const failure = new ContractLoadError("http://svc.example/ping?wsdl", "connection refused");

    const attempt = SoapClient.create(
      { wsdl: "http://svc.example/ping?wsdl" },
      undefined,
      {
        logger: quietLogger(),
        resolver: {
          resolve: async () => {
            throw failure;
          },
        },
      }
    );

    await expect(attempt).rejects.toBe(failure);
  });

  it("freezes the parsed global options", async () => {
    const { client } = await directClient();

    expect(Object.isFrozen(client.globals)).toBe(true);
    expect(client.globals.soapVersion).toBe(1);
    expect(client.globals.raiseErrors).toBe(true);
  });

  it("keeps nested global options read-only", async () => {
    const { client, transport } = await wsdlClient({
      headers: { "X-Api-Key": "test-secret" },
      filters: ["Password"],
    });
    transport.respondWith(pong());

    expect(Object.isFrozen(client.globals.headers)).toBe(true);
    expect(Object.isFrozen(client.globals.namespaces)).toBe(true);
    expect(Object.isFrozen(client.globals.filters)).toBe(true);
    expect(Reflect.set(client.globals.headers, "X-Leak", "yes")).toBe(false);

    await client.call("Ping");

    expect(transport.lastRequest().headers["X-Leak"]).toBeUndefined();
    expect(transport.lastRequest().headers["X-Api-Key"]).toBe("test-secret");
  });
});

describe("SoapClient introspection", () => {
  it("lists operations and the service name from the WSDL", async () => {
    const { client } = await wsdlClient();

    expect([...client.operations()]).toEqual(["Ping", "Echo"]);
    expect(client.serviceName()).toBe("PingService");
  });

  it("returns a fresh operation set on every call", async () => {
    const { client } = await wsdlClient();

    expect(client.operations()).not.toBe(client.operations());
  });

  it("throws MissingContractError without a WSDL document", async () => {
    const { client } = await directClient();

    expect(() => client.operations()).toThrow(MissingContractError);
    expect(() => client.serviceName()).toThrow(MissingContractError);
  });
});

describe("SoapClient single-phase dispatch", () => {
  it("hands out a fresh, frozen operation per lookup", async () => {
    const { client } = await wsdlClient();

    const first = client.operation("Ping");
    const second = client.operation("Ping");

    expect(first).not.toBe(second);
    expect(Object.isFrozen(first)).toBe(true);
    expect(first.name).toBe("Ping");
  });

  it("sends a qualified document-literal envelope built from the WSDL", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());

    const response = await client.call("Ping", { message: { note: "hi" } });

    const sent = transport.lastRequest();
    expect(sent.url).toBe("http://svc.example/ping");
    expect(sent.method).toBe("POST");
    expect(sent.headers).toEqual({
      "Content-Type": "text/xml;charset=UTF-8",
      SOAPAction: '"urn:example:ping/Ping"',
    });
    expect(sent.body).toBe(
      ENV_OPEN +
        ' xmlns:tns="urn:example:ping"' +
        ' xmlns:env="http://schemas.xmlsoap.org/soap/envelope/">' +
        "<env:Body><tns:PingRequest><tns:note>hi</tns:note></tns:PingRequest></env:Body>" +
        "</env:Envelope>"
    );
    expect(response.body()).toEqual({ PingResponse: { result: "pong" } });
  });

  it("accepts any operation name when built from endpoint and namespace", async () => {
    const { client } = await directClient();

    const request = client.buildRequest("AnyOp", { message: { a: "1" } });

    expect(request.soapAction).toBe("AnyOp");
    expect(request.http.headers["SOAPAction"]).toBe('"AnyOp"');
    expect(request.http.body).toBe(
      ENV_OPEN +
        ' xmlns:tns="urn:example:direct"' +
        ' xmlns:env="http://schemas.xmlsoap.org/soap/envelope/">' +
        "<env:Body><tns:AnyOp><a>1</a></tns:AnyOp></env:Body>" +
        "</env:Envelope>"
    );
  });

  it("rejects operations the WSDL does not declare", async () => {
    const { client, transport } = await wsdlClient();

    await expect(client.call("Nope")).rejects.toBeInstanceOf(UnknownOperationError);
    expect(() => client.buildRequest("Nope")).toThrow(
      'UNKNOWN_OPERATION: Unable to find SOAP operation "Nope". ' +
        'Operations provided by the service: "Ping", "Echo".'
    );
    expect(transport.requests).toHaveLength(0);
  });

  it("uses the SOAP 1.2 content type and envelope namespace", async () => {
    const { client } = await directClient({ soapVersion: 2 });

    const request = client.buildRequest("Go");

    expect(request.http.headers).toEqual({
      "Content-Type": 'application/soap+xml;charset=UTF-8;action="Go"',
    });
    expect(request.http.body).toContain(
      'xmlns:env="http://www.w3.org/2003/05/soap-envelope"'
    );
  });

  it("sends caller-supplied xml verbatim", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());
    const xml = soapEnvelope("<PingRequest/>");

    await client.call("Ping", { xml });

    expect(transport.lastRequest().body).toBe(xml);
  });

  it("raises a SoapFaultError for fault responses by default", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(
      rawResponse(
        soapEnvelope(
          "<soap:Fault><faultcode>soap:Server</faultcode><faultstring>boom</faultstring></soap:Fault>"
        ),
        { status: 500 }
      )
    );

    const attempt = client.call("Ping");

    await expect(attempt).rejects.toBeInstanceOf(SoapFaultError);
    await expect(attempt).rejects.toMatchObject({
      status: 500,
      fault: { code: "soap:Server", reason: "boom" },
    });
  });

  it("returns fault responses when raiseErrors is off", async () => {
    const { client, transport } = await wsdlClient({ raiseErrors: false });
    transport.respondWith(
      rawResponse(
        soapEnvelope(
          "<soap:Fault><faultcode>soap:Client</faultcode><faultstring>bad input</faultstring></soap:Fault>"
        ),
        { status: 500 }
      )
    );

    const response = await client.call("Ping");

    expect(response.success()).toBe(false);
    expect(response.fault()).toEqual({
      code: "soap:Client",
      reason: "bad input",
      detail: undefined,
    });
  });

  it("lets an observer answer instead of the transport", async () => {
    const notify = vi.fn<ISoapObserver["notify"]>(() => pong());
    const { client, transport } = await wsdlClient({ observers: [{ notify }] });

    const response = await client.call("Ping");

    expect(transport.requests).toHaveLength(0);
    expect(notify).toHaveBeenCalledWith(
      expect.objectContaining({ operationName: "Ping" })
    );
    expect(response.body()).toEqual({ PingResponse: { result: "pong" } });
  });

  it("adds a WS-Security UsernameToken header when configured", async () => {
    const { client } = await wsdlClient({
      wsseAuth: { username: "user", password: "test-secret" },
    });

    const body = client.buildRequest("Ping").http.body ?? "";

    expect(body).toContain("<env:Header><wsse:Security");
    expect(body).toContain("<wsse:Username>user</wsse:Username>");
    expect(body).toContain(
      '<wsse:Password Type="http://docs.oasis-open.org/wss/2004/01/oasis-200401-wss-username-token-profile-1.0#PasswordText">test-secret</wsse:Password>'
    );
  });
});

describe("SoapClient two-phase dispatch", () => {
  it("requires at least one argument", async () => {
    const { client } = await wsdlClient();

    expect(() => client.prepareInvocation()).toThrow(InvocationArgumentError);
    expect(client.hasPendingInvocation()).toBe(false);
  });

  it("accepts an operation object and runs the prepared callback once", async () => {
    const { client } = await wsdlClient();
    const onPrepared = vi.fn();

    const request = client.prepareInvocation(
      { operation: "Echo", message: { text: "hey" } },
      undefined,
      onPrepared
    );

    expect(request.operationName).toBe("Echo");
    expect(request.soapAction).toBe("urn:example:ping/Echo");
    expect(request.http.body).toContain(
      "<tns:EchoRequest><tns:text>hey</tns:text></tns:EchoRequest>"
    );
    expect(onPrepared).toHaveBeenCalledTimes(1);
    expect(onPrepared).toHaveBeenCalledWith(request, 0);
    expect(client.hasPendingInvocation()).toBe(true);
  });

  it("isolates the prepared request from the client's own state", async () => {
    const { client } = await wsdlClient();

    const request = client.prepareInvocation("Ping");
    request.http.headers["X-Trace"] = "1";
    request.http.cookies.set("injected", "yes");
    request.config.headers["X-Config"] = "changed";
    request.wsse.timestamp = true;

    expect(client.http.headers).toEqual({});
    expect(client.http.cookies.size).toBe(0);
    expect(client.globals.headers).toEqual({});
    expect(client.wsse.timestamp).toBe(false);
  });

  it("leaves an earlier prepared request untouched by a later one", async () => {
    const { client, transport } = await wsdlClient({ headers: { "X-Api-Key": "test-secret" } });
    transport.respondWith(pong());

    const first = client.prepareInvocation("Ping");
    const second = client.prepareInvocation("Echo", { message: { text: "later" } });
    second.http.headers["X-Second"] = "1";
    second.http.cookies.set("second", "yes");
    second.config.headers["X-Config"] = "changed";

    expect(first.http.headers["X-Second"]).toBeUndefined();
    expect(first.http.cookies.size).toBe(0);
    expect(first.config.headers).toEqual({ "X-Api-Key": "test-secret" });

    await client.finalizeInvocation(first);

    const sent = transport.lastRequest();
    expect(sent.headers["SOAPAction"]).toBe('"urn:example:ping/Ping"');
    expect(sent.headers["X-Second"]).toBeUndefined();
    expect(sent.headers["X-Config"]).toBeUndefined();
    expect(sent.headers["Cookie"]).toBeUndefined();
  });

  it("sends cookies added to a prepared request", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());

    const request = client.prepareInvocation("Ping");
    request.http.cookies.set("auth", "token");
    await client.finalizeInvocation();

    expect(transport.lastRequest().headers["Cookie"]).toBe("auth=token");
    expect(client.http.cookies.get("auth")).toBeUndefined();
  });

  it("ignores wsse edits made after the envelope is built", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());

    const request = client.prepareInvocation("Ping");
    request.wsse.timestamp = true;
    await client.finalizeInvocation();

    expect(transport.lastRequest().body).toBe(request.http.body);
    expect(transport.lastRequest().body).not.toContain("wsu:Timestamp");
  });

  it("sends the pending request and clears the slot", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());

    const request = client.prepareInvocation("Ping");
    request.http.headers["X-Trace"] = "abc";
    const response = await client.finalizeInvocation();

    expect(transport.lastRequest().headers["X-Trace"]).toBe("abc");
    expect(response.body()).toEqual({ PingResponse: { result: "pong" } });
    expect(client.hasPendingInvocation()).toBe(false);
    await expect(client.finalizeInvocation()).rejects.toBeInstanceOf(
      NoPendingInvocationError
    );
  });

  it("fails when nothing was prepared", async () => {
    const { client, transport } = await wsdlClient();

    await expect(client.finalizeInvocation()).rejects.toMatchObject({
      code: "NO_PENDING_INVOCATION",
    });
    expect(transport.requests).toHaveLength(0);
  });

  it("warns when a pending request is replaced and sends the newest one", async () => {
    const { client, transport, logger } = await wsdlClient();
    transport.respondWith(pong());

    client.prepareInvocation("Ping");
    client.prepareInvocation("Echo", { message: { text: "second" } });
    await client.finalizeInvocation();

    expect(logger.warn).toHaveBeenCalledWith("SoapClient.prepare.discarded_pending", {
      discarded: "Ping",
      operation: "Echo",
    });
    expect(transport.requests).toHaveLength(1);
    expect(transport.lastRequest().headers["SOAPAction"]).toBe('"urn:example:ping/Echo"');
  });

  it("sends an explicitly passed request without touching the pending one", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong());

    const first = client.prepareInvocation("Ping");
    client.prepareInvocation("Echo", { message: { text: "later" } });
    await client.finalizeInvocation(first);

    expect(transport.lastRequest().headers["SOAPAction"]).toBe('"urn:example:ping/Ping"');
    expect(client.hasPendingInvocation()).toBe(true);
  });

  it("consumes the pending request even when sending fails", async () => {
    const { client } = await wsdlClient();

    client.prepareInvocation("Ping");

    await expect(client.finalizeInvocation()).rejects.toThrow(/no canned response/);
    expect(client.hasPendingInvocation()).toBe(false);
  });

  it("keeps response cookies for requests prepared afterwards", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(
      pong({ setCookies: ["session=abc; Path=/; HttpOnly"] }),
      pong()
    );

    const early = client.prepareInvocation("Ping");
    await client.finalizeInvocation();

    expect(client.http.cookies.get("session")).toBe("abc");
    expect(early.http.cookies.size).toBe(0);

    const later = client.prepareInvocation("Echo", { message: { text: "x" } });
    expect(later.http.cookies.toHeader()).toBe("session=abc");

    await client.finalizeInvocation();
    expect(transport.lastRequest().headers["Cookie"]).toBe("session=abc");
  });

  it("merges per-call cookies over session cookies", async () => {
    const { client, transport } = await wsdlClient();
    transport.respondWith(pong({ setCookies: ["session=abc", "theme=dark"] }));

    client.prepareInvocation("Ping");
    await client.finalizeInvocation();
    const request = client.prepareInvocation("Ping", { cookies: { theme: "light" } });

    expect(request.http.cookies.toHeader()).toBe("session=abc; theme=light");
  });
});

describe("SoapClient response verification", () => {
  function fixedVerifier(outcome: SignatureVerification) {
    return { verify: vi.fn((_xml: string): SignatureVerification => outcome) };
  }

  it("does not verify unless verifyResponse is set", async () => {
    const verifier = fixedVerifier({ ok: false, reason: "unsigned" });
    const { client, transport } = await wsdlClient({}, { verifier });
    transport.respondWith(pong());

    client.prepareInvocation("Ping");
    await client.finalizeInvocation();

    expect(verifier.verify).not.toHaveBeenCalled();
  });

  it("returns the response when the signature checks out", async () => {
    const verifier = fixedVerifier({ ok: true });
    const { client, transport } = await wsdlClient({ verifyResponse: true }, { verifier });
    const raw = pong();
    transport.respondWith(raw);

    client.prepareInvocation("Ping");
    const response = await client.finalizeInvocation();

    expect(verifier.verify).toHaveBeenCalledWith(raw.body);
    expect(response.http).toBe(raw);
  });

  it("raises SignatureVerificationError after absorbing cookies", async () => {
    const verifier = fixedVerifier({ ok: false, reason: "bad digest" });
    const { client, transport, logger } = await wsdlClient(
      { verifyResponse: true },
      { verifier }
    );
    transport.respondWith(pong({ setCookies: ["session=abc"] }));

    client.prepareInvocation("Ping");
    const attempt = client.finalizeInvocation();

    await expect(attempt).rejects.toBeInstanceOf(SignatureVerificationError);
    await expect(attempt).rejects.toMatchObject({
      code: "SIGNATURE_VERIFICATION_FAILED",
      reason: "bad digest",
    });
    expect(client.http.cookies.get("session")).toBe("abc");
    expect(logger.warn).toHaveBeenCalledWith("SoapClient.finalize.signature_rejected", {
      operation: "Ping",
      reason: "bad digest",
    });
  });
});
