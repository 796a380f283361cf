// src/soap/SoapRequestBuilder.ts
/**
 * Purpose:
 * - Turn (operation name, local options, transport state) into a
 *   PreparedRequest, and send PreparedRequests.
 *
 * Invariants:
 * - build() writes only into the TransportState it is given (per-call
 *   cookies land in that state's jar); callers decide
 *   whether that state is fresh (single-phase call) or a clone of a
 *   client's session (two-phase).
 * - Unknown operations are rejected here, not at dispatch, and only when a
 *   WSDL document is loaded; endpoint+namespace clients accept any name.
 * - send() never catches: transport, fault and HTTP errors reach the caller
 *   unchanged.
 */

import {
  LocalOptionsSchema,
  type LocalOptions,
  type LocalOptionsInput,
} from "../contracts/localOptions.contract";
import { formatIssues } from "../contracts/clientOptions.contract";
import type { ISoapTransport } from "../http/SoapTransport.types";
import type { ISoapLogger } from "../logger/SoapLogger";
import { filterXmlForLog, snippet } from "../logger/xmlLogFilter";
import {
  InvalidLocalOptionsError,
  MissingEndpointError,
  UnknownOperationError,
} from "../problem/SoapClientError";
import type { WsdlContract } from "../wsdl/WsdlContract";
import { buildEnvelope, renderXml, shapeMessage } from "./envelope";
import { notifyObservers } from "./observers";
import { PreparedRequest, type TransportState } from "./PreparedRequest";
import { SoapResponse } from "./SoapResponse";

export class SoapRequestBuilder {
  private readonly contract: WsdlContract;
  private readonly transport: ISoapTransport;
  private readonly logger: ISoapLogger;

  public constructor(opts: {
    contract: WsdlContract;
    transport: ISoapTransport;
    logger: ISoapLogger;
  }) {
    this.contract = opts.contract;
    this.transport = opts.transport;
    this.logger = opts.logger;
  }

  public build(
    operationName: string,
    localsInput: LocalOptionsInput,
    state: TransportState
  ): PreparedRequest {
    if (
      this.contract.hasDocument() &&
      !this.contract.operation(operationName)
    ) {
      throw new UnknownOperationError(
        operationName,
        this.contract.operationNames()
      );
    }

    const locals = this.parseLocals(operationName, localsInput);
    const endpoint = this.contract.endpoint;
    if (!endpoint) throw new MissingEndpointError(operationName);

    const { config, http, wsse } = state;
    const descriptor = this.contract.operation(operationName);
    const soapAction = locals.soapAction ?? descriptor?.soapAction ?? operationName;

    const body = locals.xml ?? this.renderEnvelope(operationName, locals, state);

    http.url = endpoint;
    http.body = body;
    http.headers = {
      ...http.headers,
      ...this.soapHeaders(config.soapVersion, soapAction),
    };

    for (const [name, value] of Object.entries(locals.cookies ?? {})) {
      http.cookies.set(name, value);
    }

    this.logger.debug("SoapRequest.build.done", {
      operation: operationName,
      soapAction,
      endpoint,
      wsse: wsse.hasHeader(),
    });

    return new PreparedRequest({ operationName, soapAction, state });
  }

  public async send(request: PreparedRequest): Promise<SoapResponse> {
    const { config, http } = request;
    const transportRequest = http.toTransportRequest();

    this.logger.debug("SoapRequest.send.begin", {
      operation: request.operationName,
      url: transportRequest.url,
      headers: transportRequest.headers,
      body: snippet(filterXmlForLog(transportRequest.body, config.filters)),
    });

    const stubbed = await notifyObservers(config.observers, {
      operationName: request.operationName,
      request,
    });

    const raw = stubbed ?? (await this.transport.execute(transportRequest));

    this.logger.info("SoapRequest.send.done", {
      operation: request.operationName,
      status: raw.status,
      observed: stubbed !== undefined,
    });
    this.logger.debug("SoapRequest.send.response_body", {
      operation: request.operationName,
      body: snippet(filterXmlForLog(raw.body, config.filters)),
    });

    return new SoapResponse(raw, {
      raiseErrors: config.raiseErrors,
      stripNamespaces: config.stripNamespaces,
    });
  }

  private parseLocals(
    operationName: string,
    input: LocalOptionsInput
  ): LocalOptions {
    const parsed = LocalOptionsSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidLocalOptionsError(
        operationName,
        formatIssues(parsed.error),
        parsed.error
      );
    }
    return parsed.data;
  }

  private soapHeaders(
    soapVersion: 1 | 2,
    soapAction: string
  ): Record<string, string> {
    if (soapVersion === 2) {
      return {
        "Content-Type": `application/soap+xml;charset=UTF-8;action="${soapAction}"`,
      };
    }
    return {
      "Content-Type": "text/xml;charset=UTF-8",
      SOAPAction: `"${soapAction}"`,
    };
  }

  private renderEnvelope(
    operationName: string,
    locals: LocalOptions,
    state: TransportState
  ): string {
    const { config, wsse } = state;
    const descriptor = this.contract.operation(operationName);
    const namespace = this.contract.namespace;
    const elementForm =
      config.elementFormDefault ?? this.contract.elementFormDefault ?? "unqualified";

    const headerFragments: string[] = [];
    const wsseHeader = wsse.toHeader();
    if (wsseHeader) headerFragments.push(renderXml(wsseHeader));

    for (const soapHeader of [config.soapHeader, locals.soapHeader]) {
      if (soapHeader === undefined) continue;
      headerFragments.push(
        typeof soapHeader === "string"
          ? soapHeader
          : renderXml(
              shapeMessage(soapHeader, { conversion: config.convertRequestKeysTo })
            )
      );
    }

    const message = locals.message ?? {};
    const body = renderXml(
      shapeMessage(message, {
        conversion: config.convertRequestKeysTo,
        prefix:
          elementForm === "qualified" && namespace
            ? config.namespaceIdentifier
            : undefined,
      })
    );

    return buildEnvelope({
      soapVersion: config.soapVersion,
      envNamespace: config.envNamespace,
      namespaceIdentifier: config.namespaceIdentifier,
      namespace,
      namespaces: config.namespaces,
      headerFragments,
      messageTag: locals.messageTag ?? descriptor?.inputTag ?? operationName,
      messageAttributes: locals.attributes,
      body,
    });
  }
}
