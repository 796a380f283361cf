// src/wsdl/WsdlContractResolver.ts
/**
 * Purpose:
 * - Default IContractResolver: load the WSDL named by the `wsdl` option and
 *   parse it into a WsdlContract.
 *
 * Behavior:
 * - `wsdl` starting with "<" → inline document.
 * - `wsdl` starting with http:// or https:// → GET through the configured
 *   transport, with the client's headers, basic auth, proxy and timeout.
 * - Anything else → local file path.
 * - No `wsdl` → contract without a document (endpoint + namespace only).
 */

import { readFile } from "node:fs/promises";
import type { ClientOptions } from "../contracts/clientOptions.contract";
import type { ISoapLogger } from "../logger/SoapLogger";
import { ContractLoadError } from "../problem/SoapClientError";
import type { ISoapTransport } from "../http/SoapTransport.types";
import { WsdlContract } from "./WsdlContract";
import { parseWsdl } from "./wsdlParser";

export type IContractResolver = {
  resolve: (options: ClientOptions) => Promise<WsdlContract>;
};

export class WsdlContractResolver implements IContractResolver {
  private readonly transport: ISoapTransport;
  private readonly logger: ISoapLogger;

  public constructor(opts: { transport: ISoapTransport; logger: ISoapLogger }) {
    this.transport = opts.transport;
    this.logger = opts.logger;
  }

  public async resolve(options: ClientOptions): Promise<WsdlContract> {
    const document =
      options.wsdl === undefined
        ? null
        : parseWsdl(await this.load(options.wsdl, options));

    if (document) {
      this.logger.debug("WsdlContractResolver.resolve.parsed", {
        serviceName: document.serviceName,
        targetNamespace: document.targetNamespace,
        operationCount: document.operations.length,
      });
    }

    return new WsdlContract({
      document,
      endpoint: options.endpoint,
      namespace: options.namespace,
    });
  }

  private async load(location: string, options: ClientOptions): Promise<string> {
    if (location.trimStart().startsWith("<")) return location;

    if (/^https?:\/\//i.test(location)) {
      this.logger.debug("WsdlContractResolver.load.remote", { location });

      const response = await this.transport.execute({
        url: location,
        method: "GET",
        headers: { ...options.headers },
        timeoutMs: options.timeoutMs,
        proxy: options.proxy,
        basicAuth: options.basicAuth,
      });

      if (response.status < 200 || response.status >= 300) {
        this.logger.warn("WsdlContractResolver.load.non2xx", {
          location,
          status: response.status,
        });
        throw new ContractLoadError(
          location,
          `service answered with status ${response.status}`,
          { status: response.status }
        );
      }
      return response.body;
    }

    this.logger.debug("WsdlContractResolver.load.file", { location });
    try {
      return await readFile(location, "utf8");
    } catch (err) {
      throw new ContractLoadError(
        location,
        err instanceof Error ? err.message : String(err),
        { cause: err }
      );
    }
  }
}
