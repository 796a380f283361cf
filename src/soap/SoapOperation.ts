// src/soap/SoapOperation.ts
/**
 * Call-scoped handle for one remote operation: name + contract + options.
 *
 * Instances are frozen and hold no per-call state; every request starts
 * from a fresh TransportState derived from the client options.
 */

import {
  cloneClientOptions,
  type FrozenClientOptions,
} from "../contracts/clientOptions.contract";
import type { LocalOptionsInput } from "../contracts/localOptions.contract";
import { HttpSettings } from "../http/HttpSettings";
import type { WsdlContract } from "../wsdl/WsdlContract";
import { WsseSettings } from "../wsse/WsseSettings";
import type { PreparedRequest, TransportState } from "./PreparedRequest";
import type { SoapRequestBuilder } from "./SoapRequestBuilder";
import type { SoapResponse } from "./SoapResponse";

export class SoapOperation {
  public readonly name: string;
  public readonly contract: WsdlContract;
  public readonly globals: FrozenClientOptions;
  private readonly builder: SoapRequestBuilder;

  private constructor(
    name: string,
    contract: WsdlContract,
    globals: FrozenClientOptions,
    builder: SoapRequestBuilder
  ) {
    this.name = name;
    this.contract = contract;
    this.globals = globals;
    this.builder = builder;
    Object.freeze(this);
  }

  public static create(
    name: string,
    contract: WsdlContract,
    globals: FrozenClientOptions,
    builder: SoapRequestBuilder
  ): SoapOperation {
    return new SoapOperation(name, contract, globals, builder);
  }

  public request(locals: LocalOptionsInput = {}): PreparedRequest {
    return this.builder.build(this.name, locals, this.freshState());
  }

  public async call(locals: LocalOptionsInput = {}): Promise<SoapResponse> {
    return this.builder.send(this.request(locals));
  }

  private freshState(): TransportState {
    return {
      http: HttpSettings.fromOptions(this.globals),
      wsse: WsseSettings.fromOptions(this.globals),
      config: cloneClientOptions(this.globals),
    };
  }
}
