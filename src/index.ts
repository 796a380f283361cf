// src/index.ts
import type { ClientOptionsInput } from "./contracts/clientOptions.contract";
import type { OptionsBlock } from "./options/GlobalOptions";
import {
  SoapClient,
  type LegacyClientInit,
  type SoapClientDeps,
} from "./soap/SoapClient";

export {
  SoapClient,
  type InvocationTarget,
  type LegacyClientInit,
  type PrepareArgs,
  type PreparedCallback,
  type SoapClientDeps,
} from "./soap/SoapClient";
export { SoapOperation } from "./soap/SoapOperation";
export { PreparedRequest, type TransportState } from "./soap/PreparedRequest";
export { SoapResponse, type SoapFault } from "./soap/SoapResponse";
export { SoapRequestBuilder } from "./soap/SoapRequestBuilder";
export type { ISoapObserver, SoapObserverEvent } from "./soap/observers";

export {
  ClientOptionsSchema,
  cloneClientOptions,
  freezeClientOptions,
  type ClientOptions,
  type ClientOptionsInput,
  type FrozenClientOptions,
} from "./contracts/clientOptions.contract";
export {
  LocalOptionsSchema,
  type LocalOptions,
  type LocalOptionsInput,
} from "./contracts/localOptions.contract";
export type { XmlMessage, XmlValue } from "./contracts/message.contract";
export { GlobalOptions, type OptionsBlock } from "./options/GlobalOptions";

export { WsdlContract } from "./wsdl/WsdlContract";
export {
  WsdlContractResolver,
  type IContractResolver,
} from "./wsdl/WsdlContractResolver";
export { parseWsdl, type OperationDescriptor, type ParsedWsdl } from "./wsdl/wsdlParser";

export { HttpSettings } from "./http/HttpSettings";
export { CookieJar } from "./http/CookieJar";
export {
  AxiosSoapTransport,
  FetchSoapTransport,
  createTransport,
} from "./http/transports";
export type {
  ISoapTransport,
  RawResponse,
  TransportAdapter,
  TransportRequest,
} from "./http/SoapTransport.types";

export { WsseSettings } from "./wsse/WsseSettings";
export {
  XmlDsigSignatureVerifier,
  type ISignatureVerifier,
  type SignatureVerification,
} from "./wsse/SignatureVerifier";

export {
  createSoapLogger,
  fromPino,
  type ISoapLogger,
} from "./logger/SoapLogger";

export * from "./problem/SoapClientError";

/** Shorthand for SoapClient.create(). */
export function soapClient(
  globals: ClientOptionsInput | LegacyClientInit,
  block?: OptionsBlock,
  deps?: SoapClientDeps
): Promise<SoapClient> {
  return SoapClient.create(globals, block, deps);
}
