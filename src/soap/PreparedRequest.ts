// src/soap/PreparedRequest.ts
/**
 * Purpose:
 * - A built, not-yet-sent SOAP request. Callers may rewrite `http.body`,
 *   add headers, or edit `http.cookies` before handing it to
 *   finalizeInvocation(); all of these are read at send time.
 *
 * Invariants:
 * - Owns its http/wsse/config copies; nothing here aliases client state.
 *
 * Notes:
 * - `wsse` records the settings the envelope was rendered with. The
 *   Security header is already part of `http.body`, and response
 *   verification follows the client's own `wsse.verifyResponse`, so edits
 *   to `request.wsse` after build() have no effect. Rewrite `http.body`
 *   to change the header.
 */

import type { ClientOptions } from "../contracts/clientOptions.contract";
import type { HttpSettings } from "../http/HttpSettings";
import type { WsseSettings } from "../wsse/WsseSettings";

export type TransportState = {
  http: HttpSettings;
  wsse: WsseSettings;
  config: ClientOptions;
};

export class PreparedRequest {
  public readonly operationName: string;
  public readonly soapAction: string;
  public readonly http: HttpSettings;
  public readonly wsse: WsseSettings;
  public readonly config: ClientOptions;

  public constructor(init: {
    operationName: string;
    soapAction: string;
    state: TransportState;
  }) {
    this.operationName = init.operationName;
    this.soapAction = init.soapAction;
    this.http = init.state.http;
    this.wsse = init.state.wsse;
    this.config = init.state.config;
  }
}
