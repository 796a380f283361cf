// src/soap/observers.ts
/**
 * Observers see every request right before it is sent. An observer that
 * returns a RawResponse answers the request itself and the transport is
 * skipped (stubbing, replay, recording).
 */

import type { RawResponse } from "../http/SoapTransport.types";
import type { PreparedRequest } from "./PreparedRequest";

export type SoapObserverEvent = {
  operationName: string;
  request: PreparedRequest;
};

export type ISoapObserver = {
  notify: (
    event: SoapObserverEvent
  ) => RawResponse | undefined | Promise<RawResponse | undefined>;
};

export async function notifyObservers(
  observers: readonly ISoapObserver[],
  event: SoapObserverEvent
): Promise<RawResponse | undefined> {
  for (const observer of observers) {
    const response = await observer.notify(event);
    if (response) return response;
  }
  return undefined;
}
