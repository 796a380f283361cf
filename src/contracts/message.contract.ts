// src/contracts/message.contract.ts
/**
 * Shape of SOAP message payloads supplied by callers.
 *
 * - Keys prefixed "@_" become attributes of the enclosing element.
 * - Arrays repeat the element; null renders an xsi:nil element.
 */

import { z } from "zod";
import { isRecord } from "../util/xmlTree";

export type XmlScalar = string | number | boolean | Date | null;

export type XmlValue = XmlScalar | XmlMessage | XmlValue[];

export type XmlMessage = { [key: string]: XmlValue };

export const XmlMessageSchema = z.custom<XmlMessage>((value) => isRecord(value), {
  message: "expected an object of element names to values",
});
