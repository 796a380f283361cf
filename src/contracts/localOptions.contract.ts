// src/contracts/localOptions.contract.ts
/**
 * Per-call ("local") options accepted by call(), buildRequest() and
 * prepareInvocation().
 */

import { z } from "zod";
import { XmlMessageSchema } from "./message.contract";

export const LocalOptionsSchema = z
  .object({
    message: XmlMessageSchema.optional(),
    messageTag: z.string().min(1).optional(),
    attributes: z.record(z.string()).optional(),
    soapAction: z.string().optional(),
    soapHeader: z.union([z.string(), XmlMessageSchema]).optional(),
    cookies: z.record(z.string()).optional(),
    /** Complete envelope; replaces the one built from `message`. */
    xml: z.string().min(1).optional(),
  })
  .strict();

export type LocalOptionsInput = z.input<typeof LocalOptionsSchema>;
export type LocalOptions = z.output<typeof LocalOptionsSchema>;
