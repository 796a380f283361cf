// src/options/GlobalOptions.ts
/**
 * Purpose:
 * - Raw, not-yet-validated client options as seen by a customization block.
 *
 * Usage:
 *   await SoapClient.create({ wsdl: "service.wsdl" }, (globals) => {
 *     globals.set("timeoutMs", 5_000).set("log", true);
 *   });
 *
 * Notes:
 * - Only exists during SoapClient.create(); the client keeps the parsed
 *   ClientOptions, never this builder.
 */

import type { ClientOptionsInput } from "../contracts/clientOptions.contract";

export type OptionsBlock = (globals: GlobalOptions) => void;

export class GlobalOptions {
  private readonly values: ClientOptionsInput;

  public constructor(initial: ClientOptionsInput = {}) {
    this.values = { ...initial };
  }

  public set<K extends keyof ClientOptionsInput>(
    key: K,
    value: ClientOptionsInput[K]
  ): this {
    this.values[key] = value;
    return this;
  }

  public get<K extends keyof ClientOptionsInput>(
    key: K
  ): ClientOptionsInput[K] {
    return this.values[key];
  }

  /** True when the key was given a value (undefined counts as absent). */
  public include(key: keyof ClientOptionsInput): boolean {
    return this.values[key] !== undefined;
  }

  public toInput(): ClientOptionsInput {
    return { ...this.values };
  }
}
