// src/wsdl/WsdlContract.ts
/**
 * Purpose:
 * - Resolved service description held by a SoapClient for its lifetime.
 *
 * Invariants:
 * - Built once, never re-resolved, never mutated.
 * - Explicit `endpoint` / `namespace` options override what the document
 *   declares; without a document they are the only source.
 */

import type { OperationDescriptor, ParsedWsdl } from "./wsdlParser";

export class WsdlContract {
  private readonly document: ParsedWsdl | null;
  private readonly byName: ReadonlyMap<string, OperationDescriptor>;
  private readonly endpointOverride?: string;
  private readonly namespaceOverride?: string;

  public constructor(init: {
    document: ParsedWsdl | null;
    endpoint?: string;
    namespace?: string;
  }) {
    this.document = init.document;
    this.byName = new Map(
      (init.document?.operations ?? []).map((op) => [op.name, op])
    );
    this.endpointOverride = init.endpoint;
    this.namespaceOverride = init.namespace;
    Object.freeze(this);
  }

  public hasDocument(): boolean {
    return this.document !== null;
  }

  /** Operation names in document order; empty without a document. */
  public operationNames(): string[] {
    return [...this.byName.keys()];
  }

  public operation(name: string): OperationDescriptor | undefined {
    return this.byName.get(name);
  }

  public get serviceName(): string | undefined {
    return this.document?.serviceName;
  }

  public get namespace(): string | undefined {
    return this.namespaceOverride ?? this.document?.targetNamespace;
  }

  public get endpoint(): string | undefined {
    return this.endpointOverride ?? this.document?.endpoint;
  }

  public get elementFormDefault(): "qualified" | "unqualified" | undefined {
    return this.document?.elementFormDefault;
  }
}
