// src/wsdl/wsdlParser.ts
/**
 * Purpose:
 * - Turn a WSDL 1.1 document into the small set of facts the client needs:
 *   target namespace, service name, endpoint, element form, operations.
 *
 * Notes:
 * - Prefixes are stripped while parsing, so soap:/soap12:/wsdl: elements
 *   are matched by local name. QName attribute values ("tns:PingInput")
 *   keep their prefix and go through localName().
 * - Several bindings for one portType (SOAP 1.1 + 1.2) are common; the
 *   first binding that names an operation wins.
 */

import { XMLParser } from "fast-xml-parser";
import { ContractParseError } from "../problem/SoapClientError";
import {
  attr,
  children,
  firstChild,
  isRecord,
  localName,
  type XmlNode,
} from "../util/xmlTree";

export type OperationDescriptor = {
  name: string;
  soapAction: string;
  /** Local name of the element wrapping the message inside <Body>. */
  inputTag: string;
};

export type ParsedWsdl = {
  targetNamespace?: string;
  serviceName: string;
  endpoint?: string;
  elementFormDefault?: "qualified" | "unqualified";
  operations: OperationDescriptor[];
};

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
});

function parseDocument(xml: string): XmlNode {
  let tree: unknown;
  try {
    tree = parser.parse(xml, true);
  } catch (err) {
    throw new ContractParseError(
      `WSDL is not well-formed XML: ${err instanceof Error ? err.message : String(err)}`,
      err
    );
  }

  const root = isRecord(tree) ? tree["definitions"] : undefined;
  if (!isRecord(root)) {
    throw new ContractParseError(
      "WSDL has no <definitions> root element. Ops: check that the wsdl option points at a WSDL 1.1 document."
    );
  }
  return root;
}

/** message name → element local name of its first part (document style). */
function indexMessages(root: XmlNode): Map<string, string | undefined> {
  const out = new Map<string, string | undefined>();
  for (const message of children(root, "message")) {
    const name = attr(message, "name");
    if (!name) continue;
    const part = firstChild(message, "part");
    const element = part ? attr(part, "element") : undefined;
    out.set(name, element ? localName(element) : undefined);
  }
  return out;
}

/** portType operation name → input message name. */
function indexPortTypeInputs(root: XmlNode): Map<string, string> {
  const out = new Map<string, string>();
  for (const portType of children(root, "portType")) {
    for (const op of children(portType, "operation")) {
      const name = attr(op, "name");
      const input = firstChild(op, "input");
      const message = input ? attr(input, "message") : undefined;
      if (name && message && !out.has(name)) out.set(name, localName(message));
    }
  }
  return out;
}

function readOperations(root: XmlNode): OperationDescriptor[] {
  const messages = indexMessages(root);
  const inputs = indexPortTypeInputs(root);
  const seen = new Map<string, OperationDescriptor>();

  for (const binding of children(root, "binding")) {
    const soapBinding = firstChild(binding, "binding");
    const bindingStyle = soapBinding ? attr(soapBinding, "style") : undefined;

    for (const op of children(binding, "operation")) {
      const name = attr(op, "name");
      if (!name || seen.has(name)) continue;

      const soapOperation = firstChild(op, "operation");
      const soapAction = (soapOperation && attr(soapOperation, "soapAction")) || name;
      const style =
        (soapOperation && attr(soapOperation, "style")) ?? bindingStyle ?? "document";

      let inputTag = name;
      if (style !== "rpc") {
        const messageName = inputs.get(name);
        const element = messageName ? messages.get(messageName) : undefined;
        if (element) inputTag = element;
      }

      seen.set(name, { name, soapAction, inputTag });
    }
  }

  return [...seen.values()];
}

function readEndpoint(root: XmlNode): { serviceName?: string; endpoint?: string } {
  const service = firstChild(root, "service");
  if (!service) return {};
  for (const port of children(service, "port")) {
    const address = firstChild(port, "address");
    const location = address ? attr(address, "location") : undefined;
    if (location) return { serviceName: attr(service, "name"), endpoint: location };
  }
  return { serviceName: attr(service, "name") };
}

function readElementFormDefault(
  root: XmlNode
): "qualified" | "unqualified" | undefined {
  const types = firstChild(root, "types");
  const schema = types ? firstChild(types, "schema") : undefined;
  const form = schema ? attr(schema, "elementFormDefault") : undefined;
  return form === "qualified" || form === "unqualified" ? form : undefined;
}

export function parseWsdl(xml: string): ParsedWsdl {
  const root = parseDocument(xml);
  const { serviceName, endpoint } = readEndpoint(root);

  return {
    targetNamespace: attr(root, "targetNamespace"),
    serviceName: serviceName ?? attr(root, "name") ?? "",
    endpoint,
    elementFormDefault: readElementFormDefault(root),
    operations: readOperations(root),
  };
}
