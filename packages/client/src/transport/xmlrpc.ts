/**
 * XML-RPC wire codec: methodCall encoding, methodResponse decoding.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { XmlRpcDateTime } from "../types.js";
import type { XmlRpcStruct, XmlRpcValue } from "../types.js";
import { XmlRpcFault, XmlRpcParseError } from "./errors.js";

export const DECLARATION_NOT_AT_START = "XML or text declaration not at start of entity";

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: false,
  processEntities: true,
  htmlEntities: true,
});

// --- encoding ---

function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Format as `YYYYMMDDTHH:MM:SS` in UTC. */
export function formatDateTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

function encodeNumber(value: number): string {
  if (Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
    return `<int>${value}</int>`;
  }
  return `<double>${value}</double>`;
}

function encodeStruct(struct: XmlRpcStruct): string {
  let members = "";
  for (const [name, member] of Object.entries(struct)) {
    if (member === undefined) continue;
    members += `<member><name>${escapeXml(name)}</name>${encodeValue(member)}</member>`;
  }
  return `<struct>${members}</struct>`;
}

export function encodeValue(value: XmlRpcValue): string {
  let inner: string;
  if (value === null) {
    inner = "<nil/>";
  } else if (typeof value === "string") {
    inner = `<string>${escapeXml(value)}</string>`;
  } else if (typeof value === "number") {
    inner = encodeNumber(value);
  } else if (typeof value === "boolean") {
    inner = `<boolean>${value ? 1 : 0}</boolean>`;
  } else if (Buffer.isBuffer(value)) {
    inner = `<base64>${value.toString("base64")}</base64>`;
  } else if (value instanceof Date) {
    inner = `<dateTime.iso8601>${formatDateTime(value)}</dateTime.iso8601>`;
  } else if (value instanceof XmlRpcDateTime) {
    inner = `<dateTime.iso8601>${escapeXml(value.value)}</dateTime.iso8601>`;
  } else if (Array.isArray(value)) {
    inner = `<array><data>${value.map(encodeValue).join("")}</data></array>`;
  } else {
    inner = encodeStruct(value);
  }
  return `<value>${inner}</value>`;
}

export function encodeMethodCall(method: string, params: readonly XmlRpcValue[]): string {
  const encoded = params.map((param) => `<param>${encodeValue(param)}</param>`).join("");
  return (
    `<?xml version="1.0"?>\n` +
    `<methodCall><methodName>${escapeXml(method)}</methodName><params>${encoded}</params></methodCall>`
  );
}

// --- decoding ---

// fast-xml-parser's order-preserving output: every node is an object with one
// tag key holding its children, or a "#text" key holding character data.
type XmlNode = Record<string, unknown>;
type XmlElement = [tag: string, children: XmlNode[]];

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodes(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function elementsOf(nodes: XmlNode[]): XmlElement[] {
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    const tag = Object.keys(node).find((key) => key !== "#text" && key !== ":@");
    if (tag !== undefined) elements.push([tag, toNodes(node[tag])]);
  }
  return elements;
}

function childrenNamed(nodes: XmlNode[], tag: string): XmlNode[][] {
  return elementsOf(nodes)
    .filter(([name]) => name === tag)
    .map(([, children]) => children);
}

function textOf(nodes: XmlNode[]): string {
  let text = "";
  for (const node of nodes) {
    const data = node["#text"];
    if (data !== undefined) text += String(data);
  }
  return text;
}

function parseInteger(text: string): number {
  const value = Number.parseInt(text.trim(), 10);
  if (Number.isNaN(value)) {
    throw new XmlRpcParseError(`invalid integer value: '${text}'`);
  }
  return value;
}

function decodeStruct(nodes: XmlNode[]): XmlRpcStruct {
  const struct: XmlRpcStruct = {};
  for (const member of childrenNamed(nodes, "member")) {
    const [name] = childrenNamed(member, "name");
    const [value] = childrenNamed(member, "value");
    if (name === undefined || value === undefined) {
      throw new XmlRpcParseError("struct member without name or value");
    }
    struct[textOf(name)] = decodeValue(value);
  }
  return struct;
}

function decodeValue(nodes: XmlNode[]): XmlRpcValue {
  const [typed] = elementsOf(nodes);
  if (typed === undefined) return textOf(nodes);

  const [tag, inner] = typed;
  switch (tag) {
    case "i4":
    case "i8":
    case "int":
      return parseInteger(textOf(inner));
    case "double":
      return Number(textOf(inner).trim());
    case "boolean":
      return textOf(inner).trim() === "1";
    case "string":
      return textOf(inner);
    case "base64":
      return Buffer.from(textOf(inner).replace(/\s+/g, ""), "base64");
    case "dateTime.iso8601":
      return new XmlRpcDateTime(textOf(inner).trim());
    case "nil":
      return null;
    case "array": {
      const [data] = childrenNamed(inner, "data");
      return data === undefined ? [] : childrenNamed(data, "value").map(decodeValue);
    }
    case "struct":
      return decodeStruct(inner);
    default:
      throw new XmlRpcParseError(`unsupported value type <${tag}>`);
  }
}

export function isStruct(value: XmlRpcValue | undefined): value is XmlRpcStruct {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !Buffer.isBuffer(value) &&
    !(value instanceof Date) &&
    !(value instanceof XmlRpcDateTime)
  );
}

function toFault(value: XmlRpcValue): XmlRpcFault {
  if (!isStruct(value)) {
    throw new XmlRpcParseError("fault without a struct value");
  }
  const { faultCode, faultString } = value;
  if (typeof faultCode !== "number") {
    throw new XmlRpcParseError("fault without a numeric faultCode");
  }
  return new XmlRpcFault(faultCode, typeof faultString === "string" ? faultString : "");
}

/**
 * A strict parser rejects anything before the XML declaration, including
 * the blank line some DokuWiki releases emit after successful writes.
 */
function assertDeclarationAtStart(body: string): void {
  const at = body.indexOf("<?xml");
  if (at <= 0) return;
  const before = body.slice(0, at);
  const line = before.split("\n").length;
  const column = at - (before.lastIndexOf("\n") + 1);
  throw new XmlRpcParseError(`${DECLARATION_NOT_AT_START}: line ${line}, column ${column}`);
}

/**
 * Decode a methodResponse body. Throws XmlRpcFault for a `<fault>` answer
 * and XmlRpcParseError for anything malformed.
 */
export function decodeMethodResponse(body: string): XmlRpcValue {
  assertDeclarationAtStart(body);

  const validation = XMLValidator.validate(body);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlRpcParseError(`${msg}: line ${line}, column ${col}`);
  }

  const document: unknown = parser.parse(body);
  const [response] = childrenNamed(toNodes(document), "methodResponse");
  if (response === undefined) {
    throw new XmlRpcParseError("missing <methodResponse> element");
  }

  const [fault] = childrenNamed(response, "fault");
  if (fault !== undefined) {
    const [value] = childrenNamed(fault, "value");
    if (value === undefined) throw new XmlRpcParseError("fault without a value");
    throw toFault(decodeValue(value));
  }

  const [params] = childrenNamed(response, "params");
  const [param] = params === undefined ? [] : childrenNamed(params, "param");
  const [value] = param === undefined ? [] : childrenNamed(param, "value");
  if (value === undefined) {
    throw new XmlRpcParseError("methodResponse without a value");
  }
  return decodeValue(value);
}
