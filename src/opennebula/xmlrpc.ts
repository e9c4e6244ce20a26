/**
 * XML-RPC Codec
 *
 * Encodes method calls and decodes method responses exchanged with oned.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';

/**
 * Any value that can travel over XML-RPC
 */
export type XmlRpcValue =
  | string
  | number
  | boolean
  | null
  | XmlRpcValue[]
  | { [key: string]: XmlRpcValue };

/**
 * Decoded method response - either the single return value or a fault
 */
export type MethodResponse =
  | { kind: 'params'; value: XmlRpcValue }
  | { kind: 'fault'; code: number; message: string };

/**
 * Error thrown when a response body is not a well-formed methodResponse
 */
export class XmlRpcProtocolError extends Error {
  constructor(message: string, public readonly body?: string) {
    super(message);
    this.name = 'XmlRpcProtocolError';
  }
}

// Elements that may repeat inside their parent
const REPEATED_TAGS = new Set(['param', 'value', 'member']);

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (name: string) => REPEATED_TAGS.has(name),
});

const builder = new XMLBuilder({
  ignoreAttributes: true,
  format: false,
});

type Node = Record<string, unknown>;

function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

// =============================================================================
// Encoding
// =============================================================================

function encodeValue(value: XmlRpcValue): Node {
  if (value === null) {
    return { nil: '' };
  }
  if (typeof value === 'string') {
    return { string: value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { int: value } : { double: value };
  }
  if (typeof value === 'boolean') {
    return { boolean: value ? 1 : 0 };
  }
  if (Array.isArray(value)) {
    return { array: { data: { value: value.map(encodeValue) } } };
  }
  return {
    struct: {
      member: Object.entries(value).map(([name, member]) => ({
        name,
        value: encodeValue(member),
      })),
    },
  };
}

/**
 * Build a methodCall document.
 *
 * @param method - Remote method name, e.g. `one.vn.info`
 * @param params - Positional parameters
 * @returns XML request body
 */
export function encodeMethodCall(method: string, params: readonly XmlRpcValue[]): string {
  const body: string = builder.build({
    methodCall: {
      methodName: method,
      params: { param: params.map((param) => ({ value: encodeValue(param) })) },
    },
  });
  return `<?xml version="1.0"?>${body}`;
}

// =============================================================================
// Decoding
// =============================================================================

function decodeScalar(type: string, raw: unknown): XmlRpcValue {
  const text = typeof raw === 'string' ? raw : raw === undefined ? '' : String(raw);

  switch (type) {
    case 'string':
      return text;
    case 'int':
    case 'i4':
    case 'i8': {
      const parsed = Number.parseInt(text.trim(), 10);
      if (Number.isNaN(parsed)) {
        throw new XmlRpcProtocolError(`Invalid ${type} value: ${text}`);
      }
      return parsed;
    }
    case 'double': {
      const parsed = Number.parseFloat(text.trim());
      if (Number.isNaN(parsed)) {
        throw new XmlRpcProtocolError(`Invalid double value: ${text}`);
      }
      return parsed;
    }
    case 'boolean':
      return text.trim() === '1' || text.trim().toLowerCase() === 'true';
    case 'nil':
      return null;
    case 'dateTime.iso8601':
    case 'base64':
      return text.trim();
    default:
      throw new XmlRpcProtocolError(`Unsupported XML-RPC type: ${type}`);
  }
}

function decodeValue(node: unknown): XmlRpcValue {
  // Untyped <value>text</value> is a string
  if (typeof node === 'string') {
    return node;
  }
  if (!isNode(node)) {
    return '';
  }

  const type = Object.keys(node).find((key) => key !== '#text');
  if (type === undefined) {
    return '';
  }
  const content = node[type];

  if (type === 'array') {
    const data = isNode(content) ? content['data'] : undefined;
    const values = isNode(data) ? toArray(data['value']) : [];
    return values.map(decodeValue);
  }

  if (type === 'struct') {
    const result: { [key: string]: XmlRpcValue } = {};
    const members = isNode(content) ? toArray(content['member']) : [];
    for (const member of members) {
      if (!isNode(member)) continue;
      const name = typeof member['name'] === 'string' ? member['name'] : String(member['name'] ?? '');
      const [value] = toArray(member['value']);
      result[name] = decodeValue(value);
    }
    return result;
  }

  return decodeScalar(type, content);
}

/**
 * Parse a methodResponse document.
 *
 * @param xml - Response body
 * @returns The return value or the fault
 * @throws XmlRpcProtocolError if the document is not a methodResponse
 */
export function decodeMethodResponse(xml: string): MethodResponse {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    throw new XmlRpcProtocolError(
      `Malformed XML-RPC response: ${error instanceof Error ? error.message : String(error)}`,
      xml
    );
  }

  const response = isNode(document) ? document['methodResponse'] : undefined;
  if (!isNode(response)) {
    throw new XmlRpcProtocolError('Response is not an XML-RPC methodResponse', xml);
  }

  const fault = response['fault'];
  if (isNode(fault)) {
    const [faultValue] = toArray(fault['value']);
    const decoded = decodeValue(faultValue);
    const struct: { [key: string]: XmlRpcValue } =
      decoded !== null && typeof decoded === 'object' && !Array.isArray(decoded) ? decoded : {};
    const code = struct['faultCode'];
    const message = struct['faultString'];
    return {
      kind: 'fault',
      code: typeof code === 'number' ? code : -1,
      message: typeof message === 'string' ? message : 'Unknown XML-RPC fault',
    };
  }

  const params = response['params'];
  const [param] = isNode(params) ? toArray(params['param']) : [];
  if (!isNode(param)) {
    throw new XmlRpcProtocolError('XML-RPC response carries no return value', xml);
  }
  const [value] = toArray(param['value']);
  return { kind: 'params', value: decodeValue(value) };
}
