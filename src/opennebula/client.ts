/**
 * OpenNebula Client
 *
 * Typed read-only calls against the oned XML-RPC API. Every call returns
 * the parsed XML document oned sends back in its reply.
 */

import { XMLParser } from 'fast-xml-parser';

import { NotFoundError, RemoteFailureError } from '../core/errors.js';
import type { RawObject, RawValue } from '../core/types.js';
import type { RpcTransport } from './transport.js';
import type { XmlRpcValue } from './xmlrpc.js';
import { ONE_ERROR_CODES, type OneApi } from './types.js';

/**
 * Pool filter: every VM visible to the user, any state except DONE
 */
const ALL_RESOURCES = -2;
const ANY_STATE = -1;

const documentParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
});

/**
 * Convert parser output into the RawValue shape, dropping anything that is
 * not an element, list or leaf.
 */
function toRawValue(node: unknown): RawValue {
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (node === null || node === undefined) return '';
  if (Array.isArray(node)) return node.map(toRawValue);
  if (typeof node === 'object') {
    const element: RawObject = {};
    for (const [key, value] of Object.entries(node)) {
      element[key] = toRawValue(value);
    }
    return element;
  }
  return '';
}

/**
 * Parse an OpenNebula XML document and return its root element.
 *
 * @param xml - Document text
 * @param root - Expected root tag, e.g. `VNET`
 * @throws RemoteFailureError if the root element is missing
 */
export function parseOneDocument(xml: string, root: string, method: string): RawObject {
  let parsed: unknown;
  try {
    parsed = documentParser.parse(xml);
  } catch (error) {
    throw new RemoteFailureError(
      `${method} returned malformed XML: ${error instanceof Error ? error.message : String(error)}`,
      method
    );
  }

  const document = toRawValue(parsed);
  const element = typeof document === 'object' && !Array.isArray(document) ? document[root] : undefined;

  // An empty root (e.g. <VM_POOL/>) parses as ''
  if (element === '') {
    return {};
  }
  if (element === undefined || typeof element !== 'object' || Array.isArray(element)) {
    throw new RemoteFailureError(`${method} returned no ${root} element`, method);
  }
  return element;
}

/**
 * Wrap a single element or a list into a list of elements.
 */
export function toElementList(value: RawValue | undefined): RawObject[] {
  if (value === undefined || typeof value === 'string') return [];
  const items = Array.isArray(value) ? value : [value];
  return items.filter(
    (item): item is RawObject => typeof item === 'object' && !Array.isArray(item)
  );
}

/**
 * OpenNebula API client over an RPC transport.
 */
export class OneClient implements OneApi {
  private readonly transport: RpcTransport;
  private readonly session: string;

  /**
   * @param transport - Transport carrying the calls
   * @param session - `username:password` credential string
   */
  constructor(transport: RpcTransport, session: string) {
    this.transport = transport;
    this.session = session;
  }

  /**
   * Build the session string oned expects.
   */
  static session(username: string, password: string): string {
    return `${username}:${password}`;
  }

  async vmPoolInfoExtended(): Promise<RawObject[]> {
    const body = await this.request('one.vmpool.infoextended', [
      ALL_RESOURCES,
      ANY_STATE,
      ANY_STATE,
      ANY_STATE,
    ]);
    const pool = parseOneDocument(body, 'VM_POOL', 'one.vmpool.infoextended');
    return toElementList(pool['VM']);
  }

  async templateInfo(id: number): Promise<RawObject> {
    const body = await this.request('one.template.info', [id], id);
    return parseOneDocument(body, 'VMTEMPLATE', 'one.template.info');
  }

  async vnInfo(id: number): Promise<RawObject> {
    const body = await this.request('one.vn.info', [id], id);
    return parseOneDocument(body, 'VNET', 'one.vn.info');
  }

  /**
   * Call a method and unwrap oned's `[success, body, errorCode]` reply.
   *
   * @throws NotFoundError when oned reports the object does not exist
   * @throws RemoteFailureError for every other failure
   */
  private async request(
    method: string,
    params: XmlRpcValue[],
    objectId?: number
  ): Promise<string> {
    const reply = await this.transport.call(method, [this.session, ...params]);

    if (!Array.isArray(reply) || reply.length < 2 || typeof reply[0] !== 'boolean') {
      throw new RemoteFailureError(`${method} returned an unexpected reply`, method);
    }

    const [success, body, code] = reply;
    const message = typeof body === 'string' ? body : String(body);

    if (!success) {
      const errorCode = typeof code === 'number' ? code : undefined;
      if (errorCode === ONE_ERROR_CODES.NO_EXISTS) {
        throw new NotFoundError(message, method, objectId);
      }
      throw new RemoteFailureError(message, method, errorCode);
    }

    if (typeof body !== 'string') {
      throw new RemoteFailureError(`${method} returned a non-string body`, method);
    }
    return body;
  }
}
