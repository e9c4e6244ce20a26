/**
 * XML-RPC HTTP Transport
 *
 * POSTs encoded method calls to the oned endpoint and decodes the replies.
 */

import { MissingDependencyError, RemoteFailureError } from '../core/errors.js';
import type { Diagnostics } from '../lib/logger.js';
import { silentDiagnostics } from '../lib/logger.js';
import {
  decodeMethodResponse,
  encodeMethodCall,
  XmlRpcProtocolError,
  type MethodResponse,
  type XmlRpcValue,
} from './xmlrpc.js';

/**
 * Anything that can carry a method call to oned and return its value
 */
export interface RpcTransport {
  call(method: string, params: readonly XmlRpcValue[]): Promise<XmlRpcValue>;
}

/**
 * Minimal response surface the transport reads
 */
export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * Minimal fetch signature, so tests can pass an in-process stand-in
 */
export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
  }
) => Promise<FetchResponseLike>;

/**
 * Options for constructing an HttpTransport
 */
export interface HttpTransportOptions {
  /** XML-RPC endpoint, e.g. http://localhost:2633/RPC2 */
  url: string;
  /** Per-request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** fetch implementation (default: the global fetch) */
  fetch?: FetchLike;
  diagnostics?: Diagnostics;
}

/**
 * Resolve the fetch implementation to use.
 *
 * @throws MissingDependencyError when none is given and the runtime has no global fetch
 */
function resolveFetch(candidate?: FetchLike): FetchLike {
  if (candidate) {
    return candidate;
  }
  if (typeof globalThis.fetch !== 'function') {
    throw new MissingDependencyError(
      'The OpenNebula client requires a global fetch implementation',
      'fetch'
    );
  }
  return (url, init) => globalThis.fetch(url, init);
}

/**
 * Sends XML-RPC calls over HTTP.
 */
export class HttpTransport implements RpcTransport {
  private readonly url: string;
  private readonly timeout: number;
  private readonly fetch: FetchLike;
  private readonly diagnostics: Diagnostics;

  constructor(options: HttpTransportOptions) {
    this.url = options.url;
    this.timeout = options.timeout ?? 30000;
    this.fetch = resolveFetch(options.fetch);
    this.diagnostics = options.diagnostics ?? silentDiagnostics;
  }

  /**
   * Call a remote method.
   *
   * @param method - Remote method name
   * @param params - Positional parameters (the first is usually the session)
   * @returns The method's return value
   * @throws RemoteFailureError on network errors, HTTP errors, faults and malformed replies
   */
  async call(method: string, params: readonly XmlRpcValue[]): Promise<XmlRpcValue> {
    this.diagnostics.vvvv(`XML-RPC ${method} -> ${this.url}`);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    let bodyText: string;

    try {
      const response = await this.fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'text/xml' },
        body: encodeMethodCall(method, params),
        signal: controller.signal,
      });
      bodyText = await response.text();

      if (!response.ok) {
        throw new RemoteFailureError(
          `${method} failed with HTTP ${response.status} ${response.statusText}`.trim(),
          method
        );
      }
    } catch (error) {
      if (error instanceof RemoteFailureError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new RemoteFailureError(`${method} timed out after ${this.timeout}ms`, method);
      }
      throw new RemoteFailureError(
        `${method} could not reach ${this.url}: ${error instanceof Error ? error.message : String(error)}`,
        method
      );
    } finally {
      clearTimeout(timeoutId);
    }

    let decoded: MethodResponse;
    try {
      decoded = decodeMethodResponse(bodyText);
    } catch (error) {
      if (error instanceof XmlRpcProtocolError) {
        throw new RemoteFailureError(`${method}: ${error.message}`, method);
      }
      throw error;
    }

    if (decoded.kind === 'fault') {
      throw new RemoteFailureError(
        `${method} fault ${decoded.code}: ${decoded.message}`,
        method,
        decoded.code
      );
    }
    return decoded.value;
  }
}
