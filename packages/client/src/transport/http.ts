/**
 * XML-RPC over HTTP POST, via fetch.
 */

import type { TransportOptions, XmlRpcValue } from "../types.js";
import type { CookieJar } from "./cookies.js";
import { HttpStatusError, TransportError } from "./errors.js";
import { decodeMethodResponse, encodeMethodCall } from "./xmlrpc.js";

/**
 * The raw call-and-response exchange the invocation core depends on.
 * Resolves with the decoded value or rejects with a TransportError.
 */
export interface Transport {
  call(procedure: string, params: readonly XmlRpcValue[]): Promise<XmlRpcValue>;
}

export interface XmlRpcTransportOptions extends TransportOptions {
  endpoint: string;

  /** Cookie session state. Cookies are neither sent nor stored without it. */
  cookies?: CookieJar;
}

export class XmlRpcTransport implements Transport {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs?: number;
  readonly cookies?: CookieJar;

  constructor(options: XmlRpcTransportOptions) {
    this.endpoint = options.endpoint;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs;
    this.cookies = options.cookies;
  }

  async call(procedure: string, params: readonly XmlRpcValue[]): Promise<XmlRpcValue> {
    const headers: Record<string, string> = {
      "Content-Type": "text/xml",
      ...this.headers,
    };
    const cookie = this.cookies?.header();
    if (cookie) headers.Cookie = cookie;

    let body: string;
    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers,
        body: encodeMethodCall(procedure, params),
        signal: this.timeoutMs !== undefined ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });

      this.cookies?.update(response.headers.getSetCookie());

      if (!response.ok) {
        await response.body?.cancel();
        throw new HttpStatusError(response.status, response.statusText);
      }
      body = await response.text();
    } catch (err) {
      if (err instanceof TransportError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`${procedure}: request failed: ${reason}`, { cause: err });
    }

    return decodeMethodResponse(body);
  }
}
