/**
 * Transport-level failures. The invocation core classifies these into
 * recovered values or a DokuWikiError.
 */

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** The server answered with an XML-RPC `<fault>`. */
export class XmlRpcFault extends TransportError {
  constructor(
    readonly faultCode: number,
    readonly faultString: string,
  ) {
    super(`Fault ${faultCode}: ${faultString}`);
    this.name = "XmlRpcFault";
  }
}

/** The response body is not a well-formed methodResponse. */
export class XmlRpcParseError extends TransportError {
  constructor(message: string) {
    super(message);
    this.name = "XmlRpcParseError";
  }
}

/** The server answered with a non-2xx HTTP status. */
export class HttpStatusError extends TransportError {
  constructor(
    readonly status: number,
    statusText: string,
  ) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpStatusError";
  }
}
