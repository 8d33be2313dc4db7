/**
 * Errors raised by the DokuWiki client.
 */

export interface DokuWikiErrorDetails {
  /** XML-RPC fault code, when the server answered with a fault. */
  faultCode?: number;
  /** HTTP status, when the server answered with a non-2xx status. */
  status?: number;
  cause?: unknown;
}

/**
 * The one error kind callers see for remote failures: faults, malformed
 * responses and transport failures.
 */
export class DokuWikiError extends Error {
  readonly faultCode?: number;
  readonly status?: number;

  constructor(message: string, details: DokuWikiErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.name = "DokuWikiError";
    this.faultCode = details.faultCode;
    this.status = details.status;
  }
}

/** Invalid client configuration. Raised before any network activity. */
export class DokuWikiConfigError extends DokuWikiError {
  constructor(message: string) {
    super(message);
    this.name = "DokuWikiConfigError";
  }
}

/** Credentials rejected while opening the session. */
export class DokuWikiAuthError extends DokuWikiError {
  constructor(message: string, details: DokuWikiErrorDetails = {}) {
    super(message, details);
    this.name = "DokuWikiAuthError";
  }
}

/** A media download would overwrite an existing local file. */
export class FileExistsError extends Error {
  readonly code = "EEXIST";

  constructor(readonly path: string) {
    super(`File exists: '${path}'`);
    this.name = "FileExistsError";
  }
}
