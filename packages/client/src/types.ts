/**
 * DokuWiki RPC client types
 */

/**
 * A `dateTime.iso8601` value exactly as the server sent it.
 * The text format differs between DokuWiki releases; see `toDate()`.
 */
export class XmlRpcDateTime {
  constructor(readonly value: string) {}

  toString(): string {
    return this.value;
  }
}

/**
 * Any value the XML-RPC wire format can carry.
 */
export type XmlRpcValue =
  | string
  | number
  | boolean
  | null
  | Buffer
  | Date
  | XmlRpcDateTime
  | XmlRpcValue[]
  | XmlRpcStruct;

export interface XmlRpcStruct {
  [member: string]: XmlRpcValue | undefined;
}

/**
 * Tuning passed through to the transport adapter.
 */
export interface TransportOptions {
  /** Extra HTTP headers sent with every request. */
  headers?: Record<string, string>;

  /** Abort a request after this many milliseconds. */
  timeoutMs?: number;
}

/**
 * Configuration for the DokuWiki client.
 */
export interface DokuWikiConfig {
  /**
   * Base URL of the wiki, scheme included (e.g. "https://wiki.example.org").
   * The XML-RPC endpoint path is appended.
   */
  url: string;

  user: string;

  password: string;

  /**
   * Log in once and keep the session cookies, instead of sending the
   * credentials in the query string of every request.
   * @default false
   */
  cookieAuth?: boolean;

  /**
   * Log every command and every recovered fault to the console.
   * @default false
   */
  debug?: boolean;

  transport?: TransportOptions;
}

// --- per-command options ---
// Object type aliases, so they stay assignable to XmlRpcStruct.

export type PageListOptions = {
  /** Recursion level, 0 for all. */
  depth?: number;
  /** Add an md5 sum of the content. */
  hash?: boolean;
  /** List everything regardless of ACL. */
  skipacl?: boolean;
};

export type PutPageOptions = {
  /** Change summary. */
  sum?: string;
  minor?: boolean;
};

export type AttachmentListOptions = {
  depth?: number;
  skipacl?: boolean;
  /** Regular expression the media ids must match. */
  pattern?: string;
  hash?: boolean;
};

export type PutAttachmentOptions = {
  /** Overwrite the media if it already exists remotely. */
  ow?: boolean;
};

export type SetLocksOptions = {
  lock: string[];
  unlock: string[];
};

// --- results ---

export interface PageListItem {
  id: string;
  rev: number;
  mtime: number;
  size: number;
  hash?: string;
}

export interface RecentChange {
  name: string;
  lastModified: number;
  author: string;
  version: number;
  perms: number;
  size: number;
}

export interface SearchResult {
  id: string;
  score: number;
  rev: number;
  mtime: number;
  size: number;
  snippet: string;
  title: string;
}

export interface PageVersion {
  user: string;
  ip: string;
  type: string;
  sum: string;
  modified: XmlRpcDateTime;
  version: number;
}

export interface PageInfo {
  name: string;
  lastModified: XmlRpcDateTime;
  author: string;
  version: number;
}

export interface PageLink {
  type: "local" | "extern";
  page: string;
  href: string;
}

export interface LockResult {
  locked: string[];
  lockfail: string[];
  unlocked: string[];
  unlockfail: string[];
}

export interface AttachmentListItem {
  id: string;
  size: number;
  lastModified: XmlRpcDateTime;
  isimg: boolean;
  writable: boolean;
  perms: number;
  hash?: string;
}

export interface AttachmentInfo {
  lastModified: XmlRpcDateTime;
  size: number;
}

/** Field values of one struct schema, keyed by field name. */
export type StructValues = Record<string, string | string[]>;

/** Struct data of a page, keyed by schema name. */
export type StructData = Record<string, StructValues>;

export interface StructColumn {
  ismulti: boolean;
  label: string;
  type: string;
  hint?: string;
}

export type StructFilter = {
  logic: "and" | "or";
  condition: string;
};

/**
 * Result of a remote command. `undefined` when the server answered with a
 * blank line before the XML declaration: the call went through but no
 * value can be read from the response.
 */
export type RpcResult<T> = T | undefined;
