/**
 * Remote procedures of the DokuWiki XML-RPC API, with the positional
 * arguments, trailing options structure and result each one takes.
 */

import type {
  AttachmentInfo,
  AttachmentListItem,
  AttachmentListOptions,
  LockResult,
  PageInfo,
  PageLink,
  PageListItem,
  PageListOptions,
  PageVersion,
  PutAttachmentOptions,
  PutPageOptions,
  RecentChange,
  SearchResult,
  SetLocksOptions,
  StructColumn,
  StructData,
  StructFilter,
  RpcResult,
  XmlRpcValue,
} from "./types.js";

interface Command<Args extends readonly XmlRpcValue[], Result, Options = never> {
  args: Args;
  options: Options;
  result: Result;
}

export interface CommandTable {
  // server
  "dokuwiki.getVersion": Command<[], string>;
  "dokuwiki.getTime": Command<[], number>;
  "dokuwiki.getXMLRPCAPIVersion": Command<[], number>;
  "wiki.getRPCVersionSupported": Command<[], number>;
  "dokuwiki.getTitle": Command<[], string>;
  "dokuwiki.login": Command<[user: string, password: string], boolean>;

  // acl
  "plugin.acl.addAcl": Command<[scope: string, user: string, permission: number], boolean>;
  "plugin.acl.delAcl": Command<[scope: string, user: string], boolean>;

  // pages
  "dokuwiki.getPagelist": Command<[namespace: string], PageListItem[], PageListOptions>;
  "wiki.getRecentChanges": Command<[timestamp: number], RecentChange[]>;
  "dokuwiki.search": Command<[query: string], SearchResult[]>;
  "wiki.getPageVersions": Command<[page: string, offset: number], PageVersion[]>;
  "wiki.getPageInfo": Command<[page: string], PageInfo>;
  "wiki.getPageInfoVersion": Command<[page: string, version: number], PageInfo>;
  "wiki.getPage": Command<[page: string], string>;
  "wiki.getPageVersion": Command<[page: string, version: number], string>;
  "wiki.getPageHTML": Command<[page: string], string>;
  "wiki.getPageHTMLVersion": Command<[page: string, version: number], string>;
  "dokuwiki.appendPage": Command<[page: string, content: string], boolean, PutPageOptions>;
  "wiki.putPage": Command<[page: string, content: string], boolean, PutPageOptions>;
  "dokuwiki.setLocks": Command<[], LockResult, SetLocksOptions>;
  "wiki.aclCheck": Command<[page: string], number>;
  "wiki.listLinks": Command<[page: string], PageLink[]>;
  "wiki.getBackLinks": Command<[page: string], string[]>;

  // media
  "wiki.getAttachments": Command<[namespace: string], AttachmentListItem[], AttachmentListOptions>;
  "wiki.getRecentMediaChanges": Command<[timestamp: number], RecentChange[]>;
  "wiki.getAttachment": Command<[media: string], Buffer | string>;
  "wiki.getAttachmentInfo": Command<[media: string], AttachmentInfo>;
  "wiki.putAttachment": Command<[media: string, data: Buffer | string], XmlRpcValue, PutAttachmentOptions>;
  "wiki.deleteAttachment": Command<[media: string], XmlRpcValue>;

  // struct plugin
  "plugin.struct.getData": Command<[page: string, schema: string, timestamp: number], StructData>;
  "plugin.struct.saveData": Command<
    [page: string, data: StructData, summary: string, minor: boolean],
    boolean
  >;
  "plugin.struct.getSchema": Command<[] | [schema: string], Record<string, StructColumn[]>>;
  "plugin.struct.getAggregationData": Command<
    [schemas: string[], columns: string[], filter: StructFilter[], sort: string],
    Record<string, string>[]
  >;
}

export type CommandName = keyof CommandTable;
export type CommandArgs<C extends CommandName> = CommandTable[C]["args"];
export type CommandOptions<C extends CommandName> = CommandTable[C]["options"];
export type CommandResult<C extends CommandName> = CommandTable[C]["result"];

/** Fault code DokuWiki uses for "no results" where a struct was expected. */
export const EMPTY_STRUCT_FAULT = 121;

/** Fault code DokuWiki uses for "no results" where an array was expected. */
export const EMPTY_ARRAY_FAULT = 321;

/** Fault code for a call the authenticated user may not make. */
export const ACCESS_DENIED_FAULT = -32604;

/**
 * The invocation primitive the resource groups are built on. Any command
 * may resolve to `undefined`; see `RpcResult`.
 */
export interface CommandInvoker {
  invoke<C extends CommandName>(
    command: C,
    args: CommandArgs<C>,
    options?: CommandOptions<C>,
  ): Promise<RpcResult<CommandResult<C>>>;
}
