/**
 * dokuwiki-rpc: DokuWiki XML-RPC client
 */

export { DokuWiki, BENIGN_PARSE_ERROR, buildParams } from "./client.js";
export { resolveConfig, DokuWikiConfigSchema } from "./config.js";
export type { ResolvedConfig } from "./config.js";
export {
  EMPTY_ARRAY_FAULT,
  EMPTY_STRUCT_FAULT,
  ACCESS_DENIED_FAULT,
} from "./commands.js";
export type {
  CommandTable,
  CommandName,
  CommandArgs,
  CommandOptions,
  CommandResult,
  CommandInvoker,
} from "./commands.js";
export { DokuWikiError, DokuWikiConfigError, DokuWikiAuthError, FileExistsError } from "./errors.js";
export { Pages } from "./pages.js";
export { Media, mediaFilename } from "./media.js";
export type { MediaGetOptions, MediaSaveOptions, MediaPutOptions, MediaSetOptions } from "./media.js";
export { Structs } from "./structs.js";
export type { AggregationOptions } from "./structs.js";
export { parseDataentry, generateDataentry, stripDataentry } from "./dataentry.js";
export type { DataentryValue, ParseDataentryOptions } from "./dataentry.js";
export { toDate, utcToLocal } from "./dates.js";
export { XmlRpcTransport } from "./transport/http.js";
export type { Transport, XmlRpcTransportOptions } from "./transport/http.js";
export { CookieJar } from "./transport/cookies.js";
export { TransportError, XmlRpcFault, XmlRpcParseError, HttpStatusError } from "./transport/errors.js";
export { encodeMethodCall, decodeMethodResponse } from "./transport/xmlrpc.js";
export { XmlRpcDateTime } from "./types.js";
export type {
  DokuWikiConfig,
  TransportOptions,
  XmlRpcValue,
  XmlRpcStruct,
  PageListOptions,
  PutPageOptions,
  AttachmentListOptions,
  PutAttachmentOptions,
  SetLocksOptions,
  PageListItem,
  RecentChange,
  SearchResult,
  PageVersion,
  PageInfo,
  PageLink,
  LockResult,
  AttachmentListItem,
  AttachmentInfo,
  StructValues,
  StructData,
  StructColumn,
  StructFilter,
  RpcResult,
} from "./types.js";
