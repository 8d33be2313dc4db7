/**
 * Client session for the DokuWiki XML-RPC API.
 */

import { ACCESS_DENIED_FAULT, EMPTY_ARRAY_FAULT, EMPTY_STRUCT_FAULT } from "./commands.js";
import type { CommandArgs, CommandInvoker, CommandName, CommandOptions, CommandResult } from "./commands.js";
import { resolveConfig } from "./config.js";
import type { ResolvedConfig } from "./config.js";
import { DokuWikiAuthError, DokuWikiError } from "./errors.js";
import { Media } from "./media.js";
import { Pages } from "./pages.js";
import { Structs } from "./structs.js";
import { CookieJar } from "./transport/cookies.js";
import { HttpStatusError, TransportError, XmlRpcFault, XmlRpcParseError } from "./transport/errors.js";
import { XmlRpcTransport } from "./transport/http.js";
import type { Transport } from "./transport/http.js";
import { DECLARATION_NOT_AT_START } from "./transport/xmlrpc.js";
import type { DokuWikiConfig, RpcResult, XmlRpcStruct, XmlRpcValue } from "./types.js";

/**
 * Parse error raised for the blank line DokuWiki sometimes sends before the
 * XML declaration. The call itself went through.
 */
export const BENIGN_PARSE_ERROR = `${DECLARATION_NOT_AT_START}: line 2, column 0`;

/**
 * Positional arguments, then the options as one trailing struct when any
 * option is set.
 */
export function buildParams(args: readonly XmlRpcValue[], options?: XmlRpcStruct): XmlRpcValue[] {
  const params: XmlRpcValue[] = [...args];
  if (options === undefined) return params;

  const trailing: XmlRpcStruct = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) trailing[key] = value;
  }
  if (Object.keys(trailing).length > 0) params.push(trailing);
  return params;
}

export class DokuWiki implements CommandInvoker {
  readonly pages: Pages;
  readonly media: Media;
  readonly structs: Structs;

  /** Session cookies, in cookie authentication mode with the default transport. */
  readonly cookies?: CookieJar;

  private readonly config: ResolvedConfig;
  private readonly transport: Transport;

  /**
   * Validates `config` without any network activity. Call `connect()` (or
   * use `DokuWiki.connect()`) to open the session.
   */
  constructor(config: DokuWikiConfig, transport?: Transport) {
    this.config = resolveConfig(config);

    if (transport) {
      this.transport = transport;
    } else {
      this.cookies = this.config.cookieAuth ? new CookieJar() : undefined;
      this.transport = new XmlRpcTransport({
        endpoint: this.config.endpoint,
        headers: this.config.transport.headers,
        timeoutMs: this.config.transport.timeoutMs,
        cookies: this.cookies,
      });
    }

    this.pages = new Pages(this);
    this.media = new Media(this);
    this.structs = new Structs(this);
  }

  static async connect(config: DokuWikiConfig, transport?: Transport): Promise<DokuWiki> {
    const wiki = new DokuWiki(config, transport);
    await wiki.connect();
    return wiki;
  }

  /**
   * Open the session: log in when cookie authentication is on, otherwise
   * probe the server with the credentials carried in the endpoint URI.
   */
  async connect(): Promise<void> {
    const { user, password, cookieAuth } = this.config;

    if (cookieAuth) {
      if (!(await this.login(user, password))) {
        throw new DokuWikiAuthError("invalid login or password!");
      }
      return;
    }

    try {
      await this.version();
    } catch (err) {
      if (
        err instanceof DokuWikiError &&
        (err.status === 401 || err.status === 403 || err.faultCode === ACCESS_DENIED_FAULT)
      ) {
        throw new DokuWikiAuthError("invalid login or password!", {
          faultCode: err.faultCode,
          status: err.status,
          cause: err,
        });
      }
      throw err;
    }
  }

  /**
   * Execute a remote command. Faults DokuWiki uses to report an empty
   * result come back as `{}` or `[]`, a response with a blank line before
   * its XML declaration as `undefined`; every other failure is raised as a
   * DokuWikiError.
   */
  async invoke<C extends CommandName>(
    command: C,
    args: CommandArgs<C>,
    options?: CommandOptions<C>,
  ): Promise<RpcResult<CommandResult<C>>> {
    const params = buildParams(args, options);
    this.log(`${command} (${params.length} params)`);

    let value: unknown;
    try {
      value = await this.transport.call(command, params);
    } catch (err) {
      value = this.recover(command, err);
    }
    // Decoded values are trusted to have the documented shape of the command.
    return value as RpcResult<CommandResult<C>>;
  }

  private recover(command: CommandName, err: unknown): XmlRpcValue | undefined {
    if (err instanceof XmlRpcFault) {
      if (err.faultCode === EMPTY_STRUCT_FAULT) {
        this.log(`${command}: fault ${err.faultCode}, empty struct`);
        return {};
      }
      if (err.faultCode === EMPTY_ARRAY_FAULT) {
        this.log(`${command}: fault ${err.faultCode}, empty array`);
        return [];
      }
      throw new DokuWikiError(err.message, { faultCode: err.faultCode, cause: err });
    }

    if (err instanceof XmlRpcParseError) {
      if (err.message === BENIGN_PARSE_ERROR) {
        this.log(`${command}: blank line before the XML declaration, no value`);
        return undefined;
      }
      throw new DokuWikiError(err.message, { cause: err });
    }

    if (err instanceof HttpStatusError) {
      throw new DokuWikiError(err.message, { status: err.status, cause: err });
    }
    if (err instanceof TransportError) {
      throw new DokuWikiError(err.message, { cause: err });
    }
    throw err;
  }

  private log(message: string): void {
    if (this.config.debug) console.debug(`[DokuWiki] ${message}`);
  }

  /** DokuWiki version of the remote wiki. */
  version(): Promise<RpcResult<string>> {
    return this.invoke("dokuwiki.getVersion", []);
  }

  /** Current time on the wiki server, as a Unix timestamp. */
  time(): Promise<RpcResult<number>> {
    return this.invoke("dokuwiki.getTime", []);
  }

  /** Version of DokuWiki's own XML-RPC interface. */
  xmlrpcVersion(): Promise<RpcResult<number>> {
    return this.invoke("dokuwiki.getXMLRPCAPIVersion", []);
  }

  /** Supported version of the standard wiki RPC API. */
  xmlrpcSupportedVersion(): Promise<RpcResult<number>> {
    return this.invoke("wiki.getRPCVersionSupported", []);
  }

  title(): Promise<RpcResult<string>> {
    return this.invoke("dokuwiki.getTitle", []);
  }

  login(user: string, password: string): Promise<RpcResult<boolean>> {
    return this.invoke("dokuwiki.login", [user, password]);
  }

  /**
   * Grant `user` (or `@group`) `permission` on the page or namespace `scope`.
   */
  addAcl(scope: string, user: string, permission: number): Promise<RpcResult<boolean>> {
    return this.invoke("plugin.acl.addAcl", [scope, user, permission]);
  }

  /** Remove every ACL rule of `user` (or `@group`) on `scope`. */
  delAcl(scope: string, user: string): Promise<RpcResult<boolean>> {
    return this.invoke("plugin.acl.delAcl", [scope, user]);
  }
}
