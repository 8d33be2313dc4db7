import type { CommandInvoker } from "./commands.js";
import { DokuWikiError } from "./errors.js";
import type {
  PageInfo,
  PageLink,
  PageListItem,
  PageListOptions,
  PageVersion,
  PutPageOptions,
  RecentChange,
  RpcResult,
  SearchResult,
} from "./types.js";

/**
 * Page operations, available as `wiki.pages`.
 */
export class Pages {
  constructor(private readonly wiki: CommandInvoker) {}

  list(namespace = "/", options: PageListOptions = {}): Promise<RpcResult<PageListItem[]>> {
    return this.wiki.invoke("dokuwiki.getPagelist", [namespace], options);
  }

  /** Changes since `timestamp` (Unix seconds). */
  changes(timestamp: number): Promise<RpcResult<RecentChange[]>> {
    return this.wiki.invoke("wiki.getRecentChanges", [timestamp]);
  }

  /** Full-text search; the server returns at most 15 hits. */
  search(query: string): Promise<RpcResult<SearchResult[]>> {
    return this.wiki.invoke("dokuwiki.search", [query]);
  }

  /** Older revisions of `page`, skipping the first `offset`. */
  versions(page: string, offset = 0): Promise<RpcResult<PageVersion[]>> {
    return this.wiki.invoke("wiki.getPageVersions", [page, offset]);
  }

  info(page: string, version?: number): Promise<RpcResult<PageInfo>> {
    return version !== undefined
      ? this.wiki.invoke("wiki.getPageInfoVersion", [page, version])
      : this.wiki.invoke("wiki.getPageInfo", [page]);
  }

  /** Raw wiki text of `page`, at `version` when given. */
  get(page: string, version?: number): Promise<RpcResult<string>> {
    return version !== undefined
      ? this.wiki.invoke("wiki.getPageVersion", [page, version])
      : this.wiki.invoke("wiki.getPage", [page]);
  }

  html(page: string, version?: number): Promise<RpcResult<string>> {
    return version !== undefined
      ? this.wiki.invoke("wiki.getPageHTMLVersion", [page, version])
      : this.wiki.invoke("wiki.getPageHTML", [page]);
  }

  append(page: string, content: string, options: PutPageOptions = {}): Promise<RpcResult<boolean>> {
    return this.wiki.invoke("dokuwiki.appendPage", [page, content], options);
  }

  /** Replace the content of `page`. */
  set(page: string, content: string, options: PutPageOptions = {}): Promise<RpcResult<boolean>> {
    return this.wiki.invoke("wiki.putPage", [page, content], options);
  }

  /** DokuWiki deletes a page when its content is set to nothing. */
  delete(page: string, options: PutPageOptions = {}): Promise<RpcResult<boolean>> {
    return this.set(page, "", options);
  }

  async lock(page: string): Promise<void> {
    const result = await this.wiki.invoke("dokuwiki.setLocks", [], { lock: [page], unlock: [] });
    if (result?.lockfail?.length) {
      throw new DokuWikiError(`unable to lock page: ${page}`);
    }
  }

  async unlock(page: string): Promise<void> {
    const result = await this.wiki.invoke("dokuwiki.setLocks", [], { lock: [], unlock: [page] });
    if (result?.unlockfail?.length) {
      throw new DokuWikiError(`unable to unlock page: ${page}`);
    }
  }

  /** Permission level of the current user on `page`. */
  permission(page: string): Promise<RpcResult<number>> {
    return this.wiki.invoke("wiki.aclCheck", [page]);
  }

  links(page: string): Promise<RpcResult<PageLink[]>> {
    return this.wiki.invoke("wiki.listLinks", [page]);
  }

  /** Pages linking to `page`. */
  backlinks(page: string): Promise<RpcResult<string[]>> {
    return this.wiki.invoke("wiki.getBackLinks", [page]);
  }
}
