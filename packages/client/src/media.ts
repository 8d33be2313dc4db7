import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { CommandInvoker } from "./commands.js";
import { FileExistsError } from "./errors.js";
import type { AttachmentInfo, AttachmentListItem, AttachmentListOptions, RecentChange, RpcResult, XmlRpcValue } from "./types.js";

export interface MediaGetOptions {
  /** The server sent the file as base64 text rather than binary. */
  b64decode?: boolean;
}

export interface MediaSaveOptions extends MediaGetOptions {
  /** Directory to write the file into; created when missing. */
  dirpath: string;
  /** Defaults to the last segment of the media id. */
  filename?: string;
  overwrite?: boolean;
}

export interface MediaPutOptions {
  /** Replace the media if it exists remotely. */
  overwrite?: boolean;
}

export interface MediaSetOptions extends MediaPutOptions {
  /** Send the bytes as base64 text rather than binary. */
  b64encode?: boolean;
}

/** Last segment of a media id, `:` and `/` both acting as separators. */
export function mediaFilename(media: string): string {
  return media.replace(/\//g, ":").split(":").pop() ?? media;
}

function toBytes(raw: Buffer | string, b64decode: boolean): Buffer {
  if (b64decode) {
    return Buffer.from(typeof raw === "string" ? raw : raw.toString(), "base64");
  }
  return typeof raw === "string" ? Buffer.from(raw) : raw;
}

/**
 * Media operations, available as `wiki.media`.
 */
export class Media {
  constructor(private readonly wiki: CommandInvoker) {}

  list(namespace = "/", options: AttachmentListOptions = {}): Promise<RpcResult<AttachmentListItem[]>> {
    return this.wiki.invoke("wiki.getAttachments", [namespace], options);
  }

  /** Media changed since `timestamp` (Unix seconds). */
  changes(timestamp: number): Promise<RpcResult<RecentChange[]>> {
    return this.wiki.invoke("wiki.getRecentMediaChanges", [timestamp]);
  }

  /**
   * Fetch the content of `media`. With `dirpath` the content is written to
   * a file instead and the file path is returned. Nothing is written when
   * the server sends no value.
   */
  get(media: string, options: MediaSaveOptions): Promise<RpcResult<string>>;
  get(media: string, options?: MediaGetOptions): Promise<RpcResult<Buffer>>;
  async get(media: string, options: Partial<MediaSaveOptions> = {}): Promise<RpcResult<Buffer | string>> {
    const raw = await this.wiki.invoke("wiki.getAttachment", [media]);
    if (raw === undefined) return undefined;
    const data = toBytes(raw, options.b64decode ?? false);
    if (options.dirpath === undefined) return data;

    await mkdir(options.dirpath, { recursive: true });
    const filepath = join(options.dirpath, options.filename ?? mediaFilename(media));
    try {
      await writeFile(filepath, data, { flag: options.overwrite ? "w" : "wx" });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "EEXIST") {
        throw new FileExistsError(filepath);
      }
      throw err;
    }
    return filepath;
  }

  info(media: string): Promise<RpcResult<AttachmentInfo>> {
    return this.wiki.invoke("wiki.getAttachmentInfo", [media]);
  }

  /** Upload the local file `filepath` as `media`. */
  async add(media: string, filepath: string, options: MediaPutOptions = {}): Promise<RpcResult<XmlRpcValue>> {
    const data = await readFile(filepath);
    return this.wiki.invoke("wiki.putAttachment", [media, data], { ow: options.overwrite ?? true });
  }

  set(media: string, bytes: Uint8Array, options: MediaSetOptions = {}): Promise<RpcResult<XmlRpcValue>> {
    const buffer = Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
    const data = options.b64encode ? buffer.toString("base64") : buffer;
    return this.wiki.invoke("wiki.putAttachment", [media, data], { ow: options.overwrite ?? true });
  }

  delete(media: string): Promise<RpcResult<XmlRpcValue>> {
    return this.wiki.invoke("wiki.deleteAttachment", [media]);
  }
}
