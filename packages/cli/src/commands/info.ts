import type { DokuWiki } from "dokuwiki-rpc";
import { printField } from "../ui/output.js";

export async function runInfo(wiki: DokuWiki): Promise<void> {
  const [title, version, time, apiVersion, rpcVersion] = await Promise.all([
    wiki.title(),
    wiki.version(),
    wiki.time(),
    wiki.xmlrpcVersion(),
    wiki.xmlrpcSupportedVersion(),
  ]);

  printField("Title", title ?? "-");
  printField("Version", version ?? "-");
  printField("Server time", time === undefined ? "-" : new Date(time * 1000).toISOString());
  printField("API version", apiVersion ?? "-");
  printField("RPC version", rpcVersion ?? "-");
}
