import { toDate } from "dokuwiki-rpc";
import type { DokuWiki } from "dokuwiki-rpc";
import { UsageError, flagValue, hasFlag, positionals, requirePositional, splitAction } from "../args.js";
import { printField, printStep, printSuccess, printWarning } from "../ui/output.js";

export async function runMedia(wiki: DokuWiki, args: readonly string[]): Promise<void> {
  const { action, rest } = splitAction(args);

  switch (action) {
    case "list": {
      const namespace = positionals(rest).at(0) ?? "/";
      const files = await wiki.media.list(namespace, { pattern: flagValue(rest, "--pattern") });
      for (const file of files ?? []) console.log(`${file.id}  ${file.size} bytes`);
      break;
    }
    case "get": {
      const media = requirePositional(rest, 0, "media");
      const path = await wiki.media.get(media, {
        dirpath: flagValue(rest, "--dir") ?? ".",
        filename: flagValue(rest, "--out"),
        overwrite: hasFlag(rest, "--overwrite"),
      });
      if (path === undefined) {
        printWarning(`No content received for ${media}`);
        break;
      }
      printSuccess(`Saved ${path}`);
      break;
    }
    case "put": {
      const media = requirePositional(rest, 0, "media");
      const file = requirePositional(rest, 1, "file");
      printStep(`Uploading ${file} to ${media}`);
      await wiki.media.add(media, file, { overwrite: !hasFlag(rest, "--no-overwrite") });
      printSuccess(`Uploaded ${media}`);
      break;
    }
    case "delete": {
      const media = requirePositional(rest, 0, "media");
      await wiki.media.delete(media);
      printSuccess(`Deleted ${media}`);
      break;
    }
    case "info": {
      const media = requirePositional(rest, 0, "media");
      const info = await wiki.media.info(media);
      if (info?.lastModified === undefined) {
        printWarning(`No such media: ${media}`);
        break;
      }
      printField("Size", `${info.size} bytes`);
      printField("Modified", toDate(info.lastModified).toISOString());
      break;
    }
    case undefined:
      throw new UsageError("missing media action; see `dokuwiki help`");
    default:
      throw new UsageError(`unknown media action: ${action}`);
  }
}
