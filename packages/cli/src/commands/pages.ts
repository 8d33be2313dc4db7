import { readFile } from "node:fs/promises";
import { toDate } from "dokuwiki-rpc";
import type { DokuWiki, PutPageOptions } from "dokuwiki-rpc";
import { UsageError, flagValue, hasFlag, intFlag, positionals, requirePositional, splitAction } from "../args.js";
import { dim, printField, printSuccess, printWarning } from "../ui/output.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Page text from `--file`, else from stdin. */
async function readContent(args: readonly string[]): Promise<string> {
  const file = flagValue(args, "--file");
  if (file !== undefined) return readFile(file, "utf-8");
  if (process.stdin.isTTY) {
    throw new UsageError("pass --file or pipe the page text on stdin");
  }
  return readStdin();
}

function writeOptions(args: readonly string[]): PutPageOptions {
  return { sum: flagValue(args, "--sum"), minor: hasFlag(args, "--minor") || undefined };
}

export async function runPages(wiki: DokuWiki, args: readonly string[]): Promise<void> {
  const { action, rest } = splitAction(args);

  switch (action) {
    case "list": {
      const namespace = positionals(rest).at(0) ?? "/";
      const pages = await wiki.pages.list(namespace, { depth: intFlag(rest, "--depth") });
      for (const page of pages ?? []) console.log(page.id);
      break;
    }
    case "get": {
      const page = requirePositional(rest, 0, "page");
      console.log((await wiki.pages.get(page, intFlag(rest, "--rev"))) ?? "");
      break;
    }
    case "set": {
      const page = requirePositional(rest, 0, "page");
      await wiki.pages.set(page, await readContent(rest), writeOptions(rest));
      printSuccess(`Saved ${page}`);
      break;
    }
    case "append": {
      const page = requirePositional(rest, 0, "page");
      await wiki.pages.append(page, await readContent(rest), writeOptions(rest));
      printSuccess(`Appended to ${page}`);
      break;
    }
    case "search": {
      const query = positionals(rest).join(" ");
      if (!query) throw new UsageError("missing <query>");
      const results = (await wiki.pages.search(query)) ?? [];
      if (results.length === 0) {
        printWarning(`No pages match '${query}'`);
        break;
      }
      for (const result of results) console.log(`${result.id} ${dim(`(${result.score})`)}`);
      break;
    }
    case "info": {
      const page = requirePositional(rest, 0, "page");
      const info = await wiki.pages.info(page, intFlag(rest, "--rev"));
      if (info?.name === undefined) {
        printWarning(`No such page: ${page}`);
        break;
      }
      printField("Name", info.name);
      printField("Author", info.author);
      printField("Version", info.version);
      printField("Modified", toDate(info.lastModified).toISOString());
      break;
    }
    case "versions": {
      const page = requirePositional(rest, 0, "page");
      const versions = await wiki.pages.versions(page, intFlag(rest, "--offset"));
      for (const version of versions ?? []) {
        console.log(`${version.version}  ${version.user || "-"}  ${version.sum}`);
      }
      break;
    }
    case "links": {
      const page = requirePositional(rest, 0, "page");
      for (const link of (await wiki.pages.links(page)) ?? []) {
        console.log(`${link.type}  ${link.type === "local" ? link.page : link.href}`);
      }
      break;
    }
    case "backlinks": {
      const page = requirePositional(rest, 0, "page");
      for (const source of (await wiki.pages.backlinks(page)) ?? []) console.log(source);
      break;
    }
    case "lock": {
      const page = requirePositional(rest, 0, "page");
      await wiki.pages.lock(page);
      printSuccess(`Locked ${page}`);
      break;
    }
    case "unlock": {
      const page = requirePositional(rest, 0, "page");
      await wiki.pages.unlock(page);
      printSuccess(`Unlocked ${page}`);
      break;
    }
    case "delete": {
      const page = requirePositional(rest, 0, "page");
      await wiki.pages.delete(page, writeOptions(rest));
      printSuccess(`Deleted ${page}`);
      break;
    }
    case undefined:
      throw new UsageError("missing pages action; see `dokuwiki help`");
    default:
      throw new UsageError(`unknown pages action: ${action}`);
  }
}
