import { parseDataentry, stripDataentry } from "dokuwiki-rpc";
import type { DokuWiki } from "dokuwiki-rpc";
import { hasFlag, requirePositional } from "../args.js";

/** Print the dataentry fields of a page, or the page text without them. */
export async function runDataentry(wiki: DokuWiki, args: readonly string[]): Promise<void> {
  const page = requirePositional(args, 0, "page");
  const text = (await wiki.pages.get(page)) ?? "";

  if (hasFlag(args, "--strip")) {
    console.log(stripDataentry(text));
    return;
  }

  for (const [key, value] of parseDataentry(text, { keepOrder: true })) {
    console.log(`${key}: ${value}`);
  }
}
