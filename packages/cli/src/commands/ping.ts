import type { DokuWiki } from "dokuwiki-rpc";
import { Spinner, printSuccess } from "../ui/output.js";

/** Open the session and report the server version and round-trip time. */
export async function runPing(wiki: DokuWiki): Promise<void> {
  const spinner = new Spinner();
  spinner.start("Opening a session on the wiki...");

  const start = Date.now();
  try {
    await wiki.connect();
    const version = await wiki.version();
    spinner.stop();
    printSuccess(`Connected to ${version ?? "DokuWiki"} (${Date.now() - start}ms)`);
  } catch (err) {
    spinner.stop();
    throw err;
  }
}
