#!/usr/bin/env tsx

import { DokuWiki } from "dokuwiki-rpc";
import { UsageError } from "./args.js";
import { runDataentry } from "./commands/dataentry.js";
import { runInfo } from "./commands/info.js";
import { runMedia } from "./commands/media.js";
import { runPages } from "./commands/pages.js";
import { runPing } from "./commands/ping.js";
import { readConnectionConfig } from "./config/env.js";
import { printBanner, printHelp, printError } from "./ui/output.js";

const args = process.argv.slice(2);
const command = args[0];

function session(): Promise<DokuWiki> {
  return DokuWiki.connect(readConnectionConfig());
}

async function main(): Promise<void> {
  if (!command || command === "help" || command === "--help" || command === "-h") {
    printBanner();
    printHelp();
    return;
  }

  switch (command) {
    case "ping":
      await runPing(new DokuWiki(readConnectionConfig()));
      break;
    case "info":
      await runInfo(await session());
      break;
    case "pages":
      await runPages(await session(), args.slice(1));
      break;
    case "media":
      await runMedia(await session(), args.slice(1));
      break;
    case "dataentry":
      await runDataentry(await session(), args.slice(1));
      break;
    default:
      printError(`Unknown command: ${command}`);
      printHelp();
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  printError(err instanceof Error ? err.message : "Unexpected error");
  if (err instanceof UsageError) console.error("Run `dokuwiki help` for usage.");
  process.exit(1);
});
