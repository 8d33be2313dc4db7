const useColor = !process.env.NO_COLOR && process.stdout.isTTY;

function color(code: number, text: string): string {
  return useColor ? `\x1b[${code}m${text}\x1b[0m` : text;
}

export const green = (t: string) => color(32, t);
export const yellow = (t: string) => color(33, t);
export const red = (t: string) => color(31, t);
export const dim = (t: string) => color(2, t);
export const bold = (t: string) => color(1, t);

export function printBanner(): void {
  console.log(dim("  dokuwiki · pages, media and struct data over XML-RPC\n"));
}

export function printHelp(): void {
  console.log(`${bold("Usage:")} dokuwiki <command> [arguments]

${bold("Commands:")}
  ping                              Open a session and report latency
  info                              Show title, version and server time
  pages list [namespace]            List pages (--depth N)
  pages get <page>                  Print the raw text of a page (--rev N)
  pages set <page>                  Replace a page from --file or stdin
  pages append <page>               Append to a page from --file or stdin
  pages search <query>              Full-text search
  pages info <page>                 Show page metadata (--rev N)
  pages versions <page>             List older revisions (--offset N)
  pages links <page>                List links on a page
  pages backlinks <page>            List pages linking to a page
  pages lock <page>                 Lock a page for editing
  pages unlock <page>               Release a page lock
  pages delete <page>               Delete a page
  media list [namespace]            List media files (--pattern REGEX)
  media get <media>                 Download into --dir (default .), --overwrite
  media put <media> <file>          Upload a file (--no-overwrite)
  media delete <media>              Delete a media file
  media info <media>                Show media metadata
  dataentry <page>                  Print the dataentry fields of a page (--strip)
  help                              Show this help message

${bold("Write options:")}
  --sum TEXT        Change summary
  --minor           Mark the change as minor

${bold("Environment:")}
  DOKUWIKI_URL            Wiki base URL, e.g. https://wiki.example.org
  DOKUWIKI_USER           Login
  DOKUWIKI_PASSWORD       Password
  DOKUWIKI_COOKIE_AUTH    1 to log in once and keep the session cookie
  DOKUWIKI_DEBUG          1 to log every remote call
  DOKUWIKI_TIMEOUT_MS     Request timeout in milliseconds
`);
}

export function printSuccess(msg: string): void {
  console.log(`${green("✓")} ${msg}`);
}

export function printWarning(msg: string): void {
  console.log(`${yellow("!")} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${red("✗")} ${msg}`);
}

export function printStep(msg: string): void {
  console.log(`${dim("→")} ${msg}`);
}

/** One `label: value` line, labels aligned. */
export function printField(label: string, value: string | number): void {
  console.log(`${dim(`${label}:`.padEnd(14))}${value}`);
}

/** Progress indicator for a remote call; a plain line when stdout is not a terminal. */
export class Spinner {
  private frames = ["◐", "◓", "◑", "◒"];
  private interval: ReturnType<typeof setInterval> | null = null;
  private tick = 0;

  start(msg: string): void {
    if (!process.stdout.isTTY) {
      console.log(msg);
      return;
    }
    this.tick = 0;
    this.interval = setInterval(() => {
      const frame = this.frames[this.tick++ % this.frames.length];
      process.stdout.write(`\r${dim(frame)} ${msg} ${dim(`${this.tick * 120}ms`)}`);
    }, 120);
  }

  stop(msg?: string): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    if (process.stdout.isTTY) {
      process.stdout.write("\r\x1b[K");
    }
    if (msg) console.log(msg);
  }
}
