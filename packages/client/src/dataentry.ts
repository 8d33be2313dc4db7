/**
 * Reader and writer for data plugin entries embedded in page text:
 *
 *     ---- dataentry project ----
 *     name: Apollo
 *     status: active   # reviewed in March
 *     ----
 */

import { DokuWikiError } from "./errors.js";

const START_MARKER = "---- dataentry";
const DELIMITER = "----";

export type DataentryValue = string | number | boolean;

export interface ParseDataentryOptions {
  /** Return a Map, which keeps field order for every key. */
  keepOrder?: boolean;
}

function withoutCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Read the first dataentry block of `content`. Every line inside the block
 * is a field, a blank one included (key ""). The first occurrence of a
 * field wins; anything after a `#` in a value is a comment and is dropped.
 */
export function parseDataentry(content: string): Record<string, string>;
export function parseDataentry(content: string, options: { keepOrder: true }): Map<string, string>;
export function parseDataentry(
  content: string,
  options?: ParseDataentryOptions,
): Record<string, string> | Map<string, string>;
export function parseDataentry(
  content: string,
  options: ParseDataentryOptions = {},
): Record<string, string> | Map<string, string> {
  const fields = new Map<string, string>();
  let found = false;

  for (const raw of content.split("\n")) {
    const line = withoutCarriageReturn(raw);
    if (line.trim().startsWith(START_MARKER)) {
      found = true;
      continue;
    }
    if (!found) continue;
    if (line === DELIMITER) break;

    const colon = line.indexOf(":");
    const key = (colon === -1 ? line : line.slice(0, colon)).trim();
    const value = colon === -1 ? "" : line.slice(colon + 1).replace(/#.*$/, "").trim();
    if (!fields.has(key)) fields.set(key, value);
  }

  if (!found) {
    throw new DokuWikiError("no dataentry found");
  }
  return options.keepOrder ? fields : Object.fromEntries(fields);
}

/** Render a dataentry block named `name`, one `key:value` line per field. */
export function generateDataentry(
  name: string,
  record: Record<string, DataentryValue> | Map<string, DataentryValue>,
): string {
  const entries = record instanceof Map ? [...record] : Object.entries(record);
  return [`${START_MARKER} ${name} ${DELIMITER}`, ...entries.map(([key, value]) => `${key}:${value}`), DELIMITER].join(
    "\n",
  );
}

/**
 * Remove the first dataentry block from `content`. Content without a
 * complete block is returned unchanged.
 */
export function stripDataentry(content: string): string {
  const lines = content.split("\n");
  const start = lines.findIndex((line) => line.trim().startsWith(START_MARKER));
  if (start === -1) return content;

  const end = lines.findIndex((line, i) => i > start && withoutCarriageReturn(line) === DELIMITER);
  if (end === -1) return content;

  return [...lines.slice(0, start), ...lines.slice(end + 1)].join("\n");
}
