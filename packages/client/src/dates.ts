import { DokuWikiError } from "./errors.js";
import type { XmlRpcDateTime } from "./types.js";

// 20240102T03:04:05
const COMPACT_FORMAT = /^(\d{4})(\d{2})(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;
// 2024-01-02T03:04:05, once the "+0000" suffix is dropped
const EXTENDED_FORMAT = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

/**
 * Convert a server timestamp to a Date. DokuWiki releases disagree on the
 * format; the 24 character form carries a `+0000` suffix, the other is the
 * compact XML-RPC form. Both are read as UTC.
 */
export function toDate(value: XmlRpcDateTime | string): Date {
  const text = typeof value === "string" ? value : value.value;
  const match = text.length === 24 ? EXTENDED_FORMAT.exec(text.slice(0, -5)) : COMPACT_FORMAT.exec(text);
  if (!match) {
    throw new DokuWikiError(`unrecognised date format: '${text}'`);
  }
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  return new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
}

/**
 * Shift a UTC date by the host's current UTC offset, rounded to whole hours.
 * The offset is read at call time, not at the date's own instant.
 */
export function utcToLocal(date: Date): Date {
  const offsetHours = Math.round(-new Date().getTimezoneOffset() / 60);
  return new Date(date.getTime() + offsetHours * 3_600_000);
}
