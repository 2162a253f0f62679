/**
 * Date and time helpers
 *
 * Access-control devices report LOCAL wall-clock time. A trailing 'Z' that
 * some exporters append does not mean UTC, so it is stripped and every
 * timestamp is stored as `YYYY-MM-DDTHH:mm:ss` without a zone. Arithmetic
 * treats those values as if they were UTC, which keeps durations exact and
 * independent of the host's zone and DST rules.
 *
 * Because of that fixed shape, timestamps and `YYYY-MM-DD` dates compare
 * correctly as plain strings, which is what the repositories rely on.
 */

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?Z?$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 86_400_000;

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Check a `YYYY-MM-DD` string names a real calendar day
 */
export function isValidDate(date: string): boolean {
  if (!DATE_PATTERN.test(date)) return false;
  const parsed = new Date(`${date}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === date;
}

/**
 * Normalize a device timestamp to `YYYY-MM-DDTHH:mm:ss`.
 * Accepts a space or 'T' separator, optional seconds and fraction, and a
 * trailing 'Z'. Returns null for anything else.
 */
export function normalizeTimestamp(timestamp: string): string | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp.trim());
  if (!match) return null;
  const [, date, hours, minutes, seconds] = match;
  if (!date || !hours || !minutes || !isValidDate(date)) return null;
  if (Number(hours) > 23 || Number(minutes) > 59 || Number(seconds ?? '0') > 59) return null;
  return `${date}T${hours}:${minutes}:${seconds ?? '00'}`;
}

/**
 * Extract the local date (YYYY-MM-DD) from a wall-clock timestamp
 */
export function extractLocalDate(timestamp: string): string {
  const raw = timestamp.replace(/Z$/, '');
  return raw.split(/[T ]/)[0] ?? raw;
}

/**
 * Extract HH:mm from a wall-clock timestamp
 */
export function extractLocalTime(timestamp: string): string {
  const raw = timestamp.replace(/Z$/, '');
  const time = raw.split(/[T ]/)[1] ?? '';
  return time.substring(0, 5);
}

function toEpochMs(timestamp: string): number {
  return Date.parse(`${timestamp.replace(/Z$/, '')}Z`);
}

/**
 * Whole seconds from `start` to `end`; negative when end precedes start
 */
export function secondsBetween(start: string, end: string): number {
  return Math.round((toEpochMs(end) - toEpochMs(start)) / 1000);
}

/**
 * Format a Date's local components as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Format a Date's local components as a wall-clock timestamp
 */
export function formatTimestamp(date: Date): string {
  return `${formatDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function addDays(date: string, days: number): string {
  const time = new Date(`${date}T00:00:00Z`).getTime() + days * MS_PER_DAY;
  return new Date(time).toISOString().slice(0, 10);
}

/**
 * Day of week for a YYYY-MM-DD date, 0 = Sunday
 */
export function getDayOfWeek(date: string): number {
  return new Date(`${date}T00:00:00Z`).getUTCDay();
}

/**
 * Every date from `from` to `to`, both inclusive. Empty when from > to.
 */
export function enumerateDates(from: string, to: string): string[] {
  const dates: string[] = [];
  for (let current = from; current <= to; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
