/**
 * Calendar helpers. Every day string is `YYYY-MM-DD` in the account's home time zone.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function zonedParts(date: Date, timeZone: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  });

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  return parts;
}

export function formatDay(date: Date, timeZone: string): string {
  const parts = zonedParts(date, timeZone);
  return `${parts.year}-${parts.month}-${parts.day}`;
}

export function formatTime(date: Date, timeZone: string): string {
  const parts = zonedParts(date, timeZone);
  return `${parts.hour}:${parts.minute}:${parts.second}`;
}

/** `2024-01-05` -> `2024/01/05`, the form used by the summary and follower files */
export function toSlashDay(day: string): string {
  return day.replace(/-/g, '/');
}

/**
 * Parse a `YYYY-MM-DD` string into a UTC midnight timestamp.
 * Returns undefined for anything else, including impossible dates like 2024-02-30.
 */
export function parseDay(day: string): number | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(day.trim());
  if (!match) return undefined;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const dayOfMonth = Number(match[3]);
  const time = Date.UTC(year, month - 1, dayOfMonth);
  const check = new Date(time);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== dayOfMonth) {
    return undefined;
  }
  return time;
}

/** Whole calendar days from `from` to `to`; undefined if either is not a valid day */
export function daysBetween(from: string, to: string): number | undefined {
  const start = parseDay(from);
  const end = parseDay(to);
  if (start === undefined || end === undefined) return undefined;
  return Math.round((end - start) / DAY_MS);
}

/** Calendar day of a timestamp string, seen from `timeZone` */
export function dayOfTimestamp(timestamp: string, timeZone: string): string | undefined {
  if (!timestamp.trim()) return undefined;
  const date = new Date(timestamp);
  if (isNaN(date.getTime())) return undefined;
  return formatDay(date, timeZone);
}

export function calcAgeDays(today: string, publishedAt: string | undefined, timeZone: string): number | undefined {
  if (!publishedAt) return undefined;
  const publishedDay = dayOfTimestamp(publishedAt, timeZone);
  if (!publishedDay) return undefined;
  return daysBetween(publishedDay, today);
}
