/**
 * Durations and timestamps as the tracker accepts and returns them.
 *
 * Durations follow the tracker's default time-tracking settings: a day is 8 hours,
 * a week is 5 days, and a bare number counts as minutes.
 */

const SECONDS_PER_UNIT: Record<string, number> = {
  w: 5 * 8 * 3600,
  d: 8 * 3600,
  h: 3600,
  m: 60,
  s: 1,
};

function numberBefore(text: string, unit: string): string | undefined {
  const match = text.match(new RegExp(`(\\d+)${unit}`));
  return match?.[1];
}

/**
 * Convert a user-entered duration ("2h 30m", "1d4h", "45") into the form the tracker
 * accepts for worklogs and estimates ("2h 30m", "1d 4h", "45").
 */
export function sanitizeWorklogTime(input: string): string {
  const compact = input.replace(/\s+/g, '').toLowerCase();

  const parts = ['w', 'd', 'h', 'm', 's']
    .map((unit) => {
      const value = numberBefore(compact, unit);
      return value ? `${value}${unit}` : '';
    })
    .filter((part) => part.length > 0);

  // no units at all, pass the number along
  return parts.length > 0 ? parts.join(' ') : compact;
}

/**
 * Duration text to seconds. Returns undefined for text that is not a duration.
 */
export function parseDurationSeconds(input: string): number | undefined {
  const compact = input.replace(/\s+/g, '').toLowerCase();
  if (compact.length === 0) return undefined;

  if (/^\d+$/.test(compact)) {
    return Number.parseInt(compact, 10) * SECONDS_PER_UNIT.m;
  }

  if (!/^(\d+[wdhms])+$/.test(compact)) return undefined;

  let total = 0;
  for (const [, value, unit] of compact.matchAll(/(\d+)([wdhms])/g)) {
    total += Number.parseInt(value, 10) * SECONDS_PER_UNIT[unit];
  }
  return total;
}

/**
 * Seconds as "1h30m". Zero or absent durations are "0m", never an empty string.
 */
export function friendlyWorklogTime(seconds: number | null | undefined): string {
  if (!seconds || seconds <= 0) return '0m';

  const whole = Math.floor(seconds);
  const h = Math.floor(whole / 3600);
  const m = Math.floor((whole % 3600) / 60);
  const s = whole % 60;

  let text = '';
  if (h) text += `${h}h`;
  if (m) text += `${m}m`;
  if (s) text += `${s}s`;
  return text;
}

/**
 * Canonical form of a user-entered duration: "2h 30m" becomes "2h30m", "0" becomes "0m".
 */
export function formatDuration(input: string): string {
  const seconds = parseDurationSeconds(input);
  if (seconds === undefined) {
    throw new Error(`Invalid duration: "${input}". Use formats like 2h30m, 1d, 45m`);
  }
  return friendlyWorklogTime(seconds);
}

// ============= Timestamps =============

const WEEKDAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];

const pad = (n: number, width = 2) => String(Math.abs(n)).padStart(width, '0');

/**
 * Parse a tracker timestamp. The tracker writes offsets without a colon ("+0200"),
 * which Date.parse does not accept everywhere, so normalize it first.
 */
export function isoToDate(iso: string): Date {
  const normalized = iso.trim().replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp: "${iso}"`);
  }
  return date;
}

function timeZoneAbbreviation(date: Date): string {
  const part = new Intl.DateTimeFormat('en-US', { timeZoneName: 'short' })
    .formatToParts(date)
    .find((p) => p.type === 'timeZoneName');
  return part?.value ?? 'UTC';
}

/**
 * Local, human-friendly rendering used in worklog tables and the editable worklog text,
 * e.g. "Tue 03/05/2024 14:30:00 GMT+1". `displayStringToDate` reads it back.
 */
export function isoToDisplayString(iso: string): string {
  const d = isoToDate(iso);
  const date = `${pad(d.getMonth() + 1)}/${pad(d.getDate())}/${d.getFullYear()}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${WEEKDAYS[d.getDay()]} ${date} ${time} ${timeZoneAbbreviation(d)}`;
}

/**
 * Read a display string (or any ISO-8601 text) back into a Date, interpreted in local time.
 */
export function displayStringToDate(text: string): Date {
  const match = text.trim().match(/^(?:[A-Za-z]{3}\s+)?(\d{2})\/(\d{2})\/(\d{4})\s+(\d{2}):(\d{2}):(\d{2})/);
  if (match) {
    const [, month, day, year, hours, minutes, seconds] = match.map((v) => Number.parseInt(v, 10));
    return new Date(year, month - 1, day, hours, minutes, seconds);
  }
  return isoToDate(text);
}

/**
 * The timestamp format the worklog API accepts: 2024-03-05T14:30:00.000+0100
 */
export function toTrackerTimestamp(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(Math.abs(offset) / 60))}${pad(Math.abs(offset) % 60)}`
  );
}

function sameLocalDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();
}

export function isoIsToday(iso: string, now: Date = new Date()): boolean {
  return sameLocalDay(isoToDate(iso), now);
}

export function isoIsYesterday(iso: string, now: Date = new Date()): boolean {
  const yesterday = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  return sameLocalDay(isoToDate(iso), yesterday);
}
