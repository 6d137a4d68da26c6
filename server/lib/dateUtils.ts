/**
 * Date-key helpers. A date key is a `YYYY-MM-DD` string naming a market-local
 * calendar day; keys compare correctly as plain strings.
 * All functions are pure.
 */

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function isDateKey(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const match = value.match(DATE_KEY_PATTERN);
  if (!match) return false;
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return new Date(ms).toISOString().slice(0, 10) === value;
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const match = String(dateKey || '').trim().match(DATE_KEY_PATTERN);
  if (!match) return NaN;
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]), 0, 0, 0, 0);
}

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function addDays(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) {
    throw new RangeError(`Invalid date key: ${dateKey}`);
  }
  return new Date(baseMs + Math.trunc(days) * DAY_MS).toISOString().slice(0, 10);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
function daysBetween(from: string, to: string): number {
  return Math.round((parseDateKeyToUtcMs(to) - parseDateKeyToUtcMs(from)) / DAY_MS);
}

/** UTC weekday of a date key: 0 = Sunday … 6 = Saturday. */
function weekdayOf(dateKey: string): number {
  return new Date(parseDateKeyToUtcMs(dateKey)).getUTCDay();
}

function maxDateKey(a: string | null, b: string | null): string | null {
  if (!a) return b;
  if (!b) return a;
  return a >= b ? a : b;
}

interface ZonedDateTimeParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

function zonedDateTimeParts(nowUtc: Date, timeZone: string): ZonedDateTimeParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(nowUtc);
  const map: Record<string, string> = {};
  for (const part of parts) {
    map[part.type] = part.value;
  }
  return {
    year: Number(map.year || 0),
    month: Number(map.month || 0),
    day: Number(map.day || 0),
    hour: Number(map.hour || 0) % 24,
    minute: Number(map.minute || 0),
  };
}

function currentDateKey(nowUtc: Date, timeZone: string): string {
  const { year, month, day } = zonedDateTimeParts(nowUtc, timeZone);
  return dateKeyFromYmdParts(year, month, day);
}

/**
 * The business day a job invocation works on. Before `rolloverHour` local
 * time the previous calendar day is still the logical day, so an overnight
 * run keeps working on the evening's data.
 */
function logicalDateKey(nowUtc: Date, timeZone: string, rolloverHour = 0): string {
  const parts = zonedDateTimeParts(nowUtc, timeZone);
  const today = dateKeyFromYmdParts(parts.year, parts.month, parts.day);
  return rolloverHour > 0 && parts.hour < rolloverHour ? addDays(today, -1) : today;
}

export {
  isDateKey,
  parseDateKeyToUtcMs,
  dateKeyFromYmdParts,
  addDays,
  daysBetween,
  weekdayOf,
  maxDateKey,
  zonedDateTimeParts,
  currentDateKey,
  logicalDateKey,
};
export type { ZonedDateTimeParts };
