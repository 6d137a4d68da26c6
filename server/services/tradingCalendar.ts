/**
 * Trading calendar: weekday logic minus a list of full-day market holidays.
 *
 * The holiday list is plain data loaded from JSON so a new year can be added
 * without a code change.
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { addDays, isDateKey, weekdayOf } from '../lib/dateUtils.js';

// Longest span the day iterators will walk; guards against a bogus range.
const MAX_SCAN_DAYS = 4000;

const HolidayFileSchema = z.object({
  market: z.string().optional(),
  holidays: z.array(z.string().refine(isDateKey, { message: 'holiday must be a YYYY-MM-DD date' })),
});

export interface TradingCalendar {
  isBusinessDay(dateKey: string): boolean;
  /** Business days in `[start, end]`, ascending. */
  businessDaysBetween(start: string, end: string): string[];
  previousBusinessDay(dateKey: string): string;
  nextBusinessDay(dateKey: string): string;
  getStatus(): { holidayCount: number; firstHoliday: string | null; lastHoliday: string | null };
}

function isWeekday(dateKey: string): boolean {
  const dow = weekdayOf(dateKey);
  return dow >= 1 && dow <= 5;
}

export function createTradingCalendar(holidays: Iterable<string> = []): TradingCalendar {
  const holidaySet = new Set<string>();
  for (const day of holidays) {
    if (!isDateKey(day)) {
      throw new RangeError(`Invalid holiday date: ${day}`);
    }
    holidaySet.add(day);
  }
  const sortedHolidays = [...holidaySet].sort();

  const isBusinessDay = (dateKey: string): boolean => {
    if (!isDateKey(dateKey)) return false;
    return isWeekday(dateKey) && !holidaySet.has(dateKey);
  };

  const step = (dateKey: string, direction: 1 | -1): string => {
    let cursor = addDays(dateKey, direction);
    for (let i = 0; i < 30; i++) {
      if (isBusinessDay(cursor)) return cursor;
      cursor = addDays(cursor, direction);
    }
    throw new RangeError(`No business day within 30 days of ${dateKey}`);
  };

  return {
    isBusinessDay,
    businessDaysBetween(start: string, end: string): string[] {
      if (!isDateKey(start) || !isDateKey(end)) {
        throw new RangeError(`Invalid business-day range: ${start} → ${end}`);
      }
      const result: string[] = [];
      let cursor = start;
      for (let i = 0; i < MAX_SCAN_DAYS && cursor <= end; i++) {
        if (isBusinessDay(cursor)) result.push(cursor);
        cursor = addDays(cursor, 1);
      }
      if (cursor <= end) {
        throw new RangeError(`Business-day range ${start} → ${end} exceeds ${MAX_SCAN_DAYS} days`);
      }
      return result;
    },
    previousBusinessDay: (dateKey: string) => step(dateKey, -1),
    nextBusinessDay: (dateKey: string) => step(dateKey, 1),
    getStatus: () => ({
      holidayCount: sortedHolidays.length,
      firstHoliday: sortedHolidays[0] ?? null,
      lastHoliday: sortedHolidays[sortedHolidays.length - 1] ?? null,
    }),
  };
}

/** Reads the holiday file (resolved against the working directory) and builds a calendar. */
export function loadTradingCalendar(filePath: string): TradingCalendar {
  const resolved = path.resolve(process.cwd(), filePath);
  const raw: unknown = JSON.parse(readFileSync(resolved, 'utf8'));
  const parsed = HolidayFileSchema.parse(raw);
  console.log(`[calendar] Loaded ${parsed.holidays.length} holidays from ${resolved}`);
  return createTradingCalendar(parsed.holidays);
}
