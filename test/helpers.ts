import type { EntityDocument } from '../server/data/documents.js';
import { MemoryDocumentStore } from '../server/data/memoryDocumentStore.js';
import { addDays } from '../server/lib/dateUtils.js';
import { EntityRegistry } from '../server/services/entityRegistry.js';
import { JobLedger } from '../server/services/jobLedger.js';
import { RecordStore, type RawRow } from '../server/services/recordStore.js';
import { createTradingCalendar } from '../server/services/tradingCalendar.js';

export const MINUTE_MS = 60_000;

export interface TestClock {
  now: () => Date;
  advance: (ms: number) => void;
  set: (iso: string) => void;
}

export function createClock(startIso: string): TestClock {
  let ms = Date.parse(startIso);
  return {
    now: () => new Date(ms),
    advance: (delta) => {
      ms += delta;
    },
    set: (iso) => {
      ms = Date.parse(iso);
    },
  };
}

export function createServices(clock: TestClock, holidays: string[] = []) {
  const store = new MemoryDocumentStore();
  return {
    store,
    ledger: new JobLedger(store, {
      now: clock.now,
      staleAfterMs: { ingestion: 360 * MINUTE_MS, analysis: 120 * MINUTE_MS },
    }),
    registry: new EntityRegistry(store, { now: clock.now, timeZone: 'America/New_York' }),
    records: new RecordStore(store),
    calendar: createTradingCalendar(holidays),
  };
}

export function entityDoc(id: string, priorityWeight: number, overrides: Partial<EntityDocument> = {}): EntityDocument {
  return {
    id,
    displayName: id,
    priorityWeight,
    isActive: true,
    addedOn: '2026-01-02',
    lastAnalyzedDate: null,
    updatedAt: '2026-01-02T00:00:00.000Z',
    ...overrides,
  };
}

export function bar(date: string, close: number, volume: number = 1_000): RawRow {
  return { date, open: close, high: close + 1, low: close - 1, close, volume };
}

/** One bar per calendar day for `count` days ending at `end` (weekends included; analysis only counts rows). */
export function dailyBars(end: string, count: number, close: number = 100): RawRow[] {
  const rows: RawRow[] = [];
  for (let i = count - 1; i >= 0; i--) {
    rows.push(bar(addDays(end, -i), close));
  }
  return rows;
}
