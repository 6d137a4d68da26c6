/**
 * Daily ingestion: brings raw records up to date through today, replaying
 * every business day missed since the last completed run.
 *
 * The only checkpoint is the ledger's last completed date. A failed date
 * stops the run without advancing it, so the next invocation recomputes the
 * same start and retries from the first unfinished date.
 */

import {
  DATA_API_MAX_ATTEMPTS,
  DATA_API_RETRY_BASE_MS,
  DATA_API_TIMEOUT_MS,
  INGESTION_HISTORY_START,
  MARKET_TIMEZONE,
} from '../config.js';
import { createModuleLogger, type Logger } from '../logger.js';
import { addDays, currentDateKey } from '../lib/dateUtils.js';
import { DuplicateRunError, errorMessage } from '../lib/errors.js';
import { withRetries, type RetryPolicy } from '../lib/retry.js';
import { jobRunDurationSeconds, jobRunsTotal, rawRecordsUpsertedTotal } from '../metrics.js';
import type { FetchMarketData } from '../services/dataApi.js';
import type { EntityRegistry } from '../services/entityRegistry.js';
import { INGESTION_JOB, type JobLedger, type JobRunHandle } from '../services/jobLedger.js';
import type { RawRow, RecordStore } from '../services/recordStore.js';
import type { TradingCalendar } from '../services/tradingCalendar.js';

export interface IngestionDeps {
  ledger: JobLedger;
  registry: EntityRegistry;
  records: RecordStore;
  calendar: TradingCalendar;
  fetchMarketData: FetchMarketData;
  /** Stored on every raw record as its provenance. */
  source: string;
  now?: () => Date;
  log?: Logger;
}

export interface IngestionOptions {
  /** Pins the logical date instead of deriving it from the clock. */
  today?: string;
  timeZone?: string;
  /** Floor used when no ingestion run has ever completed; empty means the previous business day. */
  historyStart?: string;
  retry?: Partial<RetryPolicy>;
}

export interface IngestionStats {
  datesVisited: number;
  entities: number;
  recordsUpserted: number;
  recordsChanged: number;
  emptyFetches: number;
}

export interface IngestionResult {
  status: 'completed' | 'failed' | 'skipped';
  logicalDate: string;
  runId: string | null;
  datesVisited: string[];
  failedDate: string | null;
  detail: string;
  stats: IngestionStats;
}

class DateFetchFailure extends Error {
  readonly date: string;
  readonly entityId: string;

  constructor(date: string, entityId: string, cause: unknown) {
    super(`fetch for ${entityId} on ${date} failed after retries: ${errorMessage(cause)}`, { cause });
    this.name = 'DateFetchFailure';
    this.date = date;
    this.entityId = entityId;
  }
}

/** First date the run has to (re)ingest. */
export function resolveIngestionStart(
  lastCompleted: string | null,
  today: string,
  calendar: TradingCalendar,
  historyStart: string = '',
): string {
  if (lastCompleted) return addDays(lastCompleted, 1);
  if (historyStart) return historyStart;
  return calendar.previousBusinessDay(today);
}

export interface IngestionPlan {
  logicalDate: string;
  lastCompleted: string | null;
  start: string;
  /** Business days the run would ingest, oldest first. */
  dates: string[];
}

function resolveToday(now: Date, options: IngestionOptions): string {
  return options.today ?? currentDateKey(now, options.timeZone ?? MARKET_TIMEZONE);
}

async function planDates(
  deps: Pick<IngestionDeps, 'ledger' | 'calendar'>,
  today: string,
  options: IngestionOptions,
): Promise<IngestionPlan> {
  const lastCompleted = await deps.ledger.lastCompletedDate(INGESTION_JOB);
  const start = resolveIngestionStart(lastCompleted, today, deps.calendar, options.historyStart ?? INGESTION_HISTORY_START);
  const dates = start <= today ? deps.calendar.businessDaysBetween(start, today) : [];
  return { logicalDate: today, lastCompleted, start, dates };
}

/** What the next run would replay. Reads the ledger only; nothing is written. */
export async function planIngestion(
  deps: Pick<IngestionDeps, 'ledger' | 'calendar' | 'now'>,
  options: IngestionOptions = {},
): Promise<IngestionPlan> {
  const now = deps.now ?? (() => new Date());
  return planDates(deps, resolveToday(now(), options), options);
}

export async function runIngestion(deps: IngestionDeps, options: IngestionOptions = {}): Promise<IngestionResult> {
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? createModuleLogger('ingestion');
  const startedMs = now().getTime();
  const today = resolveToday(new Date(startedMs), options);
  const stats: IngestionStats = { datesVisited: 0, entities: 0, recordsUpserted: 0, recordsChanged: 0, emptyFetches: 0 };
  const datesVisited: string[] = [];

  const finishMetrics = (status: IngestionResult['status']) => {
    jobRunsTotal.inc({ job: INGESTION_JOB, status });
    jobRunDurationSeconds.observe({ job: INGESTION_JOB }, Math.max(0, now().getTime() - startedMs) / 1000);
    rawRecordsUpsertedTotal.inc(stats.recordsChanged);
  };

  let handle: JobRunHandle;
  try {
    handle = await deps.ledger.recordStart(INGESTION_JOB, today, { mode: 'exclusive' });
  } catch (err: unknown) {
    if (err instanceof DuplicateRunError) {
      log.info({ logicalDate: today, existingStatus: err.existingStatus }, 'ingestion already ran or is running; skipping');
      finishMetrics('skipped');
      return { status: 'skipped', logicalDate: today, runId: null, datesVisited, failedDate: null, detail: err.message, stats };
    }
    throw err;
  }

  const policy: RetryPolicy = {
    maxAttempts: DATA_API_MAX_ATTEMPTS,
    baseDelayMs: DATA_API_RETRY_BASE_MS,
    attemptTimeoutMs: DATA_API_TIMEOUT_MS,
    ...options.retry,
  };

  try {
    const orphans = await deps.ledger.closeOrphans(INGESTION_JOB);
    if (orphans.length > 0) {
      log.warn({ logicalDates: orphans.map((run) => run.logicalDate) }, 'closed orphaned ingestion runs as failed');
    }
    const { lastCompleted, start, dates } = await planDates(deps, today, options);
    const entities = await deps.registry.listActive();
    stats.entities = entities.length;
    log.info(
      { logicalDate: today, runId: handle.runId, lastCompleted, start, dates: dates.length, entities: entities.length },
      'ingestion started',
    );

    for (const date of dates) {
      for (const entity of entities) {
        let rows: RawRow[];
        try {
          rows = await withRetries(
            `fetch ${entity.id} ${date}`,
            (signal) => deps.fetchMarketData(entity.id, date, date, signal),
            policy,
          );
        } catch (err: unknown) {
          throw new DateFetchFailure(date, entity.id, err);
        }
        if (rows.length === 0) {
          stats.emptyFetches += 1;
          log.debug({ entityId: entity.id, date }, 'provider returned no rows');
          continue;
        }
        for (const row of rows) {
          if (row.date !== date) continue;
          const changed = await deps.records.upsertRawRecord(entity.id, row, deps.source, handle.startedAt);
          stats.recordsUpserted += 1;
          if (changed) stats.recordsChanged += 1;
        }
      }
      datesVisited.push(date);
      stats.datesVisited = datesVisited.length;
      log.info({ date, recordsUpserted: stats.recordsUpserted }, 'date ingested');
    }

    const detail =
      datesVisited.length > 0
        ? `ingested ${datesVisited.length} business day(s) ${datesVisited[0]}..${datesVisited[datesVisited.length - 1]}`
        : `no business days in ${start}..${today}`;
    await deps.ledger.recordFinish(handle, 'completed', detail, { ...stats });
    log.info({ logicalDate: today, ...stats }, 'ingestion completed');
    finishMetrics('completed');
    return { status: 'completed', logicalDate: today, runId: handle.runId, datesVisited, failedDate: null, detail, stats };
  } catch (err: unknown) {
    const failedDate = err instanceof DateFetchFailure ? err.date : null;
    const detail = err instanceof DateFetchFailure ? `failed on ${err.date}: ${err.message}` : `aborted: ${errorMessage(err)}`;
    try {
      await deps.ledger.recordFinish(handle, 'failed', detail, { ...stats });
    } catch (finishErr: unknown) {
      log.error({ err: finishErr, logicalDate: today }, 'could not record ingestion failure in the ledger');
      finishMetrics('failed');
      throw err;
    }
    log.error({ logicalDate: today, failedDate, detail }, 'ingestion failed');
    finishMetrics('failed');
    return { status: 'failed', logicalDate: today, runId: handle.runId, datesVisited, failedDate, detail, stats };
  }
}
