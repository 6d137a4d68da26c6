/**
 * History backfill for newly onboarded entities. Daily ingestion only moves
 * forward from its checkpoint, so an entity added after the first run would
 * otherwise have no history for the analysis window.
 *
 * The window ends the day before the next ingestion run starts, so the two
 * together leave no gap.
 */

import {
  ANALYSIS_LOOKBACK_DAYS,
  ANALYSIS_MIN_HISTORY_ROWS,
  DATA_API_MAX_ATTEMPTS,
  DATA_API_RETRY_BASE_MS,
  DATA_API_TIMEOUT_MS,
  INGESTION_HISTORY_START,
  MARKET_TIMEZONE,
} from '../config.js';
import { createModuleLogger, type Logger } from '../logger.js';
import { addDays, currentDateKey } from '../lib/dateUtils.js';
import { errorMessage, isPersistenceError } from '../lib/errors.js';
import { withRetries, type RetryPolicy } from '../lib/retry.js';
import { rawRecordsUpsertedTotal } from '../metrics.js';
import type { FetchMarketData } from '../services/dataApi.js';
import { INGESTION_JOB, type JobLedger } from '../services/jobLedger.js';
import type { RecordStore } from '../services/recordStore.js';
import type { TradingCalendar } from '../services/tradingCalendar.js';
import { resolveIngestionStart } from './ingestionOrchestrator.js';

export interface BackfillDeps {
  ledger: JobLedger;
  records: RecordStore;
  calendar: TradingCalendar;
  fetchMarketData: FetchMarketData;
  source: string;
  now?: () => Date;
  log?: Logger;
}

export interface BackfillOptions {
  today?: string;
  timeZone?: string;
  historyStart?: string;
  lookbackDays?: number;
  minHistoryRows?: number;
  /** Reload entities that already have raw records. */
  force?: boolean;
  retry?: Partial<RetryPolicy>;
}

export type BackfillOutcome =
  | { entityId: string; status: 'skipped'; existingRows: number }
  | { entityId: string; status: 'loaded'; recordsChanged: number; rowsInWindow: number; sufficient: boolean }
  | { entityId: string; status: 'failed'; error: string };

export interface BackfillResult {
  from: string;
  to: string;
  outcomes: BackfillOutcome[];
}

export async function backfillEntities(
  deps: BackfillDeps,
  entityIds: readonly string[],
  options: BackfillOptions = {},
): Promise<BackfillResult> {
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? createModuleLogger('backfill');
  const today = options.today ?? currentDateKey(now(), options.timeZone ?? MARKET_TIMEZONE);
  const lastCompleted = await deps.ledger.lastCompletedDate(INGESTION_JOB);
  const nextStart = resolveIngestionStart(
    lastCompleted,
    today,
    deps.calendar,
    options.historyStart ?? INGESTION_HISTORY_START,
  );
  const to = addDays(nextStart, -1);
  const from = addDays(to, -(options.lookbackDays ?? ANALYSIS_LOOKBACK_DAYS));
  const minHistoryRows = options.minHistoryRows ?? ANALYSIS_MIN_HISTORY_ROWS;
  const policy: RetryPolicy = {
    maxAttempts: DATA_API_MAX_ATTEMPTS,
    baseDelayMs: DATA_API_RETRY_BASE_MS,
    attemptTimeoutMs: DATA_API_TIMEOUT_MS,
    ...options.retry,
  };
  const ingestedAt = now().toISOString();
  const outcomes: BackfillOutcome[] = [];

  for (const entityId of entityIds) {
    if (!options.force) {
      const existingRows = await deps.records.countRawRecords(entityId);
      if (existingRows > 0) {
        outcomes.push({ entityId, status: 'skipped', existingRows });
        continue;
      }
    }
    try {
      const rows = await withRetries(
        `backfill ${entityId}`,
        (signal) => deps.fetchMarketData(entityId, from, to, signal),
        policy,
      );
      let recordsChanged = 0;
      for (const row of rows) {
        if (row.date < from || row.date > to) continue;
        if (await deps.records.upsertRawRecord(entityId, row, deps.source, ingestedAt)) recordsChanged += 1;
      }
      rawRecordsUpsertedTotal.inc(recordsChanged);
      const rowsInWindow = (await deps.records.listRawRecords(entityId, from, to)).length;
      const sufficient = rowsInWindow >= minHistoryRows;
      if (!sufficient) {
        log.warn({ entityId, from, to, rowsInWindow, minHistoryRows }, 'backfilled history is shorter than analysis needs');
      }
      outcomes.push({ entityId, status: 'loaded', recordsChanged, rowsInWindow, sufficient });
    } catch (err: unknown) {
      if (isPersistenceError(err)) throw err;
      log.warn({ entityId, from, to, err: errorMessage(err) }, 'history backfill failed');
      outcomes.push({ entityId, status: 'failed', error: errorMessage(err) });
    }
  }

  log.info(
    { from, to, entities: entityIds.length, loaded: outcomes.filter((o) => o.status === 'loaded').length },
    'history backfill finished',
  );
  return { from, to, outcomes };
}
