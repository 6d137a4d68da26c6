/**
 * Hourly analysis: drains the day's backlog of entities in descending
 * priority, committing each entity on its own. Every invocation is bounded by
 * a wall-clock budget and an entity quota, both checked before starting the
 * next entity; whatever is left is picked up by the next invocation.
 */

import {
  ANALYSIS_COMPUTE_MAX_ATTEMPTS,
  ANALYSIS_DAY_ROLLOVER_HOUR,
  ANALYSIS_LOOKBACK_DAYS,
  ANALYSIS_MAX_ENTITIES_PER_RUN,
  ANALYSIS_MIN_HISTORY_ROWS,
  ANALYSIS_TIME_BUDGET_MINUTES,
  MARKET_TIMEZONE,
} from '../config.js';
import { createModuleLogger, type Logger } from '../logger.js';
import { addDays, logicalDateKey } from '../lib/dateUtils.js';
import { InsufficientHistoryError, errorMessage, isPersistenceError } from '../lib/errors.js';
import { withRetries, type RetryPolicy } from '../lib/retry.js';
import { analysisBacklogGauge, entitiesAnalyzedTotal, jobRunDurationSeconds, jobRunsTotal } from '../metrics.js';
import type { EntityRegistry } from '../services/entityRegistry.js';
import { ANALYSIS_JOB, INGESTION_JOB, type JobLedger, type JobRunHandle } from '../services/jobLedger.js';
import type { RecordStore } from '../services/recordStore.js';
import type { ComputeAnalytics } from '../services/technicalAnalysis.js';
import type { JobStatus } from '../data/documents.js';

const MAX_FAILED_IDS_IN_DETAIL = 20;

export type StopReason = 'backlog-drained' | 'time-budget' | 'quota';

export interface AnalysisDeps {
  ledger: JobLedger;
  registry: EntityRegistry;
  records: RecordStore;
  computeAnalytics: ComputeAnalytics;
  now?: () => Date;
  log?: Logger;
}

export interface AnalysisOptions {
  /** Pins the logical date instead of deriving it from the clock. */
  logicalDate?: string;
  timeZone?: string;
  rolloverHour?: number;
  timeBudgetMs?: number;
  /** 0 disables the quota. */
  maxEntities?: number;
  lookbackDays?: number;
  minHistoryRows?: number;
  computeRetry?: Partial<RetryPolicy>;
}

export interface AnalysisStats {
  backlog: number;
  attempted: number;
  succeeded: number;
  failed: number;
  remaining: number;
}

export interface AnalysisResult {
  status: 'completed' | 'failed' | 'skipped';
  logicalDate: string;
  runId: string | null;
  reason: StopReason | 'precondition-not-met' | 'aborted';
  analyzed: string[];
  failures: Array<{ entityId: string; error: string }>;
  detail: string;
  stats: AnalysisStats;
}

export interface AnalysisStatus {
  logicalDate: string;
  ingestionStatus: JobStatus | null;
  analysisRuns: number;
  lastAnalysisStatus: JobStatus | null;
  totalActive: number;
  analyzed: number;
  pending: number;
  completionPercentage: number;
  isComplete: boolean;
  canRun: boolean;
}

export function resolveAnalysisDate(now: Date, options: AnalysisOptions = {}): string {
  return (
    options.logicalDate ??
    logicalDateKey(now, options.timeZone ?? MARKET_TIMEZONE, options.rolloverHour ?? ANALYSIS_DAY_ROLLOVER_HOUR)
  );
}

function describe(reason: StopReason, stats: AnalysisStats, failures: AnalysisResult['failures']): string {
  let detail = `stop=${reason}; analyzed ${stats.succeeded}/${stats.backlog}, ${stats.remaining} remaining`;
  if (failures.length > 0) {
    const ids = failures.slice(0, MAX_FAILED_IDS_IN_DETAIL).map((f) => f.entityId);
    const more = failures.length > ids.length ? ` (+${failures.length - ids.length} more)` : '';
    detail += `; failed: ${ids.join(', ')}${more}`;
  }
  return detail;
}

export async function runAnalysis(deps: AnalysisDeps, options: AnalysisOptions = {}): Promise<AnalysisResult> {
  const now = deps.now ?? (() => new Date());
  const log = deps.log ?? createModuleLogger('analysis');
  const startedMs = now().getTime();
  const date = resolveAnalysisDate(new Date(startedMs), options);
  const timeBudgetMs = options.timeBudgetMs ?? ANALYSIS_TIME_BUDGET_MINUTES * 60_000;
  const maxEntities = Math.max(0, Math.floor(options.maxEntities ?? ANALYSIS_MAX_ENTITIES_PER_RUN));
  const lookbackDays = options.lookbackDays ?? ANALYSIS_LOOKBACK_DAYS;
  const minHistoryRows = options.minHistoryRows ?? ANALYSIS_MIN_HISTORY_ROWS;
  const computePolicy: RetryPolicy = {
    maxAttempts: ANALYSIS_COMPUTE_MAX_ATTEMPTS,
    baseDelayMs: 1_000,
    ...options.computeRetry,
  };

  const stats: AnalysisStats = { backlog: 0, attempted: 0, succeeded: 0, failed: 0, remaining: 0 };
  const analyzed: string[] = [];
  const failures: AnalysisResult['failures'] = [];

  const finishMetrics = (status: AnalysisResult['status']) => {
    jobRunsTotal.inc({ job: ANALYSIS_JOB, status });
    jobRunDurationSeconds.observe({ job: ANALYSIS_JOB }, Math.max(0, now().getTime() - startedMs) / 1000);
  };

  // Reads only: a precondition miss must leave no trace in the ledger.
  if (!(await deps.ledger.isCompletedFor(INGESTION_JOB, date))) {
    log.info({ logicalDate: date }, 'ingestion not completed for logical date; skipping analysis');
    finishMetrics('skipped');
    return {
      status: 'skipped',
      logicalDate: date,
      runId: null,
      reason: 'precondition-not-met',
      analyzed,
      failures,
      detail: `ingestion not completed for ${date}`,
      stats,
    };
  }

  const handle: JobRunHandle = await deps.ledger.recordStart(ANALYSIS_JOB, date, { mode: 'append' });

  try {
    const orphans = await deps.ledger.closeOrphans(ANALYSIS_JOB);
    if (orphans.length > 0) {
      log.warn({ logicalDates: orphans.map((run) => run.logicalDate) }, 'closed orphaned analysis runs as failed');
    }
    const backlog = await deps.registry.listBacklog(date);
    stats.backlog = backlog.length;
    log.info({ logicalDate: date, runId: handle.runId, backlog: backlog.length, timeBudgetMs, maxEntities }, 'analysis started');

    let reason: StopReason = 'backlog-drained';
    for (const entity of backlog) {
      if (now().getTime() - startedMs >= timeBudgetMs) {
        reason = 'time-budget';
        break;
      }
      if (maxEntities > 0 && stats.attempted >= maxEntities) {
        reason = 'quota';
        break;
      }
      stats.attempted += 1;
      try {
        const rows = await deps.records.listRawRecords(entity.id, addDays(date, -lookbackDays), date);
        if (rows.length < minHistoryRows) {
          throw new InsufficientHistoryError(entity.id, rows.length, minHistoryRows);
        }
        const bundle = await withRetries(
          `analytics ${entity.id}`,
          () => deps.computeAnalytics(entity.id, rows),
          computePolicy,
        );
        await deps.records.saveAnalysisRecord({
          entityId: entity.id,
          date,
          indicators: bundle.indicators,
          signals: bundle.signals,
          rowsUsed: rows.length,
          analyzedAt: now().toISOString(),
        });
        await deps.registry.markAnalyzed(entity.id, date);
        stats.succeeded += 1;
        analyzed.push(entity.id);
        entitiesAnalyzedTotal.inc({ outcome: 'succeeded' });
      } catch (err: unknown) {
        if (isPersistenceError(err)) throw err;
        stats.failed += 1;
        failures.push({ entityId: entity.id, error: errorMessage(err) });
        entitiesAnalyzedTotal.inc({ outcome: 'failed' });
        log.warn({ entityId: entity.id, err: errorMessage(err) }, 'entity analysis failed');
      }
    }

    stats.remaining = stats.backlog - stats.succeeded;
    analysisBacklogGauge.set(stats.remaining);
    const detail = describe(reason, stats, failures);
    await deps.ledger.recordFinish(handle, 'completed', detail, { ...stats });
    log.info({ logicalDate: date, reason, ...stats }, 'analysis completed');
    finishMetrics('completed');
    return { status: 'completed', logicalDate: date, runId: handle.runId, reason, analyzed, failures, detail, stats };
  } catch (err: unknown) {
    stats.remaining = stats.backlog - stats.succeeded;
    const detail = `aborted: ${errorMessage(err)}`;
    try {
      await deps.ledger.recordFinish(handle, 'failed', detail, { ...stats });
    } catch (finishErr: unknown) {
      log.error({ err: finishErr, logicalDate: date }, 'could not record analysis failure in the ledger');
      finishMetrics('failed');
      throw err;
    }
    log.error({ logicalDate: date, detail }, 'analysis failed');
    finishMetrics('failed');
    return {
      status: 'failed',
      logicalDate: date,
      runId: handle.runId,
      reason: 'aborted',
      analyzed,
      failures,
      detail,
      stats,
    };
  }
}

/** Progress of the analysis backlog for one logical date. */
export async function getAnalysisStatus(
  deps: Pick<AnalysisDeps, 'ledger' | 'registry'>,
  date: string,
): Promise<AnalysisStatus> {
  const [ingestionRun, analysisRun, active, backlog] = await Promise.all([
    deps.ledger.getRun(INGESTION_JOB, date),
    deps.ledger.getRun(ANALYSIS_JOB, date),
    deps.registry.listActive(),
    deps.registry.listBacklog(date),
  ]);
  const totalActive = active.length;
  const pending = backlog.length;
  const analyzed = totalActive - pending;
  const ingestionStatus = ingestionRun?.status ?? null;
  return {
    logicalDate: date,
    ingestionStatus,
    analysisRuns: analysisRun?.attempts ?? 0,
    lastAnalysisStatus: analysisRun?.status ?? null,
    totalActive,
    analyzed,
    pending,
    completionPercentage: totalActive > 0 ? Math.round((analyzed / totalActive) * 1000) / 10 : 100,
    isComplete: pending === 0,
    canRun: ingestionStatus === 'completed' && pending > 0,
  };
}
