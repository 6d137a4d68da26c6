/**
 * Job ledger: the durable record of every job invocation, keyed by
 * (jobName, logicalDate). It is the only resumption checkpoint the jobs have;
 * nothing about scheduling progress lives in process memory.
 */

import { v4 as uuidv4 } from 'uuid';
import type { DocumentStore } from '../data/documentStore.js';
import { jobRunKey, type JobAttempt, type JobRunDocument, type JobStatus } from '../data/documents.js';
import { DuplicateRunError, LedgerError } from '../lib/errors.js';

export const INGESTION_JOB = 'ingestion';
export const ANALYSIS_JOB = 'analysis';

export const HISTORY_LIMIT = 50;
const DEFAULT_STALE_AFTER_MS = 6 * 60 * 60 * 1000;
const WRITE_CONFLICT_ATTEMPTS = 3;
const ORPHAN_DETAIL_PREFIX = 'orphaned:';

export type RunMode = 'exclusive' | 'append';
export type FinalStatus = Extract<JobStatus, 'completed' | 'failed'>;

export interface JobRunHandle {
  readonly jobName: string;
  readonly logicalDate: string;
  readonly runId: string;
  readonly startedAt: string;
  readonly mode: RunMode;
}

export interface JobLedgerOptions {
  /** Per-job age after which an unfinished entry counts as orphaned. */
  staleAfterMs?: Partial<Record<string, number>>;
  defaultStaleAfterMs?: number;
  now?: () => Date;
  newRunId?: () => string;
}

export interface ListRunsOptions {
  status?: JobStatus;
  /** Inclusive lower bound on logicalDate. */
  since?: string;
  limit?: number;
}

export interface JobStatistics {
  jobName: string;
  since: string | null;
  total: number;
  byStatus: Record<JobStatus, number>;
  /** Percentage of closed runs that completed, one decimal. */
  successRate: number | null;
  averageDurationMs: number | null;
  lastCompletedDate: string | null;
}

/**
 * An entry is orphaned when it never left pending/running and has been open
 * longer than the job's expected maximum duration.
 */
export function isOrphaned(run: JobRunDocument, now: Date, staleAfterMs: number): boolean {
  if (run.status !== 'pending' && run.status !== 'running') return false;
  if (run.finishedAt !== null) return false;
  const startedMs = Date.parse(run.startedAt);
  if (!Number.isFinite(startedMs)) return true;
  return now.getTime() - startedMs > staleAfterMs;
}

export function isOrphanDetail(detail: string): boolean {
  return detail.startsWith(ORPHAN_DETAIL_PREFIX);
}

function toAttempt(run: JobRunDocument): JobAttempt {
  return {
    runId: run.runId,
    status: run.status,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    detail: run.detail,
  };
}

function capHistory(history: JobAttempt[]): JobAttempt[] {
  return history.length > HISTORY_LIMIT ? history.slice(history.length - HISTORY_LIMIT) : history;
}

export class JobLedger {
  private readonly store: DocumentStore;
  private readonly staleAfterMs: Partial<Record<string, number>>;
  private readonly defaultStaleAfterMs: number;
  private readonly now: () => Date;
  private readonly newRunId: () => string;
  private readonly finished = new WeakSet<JobRunHandle>();

  constructor(store: DocumentStore, options: JobLedgerOptions = {}) {
    this.store = store;
    this.staleAfterMs = options.staleAfterMs ?? {};
    this.defaultStaleAfterMs = options.defaultStaleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.now = options.now ?? (() => new Date());
    this.newRunId = options.newRunId ?? uuidv4;
  }

  staleThresholdMs(jobName: string): number {
    return this.staleAfterMs[jobName] ?? this.defaultStaleAfterMs;
  }

  /**
   * Opens an invocation. In exclusive mode an existing pending, running or
   * completed entry rejects the start with DuplicateRunError unless it is
   * orphaned; in append mode the previous attempt is archived and the new one
   * takes over the entry. The entry is written as pending, then running.
   *
   * Every write is conditional on the entry read just before it, so of two
   * concurrent exclusive starts exactly one wins and the other sees it.
   */
  async recordStart(jobName: string, logicalDate: string, options: { mode: RunMode }): Promise<JobRunHandle> {
    const key = jobRunKey(jobName, logicalDate);
    for (let attempt = 1; attempt <= WRITE_CONFLICT_ATTEMPTS; attempt++) {
      const now = this.now();
      const existing = await this.store.get('jobRuns', key);
      let history: JobAttempt[] = [];

      if (existing) {
        const orphaned = isOrphaned(existing, now, this.staleThresholdMs(jobName));
        if (options.mode === 'exclusive' && !orphaned && existing.status !== 'failed') {
          throw new DuplicateRunError(jobName, logicalDate, existing.status);
        }
        const previous = toAttempt(existing);
        if (orphaned) {
          console.warn(
            `[ledger] ${jobName} ${logicalDate}: run ${existing.runId} (${existing.status} since ${existing.startedAt}) is orphaned; starting a fresh attempt`,
          );
          previous.status = 'failed';
          previous.detail = this.orphanDetail(existing);
        }
        history = capHistory([...existing.history, previous]);
      }

      const handle: JobRunHandle = {
        jobName,
        logicalDate,
        runId: this.newRunId(),
        startedAt: now.toISOString(),
        mode: options.mode,
      };
      const pending: JobRunDocument = {
        jobName,
        logicalDate,
        status: 'pending',
        runId: handle.runId,
        attempts: (existing?.attempts ?? 0) + 1,
        startedAt: handle.startedAt,
        finishedAt: null,
        detail: '',
        stats: {},
        history,
      };
      const claimed = await this.store.compareAndSet(
        'jobRuns',
        key,
        pending,
        existing ? { field: 'runId', equals: existing.runId } : null,
      );
      if (!claimed) continue;
      const running = await this.store.compareAndSet(
        'jobRuns',
        key,
        { ...pending, status: 'running' },
        { field: 'runId', equals: handle.runId },
      );
      if (!running) {
        throw new LedgerError(`Run ${handle.runId} of ${jobName} ${logicalDate} was superseded before it started`);
      }
      return handle;
    }
    throw new LedgerError(`Could not claim ${jobName} ${logicalDate}: concurrent writers kept changing the entry`);
  }

  /**
   * Closes an invocation exactly once. When another invocation has taken over
   * the entry since, only this invocation's history slot is updated. A run
   * already closed as orphaned still records its real outcome.
   */
  async recordFinish(
    handle: JobRunHandle,
    status: FinalStatus,
    detail: string,
    stats: Record<string, number> = {},
  ): Promise<void> {
    if (this.finished.has(handle)) {
      throw new LedgerError(`Run ${handle.runId} of ${handle.jobName} ${handle.logicalDate} is already finished`);
    }
    if (status !== 'completed' && status !== 'failed') {
      throw new LedgerError(`Cannot finish a run as ${String(status)}`);
    }
    const key = jobRunKey(handle.jobName, handle.logicalDate);
    for (let attempt = 1; attempt <= WRITE_CONFLICT_ATTEMPTS; attempt++) {
      const existing = await this.store.get('jobRuns', key);
      if (!existing) {
        throw new LedgerError(`No ledger entry for ${handle.jobName} ${handle.logicalDate}`);
      }
      const finishedAt = this.now().toISOString();
      let next: JobRunDocument;

      if (existing.runId === handle.runId) {
        const closedAsOrphan = existing.status === 'failed' && isOrphanDetail(existing.detail);
        if (existing.status !== 'running' && !closedAsOrphan) {
          throw new LedgerError(`Illegal transition ${existing.status} -> ${status} for run ${handle.runId}`);
        }
        if (closedAsOrphan) {
          console.warn(`[ledger] ${handle.jobName} ${handle.logicalDate}: run ${handle.runId} finished after it was closed as orphaned`);
        }
        next = { ...existing, status, finishedAt, detail, stats };
      } else {
        const index = existing.history.findIndex((entry) => entry.runId === handle.runId);
        if (index === -1) {
          console.warn(`[ledger] ${handle.jobName} ${handle.logicalDate}: run ${handle.runId} no longer in history; finish not recorded`);
          this.finished.add(handle);
          return;
        }
        const history = existing.history.map((entry, i) =>
          i === index ? { ...entry, status, finishedAt, detail } : entry,
        );
        next = { ...existing, history };
      }

      if (await this.store.compareAndSet('jobRuns', key, next, { field: 'runId', equals: existing.runId })) {
        this.finished.add(handle);
        return;
      }
    }
    throw new LedgerError(`Could not finish run ${handle.runId}: concurrent writers kept changing the entry`);
  }

  /**
   * Closes every orphaned entry of the job as failed, whatever its logical
   * date. Returns the entries it closed.
   */
  async closeOrphans(jobName: string): Promise<JobRunDocument[]> {
    const orphans = await this.findOrphans(jobName);
    const finishedAt = this.now().toISOString();
    const closed: JobRunDocument[] = [];
    for (const run of orphans) {
      const next: JobRunDocument = { ...run, status: 'failed', finishedAt, detail: this.orphanDetail(run) };
      const written = await this.store.compareAndSet('jobRuns', jobRunKey(jobName, run.logicalDate), next, {
        field: 'runId',
        equals: run.runId,
      });
      if (written) {
        console.warn(
          `[ledger] ${jobName} ${run.logicalDate}: run ${run.runId} (${run.status} since ${run.startedAt}) closed as orphaned`,
        );
        closed.push(next);
      }
    }
    return closed;
  }

  private orphanDetail(run: JobRunDocument): string {
    const minutes = Math.round(this.staleThresholdMs(run.jobName) / 60000);
    return `${ORPHAN_DETAIL_PREFIX} no finish recorded within ${minutes} minutes${run.detail ? ` (${run.detail})` : ''}`;
  }

  async getRun(jobName: string, logicalDate: string): Promise<JobRunDocument | null> {
    return this.store.get('jobRuns', jobRunKey(jobName, logicalDate));
  }

  async lastCompletedDate(jobName: string): Promise<string | null> {
    const [latest] = await this.store.query(
      'jobRuns',
      { jobName, status: 'completed' },
      { sort: [{ field: 'logicalDate', direction: 'desc' }], limit: 1 },
    );
    return latest?.logicalDate ?? null;
  }

  async isCompletedFor(jobName: string, logicalDate: string): Promise<boolean> {
    const run = await this.getRun(jobName, logicalDate);
    return run?.status === 'completed';
  }

  /** Newest logical date first. */
  async listRuns(jobName: string, options: ListRunsOptions = {}): Promise<JobRunDocument[]> {
    return this.store.query(
      'jobRuns',
      {
        jobName,
        status: options.status,
        logicalDate: options.since ? { $gte: options.since } : undefined,
      },
      { sort: [{ field: 'logicalDate', direction: 'desc' }], limit: options.limit },
    );
  }

  async findOrphans(jobName: string): Promise<JobRunDocument[]> {
    const open = await this.store.query('jobRuns', { jobName, status: { $in: ['pending', 'running'] } });
    const now = this.now();
    const staleAfterMs = this.staleThresholdMs(jobName);
    return open.filter((run) => isOrphaned(run, now, staleAfterMs));
  }

  async getStatistics(jobName: string, since?: string): Promise<JobStatistics> {
    const runs = await this.listRuns(jobName, { since });
    const byStatus: Record<JobStatus, number> = { pending: 0, running: 0, completed: 0, failed: 0 };
    let durationTotal = 0;
    let durationCount = 0;
    for (const run of runs) {
      byStatus[run.status] += 1;
      // An orphan's finishedAt is when it was noticed, not a duration.
      if (run.finishedAt && !isOrphanDetail(run.detail)) {
        const ms = Date.parse(run.finishedAt) - Date.parse(run.startedAt);
        if (Number.isFinite(ms) && ms >= 0) {
          durationTotal += ms;
          durationCount += 1;
        }
      }
    }
    const closed = byStatus.completed + byStatus.failed;
    return {
      jobName,
      since: since ?? null,
      total: runs.length,
      byStatus,
      successRate: closed > 0 ? Math.round((byStatus.completed / closed) * 1000) / 10 : null,
      averageDurationMs: durationCount > 0 ? Math.round(durationTotal / durationCount) : null,
      lastCompletedDate: await this.lastCompletedDate(jobName),
    };
  }
}
