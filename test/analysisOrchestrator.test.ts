import test from 'node:test';
import assert from 'node:assert/strict';

import { PersistenceError, TaskTimeoutError } from '../server/lib/errors.js';
import {
  getAnalysisStatus,
  resolveAnalysisDate,
  runAnalysis,
  type AnalysisDeps,
} from '../server/orchestrators/analysisOrchestrator.js';
import { ANALYSIS_JOB, INGESTION_JOB } from '../server/services/jobLedger.js';
import { RecordStore } from '../server/services/recordStore.js';
import type { ComputeAnalytics } from '../server/services/technicalAnalysis.js';
import { bar, createClock, createServices, MINUTE_MS } from './helpers.js';

const DATE = '2026-03-06';
const GENEROUS = { logicalDate: DATE, timeBudgetMs: 60 * MINUTE_MS, maxEntities: 0, lookbackDays: 30, minHistoryRows: 1 };

async function setup() {
  const clock = createClock('2026-03-06T15:00:00.000Z');
  const services = createServices(clock);
  const computed: string[] = [];
  let compute: ComputeAnalytics = async (_id, rows) => ({
    indicators: { close: rows[rows.length - 1].close },
    signals: [],
  });
  const deps: AnalysisDeps = {
    ledger: services.ledger,
    registry: services.registry,
    records: services.records,
    now: clock.now,
    computeAnalytics: (id, rows) => {
      computed.push(id);
      return compute(id, rows);
    },
  };
  return {
    ...services,
    clock,
    deps,
    computed,
    setCompute: (next: ComputeAnalytics) => {
      compute = next;
    },
    completeIngestion: async (date: string = DATE) => {
      const handle = await services.ledger.recordStart(INGESTION_JOB, date, { mode: 'exclusive' });
      await services.ledger.recordFinish(handle, 'completed', 'seeded');
    },
    addEntity: async (id: string, priorityWeight: number, barDates: string[] = [DATE]) => {
      await services.registry.add({ id, priorityWeight });
      for (const date of barDates) {
        await services.records.upsertRawRecord(id, bar(date, 100), 'test-feed', '2026-03-06T00:00:00.000Z');
      }
    },
  };
}

type Context = Awaited<ReturnType<typeof setup>>;

function entityId(i: number): string {
  return `E${String(i).padStart(3, '0')}`;
}

async function seedEntities(ctx: Context, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    await ctx.addEntity(entityId(i), count - i);
  }
}

test('resolveAnalysisDate keeps the previous day before the rollover hour', () => {
  assert.equal(resolveAnalysisDate(new Date('2026-03-06T13:00:00.000Z'), { timeZone: 'America/New_York', rolloverHour: 9 }), '2026-03-05');
  assert.equal(resolveAnalysisDate(new Date('2026-03-06T15:00:00.000Z'), { timeZone: 'America/New_York', rolloverHour: 9 }), '2026-03-06');
  assert.equal(resolveAnalysisDate(new Date('2026-03-06T13:00:00.000Z'), { logicalDate: '2026-03-02' }), '2026-03-02');
});

test('analysis before ingestion completes exits without writing anything', async () => {
  const ctx = await setup();
  await seedEntities(ctx, 3);
  const before = {
    jobRuns: ctx.store.snapshot('jobRuns'),
    entities: ctx.store.snapshot('entities'),
    analysisRecords: ctx.store.snapshot('analysisRecords'),
  };

  const result = await runAnalysis(ctx.deps, GENEROUS);
  assert.deepEqual(result, {
    status: 'skipped',
    logicalDate: DATE,
    runId: null,
    reason: 'precondition-not-met',
    analyzed: [],
    failures: [],
    detail: 'ingestion not completed for 2026-03-06',
    stats: { backlog: 0, attempted: 0, succeeded: 0, failed: 0, remaining: 0 },
  });
  assert.deepEqual(ctx.computed, []);
  assert.deepEqual(
    {
      jobRuns: ctx.store.snapshot('jobRuns'),
      entities: ctx.store.snapshot('entities'),
      analysisRecords: ctx.store.snapshot('analysisRecords'),
    },
    before,
  );
});

test('a failed ingestion run does not satisfy the precondition', async () => {
  const ctx = await setup();
  await seedEntities(ctx, 1);
  const handle = await ctx.ledger.recordStart(INGESTION_JOB, DATE, { mode: 'exclusive' });
  await ctx.ledger.recordFinish(handle, 'failed', 'provider down');
  assert.equal((await runAnalysis(ctx.deps, GENEROUS)).status, 'skipped');
  assert.equal(await ctx.ledger.getRun(ANALYSIS_JOB, DATE), null);
});

test('the quota takes the highest-priority entities and the next run drains the rest', async () => {
  const ctx = await setup();
  await seedEntities(ctx, 100);
  await ctx.completeIngestion();

  const first = await runAnalysis(ctx.deps, { ...GENEROUS, maxEntities: 40 });
  assert.equal(first.status, 'completed');
  assert.equal(first.reason, 'quota');
  assert.deepEqual(first.analyzed, Array.from({ length: 40 }, (_, i) => entityId(i)));
  assert.deepEqual(first.stats, { backlog: 100, attempted: 40, succeeded: 40, failed: 0, remaining: 60 });
  assert.equal(first.detail, 'stop=quota; analyzed 40/100, 60 remaining');
  assert.equal((await ctx.registry.get('E039'))?.lastAnalyzedDate, DATE);
  assert.equal((await ctx.registry.get('E040'))?.lastAnalyzedDate, null);
  assert.equal(await ctx.records.countAnalysisRecords(DATE), 40);

  const status = await getAnalysisStatus(ctx.deps, DATE);
  assert.deepEqual(status, {
    logicalDate: DATE,
    ingestionStatus: 'completed',
    analysisRuns: 1,
    lastAnalysisStatus: 'completed',
    totalActive: 100,
    analyzed: 40,
    pending: 60,
    completionPercentage: 40,
    isComplete: false,
    canRun: true,
  });

  const second = await runAnalysis(ctx.deps, { ...GENEROUS, maxEntities: 60 });
  assert.equal(second.reason, 'backlog-drained');
  assert.deepEqual(second.analyzed, Array.from({ length: 60 }, (_, i) => entityId(i + 40)));
  assert.equal(second.detail, 'stop=backlog-drained; analyzed 60/60, 0 remaining');
  assert.equal(await ctx.records.countAnalysisRecords(DATE), 100);

  const third = await runAnalysis(ctx.deps, GENEROUS);
  assert.equal(third.detail, 'stop=backlog-drained; analyzed 0/0, 0 remaining');
  const run = await ctx.ledger.getRun(ANALYSIS_JOB, DATE);
  assert.equal(run?.attempts, 3);
  assert.deepEqual(
    run?.history.map((attempt) => attempt.detail),
    [first.detail, second.detail],
  );
  assert.equal((await getAnalysisStatus(ctx.deps, DATE)).isComplete, true);
});

test('the time budget is checked before each entity', async () => {
  const ctx = await setup();
  await seedEntities(ctx, 5);
  await ctx.completeIngestion();
  ctx.setCompute(async () => {
    ctx.clock.advance(10 * MINUTE_MS);
    return { indicators: {}, signals: ['slow'] };
  });

  const result = await runAnalysis(ctx.deps, { ...GENEROUS, timeBudgetMs: 25 * MINUTE_MS });
  assert.equal(result.reason, 'time-budget');
  assert.deepEqual(result.analyzed, ['E000', 'E001', 'E002']);
  assert.equal(result.detail, 'stop=time-budget; analyzed 3/5, 2 remaining');
  assert.deepEqual(await ctx.records.getAnalysisRecord('E000', DATE), {
    entityId: 'E000',
    date: DATE,
    indicators: {},
    signals: ['slow'],
    rowsUsed: 1,
    analyzedAt: '2026-03-06T15:10:00.000Z',
  });
});

test('entity failures are recorded and do not stop the run', async () => {
  const ctx = await setup();
  await ctx.addEntity('A', 30, ['2026-03-05', DATE]);
  await ctx.addEntity('B', 20);
  await ctx.addEntity('C', 10, ['2026-03-05', DATE]);
  await ctx.completeIngestion();
  ctx.setCompute(async (id, rows) => {
    if (id === 'C') throw new Error('bad data');
    return { indicators: { close: rows[rows.length - 1].close }, signals: [] };
  });

  const result = await runAnalysis(ctx.deps, {
    ...GENEROUS,
    minHistoryRows: 2,
    computeRetry: { maxAttempts: 2, baseDelayMs: 0, onRetry: () => {} },
  });
  assert.equal(result.status, 'completed');
  assert.deepEqual(result.analyzed, ['A']);
  assert.deepEqual(result.failures, [
    { entityId: 'B', error: 'Insufficient history for B: 1 rows (need 2)' },
    { entityId: 'C', error: 'bad data' },
  ]);
  assert.equal(result.detail, 'stop=backlog-drained; analyzed 1/3, 2 remaining; failed: B, C');
  // Non-transient errors are not retried.
  assert.deepEqual(ctx.computed, ['A', 'C']);
  assert.equal((await ctx.registry.get('B'))?.lastAnalyzedDate, null);
  assert.deepEqual(
    (await ctx.registry.listBacklog(DATE)).map((entity) => entity.id),
    ['B', 'C'],
  );
});

test('transient compute failures are retried', async () => {
  const ctx = await setup();
  await ctx.addEntity('A', 30);
  await ctx.completeIngestion();
  let calls = 0;
  ctx.setCompute(async () => {
    calls += 1;
    if (calls === 1) throw new TaskTimeoutError('analytics A', 100);
    return { indicators: {}, signals: [] };
  });

  const result = await runAnalysis(ctx.deps, {
    ...GENEROUS,
    computeRetry: { maxAttempts: 2, baseDelayMs: 0, onRetry: () => {} },
  });
  assert.deepEqual(result.analyzed, ['A']);
  assert.equal(calls, 2);
});

test('only rows inside the lookback window are analyzed', async () => {
  const ctx = await setup();
  await ctx.addEntity('A', 30, ['2026-03-03', '2026-03-04', '2026-03-05', DATE, '2026-03-09']);
  await ctx.completeIngestion();
  let seen: string[] = [];
  ctx.setCompute(async (_id, rows) => {
    seen = rows.map((row) => row.date);
    return { indicators: {}, signals: [] };
  });

  await runAnalysis(ctx.deps, { ...GENEROUS, lookbackDays: 2 });
  assert.deepEqual(seen, ['2026-03-04', '2026-03-05', DATE]);
  assert.equal((await ctx.records.getAnalysisRecord('A', DATE))?.rowsUsed, 3);
});

test('a persistence failure aborts the run and marks it failed', async () => {
  const ctx = await setup();
  await ctx.addEntity('A', 30);
  await ctx.addEntity('B', 20);
  await ctx.completeIngestion();
  class FailingRecordStore extends RecordStore {
    async saveAnalysisRecord(): Promise<void> {
      throw new PersistenceError('upsert', 'analysisRecords', new Error('disk full'));
    }
  }

  const result = await runAnalysis({ ...ctx.deps, records: new FailingRecordStore(ctx.store) }, GENEROUS);
  assert.equal(result.status, 'failed');
  assert.equal(result.reason, 'aborted');
  assert.equal(result.detail, 'aborted: Persistence upsert on analysisRecords failed: disk full');
  assert.deepEqual(result.stats, { backlog: 2, attempted: 1, succeeded: 0, failed: 0, remaining: 2 });
  const run = await ctx.ledger.getRun(ANALYSIS_JOB, DATE);
  assert.equal(run?.status, 'failed');
  assert.equal((await ctx.registry.get('A'))?.lastAnalyzedDate, null);
});

test('getAnalysisStatus with no entities reports complete but not runnable', async () => {
  const ctx = await setup();
  assert.deepEqual(await getAnalysisStatus(ctx.deps, DATE), {
    logicalDate: DATE,
    ingestionStatus: null,
    analysisRuns: 0,
    lastAnalysisStatus: null,
    totalActive: 0,
    analyzed: 0,
    pending: 0,
    completionPercentage: 100,
    isComplete: true,
    canRun: false,
  });
});
