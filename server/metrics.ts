import client from 'prom-client';

// Collect default metrics (memory, CPU, event loop, etc.)
client.collectDefaultMetrics({
  labels: { app: 'market-ledger' },
});

export const httpRequestDurationSeconds = new client.Histogram({
  name: 'http_request_duration_seconds',
  help: 'Duration of status-server HTTP requests in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
});

export const jobRunsTotal = new client.Counter({
  name: 'job_runs_total',
  help: 'Job invocations by final outcome',
  labelNames: ['job', 'status'],
});

export const jobRunDurationSeconds = new client.Histogram({
  name: 'job_run_duration_seconds',
  help: 'Wall-clock duration of job invocations',
  labelNames: ['job'],
  buckets: [1, 5, 30, 60, 300, 900, 1800, 3600, 7200],
});

export const rawRecordsUpsertedTotal = new client.Counter({
  name: 'raw_records_upserted_total',
  help: 'Raw OHLCV documents written by the ingestion job',
});

export const entitiesAnalyzedTotal = new client.Counter({
  name: 'entities_analyzed_total',
  help: 'Entities processed by the analysis job by outcome',
  labelNames: ['outcome'],
});

export const analysisBacklogGauge = new client.Gauge({
  name: 'analysis_backlog_entities',
  help: 'Entities left in the analysis backlog after the latest invocation',
});

export const metricsRegistry = client.register;

/** The part of prom-client's Pushgateway the job processes use. */
export interface MetricsPusher {
  pushAdd(params: { jobName: string; groupings?: Record<string, string> }): Promise<unknown>;
}

export function createMetricsPusher(url: string): MetricsPusher | null {
  return url ? new client.Pushgateway(url, { timeout: 5_000 }, metricsRegistry) : null;
}

/**
 * Job processes exit long before any scrape, so they push their registry to a
 * Pushgateway instead, grouped by job. Resolves false when pushing is disabled.
 */
export async function pushJobMetrics(pusher: MetricsPusher | null, job: string): Promise<boolean> {
  if (!pusher) return false;
  await pusher.pushAdd({ jobName: 'market-ledger', groupings: { job } });
  return true;
}

export interface StatusMetricSources {
  /** Calendar days since the job last completed, or null if it never has. */
  lastCompletedAgeDays: (job: string) => Promise<number | null>;
  pendingAnalysisEntities: () => Promise<number>;
}

/**
 * Gauges the status server derives from persisted state on every scrape, so
 * they stay correct however many job processes came and went.
 */
export function createStatusMetricsRegistry(sources: StatusMetricSources, jobs: readonly string[]): client.Registry {
  const registry = new client.Registry();
  new client.Gauge({
    name: 'job_last_completed_age_days',
    help: 'Calendar days since the logical date of the latest completed run',
    labelNames: ['job'],
    registers: [registry],
    async collect() {
      this.reset();
      for (const job of jobs) {
        const age = await sources.lastCompletedAgeDays(job);
        if (age !== null) this.set({ job }, age);
      }
    },
  });
  new client.Gauge({
    name: 'analysis_pending_entities',
    help: 'Active entities not yet analyzed for the current logical date',
    registers: [registry],
    async collect() {
      this.set(await sources.pendingAnalysisEntities());
    },
  });
  return registry;
}
