import Fastify, { type FastifyInstance } from 'fastify';
import client from 'prom-client';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import type { DocumentStore } from './data/documentStore.js';
import { errorMessage } from './lib/errors.js';
import { daysBetween } from './lib/dateUtils.js';
import { createStatusMetricsRegistry, httpRequestDurationSeconds, metricsRegistry } from './metrics.js';
import { getAnalysisStatus } from './orchestrators/analysisOrchestrator.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { registerJobRoutes } from './routes/jobRoutes.js';
import { buildHealthPayload, buildReadyPayload } from './services/healthService.js';
import type { EntityRegistry } from './services/entityRegistry.js';
import { ANALYSIS_JOB, INGESTION_JOB, type JobLedger } from './services/jobLedger.js';

export interface StatusServerDeps {
  store: DocumentStore;
  ledger: JobLedger;
  registry: EntityRegistry;
  /** Market-local date key of "now". */
  today: () => string;
  /** Logical date the analysis job would work on right now. */
  currentAnalysisDate: () => string;
  isShuttingDown?: () => boolean;
}

/** Builds the read-only status server; the caller decides whether to listen or inject. */
export function buildStatusServer(deps: StatusServerDeps): FastifyInstance {
  const startedAtMs = Date.now();
  const isShuttingDown = deps.isShuttingDown ?? (() => false);
  const app = Fastify({ logger: false });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onResponse', async (request, reply) => {
    httpRequestDurationSeconds.observe(
      {
        method: request.method,
        route: request.routeOptions.url ?? 'unknown',
        status_code: String(reply.statusCode),
      },
      reply.elapsedTime / 1000,
    );
  });

  const statusMetrics = createStatusMetricsRegistry(
    {
      lastCompletedAgeDays: async (job) => {
        const last = await deps.ledger.lastCompletedDate(job);
        return last ? daysBetween(last, deps.today()) : null;
      },
      pendingAnalysisEntities: async () =>
        (await getAnalysisStatus({ ledger: deps.ledger, registry: deps.registry }, deps.currentAnalysisDate())).pending,
    },
    [INGESTION_JOB, ANALYSIS_JOB],
  );

  registerHealthRoutes({
    app,
    metricsRegistry: client.Registry.merge([metricsRegistry, statusMetrics]),
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown: isShuttingDown(),
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
      }),
    getReadyPayload: async () =>
      buildReadyPayload({
        store: deps.store,
        isShuttingDown: isShuttingDown(),
        today: deps.today(),
        lastIngestionDate: await deps.ledger.lastCompletedDate(INGESTION_JOB).catch((err: unknown) => {
          console.warn(`[health] Could not read last ingestion date: ${errorMessage(err)}`);
          return null;
        }),
      }),
  });

  registerJobRoutes(app, {
    ledger: deps.ledger,
    registry: deps.registry,
    currentLogicalDate: deps.currentAnalysisDate,
  });

  return app;
}
