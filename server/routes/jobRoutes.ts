import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { JOB_STATUSES } from '../data/documents.js';
import { isDateKey } from '../lib/dateUtils.js';
import { errorMessage, isPersistenceError } from '../lib/errors.js';
import { getAnalysisStatus } from '../orchestrators/analysisOrchestrator.js';
import type { EntityRegistry } from '../services/entityRegistry.js';
import { ANALYSIS_JOB, INGESTION_JOB, type JobLedger } from '../services/jobLedger.js';

export interface JobRoutesOptions {
  ledger: JobLedger;
  registry: EntityRegistry;
  /** Logical date used when a request does not name one. */
  currentLogicalDate: () => string;
}

const dateKeySchema = z.string().refine(isDateKey, { message: 'expected a YYYY-MM-DD date' });

const jobParamsSchema = z.object({
  jobName: z.enum([INGESTION_JOB, ANALYSIS_JOB]),
});

const runsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  since: dateKeySchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(30),
});

const sinceQuerySchema = z.object({
  since: dateKeySchema.optional(),
});

const dateQuerySchema = z.object({
  date: dateKeySchema.optional(),
});

function sendStoreError(reply: FastifyReply, err: unknown) {
  if (isPersistenceError(err)) {
    console.error(`[jobRoutes] ${err.message}`);
    return reply.code(503).send({ error: 'Store unavailable' });
  }
  console.error(`[jobRoutes] ${errorMessage(err)}`);
  return reply.code(500).send({ error: 'Internal error' });
}

export function registerJobRoutes(app: FastifyInstance, options: JobRoutesOptions): void {
  const { ledger, registry, currentLogicalDate } = options;
  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  typedApp.get(
    '/api/jobs/:jobName/runs',
    { schema: { params: jobParamsSchema, querystring: runsQuerySchema } },
    async (request, reply) => {
      try {
        const runs = await ledger.listRuns(request.params.jobName, request.query);
        return reply.send({ jobName: request.params.jobName, runs });
      } catch (err: unknown) {
        return sendStoreError(reply, err);
      }
    },
  );

  typedApp.get(
    '/api/jobs/:jobName/last-completed',
    { schema: { params: jobParamsSchema, querystring: dateQuerySchema } },
    async (request, reply) => {
      try {
        const { jobName } = request.params;
        const date = request.query.date ?? currentLogicalDate();
        const [lastCompletedDate, completed] = await Promise.all([
          ledger.lastCompletedDate(jobName),
          ledger.isCompletedFor(jobName, date),
        ]);
        return reply.send({ jobName, lastCompletedDate, date, isCompleted: completed });
      } catch (err: unknown) {
        return sendStoreError(reply, err);
      }
    },
  );

  typedApp.get(
    '/api/jobs/:jobName/stats',
    { schema: { params: jobParamsSchema, querystring: sinceQuerySchema } },
    async (request, reply) => {
      try {
        return reply.send(await ledger.getStatistics(request.params.jobName, request.query.since));
      } catch (err: unknown) {
        return sendStoreError(reply, err);
      }
    },
  );

  typedApp.get('/api/analysis/status', { schema: { querystring: dateQuerySchema } }, async (request, reply) => {
    try {
      const date = request.query.date ?? currentLogicalDate();
      return reply.send(await getAnalysisStatus({ ledger, registry }, date));
    } catch (err: unknown) {
      return sendStoreError(reply, err);
    }
  });

  typedApp.get('/api/entities/stats', async (_request, reply) => {
    try {
      return reply.send(await registry.getStatistics());
    } catch (err: unknown) {
      return sendStoreError(reply, err);
    }
  });
}
