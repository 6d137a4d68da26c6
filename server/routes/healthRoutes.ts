import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

interface HealthRoutesOptions {
  app: FastifyInstance;
  metricsRegistry: { metrics(): Promise<string>; readonly contentType: string };
  getHealthPayload: () => Record<string, unknown>;
  getReadyPayload: () => Promise<{ statusCode: number; body: Record<string, unknown> }>;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, metricsRegistry, getHealthPayload, getReadyPayload } = options;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getHealthPayload());
  });

  app.get('/readyz', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const readyPayload = await getReadyPayload();
      return res.code(readyPayload.statusCode).send(readyPayload.body);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[health] Ready check failed: ${message}`);
      return res.code(503).send({
        ready: false,
        error: 'Ready check failed',
      });
    }
  });

  app.get('/metrics', async (_req: FastifyRequest, res: FastifyReply) => {
    const body = await metricsRegistry.metrics();
    return res.code(200).header('content-type', metricsRegistry.contentType).send(body);
  });
}

export { registerHealthRoutes };
