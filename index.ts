import logger from './server/logger.js';
import { PORT } from './server/config.js';
import { buildStatusServer } from './server/app.js';
import { openJobRuntime } from './server/jobs/runtime.js';

let isShuttingDown = false;

async function start(): Promise<void> {
  const runtime = await openJobRuntime();
  const app = buildStatusServer({
    store: runtime.store,
    ledger: runtime.ledger,
    registry: runtime.registry,
    today: runtime.today,
    currentAnalysisDate: runtime.currentAnalysisDate,
    isShuttingDown: () => isShuttingDown,
  });

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info({ signal }, 'shutting down status server');
    try {
      await app.close();
      await runtime.close();
    } catch (err: unknown) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'error during shutdown');
      process.exitCode = 1;
    }
  };
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: PORT, host: '0.0.0.0' });
  logger.info({ port: PORT, storeDriver: runtime.store.driver }, 'status server listening');
}

start().catch((err: unknown) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'status server failed to start');
  process.exit(1);
});
