/**
 * Wiring shared by the job entry points and the status server: store driver
 * selection, migrations, and the services built on top of the store.
 */

import logger from '../logger.js';
import { setGlobalDispatcher, Agent } from 'undici';
import {
  ANALYSIS_DAY_ROLLOVER_HOUR,
  ANALYSIS_STALE_AFTER_MINUTES,
  DATA_API_BASE_URL,
  DATA_API_KEY,
  DATA_API_TIMEOUT_MS,
  DATABASE_URL,
  INGESTION_STALE_AFTER_MINUTES,
  MARKET_HOLIDAYS_FILE,
  MARKET_TIMEZONE,
  METRICS_PUSHGATEWAY_URL,
  STORE_DRIVER,
  validateStartupEnvironment,
} from '../config.js';
import type { DocumentStore } from '../data/documentStore.js';
import { MemoryDocumentStore } from '../data/memoryDocumentStore.js';
import { PostgresDocumentStore } from '../data/postgresDocumentStore.js';
import { createDatabase } from '../db.js';
import { runMigrations } from '../db/migrate.js';
import { currentDateKey, logicalDateKey } from '../lib/dateUtils.js';
import { errorMessage } from '../lib/errors.js';
import { createMetricsPusher, pushJobMetrics, type MetricsPusher } from '../metrics.js';
import { createDataApiClient, type DataApiClient } from '../services/dataApi.js';
import { EntityRegistry } from '../services/entityRegistry.js';
import { ANALYSIS_JOB, INGESTION_JOB, JobLedger } from '../services/jobLedger.js';
import { RecordStore } from '../services/recordStore.js';
import { loadTradingCalendar, type TradingCalendar } from '../services/tradingCalendar.js';

export interface JobRuntime {
  store: DocumentStore;
  ledger: JobLedger;
  registry: EntityRegistry;
  records: RecordStore;
  calendar: TradingCalendar;
  dataApi: DataApiClient;
  today: () => string;
  currentAnalysisDate: () => string;
  close: () => Promise<void>;
}

export async function openStore(): Promise<DocumentStore> {
  if (STORE_DRIVER === 'memory') {
    return new MemoryDocumentStore();
  }
  const { db } = createDatabase(DATABASE_URL);
  await runMigrations(db);
  return new PostgresDocumentStore(db);
}

export async function openJobRuntime(): Promise<JobRuntime> {
  validateStartupEnvironment();
  setGlobalDispatcher(
    new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 10_000,
      connect: { timeout: DATA_API_TIMEOUT_MS },
    }),
  );

  const store = await openStore();
  const ledger = new JobLedger(store, {
    staleAfterMs: {
      [INGESTION_JOB]: INGESTION_STALE_AFTER_MINUTES * 60_000,
      [ANALYSIS_JOB]: ANALYSIS_STALE_AFTER_MINUTES * 60_000,
    },
  });
  return {
    store,
    ledger,
    registry: new EntityRegistry(store, { timeZone: MARKET_TIMEZONE }),
    records: new RecordStore(store),
    calendar: loadTradingCalendar(MARKET_HOLIDAYS_FILE),
    dataApi: createDataApiClient({ apiKey: DATA_API_KEY, baseUrl: DATA_API_BASE_URL, timeZone: MARKET_TIMEZONE }),
    today: () => currentDateKey(new Date(), MARKET_TIMEZONE),
    currentAnalysisDate: () => logicalDateKey(new Date(), MARKET_TIMEZONE, ANALYSIS_DAY_ROLLOVER_HOUR),
    close: () => store.close(),
  };
}

async function pushMetricsBeforeExit(pusher: MetricsPusher | null, name: string): Promise<void> {
  try {
    if (await pushJobMetrics(pusher, name)) {
      logger.debug({ job: name }, 'job metrics pushed');
    }
  } catch (err: unknown) {
    logger.warn({ job: name, err: errorMessage(err) }, 'could not push job metrics');
  }
}

/**
 * Runs one job invocation as a process: the returned code becomes the exit
 * code, and any escaped error exits non-zero so the scheduler can alert.
 * Metrics are pushed on the way out whatever the outcome.
 */
export function runJobMain(
  name: string,
  main: () => Promise<number>,
  pusher: MetricsPusher | null = createMetricsPusher(METRICS_PUSHGATEWAY_URL),
): void {
  void main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.fatal({ job: name, err: errorMessage(err) }, 'job aborted with an unrecoverable error');
      process.exitCode = 1;
    })
    .finally(async () => {
      await pushMetricsBeforeExit(pusher, name);
      logger.flush();
    });
}
