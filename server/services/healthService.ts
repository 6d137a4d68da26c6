import type { DocumentStore } from '../data/documentStore.js';
import { daysBetween } from '../lib/dateUtils.js';

async function checkStoreReady(store: Pick<DocumentStore, 'ping'> | null): Promise<{ ok: boolean | null; error?: string }> {
  if (!store) return { ok: null };
  try {
    await store.ping();
    return { ok: true };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: message };
  }
}

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  store: Pick<DocumentStore, 'ping' | 'driver'> | null;
  isShuttingDown: boolean;
  /** Market-local date key of "now". */
  today: string;
  lastIngestionDate: string | null;
}

// Calendar days without a completed ingestion before readiness reports degraded (covers a long weekend).
const INGESTION_STALENESS_WARN_DAYS = 4;

async function buildReadyPayload(options: ReadyPayloadOptions) {
  const { store, isShuttingDown, today, lastIngestionDate } = options;

  const storeCheck = await checkStoreReady(store);
  const ready = !isShuttingDown && storeCheck.ok === true;

  const warnings: string[] = [];
  if (store?.driver === 'memory') warnings.push('store driver is memory; state is not durable');
  if (!lastIngestionDate) {
    warnings.push('no completed ingestion run recorded');
  } else {
    const age = daysBetween(lastIngestionDate, today);
    if (age > INGESTION_STALENESS_WARN_DAYS) {
      warnings.push(`ingestion is stale; last completed: ${lastIngestionDate} (${age} days ago)`);
    }
  }

  const degraded = warnings.length > 0;
  return {
    statusCode: ready ? 200 : 503,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      store: storeCheck.ok,
      storeDriver: store?.driver ?? null,
      lastIngestionDate,
      warnings: degraded ? warnings : undefined,
      errors: {
        store: storeCheck.error || null,
      },
    },
  };
}

export { checkStoreReady, buildHealthPayload, buildReadyPayload };
