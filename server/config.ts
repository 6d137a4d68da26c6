import 'dotenv/config';

// --- Server ---
export const PORT = Math.max(1, Number(process.env.PORT) || 3000);
export const IS_PRODUCTION = String(process.env.NODE_ENV || '').toLowerCase() === 'production';

// --- Metrics ---
/** Job processes push their metrics here before exiting; empty disables the push. */
export const METRICS_PUSHGATEWAY_URL = String(process.env.METRICS_PUSHGATEWAY_URL || '').trim();

// --- Persistence ---
export type StoreDriver = 'postgres' | 'memory';
export const STORE_DRIVER: StoreDriver =
  String(process.env.STORE_DRIVER || 'postgres').trim().toLowerCase() === 'memory' ? 'memory' : 'postgres';
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DB_SSL_ENABLED = String(process.env.DB_SSL || 'false').toLowerCase() === 'true';
export const DB_POOL_MAX = Math.max(1, Number(process.env.DB_POOL_MAX) || 5);
export const DB_CONNECTION_TIMEOUT_MS = Math.max(500, Number(process.env.DB_CONNECTION_TIMEOUT_MS) || 5_000);
export const DB_STATEMENT_TIMEOUT_MS = Math.max(1_000, Number(process.env.DB_STATEMENT_TIMEOUT_MS) || 30_000);

// --- Market calendar ---
export const MARKET_TIMEZONE = String(process.env.MARKET_TIMEZONE || 'America/New_York').trim();
export const MARKET_HOLIDAYS_FILE = String(process.env.MARKET_HOLIDAYS_FILE || 'config/market-holidays.json').trim();

// --- Market-data provider ---
export const DATA_API_KEY = String(process.env.DATA_API_KEY || '').trim();
export const DATA_API_BASE_URL = String(process.env.DATA_API_BASE_URL || 'https://api.massive.com').trim();
export const DATA_API_TIMEOUT_MS = Math.max(1_000, Number(process.env.DATA_API_TIMEOUT_MS) || 15_000);
export const DATA_API_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.DATA_API_MAX_ATTEMPTS) || 3));
export const DATA_API_RETRY_BASE_MS = Math.max(0, Number(process.env.DATA_API_RETRY_BASE_MS ?? 1_500) || 0);

// --- Ingestion job ---
/** Earliest date replayed when the ledger holds no completed ingestion run. Empty = previous business day. */
export const INGESTION_HISTORY_START = String(process.env.INGESTION_HISTORY_START || '').trim();
export const INGESTION_STALE_AFTER_MINUTES = Math.max(1, Number(process.env.INGESTION_STALE_AFTER_MINUTES) || 360);

// --- Analysis job ---
export const ANALYSIS_TIME_BUDGET_MINUTES = Math.max(1, Number(process.env.ANALYSIS_TIME_BUDGET_MINUTES) || 50);
/** 0 disables the per-invocation quota. */
export const ANALYSIS_MAX_ENTITIES_PER_RUN = Math.max(
  0,
  Math.floor(Number(process.env.ANALYSIS_MAX_ENTITIES_PER_RUN ?? 50) || 0),
);
export const ANALYSIS_STALE_AFTER_MINUTES = Math.max(1, Number(process.env.ANALYSIS_STALE_AFTER_MINUTES) || 120);
export const ANALYSIS_LOOKBACK_DAYS = Math.max(30, Number(process.env.ANALYSIS_LOOKBACK_DAYS) || 200);
export const ANALYSIS_MIN_HISTORY_ROWS = Math.max(1, Number(process.env.ANALYSIS_MIN_HISTORY_ROWS) || 60);
export const ANALYSIS_DAY_ROLLOVER_HOUR = Math.min(
  23,
  Math.max(0, Math.floor(Number(process.env.ANALYSIS_DAY_ROLLOVER_HOUR ?? 9) || 0)),
);
export const ANALYSIS_COMPUTE_MAX_ATTEMPTS = Math.max(
  1,
  Math.floor(Number(process.env.ANALYSIS_COMPUTE_MAX_ATTEMPTS) || 2),
);

// --- Startup validation ---
export function validateStartupEnvironment() {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === null || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (STORE_DRIVER === 'postgres' && !DATABASE_URL) {
    errors.push('DATABASE_URL is required when STORE_DRIVER=postgres');
  }
  if (STORE_DRIVER === 'memory') {
    warnings.push('STORE_DRIVER=memory; ledger and registry state is lost when the process exits');
  }
  if (!DATA_API_KEY) {
    warnings.push('DATA_API_KEY is not set');
  }
  if (INGESTION_HISTORY_START && !/^\d{4}-\d{2}-\d{2}$/.test(INGESTION_HISTORY_START)) {
    errors.push(`INGESTION_HISTORY_START must be YYYY-MM-DD (received: ${INGESTION_HISTORY_START})`);
  }
  if (METRICS_PUSHGATEWAY_URL && !/^https?:\/\//i.test(METRICS_PUSHGATEWAY_URL)) {
    errors.push(`METRICS_PUSHGATEWAY_URL must be an http(s) URL (received: ${METRICS_PUSHGATEWAY_URL})`);
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: MARKET_TIMEZONE });
  } catch {
    errors.push(`MARKET_TIMEZONE is not a valid IANA time zone (received: ${MARKET_TIMEZONE})`);
  }

  [
    'DATA_API_TIMEOUT_MS',
    'DATA_API_MAX_ATTEMPTS',
    'INGESTION_STALE_AFTER_MINUTES',
    'ANALYSIS_TIME_BUDGET_MINUTES',
    'ANALYSIS_STALE_AFTER_MINUTES',
    'ANALYSIS_LOOKBACK_DAYS',
    'ANALYSIS_MIN_HISTORY_ROWS',
  ].forEach(warnIfInvalidPositiveNumber);
  ['ANALYSIS_MAX_ENTITIES_PER_RUN', 'ANALYSIS_DAY_ROLLOVER_HOUR', 'DATA_API_RETRY_BASE_MS'].forEach(
    warnIfInvalidNonNegativeNumber,
  );

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
