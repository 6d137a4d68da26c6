/**
 * Error taxonomy shared by the ledger, the registry and both jobs.
 *
 * Kept in lib/ so the retry helper and the stores can classify failures
 * without importing from services/.
 */

export class DuplicateRunError extends Error {
  readonly jobName: string;
  readonly logicalDate: string;
  readonly existingStatus: string;

  constructor(jobName: string, logicalDate: string, existingStatus: string) {
    super(`${jobName} already has a ${existingStatus} run for ${logicalDate}`);
    this.name = 'DuplicateRunError';
    this.jobName = jobName;
    this.logicalDate = logicalDate;
    this.existingStatus = existingStatus;
  }
}

/** Misuse of the ledger contract (double finish, illegal transition). */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class EntityNotFoundError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Unknown entity: ${entityId}`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

export class DuplicateEntityError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Entity already registered: ${entityId}`);
    this.name = 'DuplicateEntityError';
    this.entityId = entityId;
  }
}

/** The persistence substrate failed or returned a document that does not validate. */
export class PersistenceError extends Error {
  readonly operation: string;
  readonly collection: string;

  constructor(operation: string, collection: string, cause: unknown) {
    super(`Persistence ${operation} on ${collection} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
    this.collection = collection;
  }
}

export class ProviderError extends Error {
  readonly httpStatus: number | null;
  readonly transient: boolean;

  constructor(message: string, options: { httpStatus?: number | null; transient: boolean; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ProviderError';
    this.httpStatus = options.httpStatus ?? null;
    this.transient = options.transient;
  }
}

export class TaskTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label || 'Task'} timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class InsufficientHistoryError extends Error {
  readonly entityId: string;
  readonly rows: number;
  readonly required: number;

  constructor(entityId: string, rows: number, required: number) {
    super(`Insufficient history for ${entityId}: ${rows} rows (need ${required})`);
    this.name = 'InsufficientHistoryError';
    this.entityId = entityId;
    this.rows = rows;
    this.required = required;
  }
}

const TRANSIENT_NETWORK_CODES = /^(ECONNRESET|ECONNREFUSED|ETIMEDOUT|ENOTFOUND|ENETUNREACH|EAI_AGAIN|UND_ERR_CONNECT_TIMEOUT|UND_ERR_SOCKET)$/i;

/**
 * Returns true for failures worth retrying: timeouts, provider errors flagged
 * transient, and low-level network errors. Persistence failures are never
 * transient at this level; the jobs treat them as fatal.
 */
export function isTransientError(err: unknown): boolean {
  if (err instanceof PersistenceError) return false;
  if (err instanceof TaskTimeoutError) return true;
  if (err instanceof ProviderError) return err.transient;
  if (!err || typeof err !== 'object') return false;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.test(code)) return true;
  const message = err instanceof Error ? err.message : '';
  return /timed?\s*out|socket hang up|fetch failed/i.test(message);
}

export function isPersistenceError(err: unknown): err is PersistenceError {
  return err instanceof PersistenceError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
