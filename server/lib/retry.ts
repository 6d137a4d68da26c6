import { TaskTimeoutError, errorMessage, isTransientError } from './errors.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Per-attempt timeout; 0 disables it. */
  attemptTimeoutMs?: number;
  isRetryable?: (err: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { label: string; attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function getBackoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs = 30_000): number {
  const normalizedAttempt = Math.max(1, Math.floor(Number(attempt) || 1));
  return Math.min(Math.max(0, maxDelayMs), Math.max(0, baseDelayMs) * 2 ** (normalizedAttempt - 1));
}

/**
 * Races `task` against a timer. The task receives an AbortSignal that fires
 * on timeout so HTTP calls can be cancelled instead of left dangling.
 */
export async function runWithTimeout<T>(
  label: string,
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  if (!(timeoutMs > 0)) {
    return task(controller.signal);
  }
  let timer: ReturnType<typeof setTimeout> | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TaskTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Runs `task` up to `policy.maxAttempts` times. Only errors the policy
 * classifies as retryable are retried; anything else, or the last failure,
 * is rethrown unchanged.
 */
export async function withRetries<T>(
  label: string,
  task: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  const isRetryable = policy.isRetryable ?? isTransientError;
  const sleep = policy.sleep ?? wait;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await runWithTimeout(label, task, policy.attemptTimeoutMs ?? 0);
    } catch (err: unknown) {
      if (attempt >= maxAttempts || !isRetryable(err)) {
        throw err;
      }
      const delayMs = getBackoffDelayMs(attempt, policy.baseDelayMs, policy.maxDelayMs);
      if (policy.onRetry) {
        policy.onRetry({ label, attempt, maxAttempts, delayMs, error: err });
      } else {
        console.warn(`[retry] ${label} failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(err)}; retrying in ${delayMs}ms`);
      }
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
