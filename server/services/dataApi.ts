/**
 * Data API HTTP client: URL construction, JSON fetching, payload validation
 * and error classification for the daily aggregate-bars endpoint.
 *
 * Timeouts and retries are the caller's concern; every call takes an
 * AbortSignal so a timed-out attempt cancels its request.
 */

import { AggregateResponseSchema } from '../lib/apiSchemas.js';
import { currentDateKey, isDateKey } from '../lib/dateUtils.js';
import { ProviderError, errorMessage } from '../lib/errors.js';
import type { RawRow } from './recordStore.js';

export type FetchMarketData = (symbol: string, from: string, to: string, signal?: AbortSignal) => Promise<RawRow[]>;

export interface DataApiClientOptions {
  apiKey: string;
  baseUrl: string;
  /** Timezone used to turn bar timestamps into trading-day keys. */
  timeZone: string;
  fetchImpl?: typeof fetch;
}

export interface DataApiClient {
  readonly source: string;
  fetchDailyBars: FetchMarketData;
}

export const DATA_API_SOURCE = 'data-api';

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildDataApiUrl(
  baseUrl: string,
  path: string,
  params: Record<string, string | number | boolean | undefined | null> = {},
): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function buildDailyBarsUrl(baseUrl: string, symbol: string, from: string, to: string): string {
  return buildDataApiUrl(baseUrl, `/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/day/${from}/${to}`, {
    adjusted: 'true',
    sort: 'asc',
    limit: 50000,
  });
}

export function sanitizeDataApiUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has('apiKey')) parsed.searchParams.set('apiKey', '***');
    if (parsed.searchParams.has('apikey')) parsed.searchParams.set('apikey', '***');
    return parsed.toString();
  } catch {
    return url;
  }
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_PATTERN = /Limit Reach|Too Many Requests|rate limit/i;

/** 408, 429 and 5xx are worth retrying; any other HTTP failure is permanent. */
export function isTransientHttpStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function parseJsonSafe(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function extractApiError(payload: unknown): string | null {
  const parsed = AggregateResponseSchema.safeParse(payload);
  if (!parsed.success) return null;
  const { status, error, message } = parsed.data;
  if (String(status || '').toUpperCase() === 'ERROR') {
    return String(error || message || 'DataAPI returned ERROR status').trim();
  }
  return error?.trim() || null;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createDataApiClient(options: DataApiClientOptions): DataApiClient {
  const fetchImpl = options.fetchImpl ?? fetch;

  async function fetchDailyBars(symbol: string, from: string, to: string, signal?: AbortSignal): Promise<RawRow[]> {
    if (!options.apiKey) {
      throw new ProviderError('DATA_API_KEY is not configured', { transient: false });
    }
    if (!isDateKey(from) || !isDateKey(to) || from > to) {
      throw new ProviderError(`Invalid bar range ${from} → ${to}`, { transient: false });
    }
    const label = `DataAPI daily ${symbol} ${from}..${to}`;
    const url = buildDailyBarsUrl(options.baseUrl, symbol, from, to);
    const requestUrl = new URL(url);
    requestUrl.searchParams.set('apiKey', options.apiKey);

    let resp: Response;
    let text: string;
    try {
      resp = await fetchImpl(requestUrl.toString(), { signal });
      text = await resp.text();
    } catch (err: unknown) {
      // Network failures and aborted attempts alike are worth another try.
      throw new ProviderError(`${label} request failed (${sanitizeDataApiUrl(url)}): ${errorMessage(err)}`, {
        transient: true,
        cause: err,
      });
    }

    const payload = parseJsonSafe(text);
    const apiError = extractApiError(payload);
    if (!resp.ok) {
      const details = apiError || text.trim().slice(0, 180) || `HTTP ${resp.status}`;
      throw new ProviderError(`${label} request failed (${resp.status}): ${details}`, {
        httpStatus: resp.status,
        transient: isTransientHttpStatus(resp.status),
      });
    }
    if (apiError) {
      const rateLimited = RATE_LIMIT_PATTERN.test(apiError);
      throw new ProviderError(`${label} API error: ${apiError}`, {
        httpStatus: rateLimited ? 429 : resp.status,
        transient: rateLimited,
      });
    }

    const parsed = AggregateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProviderError(
        `${label} returned an unexpected payload${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`,
        { httpStatus: resp.status, transient: false },
      );
    }

    const rows: RawRow[] = [];
    for (const bar of parsed.data.results ?? []) {
      const date = currentDateKey(new Date(bar.t), options.timeZone);
      if (date < from || date > to) continue;
      rows.push({
        date,
        open: bar.o,
        high: Math.max(bar.h, bar.o, bar.c),
        low: Math.min(bar.l, bar.o, bar.c),
        close: bar.c,
        volume: bar.v,
      });
    }
    return rows;
  }

  return { source: DATA_API_SOURCE, fetchDailyBars };
}
