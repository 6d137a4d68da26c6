/**
 * Daily technical indicators over an entity's raw OHLCV history:
 * moving averages, MACD, RSI (Wilder), Bollinger bands, volume ratio,
 * and the signal tags derived from them.
 */

import type { RawRow } from './recordStore.js';

export type Series = Array<number | null>;

export interface AnalyticsBundle {
  indicators: Record<string, number | null>;
  signals: string[];
}

export type ComputeAnalytics = (entityId: string, rows: ReadonlyArray<RawRow>) => Promise<AnalyticsBundle>;

export const RSI_OVERSOLD = 30;
export const RSI_OVERBOUGHT = 70;
/** Band width relative to the middle band below which the bands count as squeezed. */
export const BOLLINGER_SQUEEZE_BANDWIDTH = 0.04;

export function calculateSMA(values: number[], period: number): Series {
  const out: Series = new Array(values.length).fill(null);
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/** EMA seeded with the SMA of the first `period` values; leading nulls are skipped. */
export function calculateEMA(values: Series, period: number): Series {
  const out: Series = new Array(values.length).fill(null);
  const k = 2 / (period + 1);
  let start = 0;
  while (start < values.length && values[start] === null) start++;
  if (values.length - start < period) return out;

  let seed = 0;
  for (let i = start; i < start + period; i++) {
    seed += values[i] ?? 0;
  }
  let prev = seed / period;
  out[start + period - 1] = prev;
  for (let i = start + period; i < values.length; i++) {
    const value = values[i];
    if (value === null) continue;
    prev = (value - prev) * k + prev;
    out[i] = prev;
  }
  return out;
}

export function calculateRSI(closePrices: number[], period: number = 14): Series {
  const out: Series = new Array(closePrices.length).fill(null);
  if (closePrices.length <= period) return out;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const change = closePrices[i] - closePrices[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;

  const toRsi = (gain: number, loss: number): number => {
    if (loss === 0) return gain === 0 ? 50 : 100;
    return 100 - 100 / (1 + gain / loss);
  };

  out[period] = toRsi(avgGain, avgLoss);
  for (let i = period + 1; i < closePrices.length; i++) {
    const change = closePrices[i] - closePrices[i - 1];
    const gain = change > 0 ? change : 0;
    const loss = change < 0 ? -change : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
    out[i] = toRsi(avgGain, avgLoss);
  }
  return out;
}

export function calculateMACD(
  closePrices: number[],
  fast: number = 12,
  slow: number = 26,
  signalPeriod: number = 9,
): { macd: Series; signal: Series; histogram: Series } {
  const fastEma = calculateEMA(closePrices, fast);
  const slowEma = calculateEMA(closePrices, slow);
  const macd: Series = closePrices.map((_, i) => {
    const f = fastEma[i];
    const s = slowEma[i];
    return f === null || s === null ? null : f - s;
  });
  const signal = calculateEMA(macd, signalPeriod);
  const histogram: Series = macd.map((m, i) => {
    const s = signal[i];
    return m === null || s === null ? null : m - s;
  });
  return { macd, signal, histogram };
}

export interface BollingerPoint {
  upper: number;
  middle: number;
  lower: number;
  bandwidth: number;
}

export function calculateBollinger(
  closePrices: number[],
  period: number = 20,
  multiplier: number = 2,
): Array<BollingerPoint | null> {
  const middle = calculateSMA(closePrices, period);
  return middle.map((mean, i) => {
    if (mean === null) return null;
    let variance = 0;
    for (let j = i - period + 1; j <= i; j++) {
      variance += (closePrices[j] - mean) ** 2;
    }
    const deviation = Math.sqrt(variance / period);
    const upper = mean + multiplier * deviation;
    const lower = mean - multiplier * deviation;
    return { upper, middle: mean, lower, bandwidth: mean === 0 ? 0 : (upper - lower) / mean };
  });
}

function last(series: Series): number | null {
  return series.length > 0 ? series[series.length - 1] : null;
}

function previous(series: Series): number | null {
  return series.length > 1 ? series[series.length - 2] : null;
}

function round(value: number | null, digits: number = 4): number | null {
  if (value === null || !Number.isFinite(value)) return null;
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** True when `a` moved from at-or-below `b` to strictly above it on the latest bar. */
function crossedAbove(a: Series, b: Series): boolean {
  const pa = previous(a);
  const pb = previous(b);
  const ca = last(a);
  const cb = last(b);
  if (pa === null || pb === null || ca === null || cb === null) return false;
  return pa <= pb && ca > cb;
}

/**
 * Computes the indicator set and signal tags from rows sorted oldest first.
 * Indicators that need more history than available come back as null.
 */
export function computeIndicators(rows: ReadonlyArray<RawRow>): AnalyticsBundle {
  if (rows.length === 0) {
    throw new RangeError('Cannot compute indicators without rows');
  }
  const closes = rows.map((row) => row.close);
  const volumes = rows.map((row) => row.volume);
  const sma5 = calculateSMA(closes, 5);
  const sma20 = calculateSMA(closes, 20);
  const sma60 = calculateSMA(closes, 60);
  const ema12 = calculateEMA(closes, 12);
  const ema26 = calculateEMA(closes, 26);
  const macd = calculateMACD(closes);
  const rsi = calculateRSI(closes, 14);
  const bollinger = calculateBollinger(closes);
  const volumeAvg20 = calculateSMA(volumes, 20);

  const close = closes[closes.length - 1];
  const prevClose = closes.length > 1 ? closes[closes.length - 2] : null;
  const band = bollinger[bollinger.length - 1];
  const avgVolume = last(volumeAvg20);
  const rsiValue = last(rsi);

  const signals: string[] = [];
  if (crossedAbove(sma5, sma20)) signals.push('golden-cross');
  if (crossedAbove(sma20, sma5)) signals.push('death-cross');
  if (rsiValue !== null && rsiValue < RSI_OVERSOLD) signals.push('rsi-oversold');
  if (rsiValue !== null && rsiValue > RSI_OVERBOUGHT) signals.push('rsi-overbought');
  if (crossedAbove(macd.macd, macd.signal)) signals.push('macd-bullish-cross');
  if (crossedAbove(macd.signal, macd.macd)) signals.push('macd-bearish-cross');
  if (band && band.bandwidth < BOLLINGER_SQUEEZE_BANDWIDTH) signals.push('bollinger-squeeze');

  return {
    indicators: {
      close: round(close),
      changePct: prevClose ? round(((close - prevClose) / prevClose) * 100) : null,
      sma5: round(last(sma5)),
      sma20: round(last(sma20)),
      sma60: round(last(sma60)),
      ema12: round(last(ema12)),
      ema26: round(last(ema26)),
      macd: round(last(macd.macd)),
      macdSignal: round(last(macd.signal)),
      macdHistogram: round(last(macd.histogram)),
      rsi14: round(rsiValue),
      bollingerUpper: round(band ? band.upper : null),
      bollingerMiddle: round(band ? band.middle : null),
      bollingerLower: round(band ? band.lower : null),
      bollingerBandwidth: round(band ? band.bandwidth : null),
      volumeRatio: avgVolume ? round(volumes[volumes.length - 1] / avgVolume) : null,
    },
    signals,
  };
}

export const computeAnalytics: ComputeAnalytics = async (_entityId, rows) => computeIndicators(rows);
