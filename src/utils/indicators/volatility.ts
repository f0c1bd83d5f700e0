// ---- Volatility ----

import { sma, type Num } from './moving-averages';

/**
 * Sample Standard Deviation
 * Standard deviation of the most recent `period` values with the `n - 1` divisor.
 * @param values - Array of price values.
 * @param period - The lookback period; needs at least 2 samples.
 * @returns The sample standard deviation, or null if there is insufficient data.
 */
export function sampleStddev(values: number[], period: number): Num {
  if (!Number.isInteger(period) || period < 2 || values.length < period) return null;
  const window = values.slice(-period);
  const mean = sma(window, period);
  if (mean === null) return null;

  let sumSqDiff = 0;
  for (const val of window) sumSqDiff += (val - mean) ** 2;
  return Math.sqrt(sumSqDiff / (period - 1));
}

/**
 * Rolling sample standard deviation series.
 * Index `i` is null for `i < period - 1`; every window is recomputed from scratch.
 */
export function stdevSeries(values: number[], period: number): Num[] {
  const n = values.length;
  const out: Num[] = new Array(n).fill(null);
  if (!Number.isInteger(period) || period < 2 || n < period) return out;
  for (let i = period - 1; i < n; i++) {
    out[i] = sampleStddev(values.slice(i - period + 1, i + 1), period);
  }
  return out;
}
