// Pure indicator functions (no side effects)
// Full-series implementations: index i only reads samples at indices <= i.

export type Num = number | null;

// ---- Moving Averages ----

/**
 * Simple Moving Average (SMA)
 *
 * Calculates the simple moving average of the most recent `period` values.
 * @param values - Array of price values.
 * @param period - The lookback period for the SMA calculation.
 * @returns The simple moving average value, or null if there is insufficient data.
 */
export function sma(values: number[], period: number): Num {
  if (!Array.isArray(values) || period <= 0 || values.length < period) return null;
  const window = values.slice(-period);
  const sum = window.reduce((acc, val) => acc + val, 0);
  return sum / period;
}

/**
 * Gaussian kernel of the Arnaud Legoux Moving Average.
 *
 * `m = offset * (length - 1)`, `s = length / sigma`,
 * `w_k = exp(-(k - m)^2 / (2 * s^2))` for `k = 0..length-1`.
 * Index `length - 1` is the weight of the newest sample.
 * @returns The weights, or null for a non-positive or fractional length.
 */
export function almaWeights(length: number, offset: number, sigma: number): number[] | null {
  if (!Number.isInteger(length) || length <= 0) return null;
  const m = offset * (length - 1);
  const s = length / sigma;
  const weights: number[] = new Array(length);
  for (let k = 0; k < length; k++) {
    weights[k] = Math.exp(-((k - m) ** 2) / (2 * s ** 2));
  }
  return weights;
}

function weightedAt(values: number[], weights: number[], wsum: number, i: number): number {
  const length = weights.length;
  let acc = 0;
  for (let k = 0; k < length; k++) {
    acc += weights[k] * values[i - (length - 1 - k)];
  }
  return acc / wsum;
}

/**
 * Arnaud Legoux Moving Average (ALMA)
 *
 * Returns the latest ALMA value.
 * @param values - Array of price values (oldest to newest).
 * @param length - Number of samples in the window.
 * @param offset - Kernel centre in [0, 1]; 1 puts the peak on the newest sample.
 * @param sigma - Kernel sharpness.
 * @returns The latest ALMA value, or null if there is insufficient data.
 */
export function alma(values: number[], length: number, offset: number, sigma: number): Num {
  const weights = almaWeights(length, offset, sigma);
  if (!weights || values.length < length) return null;
  const wsum = weights.reduce((acc, w) => acc + w, 0);
  return weightedAt(values, weights, wsum, values.length - 1);
}

/**
 * ALMA series aligned with the input: index `i` is null for `i < length - 1`.
 * The kernel is computed once per call.
 */
export function almaSeries(values: number[], length: number, offset: number, sigma: number): Num[] {
  const n = values.length;
  const out: Num[] = new Array(n).fill(null);
  const weights = almaWeights(length, offset, sigma);
  if (!weights || n < length) return out;
  const wsum = weights.reduce((acc, w) => acc + w, 0);
  for (let i = length - 1; i < n; i++) {
    out[i] = weightedAt(values, weights, wsum, i);
  }
  return out;
}
