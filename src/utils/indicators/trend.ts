// ---- Trend ----

import { almaSeries, type Num } from './moving-averages';
import { stdevSeries } from './volatility';
import { firstDefinedIndex, nullSeries } from './utils';

export const Direction = { UP: 1, DOWN: -1 } as const;
export type Direction = typeof Direction[keyof typeof Direction];

export interface AlmaSupertrendOptions {
  almaLength: number;
  almaOffset: number;
  almaSigma: number;
  sdLength: number;
  factor: number;
}

export interface AlmaSupertrend {
  /** Filter output. */
  alma: Num[];
  /** Rolling sample standard deviation. */
  sd: Num[];
  upper: Num[];
  lower: Num[];
  dir: Array<Direction | null>;
  line: Num[];
  /** First index with a defined band, or -1 when none is. */
  startIndex: number;
}

/**
 * Band/direction recurrence over precomputed filter and dispersion series.
 *
 * Bands ratchet: the upper band only moves up once the previous close broke above
 * it, the lower band only moves down once the previous close broke below it.
 * Direction flips on an exact equality test between the previous line and the
 * previous upper band, so the line must be stored as the very band value it
 * selected.
 * @param close - Close prices, same length as `alma` and `sd`.
 * @param alma - Filter series.
 * @param sd - Dispersion series.
 * @param factor - Band width in dispersion units.
 */
export function supertrendBands(close: number[], alma: Num[], sd: Num[], factor: number): Omit<AlmaSupertrend, 'alma' | 'sd'> {
  const n = close.length;
  const upper = nullSeries(n);
  const lower = nullSeries(n);
  const line = nullSeries(n);
  const dir: Array<Direction | null> = new Array(n).fill(null);

  const almaStart = firstDefinedIndex(alma);
  const sdStart = firstDefinedIndex(sd);
  if (almaStart === -1 || sdStart === -1) return { upper, lower, dir, line, startIndex: -1 };
  const startIndex = Math.max(almaStart, sdStart);

  for (let i = startIndex; i < n; i++) {
    const a = alma[i];
    const s = sd[i];
    if (a === null || s === null) continue;

    const ubBasic = a + factor * s;
    const lbBasic = a - factor * s;

    const prevUpperStored = i > startIndex ? upper[i - 1] : null;
    const prevLowerStored = i > startIndex ? lower[i - 1] : null;
    const prevUpper = prevUpperStored ?? ubBasic;
    const prevLower = prevLowerStored ?? lbBasic;
    const prevClose = i > 0 ? close[i - 1] : null;

    const ub = ubBasic < prevUpper || (prevClose !== null && prevClose > prevUpper) ? ubBasic : prevUpper;
    const lb = lbBasic > prevLower || (prevClose !== null && prevClose < prevLower) ? lbBasic : prevLower;
    upper[i] = ub;
    lower[i] = lb;

    let d: Direction;
    const prevLine = i > 0 ? line[i - 1] : null;
    if (i === startIndex || sd[i - 1] === null) {
      d = Direction.UP;
    } else if (prevLine !== null && prevUpperStored !== null && prevLine === prevUpperStored) {
      d = close[i] > ub ? Direction.DOWN : Direction.UP;
    } else {
      d = close[i] < lb ? Direction.UP : Direction.DOWN;
    }
    dir[i] = d;
    line[i] = d === Direction.DOWN ? lb : ub;
  }

  return { upper, lower, dir, line, startIndex };
}

/**
 * ALMA Supertrend indicator series (ALMA basis, standard-deviation bands).
 * Only closes are read.
 * @param close - Close prices, oldest first.
 * @param opts - Filter, dispersion and band parameters.
 * @returns Every series aligned with `close`; nulls before the first defined band.
 */
export function almaSupertrendSeries(close: number[], opts: AlmaSupertrendOptions): AlmaSupertrend {
  const alma = almaSeries(close, opts.almaLength, opts.almaOffset, opts.almaSigma);
  const sd = stdevSeries(close, opts.sdLength);
  return { alma, sd, ...supertrendBands(close, alma, sd, opts.factor) };
}
