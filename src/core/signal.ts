import { definedTail, type Num } from '../utils/indicators';
import { ok, err } from '../utils/result';
import type { ClassifyOptions, IndicatorResult, MarketTrend, Signal, SignalAction } from '../contracts';

const BARS = 3;

/**
 * Classifies the crossover state of the last three bars.
 *
 * Both inputs are aligned from their ends; the newest bar `t` must be defined but
 * only `t-1` and `t-2` take part in the comparisons. First match wins:
 * LONG_CROSS, SHORT_CROSS, BULL, BEAR, NEUTRAL.
 * @param trendLine - ALMA Supertrend line.
 * @param closes - Close prices.
 * @param opts - `legacyBearTrend` compares `line[t-2]` with `close[t-1]` for BEAR.
 */
export function classify(trendLine: Num[], closes: Num[], opts: ClassifyOptions = {}): IndicatorResult<Signal> {
  const line = definedTail(trendLine, BARS);
  const close = definedTail(closes, BARS);
  if (!line || !close) {
    return err('INSUFFICIENT_HISTORY', `classification needs ${BARS} defined trailing bars in both trend line and closes`);
  }
  const [line2, line1] = line;
  const [close2, close1] = close;

  const longCross = line2 > close2 && line1 < close1;
  const shortCross = line2 < close2 && line1 > close1;
  const bullTrend = line1 < close1 && line2 < close2;
  const bearTrend = line1 > close1 && line2 > (opts.legacyBearTrend ? close1 : close2);

  if (longCross) return ok('LONG_CROSS');
  if (shortCross) return ok('SHORT_CROSS');
  if (bullTrend) return ok('BULL');
  if (bearTrend) return ok('BEAR');
  return ok('NEUTRAL');
}

/** Market trend a signal implies: crosses count towards the trend they open. */
export function trendOf(signal: Signal): MarketTrend {
  switch (signal) {
    case 'LONG_CROSS':
    case 'BULL':
      return 'BULL';
    case 'SHORT_CROSS':
    case 'BEAR':
      return 'BEAR';
    case 'NEUTRAL':
      return 'NEUTRAL';
  }
}

export function signalAction(signal: Signal): SignalAction | null {
  if (signal === 'LONG_CROSS') return 'BUY';
  if (signal === 'SHORT_CROSS') return 'SELL';
  return null;
}

/**
 * Percentage distance of the close above (+) or below (-) the trend line.
 * @returns null when the line is undefined or zero.
 */
export function distancePct(close: number, trendLine: Num): Num {
  if (trendLine === null || trendLine === 0) return null;
  return 100 * (close / trendLine - 1);
}
