import { computeAlmaSupertrend, requiredHistory, validateParams } from '../core/alma-trend';
import { classify, distancePct, signalAction, trendOf } from '../core/signal';
import { ok, err } from '../utils/result';
import { buildErrorEventMeta } from '../application/errors';
import BaseService from './base-service';
import type { AlmaTrendParams, Candle, IndicatorResult, MarketTrend, TrendEvaluation } from '../contracts';

export interface AlmaTrendServiceOptions {
  almaLength?: number;
  almaOffset?: number;
  almaSigma?: number;
  sdLength?: number;
  factor?: number;
  /** Candles required before a symbol is evaluated at all. */
  minKlines?: number;
  legacyBearTrend?: boolean;
}

/**
 * Evaluates one symbol per call from its full candle window. Holds no per-symbol
 * state; a caller that tracks the last trend passes it back in as `prevTrend`.
 */
export class AlmaTrendService extends BaseService {
  private opts: Required<AlmaTrendServiceOptions>;

  constructor(opts: AlmaTrendServiceOptions = {}) {
    super();
    this.opts = {
      almaLength: opts.almaLength ?? 5,
      almaOffset: opts.almaOffset ?? 0.85,
      almaSigma: opts.almaSigma ?? 2.75,
      sdLength: opts.sdLength ?? 20,
      factor: opts.factor ?? 1.8,
      minKlines: opts.minKlines ?? 100,
      legacyBearTrend: opts.legacyBearTrend ?? false,
    };
  }

  static fromConfig(cfg: { params: AlmaTrendParams; minKlines: number; legacyBearTrend: boolean }): AlmaTrendService {
    return new AlmaTrendService({
      almaLength: cfg.params.filter.length,
      almaOffset: cfg.params.filter.offset,
      almaSigma: cfg.params.filter.sigma,
      sdLength: cfg.params.dispersionWindow,
      factor: cfg.params.bandFactor,
      minKlines: cfg.minKlines,
      legacyBearTrend: cfg.legacyBearTrend,
    });
  }

  get params(): AlmaTrendParams {
    return {
      filter: { length: this.opts.almaLength, offset: this.opts.almaOffset, sigma: this.opts.almaSigma },
      dispersionWindow: this.opts.sdLength,
      bandFactor: this.opts.factor,
    };
  }

  /** Candles carry high/low, which the indicator does not read. */
  evaluate(symbol: string, candles: Candle[], prevTrend?: MarketTrend | null): IndicatorResult<TrendEvaluation> {
    return this.evaluateCloses(symbol, candles.map(c => c.close), prevTrend);
  }

  evaluateCloses(symbol: string, closes: number[], prevTrend?: MarketTrend | null): IndicatorResult<TrendEvaluation> {
    const res = this.run(symbol, closes, prevTrend ?? null);
    if (!res.ok) {
      this.clog('ALMA', 'WARN', 'evaluation failed', buildErrorEventMeta({ symbol, bars: closes.length }, res.error));
    }
    return res;
  }

  private run(symbol: string, closes: number[], prevTrend: MarketTrend | null): IndicatorResult<TrendEvaluation> {
    const valid = validateParams(this.params);
    if (!valid.ok) return valid;
    const params = valid.value;
    const minBars = Math.max(this.opts.minKlines, requiredHistory(params));
    if (closes.length < minBars) {
      return err('INSUFFICIENT_HISTORY', `${symbol} has ${closes.length} bars, needs ${minBars}`);
    }
    this.clog('ALMA', 'DEBUG', 'compute', { symbol, bars: closes.length });

    const st = computeAlmaSupertrend(closes, params);
    if (!st.ok) return st;
    const signal = classify(st.value.line, closes, { legacyBearTrend: this.opts.legacyBearTrend });
    if (!signal.ok) return signal;

    const last = closes.length - 1;
    const close = closes[last];
    const trendLine = st.value.line[last];
    const trend = trendOf(signal.value);
    const evaluation: TrendEvaluation = {
      symbol,
      signal: signal.value,
      trend,
      action: signalAction(signal.value),
      trendChanged: prevTrend !== null && prevTrend !== trend,
      close,
      trendLine,
      distancePct: distancePct(close, trendLine),
      bars: closes.length,
    };
    this.clog('ALMA', 'INFO', 'evaluated', {
      symbol,
      signal: evaluation.signal,
      trend,
      action: evaluation.action,
      distancePct: evaluation.distancePct,
    });
    return ok(evaluation);
  }
}

export default AlmaTrendService;
