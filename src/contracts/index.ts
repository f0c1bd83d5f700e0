// Centralized contracts for the ALMA Supertrend engine and its signal service

import type { Result, AppError } from '../utils/result';
import type { Num } from '../utils/indicators';

// --- Indicator parameters ---

/** Gaussian kernel shape of the ALMA filter. */
export interface FilterParameters {
  length: number;
  offset: number;
  sigma: number;
}

export interface AlmaTrendParams {
  filter: FilterParameters;
  /** Rolling sample standard deviation window. */
  dispersionWindow: number;
  /** Multiplier applied to the dispersion to widen the basic bands. */
  bandFactor: number;
}

// --- Errors ---

export type IndicatorErrorCode = 'CONFIGURATION' | 'INSUFFICIENT_HISTORY' | 'DATA_FORMAT';
export type IndicatorError = AppError<IndicatorErrorCode>;
export type IndicatorResult<T> = Result<T, IndicatorError>;

// --- Signals ---

export type Signal = 'LONG_CROSS' | 'SHORT_CROSS' | 'BULL' | 'BEAR' | 'NEUTRAL';
export type MarketTrend = 'BULL' | 'BEAR' | 'NEUTRAL';
export type SignalAction = 'BUY' | 'SELL';

export interface ClassifyOptions {
  /** Bear clause of the original bot: line[t-2] against close[t-1] instead of close[t-2]. */
  legacyBearTrend?: boolean;
}

// --- Market data ---

export interface Candle {
  openTime?: number;
  open?: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
  closeTime?: number;
}

export interface TrendEvaluation {
  symbol: string;
  signal: Signal;
  trend: MarketTrend;
  action: SignalAction | null;
  /** True when the caller-supplied previous trend differs from `trend`. */
  trendChanged: boolean;
  close: number;
  trendLine: Num;
  distancePct: Num;
  bars: number;
}
