// Public entry point: the ALMA Supertrend engine, its classifier and the signal service

export { computeTrendLine, computeAlmaSupertrend, validateParams, requiredHistory, almaTrendParamsSchema, filterParametersSchema } from './core/alma-trend';
export { classify, trendOf, signalAction, distancePct } from './core/signal';
export { AlmaTrendService } from './adapters/indicator-service';
export type { AlmaTrendServiceOptions } from './adapters/indicator-service';
export { parseKlines, parseCloses } from './adapters/kline-parser';
export { loadAlmaTrendConfig, resetConfigCache } from './utils/config';
export type { AlmaTrendConfig } from './utils/config';
export { ok, err } from './utils/result';
export type { Result, Ok, Err, AppError } from './utils/result';
export { logger, log, setLoggerContext, clearLoggerContext } from './utils/logger';
export type { Logger, Level } from './utils/logger';
export * from './utils/indicators';
export type * from './contracts';
