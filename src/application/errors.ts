import type { IndicatorError, IndicatorErrorCode } from '../contracts';

export type ErrorCode = IndicatorErrorCode | 'UNKNOWN';

/**
 * Maps anything caught or returned at the service boundary to a known code.
 * zod failures are data-format problems; anything unrecognised is UNKNOWN.
 */
export function normalizeErrorCode(err: unknown): ErrorCode {
  if (err == null || typeof err !== 'object') return 'UNKNOWN';
  if (err instanceof Error && err.name === 'ZodError') return 'DATA_FORMAT';
  const code = 'code' in err ? String(err.code).toUpperCase() : '';
  switch (code) {
    case 'CONFIGURATION':
    case 'INSUFFICIENT_HISTORY':
    case 'DATA_FORMAT':
      return code;
    default:
      return 'UNKNOWN';
  }
}

export function buildErrorEventMeta(base: { symbol?: string | null; bars?: number | null }, error: IndicatorError) {
  return {
    symbol: base.symbol ?? undefined,
    bars: base.bars ?? undefined,
    cause: { code: error.code, message: error.message },
  };
}
