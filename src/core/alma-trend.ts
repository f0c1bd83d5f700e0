import { z } from 'zod';
import { almaSupertrendSeries, type AlmaSupertrend, type Num } from '../utils/indicators';
import { ok, err } from '../utils/result';
import type { AlmaTrendParams, FilterParameters, IndicatorResult } from '../contracts';

const positiveInt = z.number().int().positive();
const positiveReal = z.number().finite().positive();

export const filterParametersSchema = z.object({
  length: positiveInt,
  offset: z.number().min(0).max(1),
  sigma: positiveReal,
});

export const almaTrendParamsSchema = z.object({
  filter: filterParametersSchema,
  // the sample variance divides by w - 1
  dispersionWindow: positiveInt.min(2, 'dispersionWindow must be at least 2'),
  bandFactor: positiveReal,
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'params'}: ${i.message}`).join('; ');
}

export function validateParams(params: AlmaTrendParams): IndicatorResult<AlmaTrendParams> {
  const parsed = almaTrendParamsSchema.safeParse(params);
  if (!parsed.success) return err('CONFIGURATION', describeIssues(parsed.error), parsed.error);
  return ok(parsed.data);
}

/**
 * Number of closes needed before the trend line has its first defined value.
 */
export function requiredHistory(params: AlmaTrendParams): number {
  return Math.max(params.filter.length, params.dispersionWindow);
}

/**
 * Full ALMA Supertrend band state for a close series.
 * Short input is not an error: every series is null until enough history exists.
 */
export function computeAlmaSupertrend(closes: number[], params: AlmaTrendParams): IndicatorResult<AlmaSupertrend> {
  const valid = validateParams(params);
  if (!valid.ok) return valid;
  const bad = closes.findIndex(c => typeof c !== 'number' || !Number.isFinite(c));
  if (bad !== -1) return err('DATA_FORMAT', `close at index ${bad} is not a finite number`);

  const { filter, dispersionWindow, bandFactor } = valid.value;
  return ok(almaSupertrendSeries(closes, {
    almaLength: filter.length,
    almaOffset: filter.offset,
    almaSigma: filter.sigma,
    sdLength: dispersionWindow,
    factor: bandFactor,
  }));
}

/**
 * Trend line only, same length as `closes`.
 * @param closes - Close prices, oldest first.
 * @param filterParams - ALMA kernel shape.
 * @param dispersionWindow - Rolling sample standard deviation window.
 * @param bandFactor - Band width in standard deviations.
 */
export function computeTrendLine(closes: number[], filterParams: FilterParameters, dispersionWindow: number, bandFactor: number): IndicatorResult<Num[]> {
  const res = computeAlmaSupertrend(closes, { filter: filterParams, dispersionWindow, bandFactor });
  if (!res.ok) return res;
  return ok(res.value.line);
}
