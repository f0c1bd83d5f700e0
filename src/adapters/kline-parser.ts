import { z } from 'zod';
import { ok, err } from '../utils/result';
import type { Candle, IndicatorResult } from '../contracts';

// exchange payloads carry prices as decimal strings
const numeric = z.union([z.number(), z.string().trim().min(1)]).transform(Number).pipe(z.number().finite());

function optionalNumeric(v: unknown): number | undefined {
  const r = numeric.safeParse(v);
  return r.success ? r.data : undefined;
}

/** `[openTime, open, high, low, close, volume, closeTime, ...]` */
const klineRow = z
  .tuple([numeric, numeric, numeric, numeric, numeric])
  .rest(z.unknown())
  .transform((r): Candle => ({
    openTime: r[0],
    open: r[1],
    high: r[2],
    low: r[3],
    close: r[4],
    volume: optionalNumeric(r[5]),
    closeTime: optionalNumeric(r[6]),
  }));

const candleObject = z.object({
  openTime: numeric.optional(),
  open: numeric.optional(),
  high: numeric,
  low: numeric,
  close: numeric,
  volume: numeric.optional(),
  closeTime: numeric.optional(),
});

const klinesSchema = z.array(z.union([klineRow, candleObject]));
const closesSchema = z.array(numeric);

function describe(error: z.ZodError): string {
  const first = error.issues[0];
  if (!first) return 'invalid market data';
  return `${first.path.join('.') || 'input'}: ${first.message}`;
}

/**
 * Validates exchange kline rows or candle objects, oldest first.
 */
export function parseKlines(raw: unknown): IndicatorResult<Candle[]> {
  const parsed = klinesSchema.safeParse(raw);
  if (!parsed.success) return err('DATA_FORMAT', describe(parsed.error), parsed.error);
  return ok(parsed.data);
}

/**
 * Close prices from a plain numeric array, kline rows or candle objects.
 */
export function parseCloses(raw: unknown): IndicatorResult<number[]> {
  const plain = closesSchema.safeParse(raw);
  if (plain.success) return ok(plain.data);
  const candles = parseKlines(raw);
  if (!candles.ok) return candles;
  return ok(candles.value.map(c => c.close));
}
