import dotenv from 'dotenv';
dotenv.config();
import fs from 'fs';
import path from 'path';
import { loadAlmaTrendConfig } from '../utils/config';
import { logError } from '../utils/logger';
import { parseCloses } from '../adapters/kline-parser';
import { AlmaTrendService } from '../adapters/indicator-service';
import { normalizeErrorCode } from '../application/errors';
import type { MarketTrend } from '../contracts';

const USAGE = 'usage: alma-signal --file <klines.json> [--symbol BTCUSDT] [--prev-trend BULL|BEAR|NEUTRAL]';

function getArg(args: string[], name: string, def?: string) {
  const i = args.indexOf(`--${name}`);
  return i >= 0 && i + 1 < args.length ? args[i + 1] : def;
}

function toTrend(v: string): MarketTrend | null {
  const t = v.toUpperCase();
  return t === 'BULL' || t === 'BEAR' || t === 'NEUTRAL' ? t : null;
}

function fail(code: string, message: string): number {
  logError(`[alma-signal] ${message}`);
  console.log(JSON.stringify({ ok: false, error: { code, message } }));
  return 1;
}

/**
 * Evaluates one kline file and prints a single JSON line.
 * @returns process exit code
 */
export function runCli(args: string[] = process.argv.slice(2)): number {
  const file = getArg(args, 'file');
  const symbol = getArg(args, 'symbol', 'UNKNOWN') ?? 'UNKNOWN';
  if (!file) return fail('CONFIGURATION', USAGE);
  const prevArg = getArg(args, 'prev-trend');
  const prevTrend = prevArg === undefined ? null : toTrend(prevArg);
  if (prevArg !== undefined && prevTrend === null) {
    return fail('CONFIGURATION', `unknown --prev-trend '${prevArg}'; ${USAGE}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path.resolve(process.cwd(), file), 'utf8'));
  } catch (e) {
    return fail('DATA_FORMAT', `cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }

  const closes = parseCloses(raw);
  if (!closes.ok) return fail(closes.error.code, closes.error.message);

  let service: AlmaTrendService;
  try {
    service = AlmaTrendService.fromConfig(loadAlmaTrendConfig());
  } catch (e) {
    const code = normalizeErrorCode(e) === 'DATA_FORMAT' ? 'CONFIGURATION' : 'UNKNOWN';
    return fail(code, `invalid environment: ${e instanceof Error ? e.message : String(e)}`);
  }
  const res = service.evaluateCloses(symbol, closes.value, prevTrend);
  if (!res.ok) return fail(res.error.code, res.error.message);
  console.log(JSON.stringify({ ok: true, value: res.value }));
  return 0;
}

if (require.main === module) {
  process.exitCode = runCli();
}
