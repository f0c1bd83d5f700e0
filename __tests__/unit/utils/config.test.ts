import { describe, it, expect, beforeEach } from 'vitest';
import { loadAlmaTrendConfig, resetConfigCache } from '../../../src/utils/config';

const KEYS = ['ALMA_LEN', 'ALMA_OFFSET', 'ALMA_SIGMA', 'ALMA_SD_LEN', 'ALMA_FACTOR', 'MIN_KLINES_REQUIRED', 'LEGACY_BEAR_TREND'];

describe('utils/config', () => {
  beforeEach(() => {
    for (const k of KEYS) delete process.env[k];
    resetConfigCache();
  });

  it('falls back to the stock indicator settings', () => {
    expect(loadAlmaTrendConfig()).toEqual({
      params: { filter: { length: 5, offset: 0.85, sigma: 2.75 }, dispersionWindow: 20, bandFactor: 1.8 },
      minKlines: 100,
      legacyBearTrend: false,
    });
  });

  it('reads overrides from the environment', () => {
    process.env.ALMA_LEN = '9';
    process.env.ALMA_OFFSET = '0.5';
    process.env.ALMA_SIGMA = '6';
    process.env.ALMA_SD_LEN = '14';
    process.env.ALMA_FACTOR = '2.5';
    process.env.MIN_KLINES_REQUIRED = '50';
    process.env.LEGACY_BEAR_TREND = 'yes';
    expect(loadAlmaTrendConfig()).toEqual({
      params: { filter: { length: 9, offset: 0.5, sigma: 6 }, dispersionWindow: 14, bandFactor: 2.5 },
      minKlines: 50,
      legacyBearTrend: true,
    });
  });

  it('treats blank values as unset', () => {
    process.env.ALMA_LEN = ' ';
    expect(loadAlmaTrendConfig().params.filter.length).toBe(5);
  });

  it('caches until reset', () => {
    const first = loadAlmaTrendConfig();
    process.env.ALMA_LEN = '7';
    expect(loadAlmaTrendConfig()).toBe(first);
    resetConfigCache();
    expect(loadAlmaTrendConfig().params.filter.length).toBe(7);
  });

  it('accepts an explicit env object', () => {
    expect(loadAlmaTrendConfig({ ALMA_FACTOR: '3' }).params.bandFactor).toBe(3);
  });

  it.each([
    ['ALMA_LEN', '0'],
    ['ALMA_LEN', '2.5'],
    ['ALMA_OFFSET', '1.2'],
    ['ALMA_SIGMA', 'abc'],
    ['ALMA_SIGMA', 'Infinity'],
    ['ALMA_SD_LEN', '1'],
    ['ALMA_FACTOR', '-1'],
    ['ALMA_FACTOR', '1e400'],
    ['MIN_KLINES_REQUIRED', '2'],
  ])('rejects %s=%s', (key, value) => {
    process.env[key] = value;
    expect(() => loadAlmaTrendConfig()).toThrow();
  });
});
