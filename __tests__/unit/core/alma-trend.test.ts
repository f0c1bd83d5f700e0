import { describe, it, expect } from 'vitest';
import { computeTrendLine, computeAlmaSupertrend, validateParams, requiredHistory } from '../../../src/core/alma-trend';
import { DEFAULT_PARAMS, SWING, SWING_PARAMS, wave } from '../../helpers/series';

const { filter, dispersionWindow, bandFactor } = DEFAULT_PARAMS;

describe('core/alma-trend', () => {
  describe('validateParams', () => {
    it('accepts the default parameter set', () => {
      const r = validateParams(DEFAULT_PARAMS);
      expect(r.ok).toBe(true);
    });

    it.each([
      ['length 0', { ...DEFAULT_PARAMS, filter: { ...filter, length: 0 } }, 'filter.length'],
      ['fractional length', { ...DEFAULT_PARAMS, filter: { ...filter, length: 4.5 } }, 'filter.length'],
      ['offset above 1', { ...DEFAULT_PARAMS, filter: { ...filter, offset: 1.5 } }, 'filter.offset'],
      ['sigma 0', { ...DEFAULT_PARAMS, filter: { ...filter, sigma: 0 } }, 'filter.sigma'],
      ['window 0', { ...DEFAULT_PARAMS, dispersionWindow: 0 }, 'dispersionWindow'],
      ['window 1', { ...DEFAULT_PARAMS, dispersionWindow: 1 }, 'dispersionWindow'],
      ['negative factor', { ...DEFAULT_PARAMS, bandFactor: -1 }, 'bandFactor'],
      ['NaN factor', { ...DEFAULT_PARAMS, bandFactor: NaN }, 'bandFactor'],
    ])('rejects %s as a configuration error', (_name, params, path) => {
      const r = validateParams(params);
      expect(r.ok).toBe(false);
      if (r.ok) return;
      expect(r.error.code).toBe('CONFIGURATION');
      expect(r.error.message.startsWith(`${path}:`)).toBe(true);
    });
  });

  it('requires max(length, window) closes for the first value', () => {
    expect(requiredHistory(DEFAULT_PARAMS)).toBe(20);
    expect(requiredHistory({ ...DEFAULT_PARAMS, filter: { ...filter, length: 30 } })).toBe(30);
  });

  describe('computeTrendLine', () => {
    it('returns a series of the input length', () => {
      const closes = wave(50);
      const r = computeTrendLine(closes, filter, dispersionWindow, bandFactor);
      expect(r.ok).toBe(true);
      if (!r.ok) return;
      expect(r.value).toHaveLength(50);
      expect(r.value[18]).toBeNull();
      expect(r.value[19]).not.toBeNull();
    });

    it('returns an all-null series for input shorter than the filter', () => {
      const r = computeTrendLine([100, 101, 102, 103], filter, dispersionWindow, bandFactor);
      expect(r).toEqual({ ok: true, value: [null, null, null, null] });
    });

    it('returns an all-null series for input shorter than the window', () => {
      const r = computeTrendLine(wave(19), filter, dispersionWindow, bandFactor);
      expect(r.ok).toBe(true);
      if (!r.ok) return;
      expect(r.value.every(v => v === null)).toBe(true);
    });

    it('has exactly one defined value at the boundary length', () => {
      const r = computeTrendLine(wave(20), filter, dispersionWindow, bandFactor);
      expect(r.ok).toBe(true);
      if (!r.ok) return;
      expect(r.value.filter(v => v !== null)).toHaveLength(1);
      expect(r.value[19]).not.toBeNull();
    });

    it('reports non-positive parameters as configuration errors', () => {
      const r1 = computeTrendLine(wave(30), { ...filter, length: 0 }, dispersionWindow, bandFactor);
      const r2 = computeTrendLine(wave(30), filter, 0, bandFactor);
      const r3 = computeTrendLine(wave(30), { ...filter, sigma: -2 }, dispersionWindow, bandFactor);
      for (const r of [r1, r2, r3]) {
        expect(r.ok).toBe(false);
        if (!r.ok) expect(r.error.code).toBe('CONFIGURATION');
      }
    });

    it('rejects non-finite closes', () => {
      const closes = wave(30);
      closes[7] = NaN;
      const r = computeTrendLine(closes, filter, dispersionWindow, bandFactor);
      expect(r).toEqual({ ok: false, error: { code: 'DATA_FORMAT', message: 'close at index 7 is not a finite number', cause: undefined } });
    });

    it('matches the band engine line', () => {
      const line = computeTrendLine(SWING, SWING_PARAMS.filter, SWING_PARAMS.dispersionWindow, SWING_PARAMS.bandFactor);
      const full = computeAlmaSupertrend(SWING, SWING_PARAMS);
      expect(line.ok && full.ok).toBe(true);
      if (!line.ok || !full.ok) return;
      expect(line.value).toEqual(full.value.line);
      expect(line.value.slice(0, 5)).toEqual([null, null, 103, 103, 103]);
    });

    it('is deterministic across calls', () => {
      const closes = wave(120);
      const a = computeTrendLine(closes, filter, dispersionWindow, bandFactor);
      const b = computeTrendLine(closes.slice(), filter, dispersionWindow, bandFactor);
      expect(a).toEqual(b);
    });

    it('does not mutate its input', () => {
      const closes = wave(40);
      const copy = closes.slice();
      computeTrendLine(closes, filter, dispersionWindow, bandFactor);
      expect(closes).toEqual(copy);
    });
  });
});
