// ---- Utils ----

import type { Num } from './moving-averages';

/**
 * Index of the first non-null element, or -1 when the series never becomes defined.
 */
export function firstDefinedIndex(series: Num[]): number {
  for (let i = 0; i < series.length; i++) {
    if (series[i] !== null) return i;
  }
  return -1;
}

export function nullSeries(n: number): Num[] {
  return new Array<Num>(Math.max(0, n)).fill(null);
}

/**
 * Last `count` elements of `series` when every one of them is defined, else null.
 * @param series - Array of numeric values (may contain nulls).
 * @param count - Number of trailing values required.
 */
export function definedTail(series: Num[], count: number): number[] | null {
  if (count <= 0 || series.length < count) return null;
  const out: number[] = [];
  for (let i = series.length - count; i < series.length; i++) {
    const v = series[i];
    if (v === null) return null;
    out.push(v);
  }
  return out;
}
