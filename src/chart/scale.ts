/**
 * Scale Calculator
 */

import type { Entry } from './types.js';

/**
 * The value treated as 100% of a bar's extent.
 *
 * Uses `maxValue` when given, else the largest entry value. Anything not
 * strictly positive (including NaN) becomes 1.
 */
export function effectiveMaximum(entries: readonly Entry[], maxValue?: number): number {
  const max = maxValue ?? entries.reduce((m, e) => Math.max(m, e.value), -Infinity);
  return max > 0 ? max : 1.0;
}

/**
 * Scale a value onto `extent` cells, rounding down.
 *
 * Non-positive and non-finite results are 0. Values above the maximum are
 * not clamped and can exceed `extent`.
 */
export function scaleValue(value: number, maximum: number, extent: number): number {
  const scaled = Math.floor((value / maximum) * extent);
  return Number.isFinite(scaled) && scaled > 0 ? scaled : 0;
}
