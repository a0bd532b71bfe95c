/**
 * Draw Engine
 *
 * Uniform-per-unit selection over a fixed-order list of remaining counts.
 */

import type { RandomSource } from './RandomSource.js';

/**
 * Ask the source for k in [0, total) and check the answer.
 */
export function drawUnit(random: RandomSource, total: number): number {
  const k = random.nextInt(total);
  if (!Number.isInteger(k) || k < 0 || k >= total) {
    throw new RangeError(`Random source returned ${k}, expected an integer in [0, ${total})`);
  }
  return k;
}

/**
 * Walk the counts in order, accumulating them, and return the position
 * whose cumulative range contains k. Entries with a zero count own an
 * empty range and are never selected.
 */
export function selectIndex(counts: readonly number[], k: number): number {
  let upper = 0;
  for (let i = 0; i < counts.length; i++) {
    upper += counts[i] ?? 0;
    if (k < upper) {
      return i;
    }
  }
  throw new RangeError(`Unit ${k} is outside the ${upper} remaining units`);
}
