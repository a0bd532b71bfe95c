/**
 * Random Sources
 *
 * A random source yields an integer uniformly distributed in [0, n).
 * Decks never reach for ambient randomness; a source is always injected.
 */

import { randomInt } from 'node:crypto';

export interface RandomSource {
  nextInt(n: number): number;
}

function assertBound(n: number): void {
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new RangeError(`Random bound must be a positive integer, got ${n}`);
  }
}

/**
 * Backed by node:crypto. Used by the CLI unless a seed is configured.
 */
export class CryptoRandomSource implements RandomSource {
  nextInt(n: number): number {
    assertBound(n);
    return randomInt(n);
  }
}

const MODULUS = 2147483647;
const MULTIPLIER = 16807;

/**
 * Park-Miller minimal standard generator. The same seed replays the same
 * sequence of draws.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be an integer, got ${seed}`);
    }
    // state must stay in [1, MODULUS - 1]
    const span = MODULUS - 1;
    this.state = (((seed % span) + span) % span) + 1;
  }

  /**
   * One step yields MODULUS - 1 distinct values. Bounds above that take two
   * steps so every index stays reachable.
   */
  nextInt(n: number): number {
    assertBound(n);
    const span = MODULUS - 1;
    if (n <= span) {
      return Math.floor((this.step() / span) * n);
    }
    const unit = (this.step() + this.step() / span) / span;
    // unit can round up to 1 in double precision
    return Math.min(Math.floor(unit * n), n - 1);
  }

  private step(): number {
    this.state = (this.state * MULTIPLIER) % MODULUS;
    return this.state - 1;
  }
}

/**
 * Replays a fixed list of values, ignoring the bound. Intended for tests
 * and scripted demos.
 */
export class ScriptedRandomSource implements RandomSource {
  private readonly values: readonly number[];
  private position = 0;

  constructor(values: readonly number[]) {
    this.values = [...values];
  }

  nextInt(_n: number): number {
    const value = this.values[this.position];
    if (value === undefined) {
      throw new Error(`Scripted random source exhausted after ${this.values.length} values`);
    }
    this.position++;
    return value;
  }

  /** Number of scripted values not yet consumed. */
  pending(): number {
    return this.values.length - this.position;
  }
}
