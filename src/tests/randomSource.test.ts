/**
 * Random Source and Draw Engine Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CryptoRandomSource, ScriptedRandomSource, SeededRandomSource } from '../decks/RandomSource.js';
import { drawUnit, selectIndex } from '../decks/DrawEngine.js';

describe('SeededRandomSource', () => {
  it('replays the same sequence for the same seed', () => {
    const first = new SeededRandomSource(42);
    const second = new SeededRandomSource(42);
    const a = Array.from({ length: 20 }, () => first.nextInt(1000));
    const b = Array.from({ length: 20 }, () => second.nextInt(1000));
    assert.deepEqual(a, b);
  });

  it('produces different sequences for different seeds', () => {
    const first = new SeededRandomSource(1);
    const second = new SeededRandomSource(2);
    const a = Array.from({ length: 20 }, () => first.nextInt(1000));
    const b = Array.from({ length: 20 }, () => second.nextInt(1000));
    assert.notDeepEqual(a, b);
  });

  it('stays within [0, n)', () => {
    const random = new SeededRandomSource(7);
    for (let i = 0; i < 500; i++) {
      const value = random.nextInt(3);
      assert.ok(Number.isInteger(value) && value >= 0 && value < 3, `got ${value}`);
    }
  });

  it('accepts zero and negative seeds', () => {
    for (const seed of [0, -1, -2147483646]) {
      const value = new SeededRandomSource(seed).nextInt(10);
      assert.ok(value >= 0 && value < 10, `seed ${seed} gave ${value}`);
    }
  });

  it('yields 0 first for seed 1', () => {
    // 16807 / 2147483647 is far below 1/10
    assert.equal(new SeededRandomSource(1).nextInt(10), 0);
  });

  it('reaches indices above 2^31 for large bounds', () => {
    const random = new SeededRandomSource(5);
    const bound = 2 ** 40;
    const values = Array.from({ length: 20 }, () => random.nextInt(bound));

    for (const value of values) {
      assert.ok(Number.isInteger(value) && value >= 0 && value < bound, `got ${value}`);
    }
    assert.ok(values.some((value) => value >= 2 ** 31));
  });

  it('takes two steps for a bound above its range', () => {
    const wide = new SeededRandomSource(9);
    const narrow = new SeededRandomSource(9);

    wide.nextInt(2 ** 40);
    narrow.nextInt(2);
    narrow.nextInt(2);

    assert.equal(wide.nextInt(1000), narrow.nextInt(1000));
  });

  it('rejects a non-integer seed', () => {
    assert.throws(() => new SeededRandomSource(1.5), RangeError);
  });

  it('rejects a non-positive bound', () => {
    assert.throws(() => new SeededRandomSource(1).nextInt(0), {
      name: 'RangeError',
      message: 'Random bound must be a positive integer, got 0',
    });
  });
});

describe('CryptoRandomSource', () => {
  it('stays within [0, n)', () => {
    const random = new CryptoRandomSource();
    for (let i = 0; i < 200; i++) {
      const value = random.nextInt(5);
      assert.ok(Number.isInteger(value) && value >= 0 && value < 5, `got ${value}`);
    }
  });

  it('always returns 0 for a bound of 1', () => {
    assert.equal(new CryptoRandomSource().nextInt(1), 0);
  });

  it('rejects a fractional bound', () => {
    assert.throws(() => new CryptoRandomSource().nextInt(2.5), RangeError);
  });
});

describe('ScriptedRandomSource', () => {
  it('returns the scripted values in order', () => {
    const random = new ScriptedRandomSource([2, 0, 1]);
    assert.equal(random.nextInt(3), 2);
    assert.equal(random.nextInt(3), 0);
    assert.equal(random.pending(), 1);
    assert.equal(random.nextInt(3), 1);
    assert.equal(random.pending(), 0);
  });

  it('throws once the script runs out', () => {
    const random = new ScriptedRandomSource([0]);
    random.nextInt(1);
    assert.throws(() => random.nextInt(1), {
      message: 'Scripted random source exhausted after 1 values',
    });
  });

  it('copies the script it was given', () => {
    const values = [1];
    const random = new ScriptedRandomSource(values);
    values[0] = 9;
    assert.equal(random.nextInt(3), 1);
  });
});

describe('selectIndex', () => {
  it('walks cumulative ranges in table order', () => {
    const counts = [2, 1];
    assert.equal(selectIndex(counts, 0), 0);
    assert.equal(selectIndex(counts, 1), 0);
    assert.equal(selectIndex(counts, 2), 1);
  });

  it('never selects an entry with nothing remaining', () => {
    const counts = [0, 3, 0, 1];
    assert.deepEqual(
      [0, 1, 2, 3].map((k) => selectIndex(counts, k)),
      [1, 1, 1, 3]
    );
  });

  it('throws for a unit past the end', () => {
    assert.throws(() => selectIndex([1, 1], 2), {
      name: 'RangeError',
      message: 'Unit 2 is outside the 2 remaining units',
    });
  });
});

describe('drawUnit', () => {
  it('passes the total to the source', () => {
    const seen: number[] = [];
    const value = drawUnit(
      {
        nextInt(n: number): number {
          seen.push(n);
          return n - 1;
        },
      },
      4
    );
    assert.equal(value, 3);
    assert.deepEqual(seen, [4]);
  });

  it('rejects values outside [0, total)', () => {
    assert.throws(() => drawUnit(new ScriptedRandomSource([3]), 3), {
      name: 'RangeError',
      message: 'Random source returned 3, expected an integer in [0, 3)',
    });
    assert.throws(() => drawUnit(new ScriptedRandomSource([-1]), 3), RangeError);
    assert.throws(() => drawUnit(new ScriptedRandomSource([0.5]), 3), RangeError);
  });
});
