import { describe, expect, it } from 'vitest';
import { defaultRandom, mulberry32, sequenceRandom } from '../src/rng.js';

describe('mulberry32', () => {
  it('generates a deterministic sequence', () => {
    const rng = mulberry32(1);
    expect(rng()).toBeCloseTo(0.6270739405881613, 9);
    expect(rng()).toBeCloseTo(0.002735721180215478, 9);
  });

  it('same seed, same draws', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it('stays within [0, 1)', () => {
    const rng = mulberry32(123);
    for (let i = 0; i < 10_000; i++) {
      const v = rng();
      expect(v >= 0 && v < 1).toBe(true);
    }
  });
});

describe('sequenceRandom', () => {
  it('replays values and cycles', () => {
    const rng = sequenceRandom([0.1, 0.9]);
    expect([rng(), rng(), rng()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('rejects an empty list', () => {
    expect(() => sequenceRandom([])).toThrow(RangeError);
  });
});

describe('defaultRandom', () => {
  it('draws within [0, 1)', () => {
    const v = defaultRandom();
    expect(v >= 0 && v < 1).toBe(true);
  });
});
