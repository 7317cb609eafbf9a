import type { RandomSource } from './types.js';

/** Process-wide default source. Not reproducible. */
export const defaultRandom: RandomSource = () => Math.random();

/** Seeded 32-bit generator; same seed, same sequence. */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Replays a fixed list of draws, cycling when exhausted. Used to script probabilistic strategies. */
export function sequenceRandom(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('sequenceRandom needs at least one value');
  }
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}
