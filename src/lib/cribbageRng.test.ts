import { describe, it, expect } from 'vitest';
import { RNG_STREAMS, createStreamRng, deriveSeed, mulberry32, randomInt, sampleWithoutReplacement } from './cribbageRng';

const take = (rng: () => number, n: number) => Array.from({ length: n }, () => rng());

describe('mulberry32', () => {
  it('repeats for the same seed and stays in [0, 1)', () => {
    const a = take(mulberry32(42), 100);
    expect(take(mulberry32(42), 100)).toEqual(a);
    expect(a.every(x => x >= 0 && x < 1)).toBe(true);
  });
});

describe('deriveSeed', () => {
  it('is deterministic and unsigned 32-bit', () => {
    const seed = deriveSeed(123, 4, RNG_STREAMS.deck);
    expect(deriveSeed(123, 4, RNG_STREAMS.deck)).toBe(seed);
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
  });

  it('separates rounds and streams', () => {
    const seeds = new Set([
      deriveSeed(123, 1, RNG_STREAMS.deck),
      deriveSeed(123, 2, RNG_STREAMS.deck),
      deriveSeed(123, 1, RNG_STREAMS.seats),
      deriveSeed(123, 1, RNG_STREAMS.firstPlayer),
      deriveSeed(123, 1, RNG_STREAMS.secondPlayer),
    ]);
    expect(seeds.size).toBe(5);
  });

  it('backs createStreamRng', () => {
    expect(take(createStreamRng(9, RNG_STREAMS.seats, 3), 5)).toEqual(
      take(mulberry32(deriveSeed(9, 3, RNG_STREAMS.seats)), 5)
    );
  });
});

describe('sampling', () => {
  it('randomInt stays below its bound', () => {
    const rng = mulberry32(5);
    const values = Array.from({ length: 200 }, () => randomInt(rng, 6));
    expect(values.every(v => Number.isInteger(v) && v >= 0 && v < 6)).toBe(true);
  });

  it('picks distinct items without touching the source', () => {
    const items = ['a', 'b', 'c', 'd', 'e', 'f'];
    const picked = sampleWithoutReplacement(items, 2, mulberry32(11));
    expect(picked).toHaveLength(2);
    expect(new Set(picked).size).toBe(2);
    expect(picked.every(p => items.includes(p))).toBe(true);
    expect(items).toHaveLength(6);
  });

  it('returns at most the available items', () => {
    expect(sampleWithoutReplacement(['a'], 3, mulberry32(1))).toEqual(['a']);
  });
});
