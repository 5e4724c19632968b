// Seeded randomness. Every game owns its seed; nothing here keeps global state.

export type RNG = () => number; // [0,1)

export function mulberry32(seed: number): RNG {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Separate streams so the deck, the seat draw and each player never share a sequence.
export const RNG_STREAMS = {
  deck: 0,
  seats: 1,
  firstPlayer: 2,
  secondPlayer: 3,
} as const;

export type RngStream = (typeof RNG_STREAMS)[keyof typeof RNG_STREAMS];

/**
 * Derive a 32-bit seed from a base seed, a round/hand index and a stream id.
 */
export function deriveSeed(base: number, round: number, stream = 0): number {
  let x = (Math.floor(base) >>> 0) ^ (((Math.floor(round) + 1) * 0x9e3779b9) >>> 0);
  x = (x ^ (((Math.floor(stream) + 1) * 0x85ebca6b) >>> 0)) >>> 0;
  x ^= x >>> 16;
  x = Math.imul(x, 0x7feb352d) >>> 0;
  x ^= x >>> 15;
  x = Math.imul(x, 0x846ca68b) >>> 0;
  x ^= x >>> 16;
  return x >>> 0;
}

export function createStreamRng(seed: number, stream: RngStream, round = 0): RNG {
  return mulberry32(deriveSeed(seed, round, stream));
}

export function randomInt(rng: RNG, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive);
}

/**
 * Pick `count` distinct items uniformly at random
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, rng: RNG): T[] {
  const pool = [...items];
  const picked: T[] = [];
  for (let i = 0; i < count && pool.length > 0; i++) {
    const [item] = pool.splice(randomInt(rng, pool.length), 1);
    if (item !== undefined) picked.push(item);
  }
  return picked;
}

/**
 * A fresh seed for a run that was not given one
 */
export function generateRandomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff) >>> 0;
}
