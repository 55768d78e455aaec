/**
 * Source of uniform random numbers in [0, 1).
 * Block sampling and miner selection draw from one of these so runs can be replayed.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Seeded Mulberry32 generator
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    this.state = SeededRandom.hashToSeed(seed);
  }

  static hashToSeed(seed: number | string): number {
    let x = typeof seed === 'number' ? Math.floor(seed) : 0;
    if (typeof seed === 'string') {
      for (let i = 0; i < seed.length; i++) {
        x = (x ^ seed.charCodeAt(i)) >>> 0;
        x = (x + 0x9e3779b9 + ((x << 6) >>> 0) + (x >>> 2)) >>> 0;
      }
    }
    if (x === 0) x = 0x6d2b79f5;
    return x >>> 0;
  }

  next(): number {
    this.state |= 0;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Picks one item with probability proportional to its weight.
 * Items with a non-positive weight are never picked; returns null when nothing can be.
 */
export function weightedChoice<T>(
  items: readonly T[],
  weightOf: (item: T) => number,
  rng: RandomSource
): T | null {
  const total = items.reduce((sum, item) => sum + Math.max(0, weightOf(item)), 0);
  if (total <= 0) {
    return null;
  }

  let roll = rng.next() * total;
  let last: T | null = null;
  for (const item of items) {
    const weight = Math.max(0, weightOf(item));
    if (weight <= 0) continue;
    last = item;
    if (roll < weight) {
      return item;
    }
    roll -= weight;
  }

  // Floating point remainder lands on the last eligible item
  return last;
}
