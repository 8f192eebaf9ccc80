// Infrastructure layer: Random number sources
// Implements the RandomSource contract with injectable generators

import type { RandomSource, SeededRandomFactory } from '@/domain/shared/random.js';

/**
 * Math.random() backed source
 * Use in production
 */
export class MathRandomSource implements RandomSource {
  next(): number {
    return Math.random();
  }
}

/**
 * FNV-1a string hash, used to derive numeric seeds from ids and turn numbers
 */
export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Seeded source for reproducible draws (mulberry32)
 * Same seed, same sequence
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number | string) {
    this.state = (typeof seed === 'string' ? hashSeed(seed) : seed) >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

export const seededRandom: SeededRandomFactory = (seed) => new SeededRandomSource(seed);

/**
 * Fixed source for testing
 * Returns predetermined values from an array
 */
export class FixedRandomSource implements RandomSource {
  private values: number[];

  constructor(values: number[], private fallback?: number) {
    for (const value of values) {
      if (value < 0 || value >= 1) {
        throw new Error(`FixedRandomSource: value ${value} outside [0, 1)`);
      }
    }
    this.values = [...values];
  }

  next(): number {
    const value = this.values.shift();
    if (value !== undefined) return value;
    if (this.fallback !== undefined) return this.fallback;
    throw new Error('FixedRandomSource: No more values available');
  }

  /**
   * Check how many values remain
   */
  get remaining(): number {
    return this.values.length;
  }
}
