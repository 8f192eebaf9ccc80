// Domain layer: Random source contract
// Implementations live in infrastructure/random

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

/**
 * Uniform integer in [min, max] (both inclusive)
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  if (max < min) {
    throw new Error(`Invalid range: [${min}, ${max}]`);
  }
  return min + Math.floor(random.next() * (max - min + 1));
}

/**
 * Uniform float in [min, max)
 */
export function randomBetween(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[Math.floor(random.next() * items.length)];
}

/**
 * Builds a deterministic source from a seed string
 */
export type SeededRandomFactory = (seed: string) => RandomSource;
