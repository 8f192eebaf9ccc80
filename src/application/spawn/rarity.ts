// Application: Rarity draws and catch rewards

import type { RarityTier, RarityWeight } from '@/domain/catalog/types.js';
import type { RandomSource } from '@/domain/shared/random.js';

/**
 * Weighted draw over the tier table (cumulative scan)
 * Tiers without eligible species are skipped and the rest renormalized
 * Returns null when no tier is eligible
 */
export function drawRarityTier(
  weights: readonly RarityWeight[],
  hasSpecies: (tier: RarityTier) => boolean,
  random: RandomSource
): RarityTier | null {
  const eligible = weights.filter((w) => w.weight > 0 && hasSpecies(w.tier));
  const total = eligible.reduce((sum, w) => sum + w.weight, 0);
  if (eligible.length === 0 || total <= 0) return null;

  let roll = random.next() * total;
  for (const entry of eligible) {
    if (roll < entry.weight) return entry.tier;
    roll -= entry.weight;
  }
  // Floating point leftovers land on the last tier
  return eligible[eligible.length - 1].tier;
}

export const CATCH_EXPERIENCE_BASE: Record<RarityTier, number> = {
  COMMON: 10,
  UNCOMMON: 20,
  RARE: 35,
  EPIC: 50,
  LEGENDARY: 75,
  MYTHICAL: 100,
};

/**
 * Trainer experience for catching a creature
 */
export function catchExperience(rarity: RarityTier, level: number): number {
  return CATCH_EXPERIENCE_BASE[rarity] + Math.floor(level / 5);
}
