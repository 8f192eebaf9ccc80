// Domain layer: Stat derivation
// Pure functions, no external dependencies

import type { BaseStats, RarityTier } from '@/domain/catalog/types.js';
import { RARITY_TIERS } from '@/domain/catalog/types.js';
import type { Nature, StatBlock, StatName } from './types.js';

// Fixed individual value; every creature of a species/level/nature has the same block
const INDIVIDUAL_VALUE = 31;

const NATURE_MODIFIERS: Record<Nature, Partial<Record<StatName, number>>> = {
  hardy: {},
  adamant: { attack: 1.1, specialAttack: 0.9 },
  modest: { specialAttack: 1.1, attack: 0.9 },
  timid: { speed: 1.1, attack: 0.9 },
  jolly: { speed: 1.1, specialAttack: 0.9 },
  bold: { defense: 1.1, attack: 0.9 },
  calm: { specialDefense: 1.1, attack: 0.9 },
};

export function natureModifier(nature: Nature, stat: StatName): number {
  return NATURE_MODIFIERS[nature][stat] ?? 1;
}

function scaledBase(base: number, level: number): number {
  return ((2 * base + INDIVIDUAL_VALUE) * level) / 100;
}

export function calculateStats(base: BaseStats, level: number, nature: Nature): StatBlock {
  const other = (stat: Exclude<StatName, 'hp'>): number =>
    Math.floor(Math.floor(scaledBase(base[stat], level) + 5) * natureModifier(nature, stat));

  return {
    hp: Math.floor(scaledBase(base.hp, level)) + level + 10,
    attack: other('attack'),
    defense: other('defense'),
    specialAttack: other('specialAttack'),
    specialDefense: other('specialDefense'),
    speed: other('speed'),
  };
}

/**
 * Shiny creatures are one tier rarer than their species, capped at the top tier
 */
export function creatureRarity(speciesRarity: RarityTier, isShiny: boolean): RarityTier {
  if (!isShiny) return speciesRarity;
  const index = RARITY_TIERS.indexOf(speciesRarity);
  return RARITY_TIERS[Math.min(index + 1, RARITY_TIERS.length - 1)];
}
