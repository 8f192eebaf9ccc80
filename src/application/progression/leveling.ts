// Application: Leveling and evolution rules
// Pure functions over the catalog curve; no store access

import type { ISpeciesCatalog, Species } from '@/domain/catalog/types.js';
import { MAX_LEVEL, type Creature, type EvolutionEvent } from '@/domain/creature/types.js';
import { calculateStats } from '@/domain/creature/stats.js';
import { DataIntegrityError } from '@/utils/errors.js';

export interface LevelState {
  level: number;
  experience: number;
}

export interface LevelingResult extends LevelState {
  levelsGained: number;
}

/**
 * Add experience with carry-over into the next level
 * At the cap, new experience is discarded; the remainder of the step that reaches the cap
 * is kept, clamped below threshold(cap - 1)
 */
export function applyExperience(
  state: LevelState,
  amount: number,
  threshold: (level: number) => number
): LevelingResult {
  if (state.level >= MAX_LEVEL) {
    return { level: state.level, experience: state.experience, levelsGained: 0 };
  }

  let level = state.level;
  let experience = state.experience + amount;
  while (level < MAX_LEVEL && experience >= threshold(level)) {
    experience -= threshold(level);
    level++;
  }
  if (level >= MAX_LEVEL) {
    experience = Math.min(experience, threshold(MAX_LEVEL - 1) - 1);
  }

  return { level, experience, levelsGained: level - state.level };
}

/**
 * Follow evolution rules from `speciesCode` as far as `level` allows
 */
export function resolveEvolutions(
  speciesCode: string,
  level: number,
  catalog: ISpeciesCatalog
): { species: Species; evolutions: EvolutionEvent[] } {
  let species = requireSpecies(speciesCode, catalog);
  const evolutions: EvolutionEvent[] = [];
  const seen = new Set([species.code]);

  while (species.evolution && level >= species.evolution.level) {
    const next = requireSpecies(species.evolution.into, catalog);
    if (seen.has(next.code)) {
      throw new DataIntegrityError('Evolution cycle in catalog', { species: next.code });
    }
    evolutions.push({ from: species.code, to: next.code, atLevel: level });
    seen.add(next.code);
    species = next;
  }

  return { species, evolutions };
}

function requireSpecies(code: string, catalog: ISpeciesCatalog): Species {
  const species = catalog.getSpecies(code);
  if (!species) {
    throw new DataIntegrityError('Creature references unknown species', { species: code });
  }
  return species;
}

export interface CreatureProgress {
  creature: Creature;
  levelsGained: number;
  evolutions: EvolutionEvent[];
}

/**
 * Level, evolve and recompute stats; returns a new creature (revision untouched)
 */
export function progressCreature(creature: Creature, amount: number, catalog: ISpeciesCatalog): CreatureProgress {
  const leveled = applyExperience(creature, amount, (level) => catalog.experienceToNextLevel(level));
  const { species, evolutions } = resolveEvolutions(creature.speciesCode, leveled.level, catalog);

  return {
    creature: {
      ...creature,
      level: leveled.level,
      experience: leveled.experience,
      speciesCode: species.code,
      stats: calculateStats(species.baseStats, leveled.level, creature.nature),
    },
    levelsGained: leveled.levelsGained,
    evolutions,
  };
}
