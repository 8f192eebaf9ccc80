// Application: Battle snapshots
// Battles copy everything they need at start and never read creature records again

import type { ISpeciesCatalog, Species } from '@/domain/catalog/types.js';
import type { BattleSide, Combatant, CombatantMove, SideId } from '@/domain/battle/types.js';
import { MAX_LEVEL, MIN_LEVEL, NATURES, type Creature, type StatBlock } from '@/domain/creature/types.js';
import { calculateStats } from '@/domain/creature/stats.js';
import { pickOne, randomInt, type RandomSource } from '@/domain/shared/random.js';
import { DataIntegrityError } from '@/utils/errors.js';
import { drawRarityTier } from '@/application/spawn/rarity.js';

export const MOVES_PER_COMBATANT = 4;
export const OPPONENT_LEVEL_SPREAD = 5;

/**
 * Up to four moves from the species pool, or the catalog default move
 */
export function combatantMoves(species: Species, catalog: ISpeciesCatalog): CombatantMove[] {
  const moves: CombatantMove[] = [];
  for (const code of species.movePool) {
    const move = catalog.getMove(code);
    if (move) moves.push({ ...move });
    if (moves.length === MOVES_PER_COMBATANT) break;
  }
  if (moves.length === 0) {
    const fallback = catalog.getMove(catalog.defaultMove);
    if (!fallback) {
      throw new DataIntegrityError('Catalog default move is missing', { move: catalog.defaultMove });
    }
    moves.push({ ...fallback });
  }
  return moves;
}

function buildCombatant(
  id: string,
  creatureId: string | null,
  species: Species,
  level: number,
  stats: StatBlock,
  catalog: ISpeciesCatalog
): Combatant {
  return {
    id,
    creatureId,
    speciesCode: species.code,
    name: species.name,
    level,
    types: [...species.types],
    stats: { ...stats },
    currentHp: stats.hp,
    moves: combatantMoves(species, catalog),
    fainted: false,
    participated: false,
  };
}

/**
 * A player's side: the active team in order, plus a bag of usable items
 */
export function playerSide(
  side: SideId,
  userId: string,
  team: readonly Creature[],
  inventory: Record<string, number>,
  catalog: ISpeciesCatalog
): BattleSide {
  const combatants = team.map((creature, i) => {
    const species = catalog.getSpecies(creature.speciesCode);
    if (!species) {
      throw new DataIntegrityError('Creature references unknown species', {
        creatureId: creature.id,
        species: creature.speciesCode,
      });
    }
    const combatant = buildCombatant(`${side}${i + 1}`, creature.id, species, creature.level, creature.stats, catalog);
    if (creature.nickname) combatant.name = creature.nickname;
    return combatant;
  });
  combatants[0].participated = true;

  const items: Record<string, number> = {};
  for (const [code, quantity] of Object.entries(inventory)) {
    if (quantity > 0 && catalog.getItem(code)) items[code] = quantity;
  }

  return { side, userId, controller: 'PLAYER', team: combatants, activeIndex: 0, items };
}

export function averageLevel(team: readonly { level: number }[]): number {
  if (team.length === 0) return MIN_LEVEL;
  return team.reduce((sum, c) => sum + c.level, 0) / team.length;
}

/**
 * Generated opponent: rarity-weighted species around the challenger's average level
 */
export function generateOpponentSide(
  side: SideId,
  size: number,
  challengerAverageLevel: number,
  catalog: ISpeciesCatalog,
  random: RandomSource
): BattleSide {
  const team: Combatant[] = [];
  for (let i = 0; i < size; i++) {
    const tier = drawRarityTier(catalog.rarityWeights(), (t) => catalog.speciesByRarity(t).length > 0, random);
    if (!tier) {
      throw new DataIntegrityError('Catalog has no species for generated opponents');
    }
    const species = pickOne(random, catalog.speciesByRarity(tier));
    const spread = randomInt(random, -OPPONENT_LEVEL_SPREAD, OPPONENT_LEVEL_SPREAD);
    const level = Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, Math.round(challengerAverageLevel) + spread));
    const nature = pickOne(random, NATURES);
    team.push(
      buildCombatant(`${side}${i + 1}`, null, species, level, calculateStats(species.baseStats, level, nature), catalog)
    );
  }
  team[0].participated = true;

  return { side, userId: null, controller: 'AI', team, activeIndex: 0, items: {} };
}
