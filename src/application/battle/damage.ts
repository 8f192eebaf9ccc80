// Application: Damage formula

import type { Combatant, CombatantMove } from '@/domain/battle/types.js';

export const DAMAGE_SCALE = 0.4;
export const RANDOM_FACTOR_MIN = 0.85;
export const RANDOM_FACTOR_MAX = 1.0;
export const RANDOM_FACTOR_MEAN = (RANDOM_FACTOR_MIN + RANDOM_FACTOR_MAX) / 2;

export function attackingStats(attacker: Combatant, defender: Combatant, move: CombatantMove): [number, number] {
  return move.category === 'PHYSICAL'
    ? [attacker.stats.attack, defender.stats.defense]
    : [attacker.stats.specialAttack, defender.stats.specialDefense];
}

/**
 * floor((atk * power / def) * 0.4 * effectiveness * randomFactor), at least 1 unless immune
 */
export function computeDamage(
  attacker: Combatant,
  defender: Combatant,
  move: CombatantMove,
  effectiveness: number,
  randomFactor: number
): number {
  if (effectiveness === 0) return 0;
  const [atk, def] = attackingStats(attacker, defender, move);
  const raw = ((atk * move.power) / Math.max(1, def)) * DAMAGE_SCALE * effectiveness * randomFactor;
  return Math.max(1, Math.floor(raw));
}

/**
 * Damage with the random factor fixed at its mean, unrounded
 */
export function expectedDamage(
  attacker: Combatant,
  defender: Combatant,
  move: CombatantMove,
  effectiveness: number
): number {
  if (effectiveness === 0) return 0;
  const [atk, def] = attackingStats(attacker, defender, move);
  return ((atk * move.power) / Math.max(1, def)) * DAMAGE_SCALE * effectiveness * RANDOM_FACTOR_MEAN;
}
