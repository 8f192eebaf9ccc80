// Application: Generated-opponent move choice
// Deterministic; never switches, never uses items, draws no randomness

import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import { activeCombatant, type BattleAction, type BattleSide } from '@/domain/battle/types.js';
import { expectedDamage } from './damage.js';

/**
 * Highest expected damage against the current target; ties keep the earlier move
 */
export function chooseOpponentAction(
  own: BattleSide,
  opposing: BattleSide,
  catalog: ISpeciesCatalog
): BattleAction {
  const attacker = activeCombatant(own);
  const defender = activeCombatant(opposing);

  let best = attacker.moves[0];
  let bestDamage = -1;
  for (const move of attacker.moves) {
    const damage = expectedDamage(attacker, defender, move, catalog.typeEffectiveness(move.type, defender.types));
    if (damage > bestDamage) {
      best = move;
      bestDamage = damage;
    }
  }

  return { type: 'MOVE', moveCode: best.code };
}
