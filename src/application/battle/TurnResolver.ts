// Application: Turn resolution
// Pure: same sides, actions and random sequence always produce the same events

import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import {
  SIDE_IDS,
  activeCombatant,
  hasHealthyMember,
  opposingSide,
  sideOf,
  type BattleAction,
  type BattleEvent,
  type BattleSide,
  type BattleSides,
  type SideId,
} from '@/domain/battle/types.js';
import { randomBetween, type RandomSource } from '@/domain/shared/random.js';
import { invalidInput, type EngineResult } from '@/domain/shared/result.js';
import { DataIntegrityError } from '@/utils/errors.js';
import { RANDOM_FACTOR_MAX, RANDOM_FACTOR_MIN, computeDamage } from './damage.js';

export interface TurnOutcome {
  sides: BattleSides;
  events: BattleEvent[];
  winner: SideId | null;
  ended: boolean;
}

/**
 * Faster active combatant first; equal speed goes to the lower combatant id
 */
export function actionOrder(sides: BattleSides): SideId[] {
  return [...sides]
    .sort((x, y) => {
      const a = activeCombatant(x);
      const b = activeCombatant(y);
      if (a.stats.speed !== b.stats.speed) return b.stats.speed - a.stats.speed;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    })
    .map((s) => s.side);
}

/**
 * Check an action against the side's state before anything is stored
 */
export function validateAction(
  side: BattleSide,
  action: BattleAction,
  catalog: ISpeciesCatalog
): EngineResult<never> | null {
  switch (action.type) {
    case 'MOVE':
      if (!activeCombatant(side).moves.some((m) => m.code === action.moveCode)) {
        return invalidInput('UNKNOWN_MOVE', 'Active combatant does not know that move', {
          moveCode: action.moveCode,
        });
      }
      return null;
    case 'SWITCH': {
      const target = side.team[action.toIndex];
      if (!Number.isInteger(action.toIndex) || !target || target.fainted || action.toIndex === side.activeIndex) {
        return invalidInput('INVALID_SWITCH', 'Can only switch to a healthy bench member', {
          toIndex: action.toIndex,
        });
      }
      return null;
    }
    case 'ITEM':
      if (!catalog.getItem(action.itemCode) || (side.items[action.itemCode] ?? 0) < 1) {
        return invalidInput('INSUFFICIENT_ITEMS', 'Item not in battle bag', { itemCode: action.itemCode });
      }
      return null;
  }
}

function moveOf(side: BattleSide, moveCode: string) {
  const move = activeCombatant(side).moves.find((m) => m.code === moveCode);
  if (!move) {
    throw new DataIntegrityError('Stored action names an unknown move', { moveCode });
  }
  return move;
}

/**
 * Resolve one turn; `sides` is not mutated
 */
export function resolveTurn(
  sides: BattleSides,
  actions: Record<SideId, BattleAction>,
  random: RandomSource,
  catalog: ISpeciesCatalog
): TurnOutcome {
  const state: BattleSides = structuredClone(sides);
  const events: BattleEvent[] = [];

  for (const sideId of actionOrder(state)) {
    const own = sideOf({ sides: state }, sideId);
    const opposing = sideOf({ sides: state }, opposingSide(sideId));
    const action = actions[sideId];
    const actor = activeCombatant(own);

    if (actor.fainted) {
      events.push({ type: 'FIZZLE', side: sideId, actor: actor.id, reason: 'ACTOR_FAINTED' });
      continue;
    }

    if (action.type === 'MOVE') {
      const target = activeCombatant(opposing);
      if (target.fainted) {
        events.push({ type: 'FIZZLE', side: sideId, actor: actor.id, reason: 'TARGET_FAINTED' });
        continue;
      }

      const move = moveOf(own, action.moveCode);
      const effectiveness = catalog.typeEffectiveness(move.type, target.types);
      const randomFactor = randomBetween(random, RANDOM_FACTOR_MIN, RANDOM_FACTOR_MAX);
      const damage = computeDamage(actor, target, move, effectiveness, randomFactor);
      target.currentHp = Math.max(0, target.currentHp - damage);
      events.push({
        type: 'MOVE',
        side: sideId,
        actor: actor.id,
        target: target.id,
        moveCode: move.code,
        damage,
        effectiveness,
        targetHp: target.currentHp,
      });

      if (target.currentHp === 0) {
        target.fainted = true;
        events.push({ type: 'FAINT', side: opposing.side, combatant: target.id });
        if (!hasHealthyMember(opposing)) {
          events.push({ type: 'END', winner: sideId, reason: 'KNOCKOUT' });
          return { sides: state, events, winner: sideId, ended: true };
        }
      }
    } else if (action.type === 'SWITCH') {
      const incoming = own.team[action.toIndex];
      if (!incoming || incoming.fainted) {
        throw new DataIntegrityError('Stored switch target is not available', { toIndex: action.toIndex });
      }
      own.activeIndex = action.toIndex;
      incoming.participated = true;
      events.push({ type: 'SWITCH', side: sideId, from: actor.id, to: incoming.id });
    } else {
      const item = catalog.getItem(action.itemCode);
      const quantity = own.items[action.itemCode] ?? 0;
      if (!item || quantity < 1) {
        throw new DataIntegrityError('Stored item action has no item to use', { itemCode: action.itemCode });
      }
      if (quantity === 1) {
        delete own.items[action.itemCode];
      } else {
        own.items[action.itemCode] = quantity - 1;
      }
      const healed = Math.min(item.heal, actor.stats.hp - actor.currentHp);
      actor.currentHp += healed;
      events.push({ type: 'ITEM', side: sideId, actor: actor.id, itemCode: item.code, healed, hp: actor.currentHp });
    }
  }

  // Replace fainted actives with the first healthy member
  for (const sideId of SIDE_IDS) {
    const side = sideOf({ sides: state }, sideId);
    if (!activeCombatant(side).fainted) continue;
    const next = side.team.findIndex((c) => !c.fainted);
    if (next >= 0) {
      side.activeIndex = next;
      side.team[next].participated = true;
      events.push({ type: 'SEND_OUT', side: sideId, combatant: side.team[next].id });
    }
  }

  return { sides: state, events, winner: null, ended: false };
}
