// Domain layer: Offer ownership checks
// Shared by proposal-time validation and the exchange transaction

import type { Creature } from '@/domain/creature/types.js';
import type { User } from '@/domain/user/types.js';
import type { OfferProblem, TradeOffer } from './types.js';

/**
 * Sum item quantities per code and coins across an offer
 */
export function offerTotals(offer: TradeOffer): { items: Record<string, number>; coins: number } {
  const items: Record<string, number> = {};
  let coins = 0;
  for (const asset of offer) {
    if (asset.type === 'ITEM') {
      items[asset.itemCode] = (items[asset.itemCode] ?? 0) + asset.quantity;
    } else if (asset.type === 'COINS') {
      coins += asset.amount;
    }
  }
  return { items, coins };
}

export function offeredCreatureIds(offer: TradeOffer): string[] {
  const ids: string[] = [];
  for (const asset of offer) {
    if (asset.type === 'CREATURE') ids.push(asset.creatureId);
  }
  return ids;
}

/**
 * Check every asset against the owner's current creatures, inventory and balance
 * `creatures` holds whatever records could be found for the offered ids
 */
export function findOfferProblems(
  offer: TradeOffer,
  owner: User,
  creatures: ReadonlyMap<string, Creature>
): OfferProblem[] {
  const problems: OfferProblem[] = [];
  const { items, coins } = offerTotals(offer);

  for (const asset of offer) {
    switch (asset.type) {
      case 'CREATURE': {
        const creature = creatures.get(asset.creatureId);
        if (!creature || creature.ownerId !== owner.id) {
          problems.push({ asset, reason: 'NOT_OWNED' });
        }
        break;
      }
      case 'ITEM':
        if ((owner.inventory[asset.itemCode] ?? 0) < items[asset.itemCode]) {
          problems.push({ asset, reason: 'INSUFFICIENT_ITEMS' });
        }
        break;
      case 'COINS':
        if (owner.coins < coins) {
          problems.push({ asset, reason: 'INSUFFICIENT_COINS' });
        }
        break;
    }
  }
  return problems;
}

/**
 * Shape checks that need no store access
 * Returns a message per problem; an empty list means the offer is well formed
 */
export function describeMalformedOffer(offer: TradeOffer, allowEmpty: boolean): string[] {
  const errors: string[] = [];
  if (offer.length === 0 && !allowEmpty) {
    errors.push('Offer must contain at least one asset');
  }
  const seen = new Set<string>();
  for (const asset of offer) {
    if (asset.type === 'CREATURE') {
      if (seen.has(asset.creatureId)) errors.push(`Creature ${asset.creatureId} offered twice`);
      seen.add(asset.creatureId);
    } else if (asset.type === 'ITEM') {
      if (!Number.isInteger(asset.quantity) || asset.quantity <= 0) {
        errors.push(`Item ${asset.itemCode} quantity must be a positive integer`);
      }
    } else if (!Number.isInteger(asset.amount) || asset.amount <= 0) {
      errors.push('Coin amount must be a positive integer');
    }
  }
  return errors;
}
