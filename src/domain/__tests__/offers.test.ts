import { describe, it, expect } from 'vitest';
import type { Creature } from '@/domain/creature/types.js';
import { describeMalformedOffer, findOfferProblems, offerTotals } from '@/domain/trade/offers.js';
import type { TradeOffer } from '@/domain/trade/types.js';
import type { User } from '@/domain/user/types.js';
import { buildCreature } from '@/__tests__/helpers/fixtures.js';

function owner(overrides: Partial<User> = {}): User {
  return {
    id: 'u1',
    trainerLevel: 1,
    experience: 0,
    coins: 100,
    dailyStreak: 0,
    lastDailyClaimAt: null,
    battlesWon: 0,
    battlesLost: 0,
    creaturesCaught: 0,
    activeTeam: [],
    inventory: { potion: 2 },
    createdAt: 0,
    revision: 1,
    ...overrides,
  };
}

describe('offerTotals', () => {
  it('sums items per code and coins across assets', () => {
    const offer: TradeOffer = [
      { type: 'ITEM', itemCode: 'potion', quantity: 1 },
      { type: 'COINS', amount: 30 },
      { type: 'ITEM', itemCode: 'potion', quantity: 2 },
      { type: 'COINS', amount: 20 },
    ];
    expect(offerTotals(offer)).toEqual({ items: { potion: 3 }, coins: 50 });
  });
});

describe('describeMalformedOffer', () => {
  it('rejects an empty proposal but allows an empty counter offer', () => {
    expect(describeMalformedOffer([], false)).toEqual(['Offer must contain at least one asset']);
    expect(describeMalformedOffer([], true)).toEqual([]);
  });

  it('flags duplicates and non-positive amounts', () => {
    const errors = describeMalformedOffer(
      [
        { type: 'CREATURE', creatureId: 'c1' },
        { type: 'CREATURE', creatureId: 'c1' },
        { type: 'ITEM', itemCode: 'potion', quantity: 0 },
        { type: 'COINS', amount: 1.5 },
      ],
      false
    );
    expect(errors).toEqual([
      'Creature c1 offered twice',
      'Item potion quantity must be a positive integer',
      'Coin amount must be a positive integer',
    ]);
  });
});

describe('findOfferProblems', () => {
  it('checks totals against inventory and balance', () => {
    const offer: TradeOffer = [
      { type: 'ITEM', itemCode: 'potion', quantity: 2 },
      { type: 'ITEM', itemCode: 'potion', quantity: 1 },
      { type: 'COINS', amount: 100 },
    ];
    const problems = findOfferProblems(offer, owner(), new Map());
    expect(problems.map((p) => p.reason)).toEqual(['INSUFFICIENT_ITEMS', 'INSUFFICIENT_ITEMS']);
  });

  it('reports creatures that are missing or owned by someone else', () => {
    const mine = buildCreature('u1', 'pebble', 5);
    const theirs = buildCreature('u2', 'pebble', 5);
    const creatures = new Map<string, Creature>([
      [mine.id, mine],
      [theirs.id, theirs],
    ]);
    const offer: TradeOffer = [
      { type: 'CREATURE', creatureId: mine.id },
      { type: 'CREATURE', creatureId: theirs.id },
      { type: 'CREATURE', creatureId: 'missing' },
    ];

    const problems = findOfferProblems(offer, owner(), creatures);
    expect(problems).toEqual([
      { asset: { type: 'CREATURE', creatureId: theirs.id }, reason: 'NOT_OWNED' },
      { asset: { type: 'CREATURE', creatureId: 'missing' }, reason: 'NOT_OWNED' },
    ]);
  });

  it('reports coins beyond the balance', () => {
    const problems = findOfferProblems([{ type: 'COINS', amount: 101 }], owner(), new Map());
    expect(problems).toEqual([{ asset: { type: 'COINS', amount: 101 }, reason: 'INSUFFICIENT_COINS' }]);
  });
});
