import { describe, it, expect } from 'vitest';
import type { Trade, TradeOffer } from '@/domain/trade/types.js';
import { T0, createTestEngine, seedTrainer, type TestEngine } from '@/__tests__/helpers/fixtures.js';

async function twoTrainers() {
  const engine = await createTestEngine();
  const [pebble] = await seedTrainer(engine, 'u1', [{ species: 'pebble', level: 5 }]);
  const [spark] = await seedTrainer(engine, 'u2', [{ species: 'spark', level: 5 }]);
  return { engine, pebble, spark };
}

async function propose(engine: TestEngine, from: string, to: string, offer: TradeOffer): Promise<Trade> {
  const result = await engine.trades.propose(from, to, offer);
  if (!result.ok) throw new Error(`proposal failed: ${result.error.code}`);
  return result.value;
}

async function counter(engine: TestEngine, trade: Trade, offer: TradeOffer): Promise<Trade> {
  const result = await engine.trades.addCounterOffer(trade.id, trade.counterpartyId, offer);
  if (!result.ok) throw new Error(`counter failed: ${result.error.code}`);
  return result.value;
}

async function user(engine: TestEngine, userId: string) {
  const result = await engine.trainers.getProfile(userId);
  if (!result.ok) throw new Error(`no profile for ${userId}`);
  return result.value;
}

function failure<T>(result: { ok: true; value: T } | { ok: false; error: { kind: string; code: string; details?: unknown } }) {
  return result.ok ? null : result.error;
}

describe('TradeEngine', () => {
  describe('propose', () => {
    it('opens a trade and creates the counterparty record', async () => {
      const { engine, pebble } = await twoTrainers();

      const trade = await propose(engine, 'u1', 'newcomer', [{ type: 'CREATURE', creatureId: pebble.id }]);

      expect(trade).toMatchObject({
        proposerId: 'u1',
        counterpartyId: 'newcomer',
        counterpartyOffer: null,
        confirmations: { proposer: false, counterparty: false },
        status: 'PROPOSED',
        createdAt: T0,
        expiresAt: T0 + 600000,
      });
      expect((await user(engine, 'newcomer')).coins).toBe(1000);
    });

    it('rejects malformed offers with a message per problem', async () => {
      const { engine, pebble } = await twoTrainers();

      expect(failure(await engine.trades.propose('u1', 'u1', [{ type: 'COINS', amount: 1 }]))?.code).toBe('SELF_TRADE');
      expect(failure(await engine.trades.propose('u1', 'u2', []))?.details).toEqual({
        errors: ['Offer must contain at least one asset'],
      });
      expect(
        failure(
          await engine.trades.propose('u1', 'u2', [
            { type: 'CREATURE', creatureId: pebble.id },
            { type: 'CREATURE', creatureId: pebble.id },
            { type: 'ITEM', itemCode: 'elixir', quantity: 1 },
          ])
        )?.details
      ).toEqual({ errors: [`Creature ${pebble.id} offered twice`, 'Unknown item elixir'] });
    });

    it('rejects assets the proposer does not hold', async () => {
      const { engine, spark } = await twoTrainers();
      const offer: TradeOffer = [
        { type: 'CREATURE', creatureId: spark.id },
        { type: 'COINS', amount: 5000 },
      ];

      const error = failure(await engine.trades.propose('u1', 'u2', offer));

      expect(error?.code).toBe('INVALID_OFFER');
      expect(error?.details).toEqual({
        problems: [
          { asset: offer[0], reason: 'NOT_OWNED' },
          { asset: offer[1], reason: 'INSUFFICIENT_COINS' },
        ],
      });
    });

    it('reports an unknown proposer', async () => {
      const { engine } = await twoTrainers();

      expect(failure(await engine.trades.propose('ghost', 'u2', [{ type: 'COINS', amount: 10 }]))?.kind).toBe(
        'NOT_FOUND'
      );
    });
  });

  describe('negotiation', () => {
    it('only takes a counter offer from the counterparty', async () => {
      const { engine } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 50 }]);

      expect(failure(await engine.trades.addCounterOffer(trade.id, 'u1', []))?.code).toBe('NOT_PARTICIPANT');
      expect(failure(await engine.trades.confirm(trade.id, 'u1'))?.code).toBe('TRADE_NOT_READY');
      expect(failure(await engine.trades.confirm(trade.id, 'u3'))?.code).toBe('NOT_PARTICIPANT');
    });

    it('validates the counter offer against the counterparty', async () => {
      const { engine, pebble } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 50 }]);

      const error = failure(
        await engine.trades.addCounterOffer(trade.id, 'u2', [{ type: 'CREATURE', creatureId: pebble.id }])
      );

      expect(error?.code).toBe('INVALID_OFFER');
    });

    it('clears confirmations when the terms change', async () => {
      const { engine } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 50 }]);
      await counter(engine, trade, [{ type: 'ITEM', itemCode: 'potion', quantity: 1 }]);
      const confirmed = await engine.trades.confirm(trade.id, 'u1');
      expect(confirmed.ok && confirmed.value.confirmations).toEqual({ proposer: true, counterparty: false });

      const recountered = await counter(engine, trade, [{ type: 'ITEM', itemCode: 'potion', quantity: 2 }]);

      expect(recountered.status).toBe('PARTIALLY_CONFIRMED');
      expect(recountered.confirmations).toEqual({ proposer: false, counterparty: false });
    });
  });

  describe('confirm', () => {
    it('exchanges every asset once both sides confirm', async () => {
      const { engine, pebble } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [
        { type: 'CREATURE', creatureId: pebble.id },
        { type: 'COINS', amount: 200 },
      ]);
      await counter(engine, trade, [{ type: 'ITEM', itemCode: 'potion', quantity: 2 }]);

      const first = await engine.trades.confirm(trade.id, 'u1');
      expect(first.ok && first.value.status).toBe('PARTIALLY_CONFIRMED');

      const second = await engine.trades.confirm(trade.id, 'u2');
      expect(second.ok && second.value).toMatchObject({
        status: 'CONFIRMED',
        confirmations: { proposer: true, counterparty: true },
        completedAt: T0,
      });

      expect(await user(engine, 'u1')).toMatchObject({ coins: 800, inventory: { potion: 5 }, activeTeam: [] });
      expect(await user(engine, 'u2')).toMatchObject({ coins: 1200, inventory: { potion: 1 } });
      expect(await engine.database.creatures.findById(pebble.id)).toMatchObject({ ownerId: 'u2', inTeam: false });
    });

    it('treats a repeated confirmation as a no-op', async () => {
      const { engine } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 10 }]);
      await counter(engine, trade, []);
      await engine.trades.confirm(trade.id, 'u1');

      const again = await engine.trades.confirm(trade.id, 'u1');
      await engine.trades.confirm(trade.id, 'u2');
      const afterwards = await engine.trades.confirm(trade.id, 'u2');

      expect(again.ok && again.value.status).toBe('PARTIALLY_CONFIRMED');
      expect(afterwards.ok && afterwards.value.status).toBe('CONFIRMED');
      expect((await user(engine, 'u1')).coins).toBe(990);
    });

    it('cancels the trade when an offered asset has moved on', async () => {
      const { engine, pebble } = await twoTrainers();
      await engine.trainers.getOrCreateUser('u3');
      const first = await propose(engine, 'u1', 'u2', [{ type: 'CREATURE', creatureId: pebble.id }]);
      await counter(engine, first, []);
      const second = await propose(engine, 'u1', 'u3', [{ type: 'CREATURE', creatureId: pebble.id }]);
      await counter(engine, second, []);
      await engine.trades.confirm(second.id, 'u1');
      await engine.trades.confirm(second.id, 'u3');

      await engine.trades.confirm(first.id, 'u1');
      const error = failure(await engine.trades.confirm(first.id, 'u2'));

      expect(error).toMatchObject({ kind: 'STALE_STATE', code: 'STALE_OFFER' });
      expect(error?.details).toEqual({
        tradeId: first.id,
        problems: [{ asset: { type: 'CREATURE', creatureId: pebble.id }, reason: 'NOT_OWNED' }],
      });
      const stored = await engine.trades.getTrade(first.id);
      expect(stored.ok && stored.value).toMatchObject({ status: 'CANCELLED', cancelReason: 'STALE_OFFER' });
      expect(await engine.database.creatures.findById(pebble.id)).toMatchObject({ ownerId: 'u3' });
    });
  });

  describe('cancel', () => {
    it('closes the trade for both parties', async () => {
      const { engine } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 10 }]);

      const cancelled = await engine.trades.cancel(trade.id, 'u2');

      expect(cancelled.ok && cancelled.value).toMatchObject({ status: 'CANCELLED', cancelReason: 'BY_USER' });
      expect(failure(await engine.trades.confirm(trade.id, 'u1'))?.code).toBe('TRADE_CLOSED');
      expect(failure(await engine.trades.cancel(trade.id, 'u1'))?.code).toBe('TRADE_CLOSED');
      expect(failure(await engine.trades.addCounterOffer(trade.id, 'u2', []))?.code).toBe('TRADE_CLOSED');
      expect(failure(await engine.trades.cancel(trade.id, 'u3'))?.code).toBe('NOT_PARTICIPANT');
    });
  });

  describe('expiry', () => {
    it('expires an open trade on first touch after the deadline', async () => {
      const { engine } = await twoTrainers();
      const trade = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 10 }]);
      engine.clock.advance(600000);

      const error = failure(await engine.trades.confirm(trade.id, 'u1'));

      expect(error).toMatchObject({ kind: 'STALE_STATE', code: 'EXPIRED' });
      expect(failure(await engine.trades.getTrade(trade.id))?.code).toBe('EXPIRED');
      expect(await engine.database.trades.findById(trade.id)).toMatchObject({
        status: 'EXPIRED',
        completedAt: T0 + 600000,
      });
    });

    it('sweeps overdue trades and leaves closed ones alone', async () => {
      const { engine } = await twoTrainers();
      await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 10 }]);
      await propose(engine, 'u2', 'u1', [{ type: 'COINS', amount: 10 }]);
      const cancelled = await propose(engine, 'u1', 'u2', [{ type: 'COINS', amount: 10 }]);
      await engine.trades.cancel(cancelled.id, 'u1');

      engine.clock.advance(599999);
      expect(await engine.trades.expireOverdue()).toBe(0);

      engine.clock.advance(1);
      expect(await engine.trades.expireOverdue()).toBe(2);
      expect(await engine.trades.expireOverdue()).toBe(0);
    });

    it('reports an unknown trade', async () => {
      const { engine } = await twoTrainers();

      expect(failure(await engine.trades.getTrade('missing'))?.kind).toBe('NOT_FOUND');
    });
  });
});
