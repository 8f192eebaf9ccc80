// Trade Repository - LowDB implementation
// The exchange re-validates both offers and moves every asset in one transaction

import type { DatabaseConnection, DatabaseSchema, UserRecord } from './connection.js';
import type { Creature } from '@/domain/creature/types.js';
import type { ExchangeOutcome, Trade, TradeOffer } from '@/domain/trade/types.js';
import { isTerminal } from '@/domain/trade/types.js';
import type { ITradeRepository } from '@/domain/trade/repository.js';
import { findOfferProblems, offeredCreatureIds } from '@/domain/trade/offers.js';
import { DataIntegrityError } from '@/utils/errors.js';
import { fromIso, rowToCreature, rowToTrade, rowToUser, toIso, tradeToRow } from './mappers.js';

function requireUser(data: DatabaseSchema, id: string, tradeId: string): UserRecord {
  const user = data.users.find((u) => u.id === id);
  if (!user) {
    throw new DataIntegrityError('Trade party has no user record', { tradeId, userId: id });
  }
  return user;
}

function adjustInventory(user: UserRecord, itemCode: string, delta: number): void {
  const next = (user.inventory[itemCode] ?? 0) + delta;
  if (next <= 0) {
    delete user.inventory[itemCode];
  } else {
    user.inventory[itemCode] = next;
  }
}

/**
 * Move one side's offer to the other party (draft mutation)
 */
function transferOffer(data: DatabaseSchema, offer: TradeOffer, from: UserRecord, to: UserRecord): void {
  for (const asset of offer) {
    switch (asset.type) {
      case 'CREATURE': {
        const creature = data.creatures.find((c) => c.id === asset.creatureId);
        if (!creature) break;
        creature.owner_id = to.id;
        creature.in_team = 0;
        creature.revision += 1;
        from.active_team = from.active_team.filter((id) => id !== asset.creatureId);
        break;
      }
      case 'ITEM':
        adjustInventory(from, asset.itemCode, -asset.quantity);
        adjustInventory(to, asset.itemCode, asset.quantity);
        break;
      case 'COINS':
        from.coins -= asset.amount;
        to.coins += asset.amount;
        break;
    }
  }
}

export class TradeRepository implements ITradeRepository {
  constructor(private db: DatabaseConnection) {}

  async create(trade: Trade): Promise<Trade> {
    return this.db.atomicUpdate((data) => {
      const row = tradeToRow(trade);
      data.trades.push(row);
      return rowToTrade(row);
    });
  }

  async findById(id: string): Promise<Trade | null> {
    const row = this.db.getData().trades.find((t) => t.id === id);
    return row ? rowToTrade(row) : null;
  }

  async compareAndSwap(trade: Trade): Promise<Trade | null> {
    return this.db.atomicUpdate((data) => {
      const idx = data.trades.findIndex((t) => t.id === trade.id);
      if (idx === -1 || data.trades[idx].revision !== trade.revision) return null;

      const next = tradeToRow({ ...trade, revision: trade.revision + 1 });
      data.trades[idx] = next;
      return rowToTrade(next);
    });
  }

  async exchange(trade: Trade, now: number): Promise<ExchangeOutcome> {
    return this.db.atomicUpdate((data): ExchangeOutcome => {
      const idx = data.trades.findIndex((t) => t.id === trade.id);
      if (idx === -1 || data.trades[idx].revision !== trade.revision) {
        return { status: 'CONFLICT' };
      }

      const proposer = requireUser(data, trade.proposerId, trade.id);
      const counterparty = requireUser(data, trade.counterpartyId, trade.id);
      const counterOffer = trade.counterpartyOffer ?? [];

      const offered = new Set([...offeredCreatureIds(trade.proposerOffer), ...offeredCreatureIds(counterOffer)]);
      const creatures = new Map<string, Creature>();
      for (const row of data.creatures) {
        if (offered.has(row.id)) creatures.set(row.id, rowToCreature(row));
      }

      const problems = [
        ...findOfferProblems(trade.proposerOffer, rowToUser(proposer), creatures),
        ...findOfferProblems(counterOffer, rowToUser(counterparty), creatures),
      ];

      if (problems.length > 0) {
        const cancelled = tradeToRow({
          ...trade,
          status: 'CANCELLED',
          cancelReason: 'STALE_OFFER',
          completedAt: now,
          revision: trade.revision + 1,
        });
        data.trades[idx] = cancelled;
        return { status: 'STALE_OFFER', trade: rowToTrade(cancelled), problems };
      }

      transferOffer(data, trade.proposerOffer, proposer, counterparty);
      transferOffer(data, counterOffer, counterparty, proposer);
      proposer.revision += 1;
      counterparty.revision += 1;

      const confirmed = tradeToRow({
        ...trade,
        status: 'CONFIRMED',
        confirmations: { proposer: true, counterparty: true },
        completedAt: now,
        revision: trade.revision + 1,
      });
      data.trades[idx] = confirmed;
      return { status: 'CONFIRMED', trade: rowToTrade(confirmed) };
    });
  }

  /**
   * Mark every overdue open trade EXPIRED; returns how many changed
   */
  async expireOverdue(now: number): Promise<number> {
    const isOverdue = (t: { status: Trade['status']; expires_at: string }) =>
      !isTerminal(t.status) && now >= fromIso(t.expires_at, 'trades.expires_at');

    if (!this.db.getData().trades.some(isOverdue)) return 0;

    return this.db.atomicUpdate((data) => {
      let count = 0;
      for (const row of data.trades) {
        if (isOverdue(row)) {
          row.status = 'EXPIRED';
          row.completed_at = toIso(now);
          row.revision += 1;
          count++;
        }
      }
      return count;
    });
  }
}
