// Application: Trade Engine
// Two-party escrow; the exchange itself is a single store transaction

import { v4 as uuidv4 } from 'uuid';
import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import type { ICreatureRepository } from '@/domain/creature/repository.js';
import type { Creature } from '@/domain/creature/types.js';
import type { Clock } from '@/domain/shared/clock.js';
import {
  invalidInput,
  notFound,
  staleState,
  succeed,
  type EngineResult,
} from '@/domain/shared/result.js';
import { describeMalformedOffer, findOfferProblems, offeredCreatureIds } from '@/domain/trade/offers.js';
import type { ITradeRepository } from '@/domain/trade/repository.js';
import { isTerminal, roleOf, type Trade, type TradeOffer } from '@/domain/trade/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import { withOptimisticRetry } from '@/application/shared/optimistic.js';
import type { TradeConfig } from '@/utils/config.js';
import { ENGINE_METRICS, engineMetrics, tradeLogger } from '@/utils/logger.js';

export interface TradeEngineDeps {
  trades: ITradeRepository;
  users: IUserRepository;
  creatures: ICreatureRepository;
  catalog: ISpeciesCatalog;
  clock: Clock;
  config: TradeConfig;
  maxRetries: number;
}

// An attempt yields null when a conditional write lost a race
type Attempt<T> = Promise<EngineResult<T> | null>;

export class TradeEngine {
  constructor(private deps: TradeEngineDeps) {}

  private onConflict = (attempt: number): void => {
    tradeLogger.debug('Trade revision conflict, retrying', { attempt });
  };

  /**
   * Check shape, item codes and current ownership of an offer
   */
  private async validateOffer(ownerId: string, offer: TradeOffer, allowEmpty: boolean): Promise<EngineResult<void>> {
    const malformed = describeMalformedOffer(offer, allowEmpty);
    for (const asset of offer) {
      if (asset.type === 'ITEM' && !this.deps.catalog.getItem(asset.itemCode)) {
        malformed.push(`Unknown item ${asset.itemCode}`);
      }
    }
    if (malformed.length > 0) {
      return invalidInput('INVALID_OFFER', 'Offer is malformed', { errors: malformed });
    }

    const owner = await this.deps.users.findById(ownerId);
    if (!owner) return notFound('User not found', { userId: ownerId });

    const found = await this.deps.creatures.findByIds(offeredCreatureIds(offer));
    const creatures = new Map<string, Creature>(found.map((c) => [c.id, c]));
    const problems = findOfferProblems(offer, owner, creatures);
    if (problems.length > 0) {
      return invalidInput('INVALID_OFFER', 'Offer includes assets the user does not hold', { problems });
    }
    return succeed(undefined);
  }

  /**
   * Open a trade with an initial offer
   */
  async propose(proposerId: string, counterpartyId: string, offer: TradeOffer): Promise<EngineResult<Trade>> {
    if (proposerId === counterpartyId) {
      return invalidInput('SELF_TRADE', 'Cannot trade with yourself');
    }

    const valid = await this.validateOffer(proposerId, offer, false);
    if (!valid.ok) return valid;

    // The exchange needs a record on both sides
    await this.deps.users.getOrCreate(counterpartyId);

    const now = this.deps.clock.now();
    const trade = await this.deps.trades.create({
      id: uuidv4(),
      proposerId,
      counterpartyId,
      proposerOffer: structuredClone(offer),
      counterpartyOffer: null,
      confirmations: { proposer: false, counterparty: false },
      status: 'PROPOSED',
      createdAt: now,
      expiresAt: now + this.deps.config.timeoutMs,
      revision: 1,
    });

    engineMetrics.increment(ENGINE_METRICS.TRADE_PROPOSED);
    tradeLogger.info('Trade proposed', { tradeId: trade.id, proposerId, counterpartyId, assets: offer.length });
    return succeed(trade);
  }

  /**
   * Load a trade and persist EXPIRED if it is overdue
   * Returns null when the expiry write lost a race
   */
  private async loadOpen(tradeId: string): Attempt<Trade> {
    const trade = await this.deps.trades.findById(tradeId);
    if (!trade) return notFound('Trade not found', { tradeId });
    if (trade.status === 'EXPIRED') return staleState('EXPIRED', 'Trade has expired', { tradeId });

    const now = this.deps.clock.now();
    if (isTerminal(trade.status) || now < trade.expiresAt) return succeed(trade);

    const expired = await this.deps.trades.compareAndSwap({ ...trade, status: 'EXPIRED', completedAt: now });
    if (!expired) return null;

    engineMetrics.increment(ENGINE_METRICS.TRADE_EXPIRED);
    tradeLogger.info('Trade expired', { tradeId });
    return staleState('EXPIRED', 'Trade has expired', { tradeId });
  }

  async getTrade(tradeId: string): Promise<EngineResult<Trade>> {
    return withOptimisticRetry(this.deps.maxRetries, () => this.loadOpen(tradeId), this.onConflict);
  }

  /**
   * Counterparty's side of the deal; replaces any earlier counter offer
   */
  async addCounterOffer(tradeId: string, userId: string, offer: TradeOffer): Promise<EngineResult<Trade>> {
    return withOptimisticRetry(
      this.deps.maxRetries,
      async (): Attempt<Trade> => {
        const loaded = await this.loadOpen(tradeId);
        if (!loaded || !loaded.ok) return loaded;
        const trade = loaded.value;

        if (trade.counterpartyId !== userId) {
          return invalidInput('NOT_PARTICIPANT', 'Only the counterparty may counter', { tradeId, userId });
        }
        if (isTerminal(trade.status)) {
          return staleState('TRADE_CLOSED', 'Trade is closed', { tradeId, status: trade.status });
        }

        const valid = await this.validateOffer(userId, offer, true);
        if (!valid.ok) return valid;

        const saved = await this.deps.trades.compareAndSwap({
          ...trade,
          counterpartyOffer: structuredClone(offer),
          confirmations: { proposer: false, counterparty: false },
          status: 'PARTIALLY_CONFIRMED',
        });
        if (!saved) return null;

        tradeLogger.info('Counter offer made', { tradeId, userId, assets: offer.length });
        return succeed(saved);
      },
      this.onConflict
    );
  }

  /**
   * Confirm the current terms; the second confirmation performs the exchange
   */
  async confirm(tradeId: string, userId: string): Promise<EngineResult<Trade>> {
    return withOptimisticRetry(
      this.deps.maxRetries,
      async (): Attempt<Trade> => {
        const loaded = await this.loadOpen(tradeId);
        if (!loaded || !loaded.ok) return loaded;
        const trade = loaded.value;

        const role = roleOf(trade, userId);
        if (!role) return invalidInput('NOT_PARTICIPANT', 'Not a party to this trade', { tradeId, userId });

        switch (trade.status) {
          case 'CONFIRMED':
            return succeed(trade);
          case 'PROPOSED':
            return invalidInput('TRADE_NOT_READY', 'Waiting for a counter offer', { tradeId });
          case 'CANCELLED':
          case 'EXPIRED':
            return staleState('TRADE_CLOSED', 'Trade is closed', { tradeId, status: trade.status });
          case 'PARTIALLY_CONFIRMED':
            break;
        }

        if (trade.confirmations[role]) return succeed(trade);

        const confirmations = { ...trade.confirmations, [role]: true };
        if (!confirmations.proposer || !confirmations.counterparty) {
          const saved = await this.deps.trades.compareAndSwap({ ...trade, confirmations });
          if (!saved) return null;
          tradeLogger.debug('Trade confirmed by one party', { tradeId, role });
          return succeed(saved);
        }

        const exchanged = await this.deps.trades.exchange({ ...trade, confirmations }, this.deps.clock.now());
        switch (exchanged.status) {
          case 'CONFLICT':
            return null;
          case 'STALE_OFFER':
            engineMetrics.increment(ENGINE_METRICS.TRADE_STALE_OFFER);
            tradeLogger.warn('Trade cancelled on stale offer', { tradeId, problems: exchanged.problems.length });
            return staleState('STALE_OFFER', 'An offered asset is no longer held', {
              tradeId,
              problems: exchanged.problems,
            });
          case 'CONFIRMED':
            engineMetrics.increment(ENGINE_METRICS.TRADE_CONFIRMED);
            tradeLogger.info('Trade completed', { tradeId });
            return succeed(exchanged.trade);
        }
      },
      this.onConflict
    );
  }

  /**
   * Either party may cancel an open trade
   */
  async cancel(tradeId: string, userId: string): Promise<EngineResult<Trade>> {
    return withOptimisticRetry(
      this.deps.maxRetries,
      async (): Attempt<Trade> => {
        const loaded = await this.loadOpen(tradeId);
        if (!loaded || !loaded.ok) return loaded;
        const trade = loaded.value;

        if (!roleOf(trade, userId)) {
          return invalidInput('NOT_PARTICIPANT', 'Not a party to this trade', { tradeId, userId });
        }
        if (isTerminal(trade.status)) {
          return staleState('TRADE_CLOSED', 'Trade is closed', { tradeId, status: trade.status });
        }

        const saved = await this.deps.trades.compareAndSwap({
          ...trade,
          status: 'CANCELLED',
          cancelReason: 'BY_USER',
          completedAt: this.deps.clock.now(),
        });
        if (!saved) return null;

        engineMetrics.increment(ENGINE_METRICS.TRADE_CANCELLED);
        tradeLogger.info('Trade cancelled', { tradeId, userId });
        return succeed(saved);
      },
      this.onConflict
    );
  }

  /**
   * Sweep entry point
   */
  async expireOverdue(): Promise<number> {
    const count = await this.deps.trades.expireOverdue(this.deps.clock.now());
    if (count > 0) engineMetrics.increment(ENGINE_METRICS.TRADE_EXPIRED, count);
    return count;
  }
}
