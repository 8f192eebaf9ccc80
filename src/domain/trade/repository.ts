// Domain: Trade repository interface

import type { ExchangeOutcome, Trade } from './types.js';

export interface ITradeRepository {
  create(trade: Trade): Promise<Trade>;
  findById(id: string): Promise<Trade | null>;
  compareAndSwap(trade: Trade): Promise<Trade | null>;

  /**
   * Single transaction: re-validate both offers, move every asset and mark CONFIRMED,
   * or mark CANCELLED/STALE_OFFER and move nothing
   * `trade` must carry both confirmations and the revision it was read at
   */
  exchange(trade: Trade, now: number): Promise<ExchangeOutcome>;

  expireOverdue(now: number): Promise<number>;
}
