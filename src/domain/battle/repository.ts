// Domain: Battle repository interface

import type { Battle, BattleSettlement, CreateBattleOutcome } from './types.js';

export interface IBattleRepository {
  /**
   * Insert unless a human participant already has an IN_PROGRESS battle, withdrawing
   * each player's bag from their inventory
   * The check, the withdrawal and the insert are one transaction
   */
  createIfIdle(battle: Battle): Promise<CreateBattleOutcome>;

  findById(id: string): Promise<Battle | null>;

  findInProgressForUser(userId: string): Promise<Battle | null>;

  compareAndSwap(battle: Battle): Promise<Battle | null>;

  /**
   * Write a COMPLETE battle (revision-checked) and apply user stats and coins, and return unused bag items
   */
  settle(battle: Battle, settlement: BattleSettlement): Promise<Battle | null>;

  listOverdue(now: number): Promise<Battle[]>;
}
