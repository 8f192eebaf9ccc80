// Application: Trainer services
// Profile bootstrap, active team, daily reward, shop, nicknames and the leaderboard

import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import type { ICreatureRepository } from '@/domain/creature/repository.js';
import { MAX_NICKNAME_LENGTH, type Creature } from '@/domain/creature/types.js';
import type { Clock } from '@/domain/shared/clock.js';
import { invalidInput, notFound, succeed, type EngineResult } from '@/domain/shared/result.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import type { LeaderboardCategory, LeaderboardEntry, User } from '@/domain/user/types.js';
import { withOptimisticRetry } from '@/application/shared/optimistic.js';
import type { TrainerConfig } from '@/utils/config.js';
import { ENGINE_METRICS, engineMetrics, trainerLogger } from '@/utils/logger.js';

const DAY_MS = 86_400_000;
export const STREAK_BONUS_PER_DAY = 10;
export const STREAK_BONUS_CAP = 200;
export const MAX_PURCHASE_QUANTITY = 99;
export const MAX_LEADERBOARD_SIZE = 50;

export interface DailyReward {
  user: User;
  coins: number;
  streak: number;
}

export interface Purchase {
  user: User;
  itemCode: string;
  quantity: number;
  cost: number;
}

export function utcDay(ms: number): number {
  return Math.floor(ms / DAY_MS);
}

export class TrainerService {
  constructor(
    private users: IUserRepository,
    private creatures: ICreatureRepository,
    private catalog: ISpeciesCatalog,
    private config: TrainerConfig,
    private clock: Clock,
    private maxRetries: number
  ) {}

  async getOrCreateUser(userId: string, username?: string): Promise<User> {
    return this.users.getOrCreate(userId, username);
  }

  async getProfile(userId: string): Promise<EngineResult<User>> {
    const user = await this.users.findById(userId);
    return user ? succeed(user) : notFound('User not found', { userId });
  }

  async listCreatures(userId: string): Promise<EngineResult<Creature[]>> {
    const user = await this.users.findById(userId);
    if (!user) return notFound('User not found', { userId });
    return succeed(await this.creatures.listByOwner(userId));
  }

  /**
   * Replace the ordered active team
   */
  async setActiveTeam(userId: string, creatureIds: string[]): Promise<EngineResult<User>> {
    if (creatureIds.length > this.config.maxTeamSize) {
      return invalidInput('INVALID_TEAM', `A team holds at most ${this.config.maxTeamSize} creatures`, {
        size: creatureIds.length,
      });
    }
    if (new Set(creatureIds).size !== creatureIds.length) {
      return invalidInput('INVALID_TEAM', 'A creature can only appear once in a team');
    }

    const outcome = await this.users.setActiveTeam(userId, creatureIds);
    switch (outcome.status) {
      case 'UPDATED':
        trainerLogger.info('Active team updated', { userId, size: creatureIds.length });
        return succeed(outcome.user);
      case 'NOT_FOUND':
        return notFound('User not found', { userId });
      case 'NOT_OWNED':
        return invalidInput('INVALID_TEAM', 'Team includes creatures the user does not own', {
          creatureIds: outcome.creatureIds,
        });
    }
  }

  /**
   * Once per UTC day; consecutive days grow the streak bonus
   */
  async claimDailyReward(userId: string): Promise<EngineResult<DailyReward>> {
    const result = await withOptimisticRetry(
      this.maxRetries,
      async (): Promise<EngineResult<DailyReward> | null> => {
        const user = await this.users.findById(userId);
        if (!user) return notFound('User not found', { userId });

        const now = this.clock.now();
        const today = utcDay(now);
        const lastDay = user.lastDailyClaimAt === null ? null : utcDay(user.lastDailyClaimAt);
        if (lastDay === today) {
          return invalidInput('ALREADY_CLAIMED_TODAY', 'Daily reward already claimed', {
            nextClaimAt: (today + 1) * DAY_MS,
          });
        }

        const streak = lastDay === today - 1 ? user.dailyStreak + 1 : 1;
        const coins = this.config.dailyCoinsBase + Math.min(streak * STREAK_BONUS_PER_DAY, STREAK_BONUS_CAP);
        const saved = await this.users.compareAndSwap({
          ...user,
          coins: user.coins + coins,
          dailyStreak: streak,
          lastDailyClaimAt: now,
        });
        if (!saved) return null;

        return succeed({ user: saved, coins, streak });
      },
      (attempt) => trainerLogger.debug('Daily reward conflict, retrying', { userId, attempt })
    );

    if (result.ok) {
      engineMetrics.increment(ENGINE_METRICS.DAILY_CLAIMED);
      trainerLogger.info('Daily reward claimed', { userId, coins: result.value.coins, streak: result.value.streak });
    }
    return result;
  }

  /**
   * Buy catalog items with coins; balance and inventory change in one conditional write
   */
  async purchaseItem(userId: string, itemCode: string, quantity: number): Promise<EngineResult<Purchase>> {
    if (!Number.isInteger(quantity) || quantity < 1 || quantity > MAX_PURCHASE_QUANTITY) {
      return invalidInput('INVALID_QUANTITY', `Quantity must be a whole number from 1 to ${MAX_PURCHASE_QUANTITY}`, {
        quantity,
      });
    }
    const item = this.catalog.getItem(itemCode);
    if (!item) return notFound('Item not found', { itemCode });
    if (item.price === undefined) {
      return invalidInput('NOT_FOR_SALE', 'Item is not sold in the shop', { itemCode });
    }
    const cost = item.price * quantity;

    const result = await withOptimisticRetry(
      this.maxRetries,
      async (): Promise<EngineResult<Purchase> | null> => {
        const user = await this.users.findById(userId);
        if (!user) return notFound('User not found', { userId });
        if (user.coins < cost) {
          return invalidInput('INSUFFICIENT_COINS', 'Not enough coins', { cost, coins: user.coins });
        }

        const saved = await this.users.compareAndSwap({
          ...user,
          coins: user.coins - cost,
          inventory: { ...user.inventory, [itemCode]: (user.inventory[itemCode] ?? 0) + quantity },
        });
        if (!saved) return null;

        return succeed({ user: saved, itemCode, quantity, cost });
      },
      (attempt) => trainerLogger.debug('Purchase conflict, retrying', { userId, attempt })
    );

    if (result.ok) {
      engineMetrics.increment(ENGINE_METRICS.ITEM_PURCHASED);
      trainerLogger.info('Item purchased', { userId, itemCode, quantity, cost });
    }
    return result;
  }

  /**
   * Name an owned creature; an empty name clears it
   */
  async setNickname(userId: string, creatureId: string, nickname: string): Promise<EngineResult<Creature>> {
    const name = nickname.trim();
    if (name.length > MAX_NICKNAME_LENGTH) {
      return invalidInput('INVALID_NICKNAME', `Nicknames are at most ${MAX_NICKNAME_LENGTH} characters`, {
        length: name.length,
      });
    }

    return withOptimisticRetry(
      this.maxRetries,
      async (): Promise<EngineResult<Creature> | null> => {
        const creature = await this.creatures.findById(creatureId);
        if (!creature) return notFound('Creature not found', { creatureId });
        if (creature.ownerId !== userId) {
          return invalidInput('NOT_OWNER', 'Only the owner can rename a creature', { creatureId, userId });
        }

        const saved = await this.creatures.compareAndSwap({
          ...creature,
          nickname: name === '' ? undefined : name,
        });
        return saved ? succeed(saved) : null;
      },
      (attempt) => trainerLogger.debug('Nickname conflict, retrying', { creatureId, attempt })
    );
  }

  async getLeaderboard(category: LeaderboardCategory, limit = 10): Promise<EngineResult<LeaderboardEntry[]>> {
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LEADERBOARD_SIZE) {
      return invalidInput('INVALID_LIMIT', `Limit must be a whole number from 1 to ${MAX_LEADERBOARD_SIZE}`, { limit });
    }
    return succeed(await this.users.leaderboard(category, limit));
  }
}
