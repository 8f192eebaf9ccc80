// User Repository - LowDB implementation
// Trainer profiles, balances and active teams

import type { DatabaseConnection, UserRecord } from './connection.js';
import type {
  LeaderboardCategory,
  LeaderboardEntry,
  NewUserDefaults,
  TeamUpdateOutcome,
  User,
} from '@/domain/user/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import { systemClock, type Clock } from '@/domain/shared/clock.js';
import { newUserRow, rowToUser, userToRow } from './mappers.js';

export class UserRepository implements IUserRepository {
  constructor(
    private db: DatabaseConnection,
    private defaults: NewUserDefaults,
    private clock: Clock = systemClock
  ) {}

  /**
   * Get user by ID
   */
  async findById(id: string): Promise<User | null> {
    const user = this.db.getData().users.find((u) => u.id === id);
    return user ? rowToUser(user) : null;
  }

  /**
   * Get user by ID, creating a fresh profile on first contact
   */
  async getOrCreate(id: string, username?: string): Promise<User> {
    const existing = await this.findById(id);
    if (existing) return existing;

    return this.db.atomicUpdate((data) => {
      let row = data.users.find((u) => u.id === id);
      if (!row) {
        row = newUserRow(id, username, this.defaults, this.clock.now());
        data.users.push(row);
      }
      return rowToUser(row);
    });
  }

  async compareAndSwap(user: User): Promise<User | null> {
    return this.db.atomicUpdate((data) => {
      const idx = data.users.findIndex((u) => u.id === user.id);
      if (idx === -1 || data.users[idx].revision !== user.revision) return null;

      const next = userToRow({ ...user, revision: user.revision + 1 });
      data.users[idx] = next;
      return rowToUser(next);
    });
  }

  /**
   * Replace the active team; creatures leaving or joining have their inTeam flag
   * flipped and their revision bumped in the same transaction
   */
  async setActiveTeam(userId: string, creatureIds: string[]): Promise<TeamUpdateOutcome> {
    return this.db.atomicUpdate((data): TeamUpdateOutcome => {
      const user = data.users.find((u) => u.id === userId);
      if (!user) return { status: 'NOT_FOUND' };

      const notOwned = creatureIds.filter((id) => {
        const creature = data.creatures.find((c) => c.id === id);
        return !creature || creature.owner_id !== userId;
      });
      if (notOwned.length > 0) return { status: 'NOT_OWNED', creatureIds: notOwned };

      const wanted = new Set(creatureIds);
      for (const creature of data.creatures) {
        if (creature.owner_id !== userId) continue;
        const inTeam = wanted.has(creature.id) ? 1 : 0;
        if (creature.in_team !== inTeam) {
          creature.in_team = inTeam;
          creature.revision += 1;
        }
      }

      user.active_team = [...creatureIds];
      user.revision += 1;
      return { status: 'UPDATED', user: rowToUser(user) };
    });
  }

  /**
   * Rank users; trainer level ties fall back to experience
   */
  async leaderboard(category: LeaderboardCategory, limit: number): Promise<LeaderboardEntry[]> {
    const data = this.db.getData();

    const owned = new Map<string, number>();
    if (category === 'CREATURES') {
      for (const creature of data.creatures) {
        owned.set(creature.owner_id, (owned.get(creature.owner_id) ?? 0) + 1);
      }
    }

    const score = (user: UserRecord): [number, number] => {
      switch (category) {
        case 'LEVEL':
          return [user.trainer_level, user.experience];
        case 'CREATURES':
          return [owned.get(user.id) ?? 0, 0];
        case 'WINS':
          return [user.battles_won, 0];
        case 'COINS':
          return [user.coins, 0];
      }
    };

    return data.users
      .map((user) => ({ user, score: score(user) }))
      .sort((a, b) =>
        b.score[0] - a.score[0]
        || b.score[1] - a.score[1]
        || (a.user.id < b.user.id ? -1 : a.user.id > b.user.id ? 1 : 0)
      )
      .slice(0, limit)
      .map(({ user, score }, i) => ({
        rank: i + 1,
        userId: user.id,
        username: user.username ?? undefined,
        value: score[0],
      }));
  }
}
