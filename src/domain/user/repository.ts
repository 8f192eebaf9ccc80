// Domain: User repository interface
// Defines the contract for user data persistence

import type { LeaderboardCategory, LeaderboardEntry, TeamUpdateOutcome, User } from './types.js';

/**
 * Repository interface for User persistence
 * Implemented by infrastructure layer (LowDB)
 */
export interface IUserRepository {
  findById(id: string): Promise<User | null>;
  getOrCreate(id: string, username?: string): Promise<User>;

  /**
   * Replace the stored user if its revision still equals `user.revision`
   * Returns the stored user (revision + 1), or null on a revision mismatch
   */
  compareAndSwap(user: User): Promise<User | null>;

  /**
   * Atomically replace the active team and the inTeam flags of affected creatures
   */
  setActiveTeam(userId: string, creatureIds: string[]): Promise<TeamUpdateOutcome>;

  /**
   * Top `limit` users for a category, highest first; ties go to the lower user id
   */
  leaderboard(category: LeaderboardCategory, limit: number): Promise<LeaderboardEntry[]>;
}
