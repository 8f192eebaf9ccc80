// Spawn Repository - LowDB implementation
// Claim commit is one transaction over spawns, creatures and users

import type { DatabaseConnection } from './connection.js';
import type { ClaimCommit, ClaimInput, Spawn } from '@/domain/spawn/types.js';
import type { ISpawnRepository } from '@/domain/spawn/repository.js';
import type { NewUserDefaults } from '@/domain/user/types.js';
import { creatureToRow, newUserRow, rowToCreature, rowToSpawn, spawnToRow, toIso, fromIso } from './mappers.js';

export class SpawnRepository implements ISpawnRepository {
  constructor(
    private db: DatabaseConnection,
    private userDefaults: NewUserDefaults
  ) {}

  async create(spawn: Spawn): Promise<Spawn> {
    return this.db.atomicUpdate((data) => {
      const row = spawnToRow(spawn);
      data.spawns.push(row);
      return rowToSpawn(row);
    });
  }

  async findById(id: string): Promise<Spawn | null> {
    const row = this.db.getData().spawns.find((s) => s.id === id);
    return row ? rowToSpawn(row) : null;
  }

  async expireIfOverdue(id: string, now: number): Promise<Spawn | null> {
    const current = await this.findById(id);
    if (!current || current.status !== 'ACTIVE' || now < current.expiresAt) {
      return current;
    }

    return this.db.atomicUpdate((data) => {
      const row = data.spawns.find((s) => s.id === id);
      if (!row) return null;
      if (row.status === 'ACTIVE' && now >= fromIso(row.expires_at, 'spawns.expires_at')) {
        row.status = 'EXPIRED';
        row.revision += 1;
      }
      return rowToSpawn(row);
    });
  }

  async commitClaim(input: ClaimInput): Promise<ClaimCommit> {
    const { spawnId, userId, creature, now } = input;

    return this.db.atomicUpdate((data): ClaimCommit => {
      const row = data.spawns.find((s) => s.id === spawnId);
      if (!row) return { status: 'NOT_FOUND' };

      if (row.status === 'CAUGHT') {
        return { status: 'ALREADY_CAUGHT', spawn: rowToSpawn(row) };
      }
      if (row.status === 'EXPIRED') {
        return { status: 'EXPIRED', spawn: rowToSpawn(row) };
      }
      if (now >= fromIso(row.expires_at, 'spawns.expires_at')) {
        row.status = 'EXPIRED';
        row.revision += 1;
        return { status: 'EXPIRED', spawn: rowToSpawn(row) };
      }

      row.status = 'CAUGHT';
      row.caught_by = userId;
      row.caught_at = toIso(now);
      row.creature_id = creature.id;
      row.revision += 1;

      const creatureRow = creatureToRow(creature);
      data.creatures.push(creatureRow);

      let user = data.users.find((u) => u.id === userId);
      if (!user) {
        user = newUserRow(userId, undefined, this.userDefaults, now);
        data.users.push(user);
      }
      user.creatures_caught += 1;
      user.revision += 1;

      return { status: 'CAUGHT', spawn: rowToSpawn(row), creature: rowToCreature(creatureRow) };
    });
  }

  /**
   * Mark every overdue ACTIVE spawn EXPIRED; returns how many changed
   */
  async expireOverdue(now: number): Promise<number> {
    const isOverdue = (s: { status: string; expires_at: string }) =>
      s.status === 'ACTIVE' && now >= fromIso(s.expires_at, 'spawns.expires_at');

    if (!this.db.getData().spawns.some(isOverdue)) return 0;

    return this.db.atomicUpdate((data) => {
      let count = 0;
      for (const row of data.spawns) {
        if (isOverdue(row)) {
          row.status = 'EXPIRED';
          row.revision += 1;
          count++;
        }
      }
      return count;
    });
  }
}
