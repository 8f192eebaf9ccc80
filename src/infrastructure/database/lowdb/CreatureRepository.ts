// Creature Repository - LowDB implementation

import type { DatabaseConnection } from './connection.js';
import type { Creature } from '@/domain/creature/types.js';
import type { ICreatureRepository } from '@/domain/creature/repository.js';
import { creatureToRow, rowToCreature } from './mappers.js';

export class CreatureRepository implements ICreatureRepository {
  constructor(private db: DatabaseConnection) {}

  async findById(id: string): Promise<Creature | null> {
    const row = this.db.getData().creatures.find((c) => c.id === id);
    return row ? rowToCreature(row) : null;
  }

  /**
   * Creatures in the order requested; unknown ids are skipped
   */
  async findByIds(ids: readonly string[]): Promise<Creature[]> {
    const rows = this.db.getData().creatures;
    const found: Creature[] = [];
    for (const id of ids) {
      const row = rows.find((c) => c.id === id);
      if (row) found.push(rowToCreature(row));
    }
    return found;
  }

  /**
   * All creatures of a user, oldest catch first
   */
  async listByOwner(ownerId: string): Promise<Creature[]> {
    return this.db
      .getData()
      .creatures.filter((c) => c.owner_id === ownerId)
      .map((c) => rowToCreature(c))
      .sort((a, b) => a.createdAt - b.createdAt);
  }

  async compareAndSwap(creature: Creature): Promise<Creature | null> {
    return this.db.atomicUpdate((data) => {
      const idx = data.creatures.findIndex((c) => c.id === creature.id);
      if (idx === -1 || data.creatures[idx].revision !== creature.revision) return null;

      const next = creatureToRow({ ...creature, revision: creature.revision + 1 });
      data.creatures[idx] = next;
      return rowToCreature(next);
    });
  }
}
