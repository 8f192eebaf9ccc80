// Domain: Creature repository interface

import type { Creature } from './types.js';

export interface ICreatureRepository {
  findById(id: string): Promise<Creature | null>;
  findByIds(ids: readonly string[]): Promise<Creature[]>;
  listByOwner(ownerId: string): Promise<Creature[]>;

  /**
   * Conditional write keyed on `creature.revision`; null when it no longer matches
   */
  compareAndSwap(creature: Creature): Promise<Creature | null>;
}
