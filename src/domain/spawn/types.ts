// Domain layer: Spawn types

import type { RarityTier } from '@/domain/catalog/types.js';
import type { Creature } from '@/domain/creature/types.js';

export type SpawnStatus = 'ACTIVE' | 'CAUGHT' | 'EXPIRED';

/**
 * A wild creature appearance in a chat room
 * ACTIVE moves to exactly one of CAUGHT or EXPIRED, both terminal
 */
export interface Spawn {
  id: string;
  chatId: string;
  speciesCode: string;
  level: number;
  isShiny: boolean;
  rarity: RarityTier;
  status: SpawnStatus;
  spawnedAt: number;
  expiresAt: number;
  caughtBy?: string;
  caughtAt?: number;
  creatureId?: string;
  revision: number;
}

export function isPastDeadline(spawn: Pick<Spawn, 'expiresAt'>, now: number): boolean {
  return now >= spawn.expiresAt;
}

export type TriggerSpawnOutcome =
  | { status: 'SPAWNED'; spawn: Spawn }
  | { status: 'ON_COOLDOWN'; retryAfterMs: number };

export type ActivityOutcome = TriggerSpawnOutcome | { status: 'SKIPPED' };

export interface ClaimInput {
  spawnId: string;
  userId: string;
  creature: Creature;
  now: number;
}

export type ClaimCommit =
  | { status: 'CAUGHT'; spawn: Spawn; creature: Creature }
  | { status: 'ALREADY_CAUGHT'; spawn: Spawn }
  | { status: 'EXPIRED'; spawn: Spawn }
  | { status: 'NOT_FOUND' };

export interface ClaimSuccess {
  spawn: Spawn;
  creature: Creature;
  trainerExperience: number;
}
