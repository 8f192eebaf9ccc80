// Domain: Spawn repository interface

import type { ClaimCommit, ClaimInput, Spawn } from './types.js';

export interface ISpawnRepository {
  create(spawn: Spawn): Promise<Spawn>;
  findById(id: string): Promise<Spawn | null>;

  /**
   * ACTIVE -> EXPIRED if the deadline has passed; returns the stored spawn either way
   */
  expireIfOverdue(id: string, now: number): Promise<Spawn | null>;

  /**
   * Single transaction: ACTIVE -> CAUGHT, insert creature, bump the claimant's catch count
   * Re-checks status and deadline inside the transaction
   */
  commitClaim(input: ClaimInput): Promise<ClaimCommit>;

  expireOverdue(now: number): Promise<number>;
}
