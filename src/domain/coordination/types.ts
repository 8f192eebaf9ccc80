// Domain layer: Coordination store contract
// TTL-keyed cooldowns and mutual-exclusion locks shared by every worker

export interface ICoordinationStore {
  /**
   * Atomic set-if-absent with TTL; true when this caller created the key
   */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;

  get(key: string): Promise<string | null>;

  set(key: string, value: string, ttlMs: number): Promise<void>;

  /**
   * Remaining TTL in ms, or null when the key does not exist
   */
  remainingTtl(key: string): Promise<number | null>;

  /**
   * Atomic compare-and-delete, used to release a lock only by its holder
   */
  deleteIfEquals(key: string, value: string): Promise<boolean>;

  delete(key: string): Promise<void>;

  /**
   * Drop entries whose TTL has lapsed (only meaningful for in-process stores)
   */
  sweepExpired?(): Promise<number>;

  close?(): Promise<void>;
}
