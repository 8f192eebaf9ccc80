// Application: Mutual exclusion over the coordination store
// Locks are short-TTL and released only by the token that took them

import { v4 as uuidv4 } from 'uuid';
import type { ICoordinationStore } from '@/domain/coordination/types.js';
import { describeError } from '@/utils/errors.js';
import { EngineLogger } from '@/utils/logger.js';

const lockLogger = new EngineLogger('Lock');

export type LockOutcome<T> = { acquired: true; value: T } | { acquired: false };

export class LockManager {
  constructor(private store: ICoordinationStore) {}

  /**
   * Run `task` while holding `key`; returns { acquired: false } without waiting if it is held
   * A failed release is logged and left to the TTL
   */
  async withLock<T>(key: string, ttlMs: number, task: () => Promise<T>): Promise<LockOutcome<T>> {
    const token = uuidv4();
    const acquired = await this.store.setIfAbsent(key, token, ttlMs);
    if (!acquired) {
      lockLogger.debug('Lock busy', { key });
      return { acquired: false };
    }

    try {
      return { acquired: true, value: await task() };
    } finally {
      await this.release(key, token);
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      const released = await this.store.deleteIfEquals(key, token);
      if (!released) {
        lockLogger.warn('Lock expired before release', { key });
      }
    } catch (error) {
      lockLogger.error('Lock release failed', { key, error: describeError(error) });
    }
  }
}
