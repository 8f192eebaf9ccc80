// Coordination store selection

import type { ICoordinationStore } from '@/domain/coordination/types.js';
import type { Clock } from '@/domain/shared/clock.js';
import type { StorageConfig } from '@/utils/config.js';
import { storeLogger } from '@/utils/logger.js';
import { MemoryCoordinationStore } from './MemoryCoordinationStore.js';
import { connectRedisCoordinationStore } from './RedisCoordinationStore.js';

export { MemoryCoordinationStore } from './MemoryCoordinationStore.js';
export { RedisCoordinationStore, redisCommands, COMPARE_AND_DELETE_SCRIPT } from './RedisCoordinationStore.js';
export type { RedisCommands, RedisClient } from './RedisCoordinationStore.js';

/**
 * Redis when REDIS_URL is set, otherwise the in-process store (single worker only)
 */
export async function createCoordinationStore(
  config: StorageConfig,
  clock?: Clock
): Promise<ICoordinationStore> {
  if (config.redisUrl) {
    return connectRedisCoordinationStore(config.redisUrl);
  }
  storeLogger.warn('REDIS_URL not set; using in-process coordination store');
  return new MemoryCoordinationStore(clock);
}
