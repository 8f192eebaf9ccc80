// Infrastructure: Redis-backed coordination store
// SET NX PX for cooldowns and locks, a Lua compare-and-delete for release

import { createClient } from 'redis';
import type { ICoordinationStore } from '@/domain/coordination/types.js';
import { StoreUnavailableError, describeError } from '@/utils/errors.js';
import { storeLogger } from '@/utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * The handful of commands the store issues
 * Replies are narrowed by the store, so fakes only have to mimic redis replies
 */
export interface RedisCommands {
  setNxPx(key: string, value: string, ttlMs: number): Promise<unknown>;
  setPx(key: string, value: string, ttlMs: number): Promise<unknown>;
  get(key: string): Promise<unknown>;
  pTtl(key: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  evalScript(script: string, keys: string[], args: string[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

export const COMPARE_AND_DELETE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export function redisCommands(client: RedisClient): RedisCommands {
  return {
    setNxPx: (key, value, ttlMs) => client.set(key, value, { NX: true, PX: ttlMs }),
    setPx: (key, value, ttlMs) => client.set(key, value, { PX: ttlMs }),
    get: (key) => client.get(key),
    pTtl: (key) => client.pTTL(key),
    del: (key) => client.del(key),
    evalScript: (script, keys, args) => client.eval(script, { keys, arguments: args }),
    quit: () => client.quit(),
  };
}

export class RedisCoordinationStore implements ICoordinationStore {
  constructor(private commands: RedisCommands) {}

  private async run<T>(operation: string, key: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new StoreUnavailableError(`Coordination store ${operation} failed`, {
        key,
        cause: describeError(error),
      });
    }
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await this.run('setIfAbsent', key, () => this.commands.setNxPx(key, value, ttlMs));
    return reply === 'OK';
  }

  async get(key: string): Promise<string | null> {
    const reply = await this.run('get', key, () => this.commands.get(key));
    return typeof reply === 'string' ? reply : null;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    await this.run('set', key, () => this.commands.setPx(key, value, ttlMs));
  }

  /**
   * PTTL replies -2 for a missing key and -1 for a key without expiry
   */
  async remainingTtl(key: string): Promise<number | null> {
    const reply = await this.run('remainingTtl', key, () => this.commands.pTtl(key));
    if (typeof reply !== 'number' || reply === -2) return null;
    return reply === -1 ? Number.POSITIVE_INFINITY : reply;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const reply = await this.run('deleteIfEquals', key, () =>
      this.commands.evalScript(COMPARE_AND_DELETE_SCRIPT, [key], [value])
    );
    return reply === 1;
  }

  async delete(key: string): Promise<void> {
    await this.run('delete', key, () => this.commands.del(key));
  }

  async close(): Promise<void> {
    await this.commands.quit();
  }
}

/**
 * Connect to redis and wrap the client
 */
export async function connectRedisCoordinationStore(url: string): Promise<RedisCoordinationStore> {
  const client = createClient({ url });
  client.on('error', (error: unknown) => {
    storeLogger.error('Redis client error', { error: describeError(error) });
  });

  try {
    await client.connect();
  } catch (error) {
    throw new StoreUnavailableError('Failed to connect to redis', { cause: describeError(error) });
  }

  storeLogger.info('Coordination store connected to redis');
  return new RedisCoordinationStore(redisCommands(client));
}
