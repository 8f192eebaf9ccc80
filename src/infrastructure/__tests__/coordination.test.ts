import { describe, it, expect, vi } from 'vitest';
import { ManualClock } from '@/domain/shared/clock.js';
import { LockManager } from '@/application/coordination/LockManager.js';
import {
  COMPARE_AND_DELETE_SCRIPT,
  MemoryCoordinationStore,
  RedisCoordinationStore,
  type RedisCommands,
} from '@/infrastructure/coordination/index.js';
import { StoreUnavailableError } from '@/utils/errors.js';

describe('MemoryCoordinationStore', () => {
  it('creates a key only when absent and forgets it at the deadline', async () => {
    const clock = new ManualClock(1000);
    const store = new MemoryCoordinationStore(clock);

    expect(await store.setIfAbsent('cooldown:spawn:c1', '1', 500)).toBe(true);
    expect(await store.setIfAbsent('cooldown:spawn:c1', '2', 500)).toBe(false);
    expect(await store.remainingTtl('cooldown:spawn:c1')).toBe(500);

    clock.advance(200);
    expect(await store.get('cooldown:spawn:c1')).toBe('1');
    expect(await store.remainingTtl('cooldown:spawn:c1')).toBe(300);

    clock.advance(300);
    expect(await store.get('cooldown:spawn:c1')).toBeNull();
    expect(await store.remainingTtl('cooldown:spawn:c1')).toBeNull();
    expect(await store.setIfAbsent('cooldown:spawn:c1', '3', 500)).toBe(true);
  });

  it('deletes only on a matching value', async () => {
    const store = new MemoryCoordinationStore(new ManualClock(0));
    await store.set('lock:battle:b1', 'token-a', 1000);

    expect(await store.deleteIfEquals('lock:battle:b1', 'token-b')).toBe(false);
    expect(await store.deleteIfEquals('lock:battle:b1', 'token-a')).toBe(true);
    expect(await store.get('lock:battle:b1')).toBeNull();
  });

  it('sweeps lapsed entries', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryCoordinationStore(clock);
    await store.set('a', '1', 100);
    await store.set('b', '1', 1000);

    clock.advance(100);

    expect(await store.sweepExpired()).toBe(1);
    expect(store.size()).toBe(1);
  });
});

function fakeCommands(overrides: Partial<RedisCommands> = {}): RedisCommands {
  return {
    setNxPx: vi.fn(async () => 'OK'),
    setPx: vi.fn(async () => 'OK'),
    get: vi.fn(async () => null),
    pTtl: vi.fn(async () => -2),
    del: vi.fn(async () => 1),
    evalScript: vi.fn(async () => 1),
    quit: vi.fn(async () => 'OK'),
    ...overrides,
  };
}

describe('RedisCoordinationStore', () => {
  it('reads SET NX replies', async () => {
    const taken = new RedisCoordinationStore(fakeCommands());
    const held = new RedisCoordinationStore(fakeCommands({ setNxPx: async () => null }));

    expect(await taken.setIfAbsent('k', 'v', 100)).toBe(true);
    expect(await held.setIfAbsent('k', 'v', 100)).toBe(false);
  });

  it('maps PTTL replies', async () => {
    expect(await new RedisCoordinationStore(fakeCommands({ pTtl: async () => -2 })).remainingTtl('k')).toBeNull();
    expect(await new RedisCoordinationStore(fakeCommands({ pTtl: async () => -1 })).remainingTtl('k')).toBe(
      Number.POSITIVE_INFINITY
    );
    expect(await new RedisCoordinationStore(fakeCommands({ pTtl: async () => 4200 })).remainingTtl('k')).toBe(4200);
  });

  it('releases through the compare-and-delete script', async () => {
    const commands = fakeCommands();
    const store = new RedisCoordinationStore(commands);

    expect(await store.deleteIfEquals('lock:spawn:s1', 'token')).toBe(true);
    expect(commands.evalScript).toHaveBeenCalledWith(COMPARE_AND_DELETE_SCRIPT, ['lock:spawn:s1'], ['token']);
  });

  it('wraps command failures', async () => {
    const store = new RedisCoordinationStore(
      fakeCommands({
        get: async () => {
          throw new Error('connection reset');
        },
      })
    );

    await expect(store.get('k')).rejects.toBeInstanceOf(StoreUnavailableError);
  });
});

describe('LockManager', () => {
  it('runs the task and releases the lock', async () => {
    const store = new MemoryCoordinationStore(new ManualClock(0));
    const locks = new LockManager(store);

    const outcome = await locks.withLock('lock:spawn:s1', 1000, async () => 'caught');

    expect(outcome).toEqual({ acquired: true, value: 'caught' });
    expect(await store.get('lock:spawn:s1')).toBeNull();
  });

  it('turns a second holder away without running its task', async () => {
    const store = new MemoryCoordinationStore(new ManualClock(0));
    const locks = new LockManager(store);
    const second = vi.fn(async () => 'second');

    const outcome = await locks.withLock('lock:spawn:s1', 1000, async () => {
      return locks.withLock('lock:spawn:s1', 1000, second);
    });

    expect(outcome).toEqual({ acquired: true, value: { acquired: false } });
    expect(second).not.toHaveBeenCalled();
  });

  it('releases the lock when the task throws', async () => {
    const store = new MemoryCoordinationStore(new ManualClock(0));
    const locks = new LockManager(store);

    await expect(
      locks.withLock('lock:battle:b1', 1000, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(await store.get('lock:battle:b1')).toBeNull();
  });
});
