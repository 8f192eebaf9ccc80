import { describe, it, expect } from 'vitest';
import type { Adapter } from 'lowdb';
import {
  DatabaseConnection,
  MEMORY_PATH,
  openDatabase,
  type DatabaseSchema,
} from '@/infrastructure/database/lowdb/index.js';
import { StoreUnavailableError } from '@/utils/errors.js';

// Writes stay pending until the test settles them
class ControlledAdapter implements Adapter<DatabaseSchema> {
  pending: Array<{ data: DatabaseSchema; resolve: () => void; reject: (error: Error) => void }> = [];

  async read(): Promise<DatabaseSchema | null> {
    return null;
  }

  write(data: DatabaseSchema): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pending.push({ data, resolve, reject });
    });
  }
}

async function settled(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}

describe('DatabaseConnection', () => {
  it('bumps the version on each committed update', async () => {
    const db = await openDatabase({ path: MEMORY_PATH });
    const before = db.getVersion();

    const count = await db.atomicUpdate((data) => {
      data.users.push({
        id: 'u1',
        trainer_level: 1,
        experience: 0,
        coins: 0,
        daily_streak: 0,
        last_daily_claim_at: null,
        battles_won: 0,
        battles_lost: 0,
        creatures_caught: 0,
        active_team: [],
        inventory: {},
        created_at: new Date(0).toISOString(),
        revision: 1,
      });
      return data.users.length;
    });

    expect(count).toBe(1);
    expect(db.getVersion()).toBe(before + 1);
    expect(db.getData().users.map((u) => u.id)).toEqual(['u1']);
  });

  it('leaves the document untouched when the updater throws', async () => {
    const db = await openDatabase({ path: MEMORY_PATH });
    const before = db.getVersion();

    await expect(
      db.atomicUpdate((data) => {
        data.trades = [];
        data._lastCleanup = 'never';
        throw new Error('bad update');
      })
    ).rejects.toThrow('bad update');

    expect(db.getVersion()).toBe(before);
    expect(db.getLastCleanup()).toBeNull();
  });

  it('records the maintenance timestamp', async () => {
    const db = await openDatabase({ path: MEMORY_PATH });
    const at = new Date(Date.UTC(2024, 0, 1));

    await db.updateCleanupTimestamp(at);

    expect(db.getLastCleanup()).toEqual(at);
  });

  it('swaps in an update only after it is written', async () => {
    const adapter = new ControlledAdapter();
    const db = new DatabaseConnection({ path: MEMORY_PATH }, adapter);
    await db.init();

    const update = db.atomicUpdate((data) => {
      data._lastCleanup = new Date(0).toISOString();
    });
    await settled();

    expect(adapter.pending).toHaveLength(1);
    expect(db.getLastCleanup()).toBeNull();

    adapter.pending[0].resolve();
    await update;

    expect(db.getLastCleanup()).toEqual(new Date(0));
  });

  it('keeps a failed write out of later updates', async () => {
    const adapter = new ControlledAdapter();
    const db = new DatabaseConnection({ path: MEMORY_PATH }, adapter);
    await db.init();
    const before = db.getVersion();

    const failing = db.atomicUpdate((data) => {
      data._lastCleanup = 'lost';
    });
    const following = db.atomicUpdate((data) => data._lastCleanup ?? 'none');
    await settled();

    expect(adapter.pending).toHaveLength(1);
    adapter.pending[0].reject(new Error('disk full'));
    await expect(failing).rejects.toBeInstanceOf(StoreUnavailableError);
    await settled();

    expect(adapter.pending).toHaveLength(2);
    expect(adapter.pending[1].data._lastCleanup).toBeUndefined();
    adapter.pending[1].resolve();

    expect(await following).toBe('none');
    expect(db.getVersion()).toBe(before + 1);
  });
});
