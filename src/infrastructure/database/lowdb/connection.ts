// LowDB connection and database instance management
// JSON document store for users, creatures, spawns, battles and trades

import { Low, Memory } from 'lowdb';
import type { Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import type { RarityTier } from '@/domain/catalog/types.js';
import type { Nature, StatBlock } from '@/domain/creature/types.js';
import type { SpawnStatus } from '@/domain/spawn/types.js';
import type {
  BattleAction,
  BattleKind,
  BattleLogEntry,
  BattleSides,
  BattleStatus,
  EndReason,
  ExperienceAward,
  SideId,
  TurnRecord,
} from '@/domain/battle/types.js';
import type { CancelReason, TradeOffer, TradeRole, TradeStatus } from '@/domain/trade/types.js';
import { StoreUnavailableError, describeError } from '@/utils/errors.js';
import { storeLogger } from '@/utils/logger.js';

// Database schema definition with version field for optimistic locking
export interface DatabaseSchema {
  _version: number;           // Version for optimistic locking (incremented on write)
  _lastCleanup?: string;      // Last maintenance sweep
  users: UserRecord[];
  creatures: CreatureRecord[];
  spawns: SpawnRecord[];
  battles: BattleRecord[];
  trades: TradeRecord[];
}

export interface UserRecord {
  id: string;
  username?: string | null;
  trainer_level: number;
  experience: number;
  coins: number;
  daily_streak: number;
  last_daily_claim_at: string | null;
  battles_won: number;
  battles_lost: number;
  creatures_caught: number;
  active_team: string[];
  inventory: Record<string, number>;
  created_at: string;
  revision: number;
}

export interface CreatureRecord {
  id: string;
  owner_id: string;
  species_code: string;
  level: number;
  experience: number;
  nature: Nature;
  is_shiny: number;
  rarity: RarityTier;
  stats: StatBlock;
  in_team: number;
  caught_in_chat_id?: string | null;
  nickname?: string | null;
  created_at: string;
  revision: number;
}

export interface SpawnRecord {
  id: string;
  chat_id: string;
  species_code: string;
  level: number;
  is_shiny: number;
  rarity: RarityTier;
  status: SpawnStatus;
  spawned_at: string;
  expires_at: string;
  caught_by?: string | null;
  caught_at?: string | null;
  creature_id?: string | null;
  revision: number;
}

export interface BattleRecord {
  id: string;
  kind: BattleKind;
  sides: BattleSides;
  initial_sides: BattleSides;
  turn: number;
  pending_actions: Partial<Record<SideId, BattleAction>>;
  turn_history: TurnRecord[];
  log: BattleLogEntry[];
  status: BattleStatus;
  winner: SideId | null;
  end_reason?: EndReason | null;
  seed: string;
  created_at: string;
  last_action_at: string;
  expires_at: string;
  completed_at?: string | null;
  experience_awards: ExperienceAward[];
  revision: number;
}

export interface TradeRecord {
  id: string;
  proposer_id: string;
  counterparty_id: string;
  proposer_offer: TradeOffer;
  counterparty_offer: TradeOffer | null;
  confirmations: Record<TradeRole, boolean>;
  status: TradeStatus;
  cancel_reason?: CancelReason | null;
  created_at: string;
  expires_at: string;
  completed_at?: string | null;
  revision: number;
}

function emptyData(): DatabaseSchema {
  return {
    _version: 1,
    users: [],
    creatures: [],
    spawns: [],
    battles: [],
    trades: [],
  };
}

// Database configuration
export interface DatabaseConfig {
  path: string;               // ':memory:' keeps everything in process
}

export const MEMORY_PATH = ':memory:';

/**
 * LowDB wrapper
 * The in-memory document is authoritative; disk is read once at init.
 * Every mutation goes through atomicUpdate. Updates run one at a time: each applies
 * its updater to a clone, writes the clone, and only then swaps it in, so readers
 * never see state that is not on disk yet.
 */
export class DatabaseConnection {
  private db: Low<DatabaseSchema>;
  private adapter: Adapter<DatabaseSchema>;
  private config: DatabaseConfig;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: DatabaseConfig, adapter?: Adapter<DatabaseSchema>) {
    this.config = config;
    this.adapter = adapter ?? this.createAdapter(config.path);
    this.db = new Low(this.adapter, emptyData());
  }

  private createAdapter(path: string): Adapter<DatabaseSchema> {
    if (path === MEMORY_PATH) {
      return new Memory<DatabaseSchema>();
    }
    mkdirSync(dirname(path), { recursive: true });
    return new JSONFile<DatabaseSchema>(path);
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    try {
      await this.db.read();
    } catch (error) {
      throw new StoreUnavailableError('Failed to read database', {
        path: this.config.path,
        cause: describeError(error),
      });
    }

    // Fill collections missing from older files
    const data = { ...emptyData(), ...this.db.data };
    if (typeof data._version !== 'number') {
      data._version = 1;
    }
    this.db.data = data;
  }

  /**
   * Get raw data
   * Callers must treat it as read-only and copy whatever they hand out
   */
  getData(): DatabaseSchema {
    return this.db.data;
  }

  /**
   * Write a document to the adapter
   */
  private async persist(data: DatabaseSchema): Promise<void> {
    try {
      await this.adapter.write(data);
    } catch (error) {
      throw new StoreUnavailableError('Failed to write database', {
        path: this.config.path,
        cause: describeError(error),
      });
    }
  }

  /**
   * Atomic update
   * The updater sees a private draft; if it or the write fails, the stored document is untouched
   */
  async atomicUpdate<T>(updater: (draft: DatabaseSchema) => T): Promise<T> {
    const run = this.queue.then(() => this.apply(updater));
    // The next update waits for this one whether or not it succeeds; the caller gets the outcome
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async apply<T>(updater: (draft: DatabaseSchema) => T): Promise<T> {
    const current = this.db.data;
    const draft = structuredClone(current);
    const result = updater(draft);
    draft._version = current._version + 1;

    try {
      await this.persist(draft);
    } catch (error) {
      storeLogger.error('Commit failed, state unchanged', {
        version: current._version,
        error: describeError(error),
      });
      throw error;
    }
    this.db.data = draft;
    return result;
  }

  /**
   * Get current version
   */
  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Record a maintenance sweep
   */
  async updateCleanupTimestamp(at: Date): Promise<void> {
    await this.atomicUpdate((data) => {
      data._lastCleanup = at.toISOString();
    });
  }

  /**
   * Get last cleanup timestamp
   */
  getLastCleanup(): Date | null {
    return this.db.data._lastCleanup ? new Date(this.db.data._lastCleanup) : null;
  }

  /**
   * Close once every queued update has settled
   */
  async close(): Promise<void> {
    await this.queue;
    await this.persist(this.db.data);
  }
}

/**
 * Open and read a connection
 */
export async function openDatabase(config: DatabaseConfig): Promise<DatabaseConnection> {
  const db = new DatabaseConnection(config);
  await db.init();
  return db;
}
