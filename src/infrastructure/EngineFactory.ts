// Infrastructure: Engine composition
// Wires repositories, stores and engines from one AppConfig

import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import type { ICoordinationStore } from '@/domain/coordination/types.js';
import { systemClock, type Clock } from '@/domain/shared/clock.js';
import type { RandomSource, SeededRandomFactory } from '@/domain/shared/random.js';
import { BattleEngine } from '@/application/battle/BattleEngine.js';
import { LockManager } from '@/application/coordination/LockManager.js';
import { ProgressionEngine } from '@/application/progression/ProgressionEngine.js';
import { SpawnEngine } from '@/application/spawn/SpawnEngine.js';
import { TradeEngine } from '@/application/trade/TradeEngine.js';
import { TrainerService } from '@/application/trainer/TrainerService.js';
import type { AppConfig } from '@/utils/config.js';
import { loadCatalog } from './catalog/SpeciesCatalog.js';
import { createCoordinationStore } from './coordination/index.js';
import { DatabaseService, openDatabase, type DatabaseConnection } from './database/lowdb/index.js';
import { MaintenanceJob } from './jobs/MaintenanceJob.js';
import { MathRandomSource, seededRandom as defaultSeededRandom } from './random/RandomSource.js';

export interface EngineServices {
  config: AppConfig;
  database: DatabaseService;
  catalog: ISpeciesCatalog;
  coordination: ICoordinationStore;
  clock: Clock;
  progression: ProgressionEngine;
  spawns: SpawnEngine;
  battles: BattleEngine;
  trades: TradeEngine;
  trainers: TrainerService;
  maintenance: MaintenanceJob;
  close(): Promise<void>;
}

export interface EngineOverrides {
  db?: DatabaseConnection;
  catalog?: ISpeciesCatalog;
  coordination?: ICoordinationStore;
  clock?: Clock;
  random?: RandomSource;
  seededRandom?: SeededRandomFactory;
}

export async function createEngineServices(
  config: AppConfig,
  overrides: EngineOverrides = {}
): Promise<EngineServices> {
  const clock = overrides.clock ?? systemClock;
  const { engine } = config;

  const db = overrides.db ?? (await openDatabase({ path: config.storage.dbPath }));
  const database = new DatabaseService(db, engine.trainer, clock);
  const catalog = overrides.catalog ?? (await loadCatalog(config.storage.catalogPath));
  const coordination = overrides.coordination ?? (await createCoordinationStore(config.storage, clock));
  const locks = new LockManager(coordination);

  const progression = new ProgressionEngine(database.creatures, database.users, catalog, engine.progression);

  const spawns = new SpawnEngine({
    spawns: database.spawns,
    coordination,
    locks,
    catalog,
    progression,
    random: overrides.random ?? new MathRandomSource(),
    clock,
    config: engine.spawn,
  });

  const battles = new BattleEngine({
    battles: database.battles,
    users: database.users,
    creatures: database.creatures,
    catalog,
    progression,
    locks,
    seededRandom: overrides.seededRandom ?? defaultSeededRandom,
    clock,
    config: engine.battle,
  });

  const trades = new TradeEngine({
    trades: database.trades,
    users: database.users,
    creatures: database.creatures,
    catalog,
    clock,
    config: engine.trade,
    maxRetries: engine.progression.maxRetries,
  });

  const trainers = new TrainerService(
    database.users,
    database.creatures,
    catalog,
    engine.trainer,
    clock,
    engine.progression.maxRetries
  );

  const maintenance = new MaintenanceJob(
    {
      spawns: () => spawns.expireOverdue(),
      trades: () => trades.expireOverdue(),
      battles: () => battles.timeoutOverdue(),
      coordination: () => coordination.sweepExpired?.() ?? Promise.resolve(0),
      onComplete: (at) => db.updateCleanupTimestamp(at),
    },
    config.maintenance
  );

  return {
    config,
    database,
    catalog,
    coordination,
    clock,
    progression,
    spawns,
    battles,
    trades,
    trainers,
    maintenance,
    async close() {
      maintenance.stop();
      await coordination.close?.();
      await db.close();
    },
  };
}
