// Database Service - Main entry point for LowDB database operations
// Groups the repositories that share one connection

import type { DatabaseConnection } from './connection.js';
import type { NewUserDefaults } from '@/domain/user/types.js';
import type { Clock } from '@/domain/shared/clock.js';
import { BattleRepository } from './BattleRepository.js';
import { CreatureRepository } from './CreatureRepository.js';
import { SpawnRepository } from './SpawnRepository.js';
import { TradeRepository } from './TradeRepository.js';
import { UserRepository } from './UserRepository.js';

export class DatabaseService {
  // Repositories
  public readonly users: UserRepository;
  public readonly creatures: CreatureRepository;
  public readonly spawns: SpawnRepository;
  public readonly battles: BattleRepository;
  public readonly trades: TradeRepository;

  constructor(
    public readonly connection: DatabaseConnection,
    userDefaults: NewUserDefaults,
    clock?: Clock
  ) {
    this.users = new UserRepository(connection, userDefaults, clock);
    this.creatures = new CreatureRepository(connection);
    this.spawns = new SpawnRepository(connection, userDefaults);
    this.battles = new BattleRepository(connection);
    this.trades = new TradeRepository(connection);
  }

  /**
   * Get database statistics
   */
  getStats(): Record<string, number> {
    const data = this.connection.getData();
    return {
      users: data.users.length,
      creatures: data.creatures.length,
      spawns: data.spawns.length,
      battles: data.battles.length,
      trades: data.trades.length,
      version: data._version,
    };
  }
}

export default DatabaseService;
