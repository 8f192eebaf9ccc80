// LowDB Repository exports

export { DatabaseConnection, openDatabase, MEMORY_PATH } from './connection.js';
export { DatabaseService } from './DatabaseService.js';
export { UserRepository } from './UserRepository.js';
export { CreatureRepository } from './CreatureRepository.js';
export { SpawnRepository } from './SpawnRepository.js';
export { BattleRepository } from './BattleRepository.js';
export { TradeRepository } from './TradeRepository.js';

export type { DatabaseConfig, DatabaseSchema } from './connection.js';
