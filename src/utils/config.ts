// Utilities: Configuration management
// Pure functions, no external dependencies

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export interface StorageConfig {
  dbPath: string;                // ':memory:' selects the in-memory adapter
  redisUrl?: string;             // unset selects the in-process coordination store
  catalogPath?: string;          // unset loads data/catalog.json
}

export interface SpawnConfig {
  cooldownMs: number;
  expiryMs: number;
  claimCooldownMs: number;
  claimLockTtlMs: number;
  shinyChance: number;
  activitySpawnChance: number;
}

export interface ProgressionConfig {
  maxRetries: number;
}

export interface BattleConfig {
  timeoutMs: number;
  lockTtlMs: number;
  expPerLevel: number;
  winCoinsBase: number;
  aiTeamMaxSize: number;
}

export interface TradeConfig {
  timeoutMs: number;
}

export interface TrainerConfig {
  startingCoins: number;
  startingInventory: Record<string, number>;
  dailyCoinsBase: number;
  maxTeamSize: number;
}

export interface MaintenanceConfig {
  enabled: boolean;
  intervalMs: number;
}

export interface EngineConfig {
  spawn: SpawnConfig;
  progression: ProgressionConfig;
  battle: BattleConfig;
  trade: TradeConfig;
  trainer: TrainerConfig;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  engine: EngineConfig;
  maintenance: MaintenanceConfig;
  apiKey?: string;
}

function parseNodeEnv(value: string | undefined): ServerConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    host: env.HOST || 'localhost',
    nodeEnv: parseNodeEnv(env.NODE_ENV),
  };
}

export function buildStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  return {
    dbPath: env.DB_PATH || './data/engine.json',
    redisUrl: env.REDIS_URL || undefined,
    catalogPath: env.CATALOG_PATH || undefined,
  };
}

export function buildSpawnConfig(env: NodeJS.ProcessEnv = process.env): SpawnConfig {
  return {
    cooldownMs: parseInt(env.SPAWN_COOLDOWN_MS || '30000', 10),
    expiryMs: parseInt(env.SPAWN_EXPIRY_MS || '300000', 10),
    claimCooldownMs: parseInt(env.CLAIM_COOLDOWN_MS || '3000', 10),
    claimLockTtlMs: parseInt(env.CLAIM_LOCK_TTL_MS || '5000', 10),
    shinyChance: parseFloat(env.SHINY_CHANCE || '0.005'),
    activitySpawnChance: parseFloat(env.ACTIVITY_SPAWN_CHANCE || '0.05'),
  };
}

export function buildProgressionConfig(env: NodeJS.ProcessEnv = process.env): ProgressionConfig {
  return {
    maxRetries: parseInt(env.PROGRESSION_MAX_RETRIES || '5', 10),
  };
}

export function buildBattleConfig(env: NodeJS.ProcessEnv = process.env): BattleConfig {
  return {
    timeoutMs: parseInt(env.BATTLE_TIMEOUT_MS || '300000', 10),
    lockTtlMs: parseInt(env.BATTLE_LOCK_TTL_MS || '5000', 10),
    expPerLevel: parseInt(env.BATTLE_EXP_PER_LEVEL || '20', 10),
    winCoinsBase: parseInt(env.BATTLE_WIN_COINS_BASE || '100', 10),
    aiTeamMaxSize: parseInt(env.AI_TEAM_MAX_SIZE || '3', 10),
  };
}

export function buildTradeConfig(env: NodeJS.ProcessEnv = process.env): TradeConfig {
  return {
    timeoutMs: parseInt(env.TRADE_TIMEOUT_MS || '600000', 10),
  };
}

export function buildTrainerConfig(env: NodeJS.ProcessEnv = process.env): TrainerConfig {
  return {
    startingCoins: parseInt(env.STARTING_COINS || '1000', 10),
    startingInventory: { potion: 3 },
    dailyCoinsBase: parseInt(env.DAILY_COINS_BASE || '100', 10),
    maxTeamSize: parseInt(env.MAX_TEAM_SIZE || '6', 10),
  };
}

export function buildMaintenanceConfig(env: NodeJS.ProcessEnv = process.env): MaintenanceConfig {
  return {
    enabled: env.SWEEP_ENABLED !== 'false',
    intervalMs: parseInt(env.SWEEP_INTERVAL_MS || '60000', 10),
  };
}

export function buildEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    spawn: buildSpawnConfig(env),
    progression: buildProgressionConfig(env),
    battle: buildBattleConfig(env),
    trade: buildTradeConfig(env),
    trainer: buildTrainerConfig(env),
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    storage: buildStorageConfig(env),
    engine: buildEngineConfig(env),
    maintenance: buildMaintenanceConfig(env),
    apiKey: env.ENGINE_API_KEY || undefined,
  };
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isProbability(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}

// Validation
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];
  const { spawn, progression, battle, trade, trainer } = config.engine;

  if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  const durations: Array<[string, number]> = [
    ['SPAWN_COOLDOWN_MS', spawn.cooldownMs],
    ['SPAWN_EXPIRY_MS', spawn.expiryMs],
    ['CLAIM_COOLDOWN_MS', spawn.claimCooldownMs],
    ['CLAIM_LOCK_TTL_MS', spawn.claimLockTtlMs],
    ['BATTLE_TIMEOUT_MS', battle.timeoutMs],
    ['BATTLE_LOCK_TTL_MS', battle.lockTtlMs],
    ['TRADE_TIMEOUT_MS', trade.timeoutMs],
    ['SWEEP_INTERVAL_MS', config.maintenance.intervalMs],
  ];
  for (const [name, value] of durations) {
    if (!isPositiveInt(value)) errors.push(`${name} must be a positive integer`);
  }

  if (!isProbability(spawn.shinyChance)) {
    errors.push('SHINY_CHANCE must be between 0 and 1');
  }
  if (!isProbability(spawn.activitySpawnChance)) {
    errors.push('ACTIVITY_SPAWN_CHANCE must be between 0 and 1');
  }
  if (!isPositiveInt(progression.maxRetries)) {
    errors.push('PROGRESSION_MAX_RETRIES must be a positive integer');
  }
  if (!isPositiveInt(battle.expPerLevel) || !Number.isInteger(battle.winCoinsBase) || battle.winCoinsBase < 0) {
    errors.push('Battle rewards must be non-negative integers');
  }
  if (!isPositiveInt(battle.aiTeamMaxSize) || battle.aiTeamMaxSize > 6) {
    errors.push('AI_TEAM_MAX_SIZE must be between 1 and 6');
  }
  if (!Number.isInteger(trainer.startingCoins) || trainer.startingCoins < 0) {
    errors.push('STARTING_COINS must be a non-negative integer');
  }
  if (!Number.isInteger(trainer.dailyCoinsBase) || trainer.dailyCoinsBase < 0) {
    errors.push('DAILY_COINS_BASE must be a non-negative integer');
  }
  if (!isPositiveInt(trainer.maxTeamSize) || trainer.maxTeamSize > 6) {
    errors.push('MAX_TEAM_SIZE must be between 1 and 6');
  }

  return errors;
}
