// Utility: Structured logger and in-memory metrics
// One JSON line per event on stdout, tagged with the emitting component

export interface LogContext {
  [key: string]: string | number | boolean | null | undefined;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function thresholdFromEnv(): number {
  const configured = process.env.LOG_LEVEL;
  if (configured === 'debug' || configured === 'info' || configured === 'warn'
    || configured === 'error' || configured === 'silent') {
    return LEVEL_ORDER[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_ORDER.info : LEVEL_ORDER.debug;
}

/**
 * Structured logger for engine events
 */
export class EngineLogger {
  private prefix: string;

  constructor(prefix: string) {
    this.prefix = prefix;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < thresholdFromEnv()) return;

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.prefix,
      message,
      ...context,
    };

    const formatted = JSON.stringify(logEntry);
    if (level === 'error') {
      console.error(`[ENGINE] ${formatted}`);
    } else {
      console.log(`[ENGINE] ${formatted}`);
    }
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }
}

export const serverLogger = new EngineLogger('Server');
export const storeLogger = new EngineLogger('Store');
export const spawnLogger = new EngineLogger('Spawn');
export const progressionLogger = new EngineLogger('Progression');
export const battleLogger = new EngineLogger('Battle');
export const tradeLogger = new EngineLogger('Trade');
export const trainerLogger = new EngineLogger('Trainer');
export const maintenanceLogger = new EngineLogger('Maintenance');

/**
 * Metrics tracker (simple in-memory counter)
 * Reported by the health endpoint
 */
export class EngineMetrics {
  private counters: Map<string, number> = new Map();
  private gauges: Map<string, number> = new Map();

  increment(name: string, value = 1): void {
    const current = this.counters.get(name) || 0;
    this.counters.set(name, current + value);
  }

  setGauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  getCounter(name: string): number {
    return this.counters.get(name) || 0;
  }

  getGauge(name: string): number {
    return this.gauges.get(name) || 0;
  }

  getAll(): { counters: Record<string, number>; gauges: Record<string, number> } {
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
  }
}

export const engineMetrics = new EngineMetrics();

/**
 * Metric names constants
 */
export const ENGINE_METRICS = {
  // Counters
  SPAWN_CREATED: 'spawn.created',
  SPAWN_COOLDOWN_HIT: 'spawn.cooldown_hit',
  SPAWN_EXPIRED: 'spawn.expired',
  CLAIM_SUCCESS: 'claim.success',
  CLAIM_CONTENTION: 'claim.contention',
  CLAIM_EXPIRED: 'claim.expired',

  PROGRESSION_LEVEL_UP: 'progression.level_up',
  PROGRESSION_EVOLUTION: 'progression.evolution',
  PROGRESSION_CAS_CONFLICT: 'progression.cas_conflict',
  PROGRESSION_RETRY_EXHAUSTED: 'progression.retry_exhausted',

  BATTLE_STARTED: 'battle.started',
  BATTLE_TURN_RESOLVED: 'battle.turn_resolved',
  BATTLE_COMPLETED: 'battle.completed',
  BATTLE_TIMED_OUT: 'battle.timed_out',

  TRADE_PROPOSED: 'trade.proposed',
  TRADE_CONFIRMED: 'trade.confirmed',
  TRADE_STALE_OFFER: 'trade.stale_offer',
  TRADE_CANCELLED: 'trade.cancelled',
  TRADE_EXPIRED: 'trade.expired',

  DAILY_CLAIMED: 'trainer.daily_claimed',
  ITEM_PURCHASED: 'trainer.item_purchased',

  SWEEP_RUN: 'maintenance.sweep_run',

  // Gauges
  LAST_SWEEP_DURATION_MS: 'maintenance.last_sweep_ms',
} as const;
