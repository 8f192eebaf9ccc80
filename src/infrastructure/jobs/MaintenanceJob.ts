// Infrastructure: Maintenance Job
// Periodic safety-net sweep; every expiry is also applied lazily on access

import type { MaintenanceConfig } from '@/utils/config.js';
import { describeError } from '@/utils/errors.js';
import { ENGINE_METRICS, engineMetrics, maintenanceLogger } from '@/utils/logger.js';

/**
 * One sweep step; resolves to how many records or keys it changed
 */
export type SweepTask = () => Promise<number>;

export interface SweepTargets {
  spawns: SweepTask;
  trades: SweepTask;
  battles: SweepTask;
  coordination?: SweepTask;
  onComplete?: (at: Date) => Promise<void>;
}

export interface SweepReport {
  spawnsExpired: number;
  tradesExpired: number;
  battlesTimedOut: number;
  keysSwept: number;
  durationMs: number;
}

/**
 * MaintenanceJob - expires overdue spawns and trades, times out idle battles,
 * drops lapsed in-process coordination keys
 */
export class MaintenanceJob {
  private intervalId: NodeJS.Timeout | null = null;
  private running: Promise<SweepReport> | null = null;

  constructor(
    private targets: SweepTargets,
    private config: MaintenanceConfig
  ) {}

  /**
   * Start the periodic sweep
   */
  start(): void {
    if (!this.config.enabled) {
      maintenanceLogger.info('Sweep disabled, not starting');
      return;
    }

    if (this.intervalId) {
      maintenanceLogger.warn('Already running');
      return;
    }

    this.intervalId = setInterval(() => {
      this.runSweep().catch((error) => {
        maintenanceLogger.error('Periodic sweep failed', { error: describeError(error) });
      });
    }, this.config.intervalMs);
    this.intervalId.unref();

    maintenanceLogger.info('Started', { intervalMs: this.config.intervalMs });
  }

  /**
   * Stop the periodic sweep
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      maintenanceLogger.info('Stopped');
    }
  }

  /**
   * Run one sweep; overlapping calls share the sweep already in flight
   */
  runSweep(): Promise<SweepReport> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async sweep(): Promise<SweepReport> {
    const startedAt = Date.now();
    engineMetrics.increment(ENGINE_METRICS.SWEEP_RUN);

    const report: SweepReport = {
      spawnsExpired: await this.targets.spawns(),
      tradesExpired: await this.targets.trades(),
      battlesTimedOut: await this.targets.battles(),
      keysSwept: this.targets.coordination ? await this.targets.coordination() : 0,
      durationMs: 0,
    };
    report.durationMs = Date.now() - startedAt;

    await this.targets.onComplete?.(new Date());
    engineMetrics.setGauge(ENGINE_METRICS.LAST_SWEEP_DURATION_MS, report.durationMs);

    if (report.spawnsExpired + report.tradesExpired + report.battlesTimedOut + report.keysSwept > 0) {
      maintenanceLogger.info('Sweep finished', { ...report });
    } else {
      maintenanceLogger.debug('Nothing to sweep');
    }
    return report;
  }

  /**
   * Get current status
   */
  getStatus(): { running: boolean; intervalMs: number; enabled: boolean } {
    return {
      running: this.intervalId !== null,
      intervalMs: this.config.intervalMs,
      enabled: this.config.enabled,
    };
  }
}
