// Application: Progression Engine
// Experience, level-ups and evolution written back with compare-and-swap

import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import type { ICreatureRepository } from '@/domain/creature/repository.js';
import type { Creature, EvolutionEvent } from '@/domain/creature/types.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import type { User } from '@/domain/user/types.js';
import { invalidInput, notFound, succeed, type EngineResult } from '@/domain/shared/result.js';
import type { ProgressionConfig } from '@/utils/config.js';
import { ENGINE_METRICS, engineMetrics, progressionLogger } from '@/utils/logger.js';
import { withOptimisticRetry } from '@/application/shared/optimistic.js';
import { applyExperience, progressCreature } from './leveling.js';

export interface ExperienceAwardResult {
  creature: Creature;
  levelsGained: number;
  evolutions: EvolutionEvent[];
}

export interface TrainerExperienceResult {
  user: User;
  levelsGained: number;
}

export class ProgressionEngine {
  constructor(
    private creatures: ICreatureRepository,
    private users: IUserRepository,
    private catalog: ISpeciesCatalog,
    private config: ProgressionConfig
  ) {}

  private validateAmount(amount: number): EngineResult<never> | null {
    if (!Number.isInteger(amount) || amount < 0) {
      return invalidInput('INVALID_AMOUNT', 'Experience must be a non-negative integer', { amount });
    }
    return null;
  }

  private onConflict = (attempt: number): void => {
    engineMetrics.increment(ENGINE_METRICS.PROGRESSION_CAS_CONFLICT);
    progressionLogger.debug('Revision conflict, retrying', { attempt });
  };

  /**
   * Award experience to a creature
   */
  async awardExperience(creatureId: string, amount: number): Promise<EngineResult<ExperienceAwardResult>> {
    const invalid = this.validateAmount(amount);
    if (invalid) return invalid;

    const result = await withOptimisticRetry(
      this.config.maxRetries,
      async (): Promise<EngineResult<ExperienceAwardResult> | null> => {
        const current = await this.creatures.findById(creatureId);
        if (!current) return notFound('Creature not found', { creatureId });

        const progress = progressCreature(current, amount, this.catalog);
        const saved = await this.creatures.compareAndSwap(progress.creature);
        if (!saved) return null;

        return succeed({ creature: saved, levelsGained: progress.levelsGained, evolutions: progress.evolutions });
      },
      this.onConflict
    );

    if (result.ok) {
      const { creature, levelsGained, evolutions } = result.value;
      if (levelsGained > 0) {
        engineMetrics.increment(ENGINE_METRICS.PROGRESSION_LEVEL_UP, levelsGained);
        progressionLogger.info('Creature leveled up', { creatureId, level: creature.level, levelsGained });
      }
      for (const evolution of evolutions) {
        engineMetrics.increment(ENGINE_METRICS.PROGRESSION_EVOLUTION);
        progressionLogger.info('Creature evolved', { creatureId, from: evolution.from, to: evolution.to });
      }
    } else if (result.error.code === 'RETRY_EXHAUSTED') {
      engineMetrics.increment(ENGINE_METRICS.PROGRESSION_RETRY_EXHAUSTED);
      progressionLogger.warn('Experience award gave up', { creatureId, amount });
    }
    return result;
  }

  /**
   * Award trainer experience; same carry-over rule, no evolution
   */
  async awardTrainerExperience(userId: string, amount: number): Promise<EngineResult<TrainerExperienceResult>> {
    const invalid = this.validateAmount(amount);
    if (invalid) return invalid;

    return withOptimisticRetry(
      this.config.maxRetries,
      async (): Promise<EngineResult<TrainerExperienceResult> | null> => {
        const user = await this.users.findById(userId);
        if (!user) return notFound('User not found', { userId });

        const leveled = applyExperience(
          { level: user.trainerLevel, experience: user.experience },
          amount,
          (level) => this.catalog.experienceToNextLevel(level)
        );
        const saved = await this.users.compareAndSwap({
          ...user,
          trainerLevel: leveled.level,
          experience: leveled.experience,
        });
        if (!saved) return null;

        if (leveled.levelsGained > 0) {
          progressionLogger.info('Trainer leveled up', { userId, level: saved.trainerLevel });
        }
        return succeed({ user: saved, levelsGained: leveled.levelsGained });
      },
      this.onConflict
    );
  }
}
