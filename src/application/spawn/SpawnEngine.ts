// Application: Spawn Engine
// Decides when and what appears in a chat, and arbitrates claims

import { v4 as uuidv4 } from 'uuid';
import type { ISpeciesCatalog, Species } from '@/domain/catalog/types.js';
import type { ICoordinationStore } from '@/domain/coordination/types.js';
import { NATURES, type Creature } from '@/domain/creature/types.js';
import { calculateStats, creatureRarity } from '@/domain/creature/stats.js';
import type { Clock } from '@/domain/shared/clock.js';
import { pickOne, randomInt, type RandomSource } from '@/domain/shared/random.js';
import {
  contention,
  notFound,
  staleState,
  succeed,
  type EngineResult,
} from '@/domain/shared/result.js';
import type { ISpawnRepository } from '@/domain/spawn/repository.js';
import {
  isPastDeadline,
  type ActivityOutcome,
  type ClaimSuccess,
  type Spawn,
  type TriggerSpawnOutcome,
} from '@/domain/spawn/types.js';
import { LockManager } from '@/application/coordination/LockManager.js';
import { coordinationKeys } from '@/application/coordination/keys.js';
import type { ProgressionEngine } from '@/application/progression/ProgressionEngine.js';
import type { SpawnConfig } from '@/utils/config.js';
import { DataIntegrityError, describeError } from '@/utils/errors.js';
import { ENGINE_METRICS, engineMetrics, spawnLogger } from '@/utils/logger.js';
import { catchExperience, drawRarityTier } from './rarity.js';

export interface SpawnEngineDeps {
  spawns: ISpawnRepository;
  coordination: ICoordinationStore;
  locks: LockManager;
  catalog: ISpeciesCatalog;
  progression: ProgressionEngine;
  random: RandomSource;
  clock: Clock;
  config: SpawnConfig;
}

interface WildDraw {
  species: Species;
  level: number;
  isShiny: boolean;
}

export class SpawnEngine {
  constructor(private deps: SpawnEngineDeps) {}

  /**
   * Spawn a wild creature in a chat unless the chat is on cooldown
   */
  async triggerSpawn(chatId: string): Promise<TriggerSpawnOutcome> {
    const { coordination, spawns, clock, config } = this.deps;
    const now = clock.now();
    const cooldownKey = coordinationKeys.spawnCooldown(chatId);

    const took = await coordination.setIfAbsent(cooldownKey, String(now), config.cooldownMs);
    if (!took) {
      const ttl = await coordination.remainingTtl(cooldownKey);
      engineMetrics.increment(ENGINE_METRICS.SPAWN_COOLDOWN_HIT);
      return { status: 'ON_COOLDOWN', retryAfterMs: Math.min(ttl ?? 0, config.cooldownMs) };
    }

    try {
      const draw = this.drawWild();
      const spawn: Spawn = {
        id: uuidv4(),
        chatId,
        speciesCode: draw.species.code,
        level: draw.level,
        isShiny: draw.isShiny,
        rarity: creatureRarity(draw.species.rarity, draw.isShiny),
        status: 'ACTIVE',
        spawnedAt: now,
        expiresAt: now + config.expiryMs,
        revision: 1,
      };
      const saved = await spawns.create(spawn);

      engineMetrics.increment(ENGINE_METRICS.SPAWN_CREATED);
      spawnLogger.info('Spawned', {
        chatId,
        spawnId: saved.id,
        species: saved.speciesCode,
        level: saved.level,
        rarity: saved.rarity,
        shiny: saved.isShiny,
      });
      return { status: 'SPAWNED', spawn: saved };
    } catch (error) {
      await this.releaseCooldown(cooldownKey);
      throw error;
    }
  }

  /**
   * A chat message; spawns with probability `activitySpawnChance`
   */
  async recordActivity(chatId: string): Promise<ActivityOutcome> {
    if (this.deps.random.next() >= this.deps.config.activitySpawnChance) {
      return { status: 'SKIPPED' };
    }
    return this.triggerSpawn(chatId);
  }

  private async releaseCooldown(key: string): Promise<void> {
    try {
      await this.deps.coordination.delete(key);
    } catch (error) {
      spawnLogger.error('Cooldown compensation failed', { key, error: describeError(error) });
    }
  }

  private drawWild(): WildDraw {
    const { catalog, random, config } = this.deps;
    const tier = drawRarityTier(
      catalog.rarityWeights(),
      (t) => catalog.speciesByRarity(t).length > 0,
      random
    );
    if (!tier) {
      throw new DataIntegrityError('Catalog has no spawnable species');
    }

    const species = pickOne(random, catalog.speciesByRarity(tier));
    const range = species.levelRange ?? catalog.defaultLevelRange;
    const level = randomInt(random, range.min, range.max);
    const isShiny = random.next() < config.shinyChance;
    return { species, level, isShiny };
  }

  /**
   * Apply lazy expiry and return the spawn
   */
  async getSpawn(spawnId: string): Promise<EngineResult<Spawn>> {
    const spawn = await this.deps.spawns.expireIfOverdue(spawnId, this.deps.clock.now());
    return spawn ? succeed(spawn) : notFound('Spawn not found', { spawnId });
  }

  /**
   * Sweep entry point
   */
  async expireOverdue(): Promise<number> {
    const count = await this.deps.spawns.expireOverdue(this.deps.clock.now());
    if (count > 0) engineMetrics.increment(ENGINE_METRICS.SPAWN_EXPIRED, count);
    return count;
  }

  /**
   * Race to catch a spawn; exactly one claimant wins
   */
  async claim(spawnId: string, userId: string): Promise<EngineResult<ClaimSuccess>> {
    const { coordination, locks, spawns, clock, config } = this.deps;

    const cooldownKey = coordinationKeys.claimCooldown(userId);
    const allowed = await coordination.setIfAbsent(cooldownKey, spawnId, config.claimCooldownMs);
    if (!allowed) {
      const ttl = await coordination.remainingTtl(cooldownKey);
      engineMetrics.increment(ENGINE_METRICS.CLAIM_CONTENTION);
      return contention('CLAIM_COOLDOWN', 'Claiming too fast', {
        retryAfterMs: Math.min(ttl ?? 0, config.claimCooldownMs),
      });
    }

    const outcome = await locks.withLock(coordinationKeys.spawnLock(spawnId), config.claimLockTtlMs, () =>
      this.claimUnderLock(spawnId, userId)
    );

    let result: EngineResult<ClaimSuccess>;
    if (outcome.acquired) {
      result = outcome.value;
    } else {
      // Someone else is mid-claim; only the deadline can still change our answer
      const spawn = await spawns.expireIfOverdue(spawnId, clock.now());
      if (!spawn) {
        result = notFound('Spawn not found', { spawnId });
      } else if (spawn.status === 'EXPIRED') {
        result = staleState('EXPIRED', 'Spawn has expired', { spawnId });
      } else {
        result = contention('ALREADY_CLAIMED', 'Spawn is being claimed by someone else', { spawnId });
      }
    }

    this.recordClaimMetrics(result);
    if (result.ok) {
      await this.awardCatchExperience(userId, result.value);
    }
    return result;
  }

  private async claimUnderLock(spawnId: string, userId: string): Promise<EngineResult<ClaimSuccess>> {
    const { spawns, catalog, random, clock } = this.deps;
    const now = clock.now();

    const spawn = await spawns.findById(spawnId);
    if (!spawn) return notFound('Spawn not found', { spawnId });
    if (spawn.status === 'CAUGHT') {
      return contention('ALREADY_CLAIMED', 'Spawn was already caught', { spawnId, caughtBy: spawn.caughtBy });
    }
    if (spawn.status === 'EXPIRED' || isPastDeadline(spawn, now)) {
      await spawns.expireIfOverdue(spawnId, now);
      return staleState('EXPIRED', 'Spawn has expired', { spawnId });
    }

    const species = catalog.getSpecies(spawn.speciesCode);
    if (!species) {
      throw new DataIntegrityError('Spawn references unknown species', { spawnId, species: spawn.speciesCode });
    }

    const nature = pickOne(random, NATURES);
    const creature: Creature = {
      id: uuidv4(),
      ownerId: userId,
      speciesCode: species.code,
      level: spawn.level,
      experience: 0,
      nature,
      isShiny: spawn.isShiny,
      rarity: spawn.rarity,
      stats: calculateStats(species.baseStats, spawn.level, nature),
      inTeam: false,
      caughtInChatId: spawn.chatId,
      createdAt: now,
      revision: 1,
    };

    const commit = await spawns.commitClaim({ spawnId, userId, creature, now });
    switch (commit.status) {
      case 'CAUGHT':
        spawnLogger.info('Claimed', { spawnId, userId, creatureId: commit.creature.id });
        return succeed({
          spawn: commit.spawn,
          creature: commit.creature,
          trainerExperience: catchExperience(commit.spawn.rarity, commit.spawn.level),
        });
      case 'ALREADY_CAUGHT':
        return contention('ALREADY_CLAIMED', 'Spawn was already caught', { spawnId });
      case 'EXPIRED':
        return staleState('EXPIRED', 'Spawn has expired', { spawnId });
      case 'NOT_FOUND':
        return notFound('Spawn not found', { spawnId });
    }
  }

  private recordClaimMetrics(result: EngineResult<ClaimSuccess>): void {
    if (result.ok) {
      engineMetrics.increment(ENGINE_METRICS.CLAIM_SUCCESS);
    } else if (result.error.code === 'EXPIRED') {
      engineMetrics.increment(ENGINE_METRICS.CLAIM_EXPIRED);
    } else if (result.error.kind === 'CONTENTION') {
      engineMetrics.increment(ENGINE_METRICS.CLAIM_CONTENTION);
    }
  }

  /**
   * Post-commit reward; a failure here never undoes the catch
   */
  private async awardCatchExperience(userId: string, success: ClaimSuccess): Promise<void> {
    try {
      const award = await this.deps.progression.awardTrainerExperience(userId, success.trainerExperience);
      if (!award.ok) {
        spawnLogger.warn('Catch experience not awarded', { userId, code: award.error.code });
      }
    } catch (error) {
      spawnLogger.error('Catch experience failed', { userId, error: describeError(error) });
    }
  }
}
