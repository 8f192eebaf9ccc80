// Application: Battle Engine
// Turn-based state machine; turns are serialized per battle by a coordination lock

import { v4 as uuidv4 } from 'uuid';
import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import type { IBattleRepository } from '@/domain/battle/repository.js';
import {
  SIDE_IDS,
  opposingSide,
  sideForUser,
  sideOf,
  type Battle,
  type BattleAction,
  type BattleEvent,
  type BattleLogEntry,
  type BattleSettlement,
  type BattleSide,
  type BattleSides,
  type EndReason,
  type ExperienceAward,
  type ReplayReport,
  type SideId,
} from '@/domain/battle/types.js';
import type { ICreatureRepository } from '@/domain/creature/repository.js';
import type { Creature } from '@/domain/creature/types.js';
import type { Clock } from '@/domain/shared/clock.js';
import type { SeededRandomFactory } from '@/domain/shared/random.js';
import {
  contention,
  invalidInput,
  notFound,
  staleState,
  succeed,
  type EngineResult,
} from '@/domain/shared/result.js';
import type { IUserRepository } from '@/domain/user/repository.js';
import { LockManager } from '@/application/coordination/LockManager.js';
import { coordinationKeys } from '@/application/coordination/keys.js';
import type { ProgressionEngine } from '@/application/progression/ProgressionEngine.js';
import type { BattleConfig } from '@/utils/config.js';
import { describeError } from '@/utils/errors.js';
import { ENGINE_METRICS, battleLogger, engineMetrics } from '@/utils/logger.js';
import { chooseOpponentAction } from './OpponentPolicy.js';
import { averageLevel, generateOpponentSide, playerSide } from './snapshot.js';
import { resolveTurn, validateAction } from './TurnResolver.js';

export interface BattleEngineDeps {
  battles: IBattleRepository;
  users: IUserRepository;
  creatures: ICreatureRepository;
  catalog: ISpeciesCatalog;
  progression: ProgressionEngine;
  locks: LockManager;
  seededRandom: SeededRandomFactory;
  clock: Clock;
  config: BattleConfig;
}

export interface TurnSubmission {
  battle: Battle;
  resolved: boolean;          // false while waiting for the other player
}

export function turnSeed(seed: string, turn: number): string {
  return `${seed}:turn:${turn}`;
}

function appendEvents(log: BattleLogEntry[], turn: number, events: BattleEvent[]): BattleLogEntry[] {
  const next = [...log];
  for (const event of events) {
    next.push({ ...event, turn, index: next.length });
  }
  return next;
}

/**
 * Re-run the recorded turns from the starting snapshots
 */
export function replayTurns(
  battle: Pick<Battle, 'initialSides' | 'turnHistory' | 'seed'>,
  catalog: ISpeciesCatalog,
  seededRandom: SeededRandomFactory
): { sides: BattleSides; log: BattleLogEntry[]; winner: SideId | null } {
  let sides: BattleSides = structuredClone(battle.initialSides);
  let log: BattleLogEntry[] = [];
  let winner: SideId | null = null;

  for (const record of battle.turnHistory) {
    const outcome = resolveTurn(sides, record.actions, seededRandom(turnSeed(battle.seed, record.turn)), catalog);
    sides = outcome.sides;
    log = appendEvents(log, record.turn, outcome.events);
    if (outcome.ended) {
      winner = outcome.winner;
      break;
    }
  }
  return { sides, log, winner };
}

export class BattleEngine {
  constructor(private deps: BattleEngineDeps) {}

  /**
   * Start a battle; a null opponent means a generated team
   */
  async startBattle(challengerId: string, opponentId: string | null): Promise<EngineResult<Battle>> {
    const { battles, catalog, clock, config, seededRandom } = this.deps;

    if (opponentId === challengerId) {
      return invalidInput('SELF_CHALLENGE', 'Cannot battle yourself');
    }

    for (const userId of [challengerId, opponentId]) {
      if (userId !== null) await this.settleOverdueBattleOf(userId);
    }

    const challenger = await this.loadTeam(challengerId, 'A');
    if (!challenger.ok) return challenger;

    const seed = uuidv4();
    let opponent: BattleSide;
    if (opponentId === null) {
      const size = Math.min(challenger.value.team.length, config.aiTeamMaxSize);
      opponent = generateOpponentSide(
        'B',
        size,
        averageLevel(challenger.value.team),
        catalog,
        seededRandom(`${seed}:opponent`)
      );
    } else {
      const loaded = await this.loadTeam(opponentId, 'B');
      if (!loaded.ok) return loaded;
      opponent = loaded.value;
    }

    const now = clock.now();
    const sides: BattleSides = [challenger.value, opponent];
    const battle: Battle = {
      id: uuidv4(),
      kind: opponentId === null ? 'PVE' : 'PVP',
      sides,
      initialSides: structuredClone(sides),
      turn: 1,
      pendingActions: {},
      turnHistory: [],
      log: [],
      status: 'IN_PROGRESS',
      winner: null,
      seed,
      createdAt: now,
      lastActionAt: now,
      expiresAt: now + config.timeoutMs,
      experienceAwards: [],
      revision: 1,
    };

    const created = await battles.createIfIdle(battle);
    if (created.status === 'BUSY') {
      return invalidInput('BUSY', 'Player is already in a battle', {
        userId: created.userId,
        battleId: created.battleId,
      });
    }

    engineMetrics.increment(ENGINE_METRICS.BATTLE_STARTED);
    battleLogger.info('Battle started', {
      battleId: created.battle.id,
      kind: created.battle.kind,
      challengerId,
      opponentId,
    });
    return succeed(created.battle);
  }

  private async loadTeam(userId: string, side: SideId): Promise<EngineResult<BattleSide>> {
    const { users, creatures, catalog } = this.deps;
    const user = await users.findById(userId);
    if (!user) return notFound('User not found', { userId });
    if (user.activeTeam.length === 0) {
      return invalidInput('EMPTY_TEAM', 'Active team is empty', { userId, side });
    }

    const team: Creature[] = await creatures.findByIds(user.activeTeam);
    const valid =
      team.length === user.activeTeam.length && team.every((c) => c.ownerId === userId);
    if (!valid) {
      return invalidInput('INVALID_TEAM', 'Active team contains creatures no longer owned', { userId, side });
    }

    return succeed(playerSide(side, userId, team, user.inventory, catalog));
  }

  private async settleOverdueBattleOf(userId: string): Promise<void> {
    const existing = await this.deps.battles.findInProgressForUser(userId);
    if (existing && this.deps.clock.now() >= existing.expiresAt) {
      await this.expireUnderLock(existing.id);
    }
  }

  /**
   * Submit one player's action for `turn`
   */
  async submitTurn(
    battleId: string,
    userId: string,
    turn: number,
    action: BattleAction
  ): Promise<EngineResult<TurnSubmission>> {
    const outcome = await this.deps.locks.withLock(
      coordinationKeys.battleLock(battleId),
      this.deps.config.lockTtlMs,
      () => this.submitUnderLock(battleId, userId, turn, action)
    );
    if (!outcome.acquired) {
      return contention('LOCK_BUSY', 'Another action on this battle is in flight', { battleId });
    }
    return outcome.value;
  }

  private async submitUnderLock(
    battleId: string,
    userId: string,
    turn: number,
    action: BattleAction
  ): Promise<EngineResult<TurnSubmission>> {
    const { battles, catalog, clock, config, seededRandom } = this.deps;

    const loaded = await this.loadCurrent(battleId);
    if (!loaded.ok) return loaded;
    const battle = loaded.value;

    const side = sideForUser(battle, userId);
    if (!side) return invalidInput('NOT_PARTICIPANT', 'Not a player in this battle', { battleId, userId });
    if (turn !== battle.turn) {
      return invalidInput('TURN_MISMATCH', 'Wrong turn', { expected: battle.turn, received: turn });
    }
    if (battle.pendingActions[side.side]) {
      return invalidInput('ACTION_ALREADY_SUBMITTED', 'Action already submitted for this turn', { turn });
    }
    const invalid = validateAction(side, action, catalog);
    if (invalid) return invalid;

    const now = clock.now();
    const pending: Partial<Record<SideId, BattleAction>> = { ...battle.pendingActions, [side.side]: action };
    const other = sideOf(battle, opposingSide(side.side));
    if (other.controller === 'AI') {
      pending[other.side] = chooseOpponentAction(other, side, catalog);
    }

    const actionA = pending.A;
    const actionB = pending.B;
    if (!actionA || !actionB) {
      const saved = await battles.compareAndSwap({
        ...battle,
        pendingActions: pending,
        lastActionAt: now,
        expiresAt: now + config.timeoutMs,
      });
      if (!saved) return this.changedConcurrently(battleId);
      return succeed({ battle: saved, resolved: false });
    }

    const actions = { A: actionA, B: actionB };
    const result = resolveTurn(battle.sides, actions, seededRandom(turnSeed(battle.seed, battle.turn)), catalog);
    const advanced: Battle = {
      ...battle,
      sides: result.sides,
      log: appendEvents(battle.log, battle.turn, result.events),
      turnHistory: [...battle.turnHistory, { turn: battle.turn, actions }],
      turn: battle.turn + 1,
      pendingActions: {},
      lastActionAt: now,
      expiresAt: now + config.timeoutMs,
    };
    engineMetrics.increment(ENGINE_METRICS.BATTLE_TURN_RESOLVED);

    if (result.ended) {
      // The resolver already logged END
      const finished = await this.finish(advanced, result.winner, 'KNOCKOUT', now, false);
      if (!finished.ok) return finished;
      return succeed({ battle: finished.value, resolved: true });
    }

    const saved = await battles.compareAndSwap(advanced);
    if (!saved) return this.changedConcurrently(battleId);
    return succeed({ battle: saved, resolved: true });
  }

  private changedConcurrently(battleId: string): EngineResult<never> {
    return contention('RETRY_EXHAUSTED', 'Battle changed concurrently', { battleId });
  }

  /**
   * Give up; the other side wins
   */
  async forfeit(battleId: string, userId: string): Promise<EngineResult<Battle>> {
    const outcome = await this.deps.locks.withLock(
      coordinationKeys.battleLock(battleId),
      this.deps.config.lockTtlMs,
      async (): Promise<EngineResult<Battle>> => {
        const loaded = await this.loadCurrent(battleId);
        if (!loaded.ok) return loaded;
        const battle = loaded.value;

        const side = sideForUser(battle, userId);
        if (!side) return invalidInput('NOT_PARTICIPANT', 'Not a player in this battle', { battleId, userId });

        return this.finish(battle, opposingSide(side.side), 'FORFEIT', this.deps.clock.now(), true);
      }
    );
    if (!outcome.acquired) {
      return contention('LOCK_BUSY', 'Another action on this battle is in flight', { battleId });
    }
    return outcome.value;
  }

  /**
   * Current state, with lazy inactivity timeout
   * Never returns an overdue IN_PROGRESS battle: while another caller holds the lock it is LOCK_BUSY
   */
  async getBattle(battleId: string): Promise<EngineResult<Battle>> {
    const battle = await this.deps.battles.findById(battleId);
    if (!battle) return notFound('Battle not found', { battleId });
    if (battle.status !== 'IN_PROGRESS' || this.deps.clock.now() < battle.expiresAt) {
      return succeed(battle);
    }

    const expired = await this.expireUnderLock(battleId);
    if (expired) return succeed(expired);

    // Someone else holds the lock, or a turn landed before the deadline; report what they left
    const current = await this.deps.battles.findById(battleId);
    if (!current) return notFound('Battle not found', { battleId });
    if (current.status === 'IN_PROGRESS' && this.deps.clock.now() >= current.expiresAt) {
      return contention('LOCK_BUSY', 'Battle timeout is being applied elsewhere', { battleId });
    }
    return succeed(current);
  }

  /**
   * Time out an overdue battle if nobody holds its lock; returns the settled battle
   */
  async expireUnderLock(battleId: string): Promise<Battle | null> {
    const outcome = await this.deps.locks.withLock(
      coordinationKeys.battleLock(battleId),
      this.deps.config.lockTtlMs,
      async () => {
        const loaded = await this.loadCurrent(battleId);
        if (loaded.ok || loaded.error.code !== 'BATTLE_OVER') return null;
        return this.deps.battles.findById(battleId);
      }
    );
    return outcome.acquired ? outcome.value : null;
  }

  /**
   * Sweep entry point: time out every overdue battle
   */
  async timeoutOverdue(): Promise<number> {
    const overdue = await this.deps.battles.listOverdue(this.deps.clock.now());
    let count = 0;
    for (const battle of overdue) {
      const settled = await this.expireUnderLock(battle.id);
      if (settled) count++;
    }
    return count;
  }

  /**
   * Load and apply the inactivity timeout; a finished battle comes back as BATTLE_OVER
   * Callers must hold the battle lock
   */
  private async loadCurrent(battleId: string): Promise<EngineResult<Battle>> {
    const battle = await this.deps.battles.findById(battleId);
    if (!battle) return notFound('Battle not found', { battleId });
    if (battle.status === 'COMPLETE') {
      return staleState('BATTLE_OVER', 'Battle is over', { battleId, winner: battle.winner });
    }

    const now = this.deps.clock.now();
    if (now < battle.expiresAt) return succeed(battle);

    // Whoever already acted this turn wins; nobody or both means a draw
    const waiting = SIDE_IDS.filter((id) => battle.pendingActions[id] !== undefined);
    const winner = waiting.length === 1 ? waiting[0] : null;
    const finished = await this.finish(battle, winner, 'TIMEOUT', now, true);
    if (!finished.ok) return finished;

    engineMetrics.increment(ENGINE_METRICS.BATTLE_TIMED_OUT);
    return staleState('BATTLE_OVER', 'Battle timed out', { battleId, winner });
  }

  /**
   * Mark COMPLETE and settle in one transaction, then award experience
   */
  private async finish(
    battle: Battle,
    winner: SideId | null,
    reason: EndReason,
    now: number,
    logEnd: boolean
  ): Promise<EngineResult<Battle>> {
    const awards = this.experienceAwards(battle, winner);
    const completed: Battle = {
      ...battle,
      log: logEnd ? appendEvents(battle.log, battle.turn, [{ type: 'END', winner, reason }]) : battle.log,
      status: 'COMPLETE',
      winner,
      endReason: reason,
      completedAt: now,
      lastActionAt: now,
      experienceAwards: awards,
    };

    const settled = await this.deps.battles.settle(completed, this.settlement(completed));
    if (!settled) return this.changedConcurrently(battle.id);

    engineMetrics.increment(ENGINE_METRICS.BATTLE_COMPLETED);
    battleLogger.info('Battle finished', { battleId: battle.id, winner, reason, turns: battle.turnHistory.length });

    await this.applyAwards(battle.id, awards);
    return succeed(settled);
  }

  private experienceAwards(battle: Battle, winner: SideId | null): ExperienceAward[] {
    if (winner === null) return [];
    const winning = sideOf(battle, winner);
    const losing = sideOf(battle, opposingSide(winner));
    const amount = Math.max(1, Math.round(averageLevel(losing.team))) * this.deps.config.expPerLevel;

    const awards: ExperienceAward[] = [];
    for (const combatant of winning.team) {
      if (combatant.creatureId !== null && combatant.participated) {
        awards.push({ creatureId: combatant.creatureId, amount });
      }
    }
    return awards;
  }

  private settlement(battle: Battle): BattleSettlement {
    const challengerTeamSize = battle.initialSides[0].team.length;
    const users: BattleSettlement['users'] = [];

    for (const id of SIDE_IDS) {
      const side = sideOf(battle, id);
      if (side.controller !== 'PLAYER' || side.userId === null) continue;

      const outcome = battle.winner === null ? 'DRAW' : battle.winner === id ? 'WON' : 'LOST';
      users.push({
        userId: side.userId,
        outcome,
        coins: outcome === 'WON' ? this.deps.config.winCoinsBase + 10 * challengerTeamSize : 0,
        returnedItems: { ...side.items },
      });
    }
    return { users };
  }

  private async applyAwards(battleId: string, awards: ExperienceAward[]): Promise<void> {
    for (const award of awards) {
      try {
        const result = await this.deps.progression.awardExperience(award.creatureId, award.amount);
        if (!result.ok) {
          battleLogger.warn('Battle experience not applied', {
            battleId,
            creatureId: award.creatureId,
            code: result.error.code,
          });
        }
      } catch (error) {
        battleLogger.error('Battle experience failed', {
          battleId,
          creatureId: award.creatureId,
          error: describeError(error),
        });
      }
    }
  }

  /**
   * Re-resolve the recorded turns and compare with the stored log and winner
   */
  async replayBattle(battleId: string): Promise<EngineResult<ReplayReport>> {
    const battle = await this.deps.battles.findById(battleId);
    if (!battle) return notFound('Battle not found', { battleId });

    const replay = replayTurns(battle, this.deps.catalog, this.deps.seededRandom);

    // Forfeit and timeout endings are not derived from turns
    const stored = battle.log.filter((e) => e.type !== 'END' || e.reason === 'KNOCKOUT');
    let firstDivergence: number | null = null;
    const length = Math.max(stored.length, replay.log.length);
    for (let i = 0; i < length; i++) {
      if (JSON.stringify(stored[i]) !== JSON.stringify(replay.log[i])) {
        firstDivergence = i;
        break;
      }
    }

    const expectedWinner = battle.endReason === 'KNOCKOUT' ? battle.winner : null;
    return succeed({
      battleId,
      turnsReplayed: battle.turnHistory.length,
      matches: firstDivergence === null && replay.winner === expectedWinner,
      storedWinner: battle.winner,
      replayedWinner: replay.winner,
      firstDivergence,
    });
  }
}
