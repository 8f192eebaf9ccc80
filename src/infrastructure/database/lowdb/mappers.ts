// Record <-> domain conversion
// Records are snake_case with ISO timestamps; domain objects use epoch ms.
// Nested values are cloned both ways so nothing handed out aliases the live document.

import type { Battle } from '@/domain/battle/types.js';
import type { Creature } from '@/domain/creature/types.js';
import type { Spawn } from '@/domain/spawn/types.js';
import type { Trade } from '@/domain/trade/types.js';
import type { NewUserDefaults, User } from '@/domain/user/types.js';
import { DataIntegrityError } from '@/utils/errors.js';
import type {
  BattleRecord,
  CreatureRecord,
  SpawnRecord,
  TradeRecord,
  UserRecord,
} from './connection.js';

export function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

export function fromIso(value: string, field: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new DataIntegrityError(`Invalid timestamp in ${field}`, { value });
  }
  return ms;
}

function optionalMs(value: string | null | undefined, field: string): number | undefined {
  return value ? fromIso(value, field) : undefined;
}

// Users

export function newUserRow(
  id: string,
  username: string | undefined,
  defaults: NewUserDefaults,
  now: number
): UserRecord {
  return {
    id,
    username: username ?? null,
    trainer_level: 1,
    experience: 0,
    coins: defaults.startingCoins,
    daily_streak: 0,
    last_daily_claim_at: null,
    battles_won: 0,
    battles_lost: 0,
    creatures_caught: 0,
    active_team: [],
    inventory: { ...defaults.startingInventory },
    created_at: toIso(now),
    revision: 1,
  };
}

export function rowToUser(row: UserRecord): User {
  return {
    id: row.id,
    username: row.username ?? undefined,
    trainerLevel: row.trainer_level,
    experience: row.experience,
    coins: row.coins,
    dailyStreak: row.daily_streak,
    lastDailyClaimAt: row.last_daily_claim_at ? fromIso(row.last_daily_claim_at, 'users.last_daily_claim_at') : null,
    battlesWon: row.battles_won,
    battlesLost: row.battles_lost,
    creaturesCaught: row.creatures_caught,
    activeTeam: [...row.active_team],
    inventory: { ...row.inventory },
    createdAt: fromIso(row.created_at, 'users.created_at'),
    revision: row.revision,
  };
}

export function userToRow(user: User): UserRecord {
  return {
    id: user.id,
    username: user.username ?? null,
    trainer_level: user.trainerLevel,
    experience: user.experience,
    coins: user.coins,
    daily_streak: user.dailyStreak,
    last_daily_claim_at: user.lastDailyClaimAt === null ? null : toIso(user.lastDailyClaimAt),
    battles_won: user.battlesWon,
    battles_lost: user.battlesLost,
    creatures_caught: user.creaturesCaught,
    active_team: [...user.activeTeam],
    inventory: { ...user.inventory },
    created_at: toIso(user.createdAt),
    revision: user.revision,
  };
}

// Creatures

export function rowToCreature(row: CreatureRecord): Creature {
  return {
    id: row.id,
    ownerId: row.owner_id,
    speciesCode: row.species_code,
    level: row.level,
    experience: row.experience,
    nature: row.nature,
    isShiny: row.is_shiny === 1,
    rarity: row.rarity,
    stats: { ...row.stats },
    inTeam: row.in_team === 1,
    caughtInChatId: row.caught_in_chat_id ?? undefined,
    nickname: row.nickname ?? undefined,
    createdAt: fromIso(row.created_at, 'creatures.created_at'),
    revision: row.revision,
  };
}

export function creatureToRow(creature: Creature): CreatureRecord {
  return {
    id: creature.id,
    owner_id: creature.ownerId,
    species_code: creature.speciesCode,
    level: creature.level,
    experience: creature.experience,
    nature: creature.nature,
    is_shiny: creature.isShiny ? 1 : 0,
    rarity: creature.rarity,
    stats: { ...creature.stats },
    in_team: creature.inTeam ? 1 : 0,
    caught_in_chat_id: creature.caughtInChatId ?? null,
    nickname: creature.nickname ?? null,
    created_at: toIso(creature.createdAt),
    revision: creature.revision,
  };
}

// Spawns

export function rowToSpawn(row: SpawnRecord): Spawn {
  return {
    id: row.id,
    chatId: row.chat_id,
    speciesCode: row.species_code,
    level: row.level,
    isShiny: row.is_shiny === 1,
    rarity: row.rarity,
    status: row.status,
    spawnedAt: fromIso(row.spawned_at, 'spawns.spawned_at'),
    expiresAt: fromIso(row.expires_at, 'spawns.expires_at'),
    caughtBy: row.caught_by ?? undefined,
    caughtAt: optionalMs(row.caught_at, 'spawns.caught_at'),
    creatureId: row.creature_id ?? undefined,
    revision: row.revision,
  };
}

export function spawnToRow(spawn: Spawn): SpawnRecord {
  return {
    id: spawn.id,
    chat_id: spawn.chatId,
    species_code: spawn.speciesCode,
    level: spawn.level,
    is_shiny: spawn.isShiny ? 1 : 0,
    rarity: spawn.rarity,
    status: spawn.status,
    spawned_at: toIso(spawn.spawnedAt),
    expires_at: toIso(spawn.expiresAt),
    caught_by: spawn.caughtBy ?? null,
    caught_at: spawn.caughtAt === undefined ? null : toIso(spawn.caughtAt),
    creature_id: spawn.creatureId ?? null,
    revision: spawn.revision,
  };
}

// Battles

export function rowToBattle(row: BattleRecord): Battle {
  return {
    id: row.id,
    kind: row.kind,
    sides: structuredClone(row.sides),
    initialSides: structuredClone(row.initial_sides),
    turn: row.turn,
    pendingActions: structuredClone(row.pending_actions),
    turnHistory: structuredClone(row.turn_history),
    log: structuredClone(row.log),
    status: row.status,
    winner: row.winner,
    endReason: row.end_reason ?? undefined,
    seed: row.seed,
    createdAt: fromIso(row.created_at, 'battles.created_at'),
    lastActionAt: fromIso(row.last_action_at, 'battles.last_action_at'),
    expiresAt: fromIso(row.expires_at, 'battles.expires_at'),
    completedAt: optionalMs(row.completed_at, 'battles.completed_at'),
    experienceAwards: structuredClone(row.experience_awards),
    revision: row.revision,
  };
}

export function battleToRow(battle: Battle): BattleRecord {
  return {
    id: battle.id,
    kind: battle.kind,
    sides: structuredClone(battle.sides),
    initial_sides: structuredClone(battle.initialSides),
    turn: battle.turn,
    pending_actions: structuredClone(battle.pendingActions),
    turn_history: structuredClone(battle.turnHistory),
    log: structuredClone(battle.log),
    status: battle.status,
    winner: battle.winner,
    end_reason: battle.endReason ?? null,
    seed: battle.seed,
    created_at: toIso(battle.createdAt),
    last_action_at: toIso(battle.lastActionAt),
    expires_at: toIso(battle.expiresAt),
    completed_at: battle.completedAt === undefined ? null : toIso(battle.completedAt),
    experience_awards: structuredClone(battle.experienceAwards),
    revision: battle.revision,
  };
}

// Trades

export function rowToTrade(row: TradeRecord): Trade {
  return {
    id: row.id,
    proposerId: row.proposer_id,
    counterpartyId: row.counterparty_id,
    proposerOffer: structuredClone(row.proposer_offer),
    counterpartyOffer: row.counterparty_offer === null ? null : structuredClone(row.counterparty_offer),
    confirmations: { ...row.confirmations },
    status: row.status,
    cancelReason: row.cancel_reason ?? undefined,
    createdAt: fromIso(row.created_at, 'trades.created_at'),
    expiresAt: fromIso(row.expires_at, 'trades.expires_at'),
    completedAt: optionalMs(row.completed_at, 'trades.completed_at'),
    revision: row.revision,
  };
}

export function tradeToRow(trade: Trade): TradeRecord {
  return {
    id: trade.id,
    proposer_id: trade.proposerId,
    counterparty_id: trade.counterpartyId,
    proposer_offer: structuredClone(trade.proposerOffer),
    counterparty_offer: trade.counterpartyOffer === null ? null : structuredClone(trade.counterpartyOffer),
    confirmations: { ...trade.confirmations },
    status: trade.status,
    cancel_reason: trade.cancelReason ?? null,
    created_at: toIso(trade.createdAt),
    expires_at: toIso(trade.expiresAt),
    completed_at: trade.completedAt === undefined ? null : toIso(trade.completedAt),
    revision: trade.revision,
  };
}
