// Domain layer: Battle types
// A battle is an explicit state machine with an append-only log
// NO external dependencies - pure TypeScript

import type { MoveCategory } from '@/domain/catalog/types.js';
import type { StatBlock } from '@/domain/creature/types.js';

export type BattleKind = 'PVP' | 'PVE';
export type SideId = 'A' | 'B';
export type Controller = 'PLAYER' | 'AI';
export type BattleStatus = 'IN_PROGRESS' | 'COMPLETE';
export type EndReason = 'KNOCKOUT' | 'FORFEIT' | 'TIMEOUT';

export const SIDE_IDS: readonly SideId[] = ['A', 'B'];

export function opposingSide(side: SideId): SideId {
  return side === 'A' ? 'B' : 'A';
}

export interface CombatantMove {
  code: string;
  name: string;
  type: string;
  power: number;
  category: MoveCategory;
}

/**
 * Battle-local copy of a creature; never written back to the creature record
 */
export interface Combatant {
  id: string;                    // A1..A6 / B1..B6
  creatureId: string | null;     // null for generated opponents
  speciesCode: string;
  name: string;
  level: number;
  types: string[];
  stats: StatBlock;
  currentHp: number;
  moves: CombatantMove[];
  fainted: boolean;
  participated: boolean;         // has been sent out at least once
}

export interface BattleSide {
  side: SideId;
  userId: string | null;
  controller: Controller;
  team: Combatant[];
  activeIndex: number;
  items: Record<string, number>; // battle bag, withdrawn from the owner's inventory at start
}

export type BattleSides = [BattleSide, BattleSide];

export type BattleAction =
  | { type: 'MOVE'; moveCode: string }
  | { type: 'SWITCH'; toIndex: number }
  | { type: 'ITEM'; itemCode: string };

export interface TurnRecord {
  turn: number;
  actions: Record<SideId, BattleAction>;
}

export type BattleEvent =
  | {
      type: 'MOVE';
      side: SideId;
      actor: string;
      target: string;
      moveCode: string;
      damage: number;
      effectiveness: number;
      targetHp: number;
    }
  | { type: 'SWITCH'; side: SideId; from: string; to: string }
  | { type: 'ITEM'; side: SideId; actor: string; itemCode: string; healed: number; hp: number }
  | { type: 'FIZZLE'; side: SideId; actor: string; reason: 'ACTOR_FAINTED' | 'TARGET_FAINTED' }
  | { type: 'FAINT'; side: SideId; combatant: string }
  | { type: 'SEND_OUT'; side: SideId; combatant: string }
  | { type: 'END'; winner: SideId | null; reason: EndReason };

export type BattleLogEntry = BattleEvent & { turn: number; index: number };

export interface ExperienceAward {
  creatureId: string;
  amount: number;
}

export interface Battle {
  id: string;
  kind: BattleKind;
  sides: BattleSides;
  initialSides: BattleSides;
  turn: number;                  // next turn to resolve, starts at 1
  pendingActions: Partial<Record<SideId, BattleAction>>;
  turnHistory: TurnRecord[];
  log: BattleLogEntry[];
  status: BattleStatus;
  winner: SideId | null;
  endReason?: EndReason;
  seed: string;
  createdAt: number;
  lastActionAt: number;
  expiresAt: number;
  completedAt?: number;
  experienceAwards: ExperienceAward[];
  revision: number;
}

export function sideOf(battle: Pick<Battle, 'sides'>, id: SideId): BattleSide {
  return id === 'A' ? battle.sides[0] : battle.sides[1];
}

export function sideForUser(battle: Pick<Battle, 'sides'>, userId: string): BattleSide | null {
  return battle.sides.find((s) => s.controller === 'PLAYER' && s.userId === userId) ?? null;
}

export function activeCombatant(side: BattleSide): Combatant {
  return side.team[side.activeIndex];
}

export function hasHealthyMember(side: BattleSide): boolean {
  return side.team.some((c) => !c.fainted);
}

/**
 * Per-user effects of a finished battle, applied in the same transaction
 * that marks the battle COMPLETE
 */
export interface BattleSettlement {
  users: Array<{
    userId: string;
    outcome: 'WON' | 'LOST' | 'DRAW';
    coins: number;
    returnedItems: Record<string, number>;   // unused bag items going back to the inventory
  }>;
}

export type CreateBattleOutcome =
  | { status: 'CREATED'; battle: Battle }
  | { status: 'BUSY'; userId: string; battleId: string };

export interface ReplayReport {
  battleId: string;
  turnsReplayed: number;
  matches: boolean;
  storedWinner: SideId | null;
  replayedWinner: SideId | null;
  firstDivergence: number | null;  // index into the log, null when identical
}
