// Domain layer: Creature types
// NO external dependencies - pure TypeScript

import type { RarityTier } from '@/domain/catalog/types.js';

export const NATURES = ['hardy', 'adamant', 'modest', 'timid', 'jolly', 'bold', 'calm'] as const;

export type Nature = (typeof NATURES)[number];

export interface StatBlock {
  hp: number;
  attack: number;
  defense: number;
  specialAttack: number;
  specialDefense: number;
  speed: number;
}

export type StatName = keyof StatBlock;

/**
 * An owned creature
 * Level and experience only ever grow; stats are derived from species + level + nature
 */
export interface Creature {
  id: string;
  ownerId: string;
  speciesCode: string;
  level: number;
  experience: number;
  nature: Nature;
  isShiny: boolean;
  rarity: RarityTier;
  stats: StatBlock;
  inTeam: boolean;
  caughtInChatId?: string;
  nickname?: string;
  createdAt: number;
  revision: number;
}

export interface EvolutionEvent {
  from: string;
  to: string;
  atLevel: number;
}

export const MAX_NICKNAME_LENGTH = 20;

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 100;
