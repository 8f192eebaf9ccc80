// Domain layer: Species catalog contract
// Read-only game-balance data consumed by the engines

export const RARITY_TIERS = [
  'COMMON',
  'UNCOMMON',
  'RARE',
  'EPIC',
  'LEGENDARY',
  'MYTHICAL',
] as const;

export type RarityTier = (typeof RARITY_TIERS)[number];

export interface BaseStats {
  hp: number;
  attack: number;
  defense: number;
  specialAttack: number;
  specialDefense: number;
  speed: number;
}

export interface LevelRange {
  min: number;
  max: number;
}

export interface EvolutionRule {
  into: string;       // species code
  level: number;      // evolves once level >= this
}

export interface Species {
  code: string;
  name: string;
  types: string[];
  baseStats: BaseStats;
  rarity: RarityTier;
  evolution?: EvolutionRule;
  movePool: string[];
  levelRange?: LevelRange;
}

export type MoveCategory = 'PHYSICAL' | 'SPECIAL';

export interface Move {
  code: string;
  name: string;
  type: string;
  power: number;
  category: MoveCategory;
}

export interface Item {
  code: string;
  name: string;
  heal: number;
  price?: number;     // coins; items without a price are not sold
}

export interface RarityWeight {
  tier: RarityTier;
  weight: number;
}

export type ExperienceCurve =
  | { type: 'polynomial'; exponent: number }
  | { type: 'flat'; amount: number };

/**
 * Catalog lookup service
 * Assumed immutable for the lifetime of the process
 */
export interface ISpeciesCatalog {
  getSpecies(code: string): Species | null;
  getMove(code: string): Move | null;
  getItem(code: string): Item | null;
  shopItems(): Item[];
  speciesByRarity(tier: RarityTier): Species[];
  rarityWeights(): RarityWeight[];
  experienceToNextLevel(level: number): number;
  typeEffectiveness(moveType: string, defenderTypes: readonly string[]): number;
  readonly defaultLevelRange: LevelRange;
  readonly defaultMove: string;
}
