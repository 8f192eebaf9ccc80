// Infrastructure: Species catalog
// Loaded once from JSON, validated with zod, immutable afterwards

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  RARITY_TIERS,
  type ExperienceCurve,
  type ISpeciesCatalog,
  type Item,
  type LevelRange,
  type Move,
  type RarityTier,
  type RarityWeight,
  type Species,
} from '@/domain/catalog/types.js';
import { DataIntegrityError, describeError } from '@/utils/errors.js';
import { storeLogger } from '@/utils/logger.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../../../data/catalog.json', import.meta.url));

const levelRangeSchema = z
  .object({ min: z.number().int().min(1).max(100), max: z.number().int().min(1).max(100) })
  .refine((r) => r.min <= r.max, { message: 'levelRange.min must not exceed max' });

const statsSchema = z.object({
  hp: z.number().int().positive(),
  attack: z.number().int().positive(),
  defense: z.number().int().positive(),
  specialAttack: z.number().int().positive(),
  specialDefense: z.number().int().positive(),
  speed: z.number().int().positive(),
});

const speciesSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  types: z.array(z.string().min(1)).min(1),
  baseStats: statsSchema,
  rarity: z.enum(RARITY_TIERS),
  evolution: z.object({ into: z.string().min(1), level: z.number().int().min(2).max(100) }).optional(),
  movePool: z.array(z.string().min(1)),
  levelRange: levelRangeSchema.optional(),
});

const moveSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  type: z.string().min(1),
  power: z.number().int().positive(),
  category: z.enum(['PHYSICAL', 'SPECIAL']),
});

const itemSchema = z.object({
  code: z.string().min(1),
  name: z.string().min(1),
  heal: z.number().int().positive(),
  price: z.number().int().positive().optional(),
});

const experienceCurveSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('polynomial'), exponent: z.number().positive() }),
  z.object({ type: z.literal('flat'), amount: z.number().int().positive() }),
]);

export const catalogSchema = z.object({
  defaultLevelRange: levelRangeSchema,
  defaultMove: z.string().min(1),
  experienceCurve: experienceCurveSchema,
  rarityWeights: z.array(z.object({ tier: z.enum(RARITY_TIERS), weight: z.number().nonnegative() })).min(1),
  typeChart: z.record(z.record(z.number().nonnegative())),
  moves: z.array(moveSchema).min(1),
  items: z.array(itemSchema),
  species: z.array(speciesSchema).min(1),
});

export type CatalogData = z.infer<typeof catalogSchema>;

export class SpeciesCatalog implements ISpeciesCatalog {
  readonly defaultLevelRange: LevelRange;
  readonly defaultMove: string;

  private species: Map<string, Species>;
  private moves: Map<string, Move>;
  private items: Map<string, Item>;
  private byRarity: Map<RarityTier, Species[]>;
  private weights: RarityWeight[];
  private curve: ExperienceCurve;
  private typeChart: Record<string, Record<string, number>>;

  constructor(data: CatalogData) {
    this.defaultLevelRange = { ...data.defaultLevelRange };
    this.defaultMove = data.defaultMove;
    this.curve = data.experienceCurve;
    this.typeChart = data.typeChart;
    this.weights = data.rarityWeights.map((w) => ({ ...w }));
    this.species = new Map(data.species.map((s) => [s.code, s]));
    this.moves = new Map(data.moves.map((m) => [m.code, m]));
    this.items = new Map(data.items.map((i) => [i.code, i]));

    this.byRarity = new Map();
    for (const species of data.species) {
      const tier = this.byRarity.get(species.rarity) ?? [];
      tier.push(species);
      this.byRarity.set(species.rarity, tier);
    }

    this.checkReferences();
  }

  /**
   * Parse untrusted JSON content
   */
  static fromJson(raw: unknown): SpeciesCatalog {
    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DataIntegrityError('Catalog failed validation', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return new SpeciesCatalog(parsed.data);
  }

  private checkReferences(): void {
    const problems: string[] = [];
    if (!this.moves.has(this.defaultMove)) {
      problems.push(`defaultMove ${this.defaultMove} is not a known move`);
    }
    for (const species of this.species.values()) {
      if (species.evolution && !this.species.has(species.evolution.into)) {
        problems.push(`${species.code} evolves into unknown species ${species.evolution.into}`);
      }
      for (const move of species.movePool) {
        if (!this.moves.has(move)) problems.push(`${species.code} lists unknown move ${move}`);
      }
    }
    if (problems.length > 0) {
      throw new DataIntegrityError('Catalog has dangling references', { problems });
    }
  }

  getSpecies(code: string): Species | null {
    return this.species.get(code) ?? null;
  }

  getMove(code: string): Move | null {
    return this.moves.get(code) ?? null;
  }

  getItem(code: string): Item | null {
    return this.items.get(code) ?? null;
  }

  /**
   * Priced items, cheapest first
   */
  shopItems(): Item[] {
    return [...this.items.values()]
      .filter((i) => i.price !== undefined)
      .sort((a, b) => (a.price ?? 0) - (b.price ?? 0) || a.code.localeCompare(b.code));
  }

  speciesByRarity(tier: RarityTier): Species[] {
    return [...(this.byRarity.get(tier) ?? [])];
  }

  rarityWeights(): RarityWeight[] {
    return this.weights.map((w) => ({ ...w }));
  }

  /**
   * Experience needed to go from `level` to `level + 1`
   */
  experienceToNextLevel(level: number): number {
    if (this.curve.type === 'flat') return this.curve.amount;
    const e = this.curve.exponent;
    return Math.round(Math.pow(level + 1, e) - Math.pow(level, e));
  }

  /**
   * Product of the chart multipliers against each defender type; unlisted pairs are neutral
   */
  typeEffectiveness(moveType: string, defenderTypes: readonly string[]): number {
    const row = this.typeChart[moveType] ?? {};
    return defenderTypes.reduce((product, type) => product * (row[type] ?? 1), 1);
  }

  get size(): number {
    return this.species.size;
  }
}

const cache = new Map<string, SpeciesCatalog>();

/**
 * Load (once per path) and validate the catalog file
 */
export async function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Promise<SpeciesCatalog> {
  const cached = cache.get(path);
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new DataIntegrityError('Catalog file could not be read', { path, cause: describeError(error) });
  }

  const catalog = SpeciesCatalog.fromJson(raw);
  cache.set(path, catalog);
  storeLogger.info('Catalog loaded', { path, species: catalog.size });
  return catalog;
}
