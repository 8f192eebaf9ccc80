// Shared test fixtures: a small catalog, in-memory engine wiring and seed helpers

import { v4 as uuidv4 } from 'uuid';
import { ManualClock } from '@/domain/shared/clock.js';
import type { RandomSource, SeededRandomFactory } from '@/domain/shared/random.js';
import type { Creature, Nature } from '@/domain/creature/types.js';
import { calculateStats } from '@/domain/creature/stats.js';
import { SpeciesCatalog, type CatalogData } from '@/infrastructure/catalog/SpeciesCatalog.js';
import { MemoryCoordinationStore } from '@/infrastructure/coordination/MemoryCoordinationStore.js';
import { createEngineServices, type EngineServices } from '@/infrastructure/EngineFactory.js';
import { MEMORY_PATH, openDatabase, type DatabaseConnection } from '@/infrastructure/database/lowdb/index.js';
import { creatureToRow } from '@/infrastructure/database/lowdb/mappers.js';
import { FixedRandomSource } from '@/infrastructure/random/RandomSource.js';
import { buildAppConfig, type AppConfig } from '@/utils/config.js';

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

/**
 * Flat curve of 100 per level keeps experience arithmetic easy to follow
 */
export function testCatalogData(): CatalogData {
  return {
    defaultLevelRange: { min: 1, max: 50 },
    defaultMove: 'tackle',
    experienceCurve: { type: 'flat', amount: 100 },
    rarityWeights: [
      { tier: 'COMMON', weight: 0.6 },
      { tier: 'UNCOMMON', weight: 0.3 },
      { tier: 'RARE', weight: 0.1 },
      { tier: 'EPIC', weight: 0 },
      { tier: 'LEGENDARY', weight: 0 },
      { tier: 'MYTHICAL', weight: 0 },
    ],
    typeChart: {
      fire: { grass: 2, water: 0.5 },
      normal: { ghost: 0 },
    },
    moves: [
      { code: 'tackle', name: 'Tackle', type: 'normal', power: 40, category: 'PHYSICAL' },
      { code: 'ember', name: 'Ember', type: 'fire', power: 40, category: 'SPECIAL' },
    ],
    items: [
      { code: 'potion', name: 'Potion', heal: 20, price: 100 },
      { code: 'elixir', name: 'Elixir', heal: 50 },
    ],
    species: [
      {
        code: 'pebble',
        name: 'Pebble',
        types: ['normal'],
        baseStats: { hp: 50, attack: 50, defense: 50, specialAttack: 50, specialDefense: 50, speed: 40 },
        rarity: 'COMMON',
        movePool: ['tackle'],
        levelRange: { min: 5, max: 5 },
      },
      {
        code: 'spark',
        name: 'Spark',
        types: ['fire'],
        baseStats: { hp: 40, attack: 50, defense: 40, specialAttack: 60, specialDefense: 40, speed: 60 },
        rarity: 'UNCOMMON',
        evolution: { into: 'blaze', level: 10 },
        movePool: ['tackle', 'ember'],
        levelRange: { min: 3, max: 8 },
      },
      {
        code: 'blaze',
        name: 'Blaze',
        types: ['fire'],
        baseStats: { hp: 60, attack: 70, defense: 55, specialAttack: 80, specialDefense: 55, speed: 75 },
        rarity: 'RARE',
        evolution: { into: 'inferno', level: 20 },
        movePool: ['tackle', 'ember'],
      },
      {
        code: 'inferno',
        name: 'Inferno',
        types: ['fire'],
        baseStats: { hp: 80, attack: 90, defense: 70, specialAttack: 100, specialDefense: 70, speed: 90 },
        rarity: 'EPIC',
        movePool: ['ember'],
      },
      {
        code: 'shade',
        name: 'Shade',
        types: ['ghost'],
        baseStats: { hp: 50, attack: 50, defense: 50, specialAttack: 50, specialDefense: 50, speed: 50 },
        rarity: 'LEGENDARY',
        movePool: ['tackle'],
      },
    ],
  };
}

export function testCatalog(): SpeciesCatalog {
  return new SpeciesCatalog(testCatalogData());
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return buildAppConfig({ DB_PATH: MEMORY_PATH, SWEEP_ENABLED: 'false', ...env });
}

export interface TestEngine extends EngineServices {
  db: DatabaseConnection;
  clock: ManualClock;
  store: MemoryCoordinationStore;
}

export interface TestEngineOptions {
  env?: NodeJS.ProcessEnv;
  random?: RandomSource;
  seededRandom?: SeededRandomFactory;
  now?: number;
}

/**
 * Full engine over an in-memory document and an in-process coordination store
 * Random draws default to 0.5, which the expected values in tests are traced from
 */
export async function createTestEngine(options: TestEngineOptions = {}): Promise<TestEngine> {
  const clock = new ManualClock(options.now ?? T0);
  const store = new MemoryCoordinationStore(clock);
  const db = await openDatabase({ path: MEMORY_PATH });
  const services = await createEngineServices(testConfig(options.env), {
    db,
    catalog: testCatalog(),
    coordination: store,
    clock,
    random: options.random ?? new FixedRandomSource([], 0.5),
    seededRandom: options.seededRandom ?? (() => new FixedRandomSource([], 0.5)),
  });
  return { ...services, db, clock, store };
}

export function buildCreature(
  ownerId: string,
  speciesCode: string,
  level: number,
  overrides: Partial<Creature> = {}
): Creature {
  const species = testCatalog().getSpecies(speciesCode);
  if (!species) throw new Error(`unknown test species ${speciesCode}`);
  const nature: Nature = overrides.nature ?? 'hardy';
  return {
    id: uuidv4(),
    ownerId,
    speciesCode,
    level,
    experience: 0,
    nature,
    isShiny: false,
    rarity: species.rarity,
    stats: calculateStats(species.baseStats, level, nature),
    inTeam: false,
    createdAt: T0,
    revision: 1,
    ...overrides,
  };
}

export async function seedCreature(db: DatabaseConnection, creature: Creature): Promise<Creature> {
  await db.atomicUpdate((data) => {
    data.creatures.push(creatureToRow(creature));
  });
  return creature;
}

/**
 * A user holding one creature per species code, all in the active team
 */
export async function seedTrainer(
  engine: TestEngine,
  userId: string,
  team: Array<{ species: string; level: number }>
): Promise<Creature[]> {
  await engine.trainers.getOrCreateUser(userId);
  const creatures: Creature[] = [];
  for (const member of team) {
    creatures.push(await seedCreature(engine.db, buildCreature(userId, member.species, member.level)));
  }
  if (creatures.length > 0) {
    const result = await engine.trainers.setActiveTeam(userId, creatures.map((c) => c.id));
    if (!result.ok) throw new Error(`could not set team for ${userId}`);
  }
  return creatures;
}
