import { describe, it, expect } from 'vitest';
import type { Battle, BattleAction } from '@/domain/battle/types.js';
import { coordinationKeys } from '@/application/coordination/keys.js';
import { turnSeed } from '@/application/battle/BattleEngine.js';
import { FixedRandomSource, seededRandom } from '@/infrastructure/random/RandomSource.js';
import { createTestEngine, seedTrainer, type TestEngine } from '@/__tests__/helpers/fixtures.js';

const TACKLE: BattleAction = { type: 'MOVE', moveCode: 'tackle' };

// Every turn rolls the minimum damage factor, so a level 5 pebble tackle deals 13 of 21 hp
const minRolls = () => new FixedRandomSource([], 0);

async function pebbleDuel(options: Parameters<typeof createTestEngine>[0] = {}) {
  const engine = await createTestEngine({ seededRandom: minRolls, ...options });
  const [a] = await seedTrainer(engine, 'u1', [{ species: 'pebble', level: 5 }]);
  const [b] = await seedTrainer(engine, 'u2', [{ species: 'pebble', level: 5 }]);
  const started = await engine.battles.startBattle('u1', 'u2');
  if (!started.ok) throw new Error(`battle did not start: ${started.error.code}`);
  return { engine, battle: started.value, creatures: { a, b } };
}

async function playTurn(engine: TestEngine, battleId: string, turn: number, a: BattleAction, b: BattleAction) {
  const first = await engine.battles.submitTurn(battleId, 'u1', turn, a);
  if (!first.ok) throw new Error(`u1 turn ${turn}: ${first.error.code}`);
  const second = await engine.battles.submitTurn(battleId, 'u2', turn, b);
  if (!second.ok) throw new Error(`u2 turn ${turn}: ${second.error.code}`);
  return second.value.battle;
}

async function profile(engine: TestEngine, userId: string) {
  const result = await engine.trainers.getProfile(userId);
  if (!result.ok) throw new Error(`no profile for ${userId}`);
  return result.value;
}

function errorCode<T>(result: { ok: true; value: T } | { ok: false; error: { code: string } }): string | null {
  return result.ok ? null : result.error.code;
}

describe('BattleEngine', () => {
  describe('startBattle', () => {
    it('snapshots both teams and bags', async () => {
      const { battle, creatures } = await pebbleDuel();

      expect(battle).toMatchObject({ kind: 'PVP', status: 'IN_PROGRESS', turn: 1, winner: null, revision: 1 });
      expect(battle.sides[0]).toMatchObject({ side: 'A', userId: 'u1', controller: 'PLAYER', items: { potion: 3 } });
      expect(battle.sides[0].team[0]).toMatchObject({
        id: 'A1',
        creatureId: creatures.a.id,
        currentHp: 21,
        participated: true,
      });
      expect(battle.initialSides).toEqual(battle.sides);
    });

    it('generates an opponent for a solo battle', async () => {
      const engine = await createTestEngine();
      await seedTrainer(engine, 'u1', [
        { species: 'pebble', level: 5 },
        { species: 'pebble', level: 5 },
      ]);

      const result = await engine.battles.startBattle('u1', null);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.kind).toBe('PVE');
      expect(result.value.sides[1]).toMatchObject({ controller: 'AI', userId: null });
      expect(result.value.sides[1].team.map((c) => c.level)).toEqual([5, 5]);
    });

    it('rejects a self challenge and an empty team', async () => {
      const engine = await createTestEngine();
      await engine.trainers.getOrCreateUser('u1');

      expect(errorCode(await engine.battles.startBattle('u1', 'u1'))).toBe('SELF_CHALLENGE');
      expect(errorCode(await engine.battles.startBattle('u1', null))).toBe('EMPTY_TEAM');
      expect(errorCode(await engine.battles.startBattle('nobody', null))).toBe('NOT_FOUND');
    });

    it('rejects a team holding a creature the user no longer owns', async () => {
      const engine = await createTestEngine();
      await seedTrainer(engine, 'u1', [{ species: 'pebble', level: 5 }]);
      await engine.db.atomicUpdate((data) => {
        data.creatures[0].owner_id = 'u9';
      });

      expect(errorCode(await engine.battles.startBattle('u1', null))).toBe('INVALID_TEAM');
    });

    it('allows one battle per player at a time', async () => {
      const { engine, battle } = await pebbleDuel();

      const second = await engine.battles.startBattle('u1', null);

      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.code).toBe('BUSY');
        expect(second.error.details).toEqual({ userId: 'u1', battleId: battle.id });
      }
    });
  });

  describe('submitTurn', () => {
    it('waits for both players, then resolves the turn', async () => {
      const { engine, battle } = await pebbleDuel();

      const first = await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE);
      expect(first.ok && first.value.resolved).toBe(false);
      expect(first.ok && first.value.battle.pendingActions).toEqual({ A: TACKLE });

      const second = await engine.battles.submitTurn(battle.id, 'u2', 1, TACKLE);
      expect(second.ok).toBe(true);
      if (!second.ok) return;
      expect(second.value.resolved).toBe(true);
      expect(second.value.battle).toMatchObject({ turn: 2, pendingActions: {} });
      expect(second.value.battle.sides.map((s) => s.team[0].currentHp)).toEqual([8, 8]);
      expect(second.value.battle.turnHistory).toEqual([{ turn: 1, actions: { A: TACKLE, B: TACKLE } }]);
      expect(second.value.battle.log.map((e) => [e.turn, e.index, e.type])).toEqual([
        [1, 0, 'MOVE'],
        [1, 1, 'MOVE'],
      ]);
    });

    it('settles a knockout with coins, counters and experience', async () => {
      const { engine, battle, creatures } = await pebbleDuel();
      await playTurn(engine, battle.id, 1, TACKLE, TACKLE);

      const finished = await playTurn(engine, battle.id, 2, TACKLE, TACKLE);

      expect(finished).toMatchObject({ status: 'COMPLETE', winner: 'A', endReason: 'KNOCKOUT' });
      expect(finished.log.map((e) => e.type)).toEqual(['MOVE', 'MOVE', 'MOVE', 'FAINT', 'END']);
      expect(finished.experienceAwards).toEqual([{ creatureId: creatures.a.id, amount: 100 }]);

      expect(await profile(engine, 'u1')).toMatchObject({ coins: 1110, battlesWon: 1, battlesLost: 0 });
      expect(await profile(engine, 'u2')).toMatchObject({ coins: 1000, battlesWon: 0, battlesLost: 1 });
      expect(await engine.database.creatures.findById(creatures.a.id)).toMatchObject({ level: 6, experience: 0 });
      expect(await engine.database.creatures.findById(creatures.b.id)).toMatchObject({ level: 5, experience: 0 });
    });

    it('plays the generated side automatically', async () => {
      // Default rolls of 0.5 give a timid level 5 pebble that outspeeds the player
      const engine = await createTestEngine();
      await seedTrainer(engine, 'u1', [{ species: 'pebble', level: 5 }]);
      const started = await engine.battles.startBattle('u1', null);
      if (!started.ok) throw new Error('battle did not start');

      const turn1 = await engine.battles.submitTurn(started.value.id, 'u1', 1, TACKLE);
      expect(turn1.ok && turn1.value.resolved).toBe(true);
      if (!turn1.ok) return;
      expect(turn1.value.battle.log.map((e) => (e.type === 'MOVE' ? [e.side, e.damage, e.targetHp] : e.type))).toEqual([
        ['B', 12, 9],
        ['A', 14, 7],
      ]);

      const turn2 = await engine.battles.submitTurn(started.value.id, 'u1', 2, TACKLE);
      expect(turn2.ok && turn2.value.battle).toMatchObject({ status: 'COMPLETE', winner: 'B' });
      expect(await profile(engine, 'u1')).toMatchObject({ battlesLost: 1, coins: 1000 });
    });

    it('rejects out-of-turn, repeated and foreign submissions', async () => {
      const { engine, battle } = await pebbleDuel();
      await engine.trainers.getOrCreateUser('u3');

      expect(errorCode(await engine.battles.submitTurn(battle.id, 'u1', 2, TACKLE))).toBe('TURN_MISMATCH');
      expect(errorCode(await engine.battles.submitTurn(battle.id, 'u3', 1, TACKLE))).toBe('NOT_PARTICIPANT');
      expect(
        errorCode(await engine.battles.submitTurn(battle.id, 'u1', 1, { type: 'MOVE', moveCode: 'ember' }))
      ).toBe('UNKNOWN_MOVE');

      await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE);
      expect(errorCode(await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE))).toBe('ACTION_ALREADY_SUBMITTED');
      expect(errorCode(await engine.battles.submitTurn('missing', 'u1', 1, TACKLE))).toBe('NOT_FOUND');
    });

    it('turns away a submission while another holds the battle', async () => {
      const { engine, battle } = await pebbleDuel();
      await engine.store.set(coordinationKeys.battleLock(battle.id), 'someone-else', 5000);

      const result = await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('CONTENTION');
        expect(result.error.code).toBe('LOCK_BUSY');
      }
    });

    it('refuses actions once the battle is over', async () => {
      const { engine, battle } = await pebbleDuel();
      await engine.battles.forfeit(battle.id, 'u2');

      const result = await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE);

      expect(!result.ok && result.error.kind).toBe('STALE_STATE');
      expect(errorCode(result)).toBe('BATTLE_OVER');
    });
  });

  describe('forfeit', () => {
    it('awards the other side and returns unused bag items', async () => {
      const { engine, battle, creatures } = await pebbleDuel();
      await playTurn(engine, battle.id, 1, { type: 'ITEM', itemCode: 'potion' }, TACKLE);

      const result = await engine.battles.forfeit(battle.id, 'u1');

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatchObject({ status: 'COMPLETE', winner: 'B', endReason: 'FORFEIT' });
      expect(result.value.log[result.value.log.length - 1]).toEqual({
        type: 'END',
        winner: 'B',
        reason: 'FORFEIT',
        turn: 2,
        index: 2,
      });
      expect(await profile(engine, 'u1')).toMatchObject({ inventory: { potion: 2 }, battlesLost: 1 });
      expect(await profile(engine, 'u2')).toMatchObject({ inventory: { potion: 3 }, coins: 1110, battlesWon: 1 });
      expect(await engine.database.creatures.findById(creatures.b.id)).toMatchObject({ level: 6 });
    });

    it('only lets players forfeit', async () => {
      const { engine, battle } = await pebbleDuel();

      expect(errorCode(await engine.battles.forfeit(battle.id, 'u3'))).toBe('NOT_PARTICIPANT');
    });
  });

  describe('battle bag', () => {
    it('holds bag items out of the inventory while the battle runs', async () => {
      const { engine, battle } = await pebbleDuel();

      expect((await profile(engine, 'u1')).inventory).toEqual({});
      expect((await profile(engine, 'u2')).inventory).toEqual({});

      await engine.battles.forfeit(battle.id, 'u2');

      expect((await profile(engine, 'u1')).inventory).toEqual({ potion: 3 });
      expect((await profile(engine, 'u2')).inventory).toEqual({ potion: 3 });
    });

    it('keeps potions from being traded away and used in battle', async () => {
      const engine = await createTestEngine({ seededRandom: minRolls });
      await seedTrainer(engine, 'u1', [{ species: 'pebble', level: 5 }]);
      await seedTrainer(engine, 'u2', [{ species: 'pebble', level: 5 }]);
      await engine.trainers.getOrCreateUser('u3');
      const potions = [{ type: 'ITEM' as const, itemCode: 'potion', quantity: 3 }];

      const early = await engine.trades.propose('u1', 'u3', potions);
      if (!early.ok) throw new Error(`proposal failed: ${early.error.code}`);
      await engine.trades.addCounterOffer(early.value.id, 'u3', []);

      const started = await engine.battles.startBattle('u1', 'u2');
      if (!started.ok) throw new Error(`battle did not start: ${started.error.code}`);

      await engine.trades.confirm(early.value.id, 'u1');
      expect(errorCode(await engine.trades.confirm(early.value.id, 'u3'))).toBe('STALE_OFFER');
      expect(errorCode(await engine.trades.propose('u1', 'u3', potions))).toBe('INVALID_OFFER');

      await playTurn(engine, started.value.id, 1, { type: 'ITEM', itemCode: 'potion' }, TACKLE);
      await engine.battles.forfeit(started.value.id, 'u1');

      const held = await Promise.all(['u1', 'u2', 'u3'].map(async (id) => (await profile(engine, id)).inventory.potion ?? 0));
      expect(held).toEqual([2, 3, 3]);
    });
  });

  describe('timeout', () => {
    it('reports an overdue battle as busy while another caller holds its lock', async () => {
      const { engine, battle } = await pebbleDuel();
      engine.clock.advance(300000);
      await engine.store.set(coordinationKeys.battleLock(battle.id), 'someone-else', 5000);

      const busy = await engine.battles.getBattle(battle.id);

      expect(busy.ok).toBe(false);
      if (busy.ok) return;
      expect(busy.error).toMatchObject({ kind: 'CONTENTION', code: 'LOCK_BUSY' });

      await engine.store.delete(coordinationKeys.battleLock(battle.id));
      const settled = await engine.battles.getBattle(battle.id);

      expect(settled.ok && settled.value).toMatchObject({ status: 'COMPLETE', winner: null, endReason: 'TIMEOUT' });
    });

    it('gives the win to the side that acted', async () => {
      const { engine, battle } = await pebbleDuel();
      await engine.battles.submitTurn(battle.id, 'u1', 1, TACKLE);
      engine.clock.advance(300000);

      const result = await engine.battles.getBattle(battle.id);

      expect(result.ok && result.value).toMatchObject({ status: 'COMPLETE', winner: 'A', endReason: 'TIMEOUT' });
      expect(await profile(engine, 'u1')).toMatchObject({ coins: 1110, battlesWon: 1 });
    });

    it('calls it a draw when nobody acted', async () => {
      const { engine, battle } = await pebbleDuel();
      engine.clock.advance(300000);

      expect(await engine.battles.timeoutOverdue()).toBe(1);

      const result = await engine.battles.getBattle(battle.id);
      expect(result.ok && result.value).toMatchObject({ status: 'COMPLETE', winner: null, endReason: 'TIMEOUT' });
      expect(await profile(engine, 'u1')).toMatchObject({ coins: 1000, battlesWon: 0, battlesLost: 0 });
      expect(await profile(engine, 'u2')).toMatchObject({ coins: 1000, battlesWon: 0, battlesLost: 0 });
    });

    it('frees a player stuck in an overdue battle to start another', async () => {
      const { engine } = await pebbleDuel();
      engine.clock.advance(300000);

      const next = await engine.battles.startBattle('u1', null);

      expect(next.ok).toBe(true);
    });

    it('counts nothing before the deadline', async () => {
      const { engine } = await pebbleDuel();
      engine.clock.advance(299999);

      expect(await engine.battles.timeoutOverdue()).toBe(0);
    });
  });

  describe('replayBattle', () => {
    async function playToEnd(engine: TestEngine, battle: Battle): Promise<Battle> {
      let current = battle;
      while (current.status === 'IN_PROGRESS') {
        current = await playTurn(engine, battle.id, current.turn, TACKLE, TACKLE);
      }
      return current;
    }

    it('reproduces the stored log from the seed', async () => {
      const { engine, battle } = await pebbleDuel({ seededRandom });
      const finished = await playToEnd(engine, battle);

      const result = await engine.battles.replayBattle(battle.id);

      expect(result.ok && result.value).toEqual({
        battleId: battle.id,
        turnsReplayed: finished.turnHistory.length,
        matches: true,
        storedWinner: 'A',
        replayedWinner: 'A',
        firstDivergence: null,
      });
    });

    it('points at the first entry that differs', async () => {
      const { engine, battle } = await pebbleDuel({ seededRandom });
      await playToEnd(engine, battle);
      await engine.db.atomicUpdate((data) => {
        const entry = data.battles[0].log[1];
        if (entry.type === 'MOVE') entry.damage += 1;
      });

      const result = await engine.battles.replayBattle(battle.id);

      expect(result.ok && result.value).toMatchObject({ matches: false, firstDivergence: 1 });
    });

    it('accepts a forfeit ending that turns do not explain', async () => {
      const { engine, battle } = await pebbleDuel({ seededRandom });
      await playTurn(engine, battle.id, 1, TACKLE, TACKLE);
      await engine.battles.forfeit(battle.id, 'u2');

      const result = await engine.battles.replayBattle(battle.id);

      expect(result.ok && result.value).toMatchObject({ matches: true, storedWinner: 'A', replayedWinner: null });
    });

    it('derives turn seeds from the battle seed', () => {
      expect(turnSeed('abc', 3)).toBe('abc:turn:3');
    });
  });
});
