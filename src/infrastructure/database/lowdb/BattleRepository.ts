// Battle Repository - LowDB implementation

import type { DatabaseConnection, BattleRecord, UserRecord } from './connection.js';
import type { Battle, BattleSettlement, CreateBattleOutcome } from '@/domain/battle/types.js';
import type { IBattleRepository } from '@/domain/battle/repository.js';
import { DataIntegrityError } from '@/utils/errors.js';
import { battleToRow, fromIso, rowToBattle } from './mappers.js';

function humanParticipants(sides: BattleRecord['sides']): string[] {
  const ids: string[] = [];
  for (const side of sides) {
    if (side.controller === 'PLAYER' && side.userId !== null) ids.push(side.userId);
  }
  return ids;
}

/**
 * Move a battle bag out of the inventory; the bag shrinks to what is still held
 */
function withdrawBag(user: UserRecord, bag: Record<string, number>): Record<string, number> {
  const withdrawn: Record<string, number> = {};
  for (const [code, quantity] of Object.entries(bag)) {
    const held = user.inventory[code] ?? 0;
    const taken = Math.min(held, quantity);
    if (taken <= 0) continue;
    withdrawn[code] = taken;
    if (held === taken) {
      delete user.inventory[code];
    } else {
      user.inventory[code] = held - taken;
    }
  }
  return withdrawn;
}

export class BattleRepository implements IBattleRepository {
  constructor(private db: DatabaseConnection) {}

  async createIfIdle(battle: Battle): Promise<CreateBattleOutcome> {
    return this.db.atomicUpdate((data): CreateBattleOutcome => {
      for (const userId of humanParticipants(battle.sides)) {
        const busy = data.battles.find(
          (b) => b.status === 'IN_PROGRESS' && humanParticipants(b.sides).includes(userId)
        );
        if (busy) return { status: 'BUSY', userId, battleId: busy.id };
      }

      const bags = new Map<string, Record<string, number>>();
      for (const side of battle.sides) {
        if (side.controller !== 'PLAYER' || side.userId === null) continue;
        const user = data.users.find((u) => u.id === side.userId);
        if (!user) {
          throw new DataIntegrityError('Battle participant has no user record', { userId: side.userId });
        }
        bags.set(side.side, withdrawBag(user, side.items));
        user.revision += 1;
      }

      const withBags = (sides: Battle['sides']): Battle['sides'] => [
        { ...sides[0], items: bags.get(sides[0].side) ?? sides[0].items },
        { ...sides[1], items: bags.get(sides[1].side) ?? sides[1].items },
      ];
      const row = battleToRow({
        ...battle,
        sides: withBags(battle.sides),
        initialSides: withBags(battle.initialSides),
      });
      data.battles.push(row);
      return { status: 'CREATED', battle: rowToBattle(row) };
    });
  }

  async findById(id: string): Promise<Battle | null> {
    const row = this.db.getData().battles.find((b) => b.id === id);
    return row ? rowToBattle(row) : null;
  }

  async findInProgressForUser(userId: string): Promise<Battle | null> {
    const row = this.db
      .getData()
      .battles.find((b) => b.status === 'IN_PROGRESS' && humanParticipants(b.sides).includes(userId));
    return row ? rowToBattle(row) : null;
  }

  async compareAndSwap(battle: Battle): Promise<Battle | null> {
    return this.db.atomicUpdate((data) => {
      const idx = data.battles.findIndex((b) => b.id === battle.id);
      if (idx === -1 || data.battles[idx].revision !== battle.revision) return null;

      const next = battleToRow({ ...battle, revision: battle.revision + 1 });
      data.battles[idx] = next;
      return rowToBattle(next);
    });
  }

  /**
   * Write the finished battle, apply win/loss counters and coins, and return unused bag items
   */
  async settle(battle: Battle, settlement: BattleSettlement): Promise<Battle | null> {
    return this.db.atomicUpdate((data) => {
      const idx = data.battles.findIndex((b) => b.id === battle.id);
      if (idx === -1 || data.battles[idx].revision !== battle.revision) return null;

      for (const entry of settlement.users) {
        const user = data.users.find((u) => u.id === entry.userId);
        if (!user) {
          throw new DataIntegrityError('Battle participant has no user record', {
            battleId: battle.id,
            userId: entry.userId,
          });
        }
        if (entry.outcome === 'WON') user.battles_won += 1;
        if (entry.outcome === 'LOST') user.battles_lost += 1;
        user.coins += entry.coins;
        for (const [code, quantity] of Object.entries(entry.returnedItems)) {
          if (quantity > 0) user.inventory[code] = (user.inventory[code] ?? 0) + quantity;
        }
        user.revision += 1;
      }

      const next = battleToRow({ ...battle, revision: battle.revision + 1 });
      data.battles[idx] = next;
      return rowToBattle(next);
    });
  }

  /**
   * IN_PROGRESS battles whose inactivity deadline has passed
   */
  async listOverdue(now: number): Promise<Battle[]> {
    return this.db
      .getData()
      .battles.filter((b) => b.status === 'IN_PROGRESS' && now >= fromIso(b.expires_at, 'battles.expires_at'))
      .map((b) => rowToBattle(b));
  }
}
