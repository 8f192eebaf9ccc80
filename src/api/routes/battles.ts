// API layer: Battle routes

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { BattleEngine } from '@/application/battle/BattleEngine.js';
import { respond } from './respond.js';

// ========== Schemas ==========

const StartBattleSchema = z.object({
  challengerId: z.string().min(1).max(100),
  opponentId: z.string().min(1).max(100).nullable().default(null),
});

const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('MOVE'), moveCode: z.string().min(1) }),
  z.object({ type: z.literal('SWITCH'), toIndex: z.number().int().min(0) }),
  z.object({ type: z.literal('ITEM'), itemCode: z.string().min(1) }),
]);

const TurnSchema = z.object({
  userId: z.string().min(1).max(100),
  turn: z.number().int().min(1),
  action: ActionSchema,
});

const ParticipantSchema = z.object({
  userId: z.string().min(1).max(100),
});

// ========== Routes ==========

export function createBattleRouter(battles: BattleEngine): Router {
  const router = Router();

  // Challenge a player, or a generated team when opponentId is null
  router.post(
    '/battles',
    asyncHandler(async (req: Request, res: Response) => {
      const { challengerId, opponentId } = StartBattleSchema.parse(req.body);
      respond(res, await battles.startBattle(challengerId, opponentId), 'battle', 201);
    })
  );

  router.get(
    '/battles/:id',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await battles.getBattle(req.params.id), 'battle');
    })
  );

  router.post(
    '/battles/:id/turns',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId, turn, action } = TurnSchema.parse(req.body);
      respond(res, await battles.submitTurn(req.params.id, userId, turn, action), 'submission');
    })
  );

  router.post(
    '/battles/:id/forfeit',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId } = ParticipantSchema.parse(req.body);
      respond(res, await battles.forfeit(req.params.id, userId), 'battle');
    })
  );

  router.get(
    '/battles/:id/replay',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await battles.replayBattle(req.params.id), 'replay');
    })
  );

  return router;
}
