// API layer: Spawn routes
// Chat activity, spawns and claims

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { SpawnEngine } from '@/application/spawn/SpawnEngine.js';
import type { ActivityOutcome } from '@/domain/spawn/types.js';
import { respond } from './respond.js';

const ClaimSchema = z.object({
  userId: z.string().min(1).max(100),
});

function sendActivity(res: Response, outcome: ActivityOutcome): void {
  switch (outcome.status) {
    case 'SPAWNED':
      res.status(201).json({ success: true, status: outcome.status, spawn: outcome.spawn });
      return;
    case 'ON_COOLDOWN':
      res.json({ success: true, status: outcome.status, retryAfterMs: outcome.retryAfterMs });
      return;
    case 'SKIPPED':
      res.json({ success: true, status: outcome.status });
      return;
  }
}

export function createSpawnRouter(spawns: SpawnEngine): Router {
  const router = Router();

  // Force a spawn attempt in a chat
  router.post(
    '/chats/:chatId/spawns',
    asyncHandler(async (req: Request, res: Response) => {
      sendActivity(res, await spawns.triggerSpawn(req.params.chatId));
    })
  );

  // A chat message; may or may not spawn
  router.post(
    '/chats/:chatId/activity',
    asyncHandler(async (req: Request, res: Response) => {
      sendActivity(res, await spawns.recordActivity(req.params.chatId));
    })
  );

  router.get(
    '/spawns/:id',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await spawns.getSpawn(req.params.id), 'spawn');
    })
  );

  router.post(
    '/spawns/:id/claim',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId } = ClaimSchema.parse(req.body);
      respond(res, await spawns.claim(req.params.id, userId), 'claim', 201);
    })
  );

  return router;
}
