// API layer: Trainer routes
// Profiles, collections, active team, daily reward, nicknames and the leaderboard

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { MAX_LEADERBOARD_SIZE, type TrainerService } from '@/application/trainer/TrainerService.js';
import { MAX_NICKNAME_LENGTH } from '@/domain/creature/types.js';
import { LEADERBOARD_CATEGORIES } from '@/domain/user/types.js';
import { respond } from './respond.js';

// ========== Schemas ==========

const RegisterSchema = z.object({
  userId: z.string().min(1).max(100),
  username: z.string().min(1).max(100).optional(),
});

const TeamSchema = z.object({
  creatureIds: z.array(z.string().min(1)),
});

const NicknameSchema = z.object({
  nickname: z.string().max(MAX_NICKNAME_LENGTH),
});

const LeaderboardQuerySchema = z.object({
  category: z.enum(LEADERBOARD_CATEGORIES).default('LEVEL'),
  limit: z.coerce.number().int().min(1).max(MAX_LEADERBOARD_SIZE).default(10),
});

// ========== Routes ==========

export function createUserRouter(trainers: TrainerService): Router {
  const router = Router();

  // Get or create a profile on first contact
  router.post(
    '/users',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId, username } = RegisterSchema.parse(req.body);
      const user = await trainers.getOrCreateUser(userId, username);
      res.json({ success: true, user });
    })
  );

  router.get(
    '/users/:id',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await trainers.getProfile(req.params.id), 'user');
    })
  );

  router.get(
    '/users/:id/creatures',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await trainers.listCreatures(req.params.id), 'creatures');
    })
  );

  router.put(
    '/users/:id/team',
    asyncHandler(async (req: Request, res: Response) => {
      const { creatureIds } = TeamSchema.parse(req.body);
      respond(res, await trainers.setActiveTeam(req.params.id, creatureIds), 'user');
    })
  );

  router.post(
    '/users/:id/daily',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await trainers.claimDailyReward(req.params.id), 'reward');
    })
  );

  router.put(
    '/users/:id/creatures/:creatureId/nickname',
    asyncHandler(async (req: Request, res: Response) => {
      const { nickname } = NicknameSchema.parse(req.body);
      respond(res, await trainers.setNickname(req.params.id, req.params.creatureId, nickname), 'creature');
    })
  );

  router.get(
    '/leaderboard',
    asyncHandler(async (req: Request, res: Response) => {
      const { category, limit } = LeaderboardQuerySchema.parse(req.query);
      respond(res, await trainers.getLeaderboard(category, limit), 'leaderboard');
    })
  );

  return router;
}
