// API layer: Creature routes

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { ProgressionEngine } from '@/application/progression/ProgressionEngine.js';
import { respond } from './respond.js';

const ExperienceSchema = z.object({
  amount: z.number().int().min(0),
});

export function createCreatureRouter(progression: ProgressionEngine): Router {
  const router = Router();

  router.post(
    '/creatures/:id/experience',
    asyncHandler(async (req: Request, res: Response) => {
      const { amount } = ExperienceSchema.parse(req.body);
      respond(res, await progression.awardExperience(req.params.id, amount), 'progress');
    })
  );

  return router;
}
