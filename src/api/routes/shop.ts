// API layer: Shop routes
// Priced catalog items and purchases

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { ISpeciesCatalog } from '@/domain/catalog/types.js';
import { MAX_PURCHASE_QUANTITY, type TrainerService } from '@/application/trainer/TrainerService.js';
import { respond } from './respond.js';

const PurchaseSchema = z.object({
  itemCode: z.string().min(1),
  quantity: z.number().int().min(1).max(MAX_PURCHASE_QUANTITY).default(1),
});

export function createShopRouter(catalog: ISpeciesCatalog, trainers: TrainerService): Router {
  const router = Router();

  router.get('/shop', (_req: Request, res: Response) => {
    res.json({ success: true, items: catalog.shopItems() });
  });

  router.post(
    '/users/:id/purchases',
    asyncHandler(async (req: Request, res: Response) => {
      const { itemCode, quantity } = PurchaseSchema.parse(req.body);
      respond(res, await trainers.purchaseItem(req.params.id, itemCode, quantity), 'purchase', 201);
    })
  );

  return router;
}
