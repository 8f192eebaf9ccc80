// API layer: Trade routes

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { TradeEngine } from '@/application/trade/TradeEngine.js';
import { respond } from './respond.js';

// ========== Schemas ==========

// Quantities and amounts are checked by the engine so they surface as INVALID_OFFER
const AssetSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('CREATURE'), creatureId: z.string().min(1) }),
  z.object({ type: z.literal('ITEM'), itemCode: z.string().min(1), quantity: z.number() }),
  z.object({ type: z.literal('COINS'), amount: z.number() }),
]);

const ProposeSchema = z.object({
  proposerId: z.string().min(1).max(100),
  counterpartyId: z.string().min(1).max(100),
  offer: z.array(AssetSchema),
});

const CounterSchema = z.object({
  userId: z.string().min(1).max(100),
  offer: z.array(AssetSchema),
});

const ParticipantSchema = z.object({
  userId: z.string().min(1).max(100),
});

// ========== Routes ==========

export function createTradeRouter(trades: TradeEngine): Router {
  const router = Router();

  router.post(
    '/trades',
    asyncHandler(async (req: Request, res: Response) => {
      const { proposerId, counterpartyId, offer } = ProposeSchema.parse(req.body);
      respond(res, await trades.propose(proposerId, counterpartyId, offer), 'trade', 201);
    })
  );

  router.get(
    '/trades/:id',
    asyncHandler(async (req: Request, res: Response) => {
      respond(res, await trades.getTrade(req.params.id), 'trade');
    })
  );

  router.post(
    '/trades/:id/counter',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId, offer } = CounterSchema.parse(req.body);
      respond(res, await trades.addCounterOffer(req.params.id, userId, offer), 'trade');
    })
  );

  router.post(
    '/trades/:id/confirm',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId } = ParticipantSchema.parse(req.body);
      respond(res, await trades.confirm(req.params.id, userId), 'trade');
    })
  );

  router.post(
    '/trades/:id/cancel',
    asyncHandler(async (req: Request, res: Response) => {
      const { userId } = ParticipantSchema.parse(req.body);
      respond(res, await trades.cancel(req.params.id, userId), 'trade');
    })
  );

  return router;
}
