// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { EngineServices } from '@/infrastructure/EngineFactory.js';
import { engineMetrics } from '@/utils/logger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requireServiceKey } from './middleware/serviceKey.js';
import { createBattleRouter } from './routes/battles.js';
import { createCreatureRouter } from './routes/creatures.js';
import { createShopRouter } from './routes/shop.js';
import { createSpawnRouter } from './routes/spawns.js';
import { createTradeRouter } from './routes/trades.js';
import { createUserRouter } from './routes/users.js';

export interface AppOptions {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;     // null disables access logging
}

export function createApp(services: EngineServices, options: Partial<AppOptions> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
  }));

  // Logging
  if (logFormat) {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      storage: services.database.getStats(),
      maintenance: services.maintenance.getStatus(),
      metrics: engineMetrics.getAll(),
    });
  });

  // Every API route requires the service key when one is configured
  app.use('/api', requireServiceKey(services.config.apiKey));

  app.use('/api', createSpawnRouter(services.spawns));
  app.use('/api', createCreatureRouter(services.progression));
  app.use('/api', createUserRouter(services.trainers));
  app.use('/api', createShopRouter(services.catalog, services.trainers));
  app.use('/api', createBattleRouter(services.battles));
  app.use('/api', createTradeRouter(services.trades));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
