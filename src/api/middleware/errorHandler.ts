// API layer: Global error handler middleware

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { serverLogger } from '@/utils/logger.js';

interface ErrorShape {
  statusCode: number;
  code: string;
  details?: unknown;
}

// Engine errors and body-parser errors both carry statusCode/code
function shapeOf(err: Error): ErrorShape {
  if (err instanceof ZodError) {
    return { statusCode: 400, code: 'VALIDATION_ERROR', details: err.issues };
  }
  const statusCode = 'statusCode' in err && typeof err.statusCode === 'number' ? err.statusCode : 500;
  const code = 'code' in err && typeof err.code === 'string' ? err.code : 'INTERNAL_ERROR';
  const details = 'details' in err ? err.details : undefined;
  return { statusCode, code, details };
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, code, details } = shapeOf(err);

  if (statusCode >= 500) {
    serverLogger.error(err.message, { code, stack: err.stack });
  } else {
    serverLogger.debug(err.message, { code });
  }

  // Don't leak error details in production
  const isProduction = process.env.NODE_ENV === 'production';
  const message = isProduction && statusCode >= 500
    ? 'Internal server error'
    : err.message;

  res.status(statusCode).json({
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && !isProduction ? { details } : {}),
    },
  });
}

// Async handler wrapper to avoid try-catch in every route
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
