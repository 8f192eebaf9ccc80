// API Middleware: Service key check
// The engine sits behind a chat bot; the bot presents a shared key

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export const SERVICE_KEY_HEADER = 'x-engine-key';

function sameKey(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `x-engine-key` to match; no key configured means no check
 */
export function requireServiceKey(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const presented = req.header(SERVICE_KEY_HEADER);
    if (!presented || !sameKey(presented, apiKey)) {
      res.status(401).json({
        success: false,
        error: { code: 'UNAUTHORIZED', message: 'Missing or invalid service key' },
      });
      return;
    }

    next();
  };
}
