// API layer: EngineResult -> HTTP

import type { Response } from 'express';
import type { EngineResult, FailureKind } from '@/domain/shared/result.js';

export const FAILURE_STATUS: Record<FailureKind, number> = {
  CONTENTION: 409,
  STALE_STATE: 410,
  INVALID_INPUT: 400,
  NOT_FOUND: 404,
};

/**
 * Send a result; `key` names the payload field on success
 */
export function respond<T>(res: Response, result: EngineResult<T>, key: string, successStatus = 200): void {
  if (result.ok) {
    res.status(successStatus).json({ success: true, [key]: result.value });
    return;
  }

  const { kind, code, message, details } = result.error;
  res.status(FAILURE_STATUS[kind]).json({
    success: false,
    error: { kind, code, message, ...(details ? { details } : {}) },
  });
}
