// Application: Bounded optimistic retry
// An attempt returns null when its conditional write lost a race

import { contention, type EngineResult } from '@/domain/shared/result.js';

export async function withOptimisticRetry<T>(
  maxRetries: number,
  attempt: (attemptNumber: number) => Promise<EngineResult<T> | null>,
  onConflict?: (attemptNumber: number) => void
): Promise<EngineResult<T>> {
  for (let n = 0; n <= maxRetries; n++) {
    const result = await attempt(n);
    if (result !== null) return result;
    onConflict?.(n);
  }
  return contention('RETRY_EXHAUSTED', 'Gave up after repeated concurrent updates', {
    attempts: maxRetries + 1,
  });
}
