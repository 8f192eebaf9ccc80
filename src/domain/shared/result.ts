// Domain layer: Engine result types
// Expected outcomes (contention, stale state, bad input) are values, not exceptions

export type FailureKind = 'CONTENTION' | 'STALE_STATE' | 'INVALID_INPUT' | 'NOT_FOUND';

export type ContentionCode =
  | 'ALREADY_CLAIMED'
  | 'CLAIM_COOLDOWN'
  | 'LOCK_BUSY'
  | 'RETRY_EXHAUSTED';

export type StaleStateCode = 'EXPIRED' | 'STALE_OFFER' | 'BATTLE_OVER' | 'TRADE_CLOSED';

export type InvalidInputCode =
  | 'INVALID_AMOUNT'
  | 'INVALID_TEAM'
  | 'EMPTY_TEAM'
  | 'BUSY'
  | 'NOT_PARTICIPANT'
  | 'TURN_MISMATCH'
  | 'ACTION_ALREADY_SUBMITTED'
  | 'UNKNOWN_MOVE'
  | 'INVALID_SWITCH'
  | 'INSUFFICIENT_ITEMS'
  | 'INVALID_OFFER'
  | 'SELF_TRADE'
  | 'SELF_CHALLENGE'
  | 'TRADE_NOT_READY'
  | 'ALREADY_CLAIMED_TODAY'
  | 'INVALID_QUANTITY'
  | 'NOT_FOR_SALE'
  | 'INSUFFICIENT_COINS'
  | 'INVALID_NICKNAME'
  | 'NOT_OWNER'
  | 'INVALID_LIMIT';

export type FailureCode = ContentionCode | StaleStateCode | InvalidInputCode | 'NOT_FOUND';

export interface EngineFailure {
  kind: FailureKind;
  code: FailureCode;
  message: string;
  details?: Record<string, unknown>;
}

export type EngineResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: EngineFailure };

export function succeed<T>(value: T): EngineResult<T> {
  return { ok: true, value };
}

export function contention(
  code: ContentionCode,
  message: string,
  details?: Record<string, unknown>
): { ok: false; error: EngineFailure } {
  return { ok: false, error: { kind: 'CONTENTION', code, message, details } };
}

export function staleState(
  code: StaleStateCode,
  message: string,
  details?: Record<string, unknown>
): { ok: false; error: EngineFailure } {
  return { ok: false, error: { kind: 'STALE_STATE', code, message, details } };
}

export function invalidInput(
  code: InvalidInputCode,
  message: string,
  details?: Record<string, unknown>
): { ok: false; error: EngineFailure } {
  return { ok: false, error: { kind: 'INVALID_INPUT', code, message, details } };
}

export function notFound(
  message: string,
  details?: Record<string, unknown>
): { ok: false; error: EngineFailure } {
  return { ok: false, error: { kind: 'NOT_FOUND', code: 'NOT_FOUND', message, details } };
}
