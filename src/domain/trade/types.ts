// Domain layer: Trade types
// Two-party escrow with a confirmation handshake

export type TradeAsset =
  | { type: 'CREATURE'; creatureId: string }
  | { type: 'ITEM'; itemCode: string; quantity: number }
  | { type: 'COINS'; amount: number };

export type TradeOffer = TradeAsset[];

export type TradeStatus =
  | 'PROPOSED'
  | 'PARTIALLY_CONFIRMED'
  | 'CONFIRMED'
  | 'CANCELLED'
  | 'EXPIRED';

export type CancelReason = 'BY_USER' | 'STALE_OFFER';

export type TradeRole = 'proposer' | 'counterparty';

export interface Trade {
  id: string;
  proposerId: string;
  counterpartyId: string;
  proposerOffer: TradeOffer;
  counterpartyOffer: TradeOffer | null;
  confirmations: Record<TradeRole, boolean>;
  status: TradeStatus;
  cancelReason?: CancelReason;
  createdAt: number;
  expiresAt: number;
  completedAt?: number;
  revision: number;
}

const TERMINAL: readonly TradeStatus[] = ['CONFIRMED', 'CANCELLED', 'EXPIRED'];

export function isTerminal(status: TradeStatus): boolean {
  return TERMINAL.includes(status);
}

export function roleOf(trade: Pick<Trade, 'proposerId' | 'counterpartyId'>, userId: string): TradeRole | null {
  if (trade.proposerId === userId) return 'proposer';
  if (trade.counterpartyId === userId) return 'counterparty';
  return null;
}

export interface OfferProblem {
  asset: TradeAsset;
  reason: 'NOT_OWNED' | 'INSUFFICIENT_ITEMS' | 'INSUFFICIENT_COINS';
}

export type ExchangeOutcome =
  | { status: 'CONFIRMED'; trade: Trade }
  | { status: 'STALE_OFFER'; trade: Trade; problems: OfferProblem[] }
  | { status: 'CONFLICT' };
