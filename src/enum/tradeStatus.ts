export enum TradeStatus {
  PENDING = 'PENDING',
  PREPARED = 'PREPARED',
  EXECUTED = 'EXECUTED',
  FAILED = 'FAILED',
  SKIPPED = 'SKIPPED'
}

// Transições permitidas: PENDING -> PREPARED -> EXECUTED | FAILED,
// e PENDING/PREPARED -> SKIPPED quando a agenda expira.
const ALLOWED_TRANSITIONS: Record<TradeStatus, readonly TradeStatus[]> = {
  [TradeStatus.PENDING]: [TradeStatus.PREPARED, TradeStatus.FAILED, TradeStatus.SKIPPED],
  [TradeStatus.PREPARED]: [TradeStatus.EXECUTED, TradeStatus.FAILED, TradeStatus.SKIPPED],
  [TradeStatus.EXECUTED]: [],
  [TradeStatus.FAILED]: [],
  [TradeStatus.SKIPPED]: []
};

export function canTransition(from: TradeStatus, to: TradeStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isOutstanding(status: TradeStatus): boolean {
  return status === TradeStatus.PENDING || status === TradeStatus.PREPARED;
}
