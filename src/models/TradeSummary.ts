import { TradeStatus } from '../enum/tradeStatus';

export interface TradeSummary {
  total: number;
  byInstrument: Record<string, number>;
  /** menor executeAt (epoch ms), null para agenda vazia */
  earliest: number | null;
  latest: number | null;
  byStatus: Record<TradeStatus, number>;
}
