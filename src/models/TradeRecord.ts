// src/models/TradeRecord.ts

import { TradeAction } from '../enum/tradeAction';
import { TradeStatus } from '../enum/tradeStatus';

export type TradeSide = 'BUY' | 'SELL';

/**
 * Uma ação agendada da agenda de trades. Tudo é fixado no carregamento,
 * exceto `status`, que só o Dispatcher altera.
 */
export interface TradeRecord {
  readonly id: string;
  readonly action: TradeAction;
  readonly side: TradeSide;
  readonly instrument: string;
  readonly quantity: number;
  /** epoch ms */
  readonly executeAt: number;
  /** executeAt - lead time */
  readonly prepareAt: number;
  /** Só em EXIT: a ENTRY que esta saída fecha */
  readonly linkedEntryId?: string;
  /** Índice da linha na fonte (para gravar "executado"/"fechado" de volta) */
  readonly sourceRow: number;
  status: TradeStatus;
}

export function compareByExecution(a: TradeRecord, b: TradeRecord): number {
  if (a.executeAt !== b.executeAt) {
    return a.executeAt - b.executeAt;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
