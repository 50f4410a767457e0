// src/readers/dataReader.ts

import { TradingSettings } from '../config/settings';
import { TradeRecord } from '../models/TradeRecord';
import { normalizeRows, RawRow } from './normalize';

export type { RawRow } from './normalize';

/** Coluna marcada como "yes" na fonte depois que a ação foi executada */
export type RowFlag = 'executed' | 'closed';

/**
 * Leitor de agenda. Cada fonte (Excel, CSV, Google Sheets) só precisa saber
 * carregar linhas cruas e gravar as marcas de volta; a normalização é comum.
 */
export abstract class DataReader {
  abstract readonly idPrefix: string;

  constructor(protected readonly trading: TradingSettings) {}

  /**
   * Lê as linhas cruas (cabeçalho -> célula).
   * Lança SourceUnavailable se a fonte não abre e SourceMalformed se não dá para ler as colunas.
   */
  abstract load(): Promise<RawRow[]>;

  /** Grava a marca de executado/fechado na linha. Retorna false se não conseguiu. */
  abstract markRow(rowIndex: number, flag: RowFlag): Promise<boolean>;

  abstract describe(): string;

  async readSchedule(now: number): Promise<TradeRecord[]> {
    const rows = await this.load();
    console.log(`📥 ${this.describe()}: ${rows.length} linhas lidas`);

    return normalizeRows(rows, {
      idPrefix: this.idPrefix,
      leadTimeMs: this.trading.lead_time_seconds * 1000,
      defaultLotSize: this.trading.default_lot_size,
      now
    });
  }
}

export function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
