// src/services/paperExecutionSink.ts

import { TradeAction } from "../enum/tradeAction";
import type { TradeRecord, TradeSide } from "../models/TradeRecord";
import type { ExecutionSink, SinkResult } from "../robot/executionSink";

export interface PaperCall {
  op: 'prepare' | 'execute';
  recordId: string;
}

export interface PaperPosition {
  entryId: string;
  instrument: string;
  side: TradeSide;
  quantity: number;
  openedAt: number;
}

/**
 * Sink de simulação: não toca em corretora nenhuma, só registra as chamadas
 * e mantém as posições abertas em memória. Usado no --dry-run.
 */
export class PaperExecutionSink implements ExecutionSink {
  private calls: PaperCall[] = [];
  private positions: PaperPosition[] = [];
  private prepared = new Set<string>();

  constructor(private clock: () => number = Date.now) {}

  async prepare(record: TradeRecord): Promise<SinkResult> {
    this.calls.push({ op: 'prepare', recordId: record.id });
    this.prepared.add(record.id);
    console.log(`🧪 [paper] prepare ${record.id} ${record.instrument} ${record.side} ${record.quantity}`);
    return { ok: true, diagnostic: { mode: 'paper' } };
  }

  async execute(record: TradeRecord): Promise<SinkResult> {
    this.calls.push({ op: 'execute', recordId: record.id });

    if (!this.prepared.has(record.id)) {
      return { ok: false, diagnostic: { mode: 'paper', reason: 'not prepared' } };
    }

    if (record.action === TradeAction.ENTRY) {
      // abertura
      this.positions.push({
        entryId: record.id,
        instrument: record.instrument,
        side: record.side,
        quantity: record.quantity,
        openedAt: this.clock()
      });
    } else {
      // fechamento
      this.positions = this.positions.filter(p => p.entryId !== record.linkedEntryId);
    }

    console.log(`🧪 [paper] execute ${record.id} (${record.action}) -> posições abertas: ${this.positions.length}`);
    return { ok: true, diagnostic: { mode: 'paper', openPositions: this.positions.length } };
  }

  getCalls(): readonly PaperCall[] {
    return this.calls;
  }

  getOpenPositions(): readonly PaperPosition[] {
    return this.positions;
  }
}
