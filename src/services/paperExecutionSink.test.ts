import { describe, expect, it } from 'vitest';
import { TradeAction } from '../enum/tradeAction';
import { TradeStatus } from '../enum/tradeStatus';
import type { TradeRecord } from '../models/TradeRecord';
import { PaperExecutionSink } from './paperExecutionSink';

const entry: TradeRecord = {
  id: 'csv_0',
  action: TradeAction.ENTRY,
  side: 'SELL',
  instrument: 'EUR/USD',
  quantity: 2000,
  executeAt: 1_000_000,
  prepareAt: 970_000,
  sourceRow: 0,
  status: TradeStatus.PENDING
};

const exit: TradeRecord = {
  ...entry,
  id: 'csv_0_exit',
  action: TradeAction.EXIT,
  executeAt: 1_060_000,
  prepareAt: 1_030_000,
  linkedEntryId: 'csv_0'
};

describe('PaperExecutionSink', () => {
  it('abre e fecha a posição simulada', async () => {
    const sink = new PaperExecutionSink(() => 42);

    await sink.prepare(entry);
    await expect(sink.execute(entry)).resolves.toEqual({ ok: true, diagnostic: { mode: 'paper', openPositions: 1 } });
    expect(sink.getOpenPositions()).toEqual([
      { entryId: 'csv_0', instrument: 'EUR/USD', side: 'SELL', quantity: 2000, openedAt: 42 }
    ]);

    await sink.prepare(exit);
    await sink.execute(exit);
    expect(sink.getOpenPositions()).toEqual([]);
  });

  it('recusa execute sem prepare', async () => {
    const sink = new PaperExecutionSink();
    await expect(sink.execute(entry)).resolves.toEqual({ ok: false, diagnostic: { mode: 'paper', reason: 'not prepared' } });
    expect(sink.getCalls()).toEqual([{ op: 'execute', recordId: 'csv_0' }]);
  });
});
