import { describe, expect, it } from 'vitest';
import { SourceUnavailable } from '../errors';
import { columnLetter, GoogleSheetsDataReader, SheetsApi } from './googleSheetsDataReader';

const trading = { lead_time_seconds: 30, grace_window_seconds: 60, tick_interval_ms: 1000, default_lot_size: 100 };
const now = new Date(2026, 9, 19, 8, 0, 0).getTime();

class FakeSheetsApi implements SheetsApi {
  readonly ranges: string[] = [];
  readonly updates: Array<[string, string]> = [];

  constructor(private values: unknown[][], private failWith?: Error) {}

  async getValues(range: string): Promise<unknown[][]> {
    this.ranges.push(range);
    if (this.failWith) throw this.failWith;
    return this.values;
  }

  async updateValue(range: string, value: string): Promise<void> {
    this.updates.push([range, value]);
  }
}

function reader(api: SheetsApi) {
  return new GoogleSheetsDataReader('sheet-id', 'Trade Schedule', 'config/test-credentials.json', trading, api);
}

describe('columnLetter', () => {
  it('converte índice em letra A1', () => {
    expect([0, 4, 25, 26, 701].map(columnLetter)).toEqual(['A', 'E', 'Z', 'AA', 'ZZ']);
  });
});

describe('GoogleSheetsDataReader', () => {
  const values = [
    ['通貨ペア', '方向', '数量', 'エントリー時刻', '実行済み'],
    ['USD/JPY', '買い', 1000, '15:15'],
    ['EUR/USD', 'ショート', '', '16:00', '']
  ];

  it('usa a primeira linha como cabeçalho', async () => {
    const api = new FakeSheetsApi(values);
    const records = await reader(api).readSchedule(now);

    expect(api.ranges).toEqual(["'Trade Schedule'"]);
    expect(records.map((r) => [r.id, r.side, r.quantity])).toEqual([
      ['gsheets_0', 'BUY', 1000],
      ['gsheets_1', 'SELL', 100]
    ]);
  });

  it('planilha vazia vira lista vazia', async () => {
    await expect(reader(new FakeSheetsApi([])).load()).resolves.toEqual([]);
  });

  it('erro da API vira SourceUnavailable', async () => {
    const api = new FakeSheetsApi([], new Error('403 PERMISSION_DENIED'));
    await expect(reader(api).load()).rejects.toThrow(SourceUnavailable);
  });

  it('markRow atualiza a célula da coluna de executado', async () => {
    const api = new FakeSheetsApi(values);
    const r = reader(api);
    await r.load();

    await expect(r.markRow(1, 'executed')).resolves.toBe(true);
    expect(api.updates).toEqual([["'Trade Schedule'!E3", 'yes']]);
  });

  it('markRow sem a coluna devolve false', async () => {
    const api = new FakeSheetsApi(values);
    const r = reader(api);
    await r.load();

    await expect(r.markRow(0, 'closed')).resolves.toBe(false);
    expect(api.updates).toEqual([]);
  });
});
