import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceUnavailable } from '../errors';
import { CsvDataReader } from './csvDataReader';

const trading = { lead_time_seconds: 30, grace_window_seconds: 60, tick_interval_ms: 1000 };
const now = new Date(2026, 9, 19, 8, 0, 0).getTime();

const CSV = [
  '\uFEFF通貨ペア,方向,数量,エントリー時刻,保有時間',
  'USD/JPY,買い,1000,15:15:00,60',
  'EUR/USD,売り,2000,16:00,',
  ''
].join('\n');

describe('CsvDataReader', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-reader-'));
    file = path.join(dir, 'schedule.csv');
    fs.writeFileSync(file, CSV, 'utf-8');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lê o cabeçalho japonês e remove o BOM', async () => {
    const reader = new CsvDataReader(file, 'utf-8', trading);
    const rows = await reader.load();
    expect(rows).toEqual([
      { 通貨ペア: 'USD/JPY', 方向: '買い', 数量: '1000', エントリー時刻: '15:15:00', 保有時間: '60' },
      { 通貨ペア: 'EUR/USD', 方向: '売り', 数量: '2000', エントリー時刻: '16:00', 保有時間: '' }
    ]);
  });

  it('monta a agenda com ids csv_<linha>', async () => {
    const reader = new CsvDataReader(file, 'utf-8', trading);
    const records = await reader.readSchedule(now);
    expect(records.map((r) => [r.id, r.side, r.quantity])).toEqual([
      ['csv_0', 'BUY', 1000],
      ['csv_0_exit', 'BUY', 1000],
      ['csv_1', 'SELL', 2000]
    ]);
  });

  it('arquivo ausente vira SourceUnavailable', async () => {
    const reader = new CsvDataReader(path.join(dir, 'nao-existe.csv'), 'utf-8', trading);
    await expect(reader.readSchedule(now)).rejects.toBeInstanceOf(SourceUnavailable);
  });

  it('markRow acrescenta a coluna e guarda backup', async () => {
    const reader = new CsvDataReader(file, 'utf-8', trading);
    await reader.load();

    await expect(reader.markRow(1, 'executed')).resolves.toBe(true);

    expect(fs.readFileSync(file, 'utf-8')).toBe(
      [
        '通貨ペア,方向,数量,エントリー時刻,保有時間,executed',
        'USD/JPY,買い,1000,15:15:00,60,',
        'EUR/USD,売り,2000,16:00,,yes',
        ''
      ].join('\n')
    );
    expect(fs.readFileSync(path.join(dir, 'schedule_backup.csv'), 'utf-8')).toBe(CSV);
  });

  it('markRow usa a coluna existente', async () => {
    fs.writeFileSync(file, 'instrument,entry_time,quantity,決済済み\nUSD/JPY,10:00,1,\n', 'utf-8');
    const reader = new CsvDataReader(file, 'utf-8', trading);

    await expect(reader.markRow(0, 'closed')).resolves.toBe(true);
    expect(fs.readFileSync(file, 'utf-8')).toBe('instrument,entry_time,quantity,決済済み\nUSD/JPY,10:00,1,yes\n');
  });

  it('markRow devolve false para linha inexistente', async () => {
    const reader = new CsvDataReader(file, 'utf-8', trading);
    await expect(reader.markRow(5, 'executed')).resolves.toBe(false);
  });
});
