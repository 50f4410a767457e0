import fs from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SourceMalformed, SourceUnavailable } from '../errors';
import { ExcelDataReader } from './excelDataReader';

const trading = { lead_time_seconds: 30, grace_window_seconds: 60, tick_interval_ms: 1000 };
const now = new Date(2026, 9, 19, 8, 0, 0).getTime();

function writeWorkbook(file: string, rows: unknown[][], sheetName = 'Trade Schedule') {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), sheetName);
  XLSX.writeFile(wb, file);
}

describe('ExcelDataReader', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'excel-reader-'));
    file = path.join(dir, 'schedule.xlsx');
    writeWorkbook(file, [
      ['instrument', 'side', 'quantity', 'entry_time', 'holding_seconds'],
      ['USD/JPY', 'BUY', 1000, '15:15:00', 60],
      [],
      ['EUR/USD', 'SELL', 2000, '16:00', '']
    ]);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lê a primeira aba mantendo o índice das linhas vazias', async () => {
    const reader = new ExcelDataReader(file, undefined, trading);
    const records = await reader.readSchedule(now);

    expect(records.map((r) => [r.id, r.instrument, r.quantity, r.sourceRow])).toEqual([
      ['excel_0', 'USD/JPY', 1000, 0],
      ['excel_0_exit', 'USD/JPY', 1000, 0],
      ['excel_2', 'EUR/USD', 2000, 2]
    ]);
    expect(records[0].executeAt).toBe(new Date(2026, 9, 19, 15, 15, 0).getTime());
  });

  it('aba inexistente é SourceMalformed', async () => {
    const reader = new ExcelDataReader(file, 'Outra', trading);
    await expect(reader.load()).rejects.toBeInstanceOf(SourceMalformed);
  });

  it('arquivo ausente é SourceUnavailable', async () => {
    const reader = new ExcelDataReader(path.join(dir, 'nada.xlsx'), undefined, trading);
    await expect(reader.load()).rejects.toBeInstanceOf(SourceUnavailable);
  });

  it('markRow grava em <nome>_updated.xlsx', async () => {
    const reader = new ExcelDataReader(file, 'Trade Schedule', trading);
    await reader.load();

    await expect(reader.markRow(2, 'executed')).resolves.toBe(true);
    expect(reader.updatedPath).toBe(path.join(dir, 'schedule_updated.xlsx'));

    const updated = XLSX.readFile(reader.updatedPath);
    const sheet = updated.Sheets['Trade Schedule'];
    expect(sheet['F1'].v).toBe('executed');
    expect(sheet['F4'].v).toBe('yes');
    expect(sheet['F2']).toBeUndefined();
  });

  it('markRow sem load devolve false', async () => {
    const reader = new ExcelDataReader(file, undefined, trading);
    await expect(reader.markRow(0, 'executed')).resolves.toBe(false);
  });
});
