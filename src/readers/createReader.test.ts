import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { createReader } from './createReader';
import { CsvDataReader } from './csvDataReader';
import { ExcelDataReader } from './excelDataReader';
import { GoogleSheetsDataReader } from './googleSheetsDataReader';

const trading = { lead_time_seconds: 30, grace_window_seconds: 60, tick_interval_ms: 1000 };

describe('createReader', () => {
  it('escolhe o leitor pelo tipo', () => {
    expect(createReader({ type: 'csv' }, trading)).toBeInstanceOf(CsvDataReader);
    expect(createReader({ type: 'excel' }, trading)).toBeInstanceOf(ExcelDataReader);
    expect(
      createReader({ type: 'google_sheets', google_sheets: { spreadsheet_id: 'test-sheet' } }, trading)
    ).toBeInstanceOf(GoogleSheetsDataReader);
  });

  it('descreve a fonte configurada', () => {
    expect(createReader({ type: 'excel', excel: { file_path: 'a.xlsx', sheet_name: 'Plan1' } }, trading).describe()).toBe(
      'Excel a.xlsx [Plan1]'
    );
  });

  it('tipo ausente ou desconhecido é ConfigError', () => {
    expect(() => createReader({}, trading)).toThrow(ConfigError);
    expect(() => createReader({ type: 'mysql' }, trading)).toThrow(ConfigError);
  });

  it('google_sheets sem spreadsheet_id é ConfigError', () => {
    expect(() => createReader({ type: 'google_sheets' }, trading)).toThrow(ConfigError);
  });
});
