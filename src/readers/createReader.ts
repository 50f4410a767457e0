// src/readers/createReader.ts

import { parseDataSource, TradingSettings } from '../config/settings';
import { CsvDataReader } from './csvDataReader';
import { DataReader } from './dataReader';
import { ExcelDataReader } from './excelDataReader';
import { GoogleSheetsDataReader } from './googleSheetsDataReader';

/**
 * Escolhe o leitor pelo discriminador `data_source.type`.
 * Lança ConfigError se o tipo estiver ausente, for desconhecido ou faltar parâmetro da fonte.
 */
export function createReader(dataSource: unknown, trading: TradingSettings): DataReader {
  const source = parseDataSource(dataSource);

  switch (source.type) {
    case 'excel':
      return new ExcelDataReader(source.excel.file_path, source.excel.sheet_name, trading);
    case 'csv':
      return new CsvDataReader(source.csv.file_path, source.csv.encoding, trading);
    case 'google_sheets':
      return new GoogleSheetsDataReader(
        source.google_sheets.spreadsheet_id,
        source.google_sheets.sheet_name,
        source.google_sheets.credentials_file,
        trading
      );
  }
}
