// src/readers/excelDataReader.ts

import fs from 'fs';
import * as XLSX from 'xlsx';
import { TradingSettings } from '../config/settings';
import { SourceMalformed, SourceUnavailable } from '../errors';
import { COLUMNS } from './columns';
import { DataReader, RawRow, RowFlag } from './dataReader';

export class ExcelDataReader extends DataReader {
  readonly idPrefix = 'excel';
  private workbook: XLSX.WorkBook | null = null;
  private sheetName: string | null = null;

  constructor(
    private readonly filePath: string,
    private readonly configuredSheet: string | undefined,
    trading: TradingSettings
  ) {
    super(trading);
  }

  describe(): string {
    return `Excel ${this.filePath}${this.configuredSheet ? ` [${this.configuredSheet}]` : ''}`;
  }

  /** Arquivo onde as marcas de executado/fechado são gravadas (a planilha de origem fica intacta) */
  get updatedPath(): string {
    return this.filePath.replace(/\.xlsx?$/i, '') + '_updated.xlsx';
  }

  async load(): Promise<RawRow[]> {
    let data: Buffer;
    try {
      data = await fs.promises.readFile(this.filePath);
    } catch (err) {
      throw new SourceUnavailable(`Arquivo Excel não encontrado ou sem permissão: ${this.filePath}`, err);
    }

    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.read(data, { type: 'buffer' });
    } catch (err) {
      throw new SourceMalformed(`Excel inválido (${this.filePath}): ${err instanceof Error ? err.message : String(err)}`);
    }

    const sheetName = this.configuredSheet ?? workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (sheetName === undefined || !sheet) {
      throw new SourceMalformed(`Aba não encontrada em ${this.filePath}: ${sheetName ?? '(nenhuma)'}`);
    }

    this.workbook = workbook;
    this.sheetName = sheetName;

    const rows = XLSX.utils.sheet_to_json<RawRow>(sheet, { defval: '', raw: true, blankrows: true });
    console.log(`📗 Excel lido: ${rows.length} linhas (aba ${sheetName})`);
    return rows;
  }

  async markRow(rowIndex: number, flag: RowFlag): Promise<boolean> {
    try {
      if (!this.workbook || this.sheetName === null) {
        return false;
      }
      const sheet = this.workbook.Sheets[this.sheetName];
      if (!sheet || !sheet['!ref']) {
        return false;
      }

      const range = XLSX.utils.decode_range(sheet['!ref']);
      const aliases: readonly string[] = COLUMNS[flag];

      let col = -1;
      for (let c = range.s.c; c <= range.e.c; c++) {
        const cell = sheet[XLSX.utils.encode_cell({ r: range.s.r, c })];
        if (cell && aliases.includes(String(cell.v).trim())) {
          col = c;
          break;
        }
      }
      if (col === -1) {
        col = range.e.c + 1;
        sheet[XLSX.utils.encode_cell({ r: range.s.r, c: col })] = { t: 's', v: flag };
        range.e.c = col;
      }

      // linha 0 da agenda fica logo abaixo do cabeçalho
      const r = range.s.r + 1 + rowIndex;
      sheet[XLSX.utils.encode_cell({ r, c: col })] = { t: 's', v: 'yes' };
      if (r > range.e.r) range.e.r = r;
      sheet['!ref'] = XLSX.utils.encode_range(range);

      XLSX.writeFile(this.workbook, this.updatedPath);
      console.log(`📝 Excel atualizado: linha ${rowIndex} ${flag}=yes -> ${this.updatedPath}`);
      return true;
    } catch (err) {
      console.error(`❌ Erro ao marcar linha ${rowIndex} no Excel:`, err instanceof Error ? err.message : err);
      return false;
    }
  }
}
