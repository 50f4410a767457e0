// src/readers/csvDataReader.ts

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { TextDecoder } from 'util';
import { TradingSettings } from '../config/settings';
import { SourceMalformed, SourceUnavailable } from '../errors';
import { toCsv } from '../utils/csv';
import { COLUMNS } from './columns';
import { DataReader, isRawRow, RawRow, RowFlag } from './dataReader';

const FALLBACK_ENCODINGS = ['utf-8', 'shift_jis'];

interface ParsedCsv {
  header: string[];
  rows: RawRow[];
}

export class CsvDataReader extends DataReader {
  readonly idPrefix = 'csv';
  private detectedEncoding: string | null = null;

  constructor(
    private readonly filePath: string,
    private readonly encoding: string,
    trading: TradingSettings
  ) {
    super(trading);
  }

  describe(): string {
    return `CSV ${this.filePath}`;
  }

  async load(): Promise<RawRow[]> {
    return (await this.readFile()).rows;
  }

  async markRow(rowIndex: number, flag: RowFlag): Promise<boolean> {
    try {
      if (this.detectedEncoding !== null && this.detectedEncoding !== 'utf-8') {
        console.warn(`⚠️ CSV em ${this.detectedEncoding}: marca ${flag} não gravada para a linha ${rowIndex}`);
        return false;
      }

      const { header, rows } = await this.readFile();
      const row = rows[rowIndex];
      if (!row) {
        console.warn(`⚠️ Linha ${rowIndex} não existe em ${this.filePath}`);
        return false;
      }

      const aliases: readonly string[] = COLUMNS[flag];
      let column = header.find((h) => aliases.includes(h));
      if (column === undefined) {
        column = flag;
        header.push(column);
      }
      row[column] = 'yes';

      const backupPath = this.filePath.replace(/\.csv$/i, '') + '_backup.csv';
      await fs.promises.copyFile(this.filePath, backupPath);
      await fs.promises.writeFile(this.filePath, toCsv(rows, header), 'utf-8');

      console.log(`📝 CSV atualizado: linha ${rowIndex} ${column}=yes`);
      return true;
    } catch (err) {
      console.error(`❌ Erro ao atualizar CSV ${this.filePath}:`, err instanceof Error ? err.message : err);
      return false;
    }
  }

  private async readFile(): Promise<ParsedCsv> {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(this.filePath);
    } catch (err) {
      throw new SourceUnavailable(`CSV não encontrado ou sem permissão: ${this.filePath}`, err);
    }

    const content = this.decode(buffer);
    let header: string[] = [];
    let parsed: unknown;
    try {
      parsed = parse(content, {
        bom: true,
        columns: (names: string[]) => {
          header = names.map((name) => String(name).trim());
          return header;
        },
        skip_empty_lines: true,
        trim: true
      });
    } catch (err) {
      throw new SourceMalformed(`CSV inválido (${this.filePath}): ${err instanceof Error ? err.message : String(err)}`);
    }

    if (!Array.isArray(parsed) || !parsed.every(isRawRow)) {
      throw new SourceMalformed(`CSV sem linhas em formato de tabela: ${this.filePath}`);
    }
    return { header, rows: parsed };
  }

  // Tenta a codificação configurada e depois as alternativas (planilhas
  // exportadas no Windows japonês costumam vir em Shift_JIS).
  private decode(buffer: Buffer): string {
    const candidates = [this.encoding.toLowerCase(), ...FALLBACK_ENCODINGS]
      .filter((enc, i, all) => all.indexOf(enc) === i);

    for (const encoding of candidates) {
      try {
        const text = new TextDecoder(encoding, { fatal: true }).decode(buffer);
        this.detectedEncoding = encoding === 'utf8' || encoding === 'utf-8-sig' ? 'utf-8' : encoding;
        return text;
      } catch {
        continue;
      }
    }
    throw new SourceMalformed(`Não foi possível decodificar ${this.filePath} (${candidates.join(', ')})`);
  }
}
