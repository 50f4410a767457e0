// src/readers/googleSheetsDataReader.ts

import fs from 'fs';
import { AxiosInstance } from 'axios';
import { GoogleAuth } from 'google-auth-library';
import { TradingSettings } from '../config/settings';
import { SourceUnavailable } from '../errors';
import { createHttpClient } from '../services/httpClient';
import { COLUMNS } from './columns';
import { DataReader, RawRow, RowFlag } from './dataReader';

const SHEETS_BASE_URL = 'https://sheets.googleapis.com/v4/spreadsheets';
const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

/** Operações da API do Sheets que o leitor usa */
export interface SheetsApi {
  getValues(range: string): Promise<unknown[][]>;
  updateValue(range: string, value: string): Promise<void>;
}

/**
 * Cliente mínimo da Sheets API v4: token de service account via
 * google-auth-library e chamadas REST via axios.
 */
export class GoogleSheetsApi implements SheetsApi {
  private readonly auth: GoogleAuth;
  private readonly http: AxiosInstance;

  constructor(private readonly spreadsheetId: string, credentialsFile: string) {
    this.auth = new GoogleAuth({ keyFile: credentialsFile, scopes: [SHEETS_SCOPE] });
    this.http = createHttpClient(SHEETS_BASE_URL, 30000);
  }

  private async authHeaders(): Promise<Record<string, string>> {
    const token = await this.auth.getAccessToken();
    if (!token) {
      throw new Error('Google não retornou access token');
    }
    return { Authorization: `Bearer ${token}` };
  }

  private valuesUrl(range: string): string {
    return `/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(range)}`;
  }

  async getValues(range: string): Promise<unknown[][]> {
    const res = await this.http.get<{ values?: unknown[][] }>(this.valuesUrl(range), {
      headers: await this.authHeaders(),
      params: { valueRenderOption: 'UNFORMATTED_VALUE', dateTimeRenderOption: 'SERIAL_NUMBER' }
    });
    return res.data.values ?? [];
  }

  async updateValue(range: string, value: string): Promise<void> {
    await this.http.put(
      this.valuesUrl(range),
      { range, majorDimension: 'ROWS', values: [[value]] },
      { headers: await this.authHeaders(), params: { valueInputOption: 'RAW' } }
    );
  }
}

/** Índice de coluna (0 = A) para a letra A1 */
export function columnLetter(index: number): string {
  let n = index + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export class GoogleSheetsDataReader extends DataReader {
  readonly idPrefix = 'gsheets';
  private header: string[] = [];

  constructor(
    private readonly spreadsheetId: string,
    private readonly sheetName: string,
    private readonly credentialsFile: string,
    trading: TradingSettings,
    private readonly api: SheetsApi = new GoogleSheetsApi(spreadsheetId, credentialsFile)
  ) {
    super(trading);
  }

  describe(): string {
    return `Google Sheets ${this.spreadsheetId} [${this.sheetName}]`;
  }

  private quotedSheet(): string {
    return `'${this.sheetName.replace(/'/g, "''")}'`;
  }

  async load(): Promise<RawRow[]> {
    if (this.api instanceof GoogleSheetsApi && !fs.existsSync(this.credentialsFile)) {
      throw new SourceUnavailable(`Arquivo de credenciais não encontrado: ${this.credentialsFile}`);
    }

    let values: unknown[][];
    try {
      values = await this.api.getValues(this.quotedSheet());
    } catch (err) {
      throw new SourceUnavailable(
        `Falha ao ler Google Sheets ${this.spreadsheetId}: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }

    if (values.length === 0) {
      this.header = [];
      return [];
    }

    const [headerRow, ...dataRows] = values;
    this.header = headerRow.map((cell) => String(cell ?? '').trim());

    console.log(`📊 Google Sheets conectado: ${dataRows.length} linhas`);
    return dataRows.map((cells) => {
      const row: RawRow = {};
      this.header.forEach((name, i) => {
        row[name] = cells[i] ?? '';
      });
      return row;
    });
  }

  async markRow(rowIndex: number, flag: RowFlag): Promise<boolean> {
    const aliases: readonly string[] = COLUMNS[flag];
    const col = this.header.findIndex((name) => aliases.includes(name));
    if (col === -1) {
      console.warn(`⚠️ Coluna não encontrada na planilha: ${aliases.join(' / ')}`);
      return false;
    }

    // +2: cabeçalho na linha 1 e A1 começa em 1
    const cell = `${this.quotedSheet()}!${columnLetter(col)}${rowIndex + 2}`;
    try {
      await this.api.updateValue(cell, 'yes');
      console.log(`📝 Google Sheets atualizado: ${cell}=yes`);
      return true;
    } catch (err) {
      console.error(`❌ Erro ao atualizar Google Sheets ${cell}:`, err instanceof Error ? err.message : err);
      return false;
    }
  }
}
