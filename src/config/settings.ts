// src/config/settings.ts

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';

export const SOURCE_TYPES = ['excel', 'csv', 'google_sheets'] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

const excelSourceSchema = z.object({
  file_path: z.string().min(1).default('data/trade_schedule.xlsx'),
  sheet_name: z.string().min(1).optional()
});

const csvSourceSchema = z.object({
  file_path: z.string().min(1).default('data/trade_schedule.csv'),
  encoding: z.string().min(1).default('utf-8')
});

const googleSheetsSourceSchema = z.object({
  spreadsheet_id: z.string().min(1),
  sheet_name: z.string().min(1).default('Trade Schedule'),
  credentials_file: z.string().min(1).default('config/google_credentials.json')
});

export const dataSourceSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('excel'), excel: excelSourceSchema.default({}) }),
  z.object({ type: z.literal('csv'), csv: csvSourceSchema.default({}) }),
  z.object({ type: z.literal('google_sheets'), google_sheets: googleSheetsSourceSchema })
]);

export const executionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('paper') }),
  z.object({
    type: z.literal('http'),
    base_url: z.string().url(),
    timeout_ms: z.number().int().positive().default(30000)
  })
]);

export const settingsSchema = z.object({
  data_source: z.unknown(),
  execution: executionSchema.default({ type: 'paper' }),
  server: z
    .object({
      port: z.number().int().positive().default(3001),
      ws_port: z.number().int().positive().default(3002)
    })
    .default({})
});

export const tradingSettingsSchema = z.object({
  lead_time_seconds: z.number().positive(),
  grace_window_seconds: z.number().nonnegative(),
  tick_interval_ms: z.number().int().positive().default(1000),
  default_lot_size: z.number().int().positive().optional(),
  max_concurrent_positions: z.number().int().positive().optional()
});

export type DataSourceSettings = z.output<typeof dataSourceSchema>;
export type ExecutionSettings = z.output<typeof executionSchema>;
export type TradingSettings = z.output<typeof tradingSettingsSchema>;

export interface Settings {
  dataSource: DataSourceSettings;
  execution: ExecutionSettings;
  server: { port: number; ws_port: number };
}

export interface AppConfig {
  settings: Settings;
  trading: TradingSettings;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(raiz)'}: ${issue.message}`).join('; ');
}

function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some((type) => type === value);
}

/**
 * Valida o bloco `data_source`. O discriminador `type` é obrigatório e
 * precisa ser um dos tipos suportados.
 */
export function parseDataSource(raw: unknown): DataSourceSettings {
  if (typeof raw !== 'object' || raw === null || !('type' in raw) || raw.type === undefined) {
    throw new ConfigError('data_source.type não definido');
  }

  const type = String(raw.type).toLowerCase();
  if (!isSourceType(type)) {
    throw new ConfigError(`Fonte de dados não suportada: ${String(raw.type)}`);
  }

  const result = dataSourceSchema.safeParse({ ...raw, type });
  if (!result.success) {
    throw new ConfigError(`data_source inválido: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseTradingSettings(raw: unknown): TradingSettings {
  const result = tradingSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`trading_settings inválido: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseSettings(raw: unknown): Settings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`settings inválido: ${formatIssues(result.error)}`);
  }
  return {
    dataSource: parseDataSource(result.data.data_source),
    execution: result.data.execution,
    server: result.data.server
  };
}

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Arquivo de configuração não encontrado: ${filePath}`);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`JSON inválido em ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function loadConfig(
  settingsPath = process.env.SETTINGS_PATH || 'config/settings.json',
  tradingPath = process.env.TRADING_SETTINGS_PATH || path.join(path.dirname(settingsPath), 'trading_settings.json')
): AppConfig {
  const settings = parseSettings(readJsonFile(settingsPath));
  const trading = parseTradingSettings(readJsonFile(tradingPath));

  console.log(`⚙️ Configuração carregada: fonte=${settings.dataSource.type} execução=${settings.execution.type}`);
  return { settings, trading };
}
