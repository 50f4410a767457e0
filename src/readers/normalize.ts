// src/readers/normalize.ts

import { TradeAction } from '../enum/tradeAction';
import { TradeStatus } from '../enum/tradeStatus';
import { DuplicateScheduleEntry, SourceMalformed } from '../errors';
import { compareByExecution, TradeRecord } from '../models/TradeRecord';
import { isBlank, parseDate, parseDuration, parseTimestamp, startOfDay } from '../utils/timeParsing';
import { COLUMNS, ColumnField, isTruthyFlag, normalizeSide, REQUIRED_FIELDS } from './columns';

export type RawRow = Record<string, unknown>;

export interface NormalizeOptions {
  /** prefixo do id: csv, excel, gsheets */
  idPrefix: string;
  leadTimeMs: number;
  defaultLotSize?: number;
  /** data usada quando a linha só traz horário */
  now: number;
}

function pick(row: RawRow, field: ColumnField): unknown {
  for (const alias of COLUMNS[field]) {
    const value = row[alias];
    if (!isBlank(value)) return value;
  }
  return undefined;
}

function assertHeader(rows: RawRow[]) {
  const headers = new Set(rows.flatMap((row) => Object.keys(row)));
  for (const field of REQUIRED_FIELDS) {
    if (!COLUMNS[field].some((alias) => headers.has(alias))) {
      throw new SourceMalformed(`coluna obrigatória ausente: ${COLUMNS[field].join(' / ')}`);
    }
  }
}

function parseQuantity(value: unknown, defaultLotSize: number | undefined): number {
  if (isBlank(value)) {
    if (defaultLotSize === undefined) {
      throw new Error('quantidade vazia e default_lot_size não configurado');
    }
    return defaultLotSize;
  }
  const qty = typeof value === 'number' ? value : Number(String(value).replace(/,/g, '').trim());
  if (!Number.isInteger(qty) || qty <= 0) {
    throw new Error(`quantidade inválida: ${String(value)}`);
  }
  return qty;
}

function parseInstrument(value: unknown): string {
  const instrument = isBlank(value) ? '' : String(value).trim();
  if (!/\S/.test(instrument)) {
    throw new Error('par de moedas não definido');
  }
  return instrument;
}

function rowToRecords(row: RawRow, index: number, opts: NormalizeOptions): TradeRecord[] {
  const instrument = parseInstrument(pick(row, 'instrument'));

  const rawSide = pick(row, 'side');
  const side = normalizeSide(rawSide === undefined ? '' : String(rawSide));
  if (!side) {
    throw new Error(`direção inválida: ${String(rawSide)}`);
  }

  const quantity = parseQuantity(pick(row, 'quantity'), opts.defaultLotSize);
  const day = parseDate(pick(row, 'date')) ?? startOfDay(opts.now);

  const executeAt = parseTimestamp(pick(row, 'entryTime'), day);
  if (executeAt === null) {
    throw new Error('horário de entrada vazio');
  }

  let holdingMs = parseDuration(pick(row, 'holding'));
  if (holdingMs === null) {
    const exitAt = parseTimestamp(pick(row, 'exitTime'), day);
    if (exitAt !== null) {
      holdingMs = exitAt - executeAt;
      if (holdingMs <= 0) {
        throw new Error('horário de saída precisa ser depois da entrada');
      }
    }
  }

  const executed = isTruthyFlag(pick(row, 'executed'));
  const closed = isTruthyFlag(pick(row, 'closed'));
  if (closed && !executed) {
    throw new Error('linha marcada como fechada sem ter sido executada');
  }

  const entry: TradeRecord = {
    id: `${opts.idPrefix}_${index}`,
    action: TradeAction.ENTRY,
    side,
    instrument,
    quantity,
    executeAt,
    prepareAt: executeAt - opts.leadTimeMs,
    sourceRow: index,
    status: executed ? TradeStatus.EXECUTED : TradeStatus.PENDING
  };

  if (holdingMs === null) {
    return [entry];
  }

  const exitAt = executeAt + holdingMs;
  const exit: TradeRecord = {
    id: `${entry.id}_exit`,
    action: TradeAction.EXIT,
    side,
    instrument,
    quantity,
    executeAt: exitAt,
    prepareAt: exitAt - opts.leadTimeMs,
    linkedEntryId: entry.id,
    sourceRow: index,
    status: closed ? TradeStatus.EXECUTED : TradeStatus.PENDING
  };
  return [entry, exit];
}

/**
 * Converte linhas cruas em registros da agenda, ordenados por executeAt.
 * Qualquer linha inválida ou duplicada rejeita o carregamento inteiro.
 */
export function normalizeRows(rows: RawRow[], opts: NormalizeOptions): TradeRecord[] {
  if (opts.leadTimeMs <= 0) {
    throw new SourceMalformed(`lead time precisa ser positivo: ${opts.leadTimeMs}ms`);
  }
  if (rows.length === 0) {
    return [];
  }
  assertHeader(rows);

  const records: TradeRecord[] = [];
  rows.forEach((row, index) => {
    // linhas totalmente vazias mantêm o índice, mas não geram registro
    if (Object.values(row).every(isBlank)) return;
    try {
      records.push(...rowToRecords(row, index, opts));
    } catch (err) {
      throw new SourceMalformed(err instanceof Error ? err.message : String(err), index);
    }
  });

  const seen = new Set<string>();
  for (const record of records) {
    const key = `${record.instrument.toUpperCase()}|${record.executeAt}|${record.action}`;
    if (seen.has(key)) {
      throw new DuplicateScheduleEntry(record.instrument, record.executeAt, record.action);
    }
    seen.add(key);
  }

  return records.sort(compareByExecution);
}

/** Confere as invariantes de uma agenda já montada. */
export function validateSchedule(records: readonly TradeRecord[]): void {
  const byId = new Map<string, TradeRecord>();
  for (const record of records) {
    if (byId.has(record.id)) {
      throw new SourceMalformed(`id repetido: ${record.id}`);
    }
    byId.set(record.id, record);
  }

  for (const record of records) {
    if (!(record.prepareAt < record.executeAt)) {
      throw new SourceMalformed(`prepareAt >= executeAt em ${record.id}`);
    }
    if (record.linkedEntryId === undefined) continue;

    const entry = byId.get(record.linkedEntryId);
    if (!entry || entry.action !== TradeAction.ENTRY) {
      throw new SourceMalformed(`${record.id} aponta para entrada inexistente ${record.linkedEntryId}`);
    }
    if (!(entry.executeAt < record.executeAt)) {
      throw new SourceMalformed(`${record.id} executa antes da entrada ${entry.id}`);
    }
  }
}
