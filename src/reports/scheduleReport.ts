// src/reports/scheduleReport.ts
import fs from 'fs';
import path from 'path';
import { TradeRecord } from '../models/TradeRecord';
import { TradeSummary } from '../models/TradeSummary';
import { toCsv } from '../utils/csv';
import { formatTime } from '../utils/timeParsing';

const CSV_COLUMNS = ['id', 'action', 'side', 'instrument', 'quantity', 'prepareAt', 'executeAt', 'status', 'linkedEntryId', 'sourceRow'];

export function formatSummary(summary: TradeSummary): string[] {
  const lines = [`📊 Agenda: ${summary.total} registros`];

  if (summary.earliest !== null && summary.latest !== null) {
    lines.push(`   ⏰ De ${formatTime(summary.earliest)} até ${formatTime(summary.latest)}`);
  }

  const instruments = Object.entries(summary.byInstrument).sort(([a], [b]) => a.localeCompare(b));
  for (const [instrument, count] of instruments) {
    lines.push(`   💱 ${instrument}: ${count}`);
  }

  const statuses = Object.entries(summary.byStatus).filter(([, count]) => count > 0);
  if (statuses.length > 0) {
    lines.push(`   📌 ${statuses.map(([status, count]) => `${status}=${count}`).join(' ')}`);
  }
  return lines;
}

/** Uma linha por registro, na ordem da agenda */
export function formatRecord(record: TradeRecord): string {
  const side = record.side === 'BUY' ? '🟢' : '🔴';
  const link = record.linkedEntryId ? ` -> ${record.linkedEntryId}` : '';
  return `${side} ${record.id} ${record.action} ${record.instrument} ${record.side} ${record.quantity} ` +
    `prep=${formatTime(record.prepareAt)} exec=${formatTime(record.executeAt)} [${record.status}]${link}`;
}

export function scheduleToCsv(records: readonly TradeRecord[]): string {
  return toCsv(
    records.map((r) => ({
      ...r,
      prepareAt: formatTime(r.prepareAt),
      executeAt: formatTime(r.executeAt),
      linkedEntryId: r.linkedEntryId ?? ''
    })),
    CSV_COLUMNS
  );
}

export function exportSchedule(records: readonly TradeRecord[], outputPath: string): string {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, scheduleToCsv(records), 'utf-8');
  console.log(`📄 Agenda exportada para ${outputPath}`);
  return outputPath;
}
