import fs from 'fs';
import path from 'path';
import { TradeStatus } from '../enum/tradeStatus';
import { TradeSummary } from '../models/TradeSummary';
import { StorageService } from './StorageService';

export interface TradeEvent {
  type: TradeStatus;
  recordId: string;
  action: string;
  instrument: string;
  side: 'BUY' | 'SELL';
  quantity: number;
  scheduledAt: string;
  reason?: string;
  diagnostic?: Record<string, unknown>;
  date: string;
}

export interface TradingSession {
  startedAt: string;
  finishedAt: string;
  source: string;
  cancelled: boolean;
  summary: TradeSummary;
}

function isEventList(value: unknown): value is TradeEvent[] {
  return Array.isArray(value);
}

export class FileService {
  private logPath: string;
  private tradesLogPath: string;

  constructor(private dataDir = './data', logsDir = './logs') {
    this.logPath = path.join(dataDir, 'trade-events-log.json');
    this.tradesLogPath = path.join(logsDir, 'trades.log');

    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  readTradeEvents(): TradeEvent[] {
    return StorageService.loadJson<TradeEvent[]>(this.logPath, [], isEventList);
  }

  saveTradeEvent(entry: TradeEvent) {
    const logs = this.readTradeEvents();
    logs.push(entry);
    StorageService.saveJson(this.logPath, logs);
  }

  /** Log humano, uma linha (ou bloco) por evento */
  appendTradeLog(message: string) {
    fs.mkdirSync(path.dirname(this.tradesLogPath), { recursive: true });
    fs.appendFileSync(this.tradesLogPath, message + '\n');
  }

  saveTradingSession(session: TradingSession): string {
    const stamp = session.finishedAt.replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
    const filePath = path.join(this.dataDir, `trading_session_${stamp}.json`);
    StorageService.saveJson(filePath, session);
    return filePath;
  }
}
