// src/robot/tradeScheduleManager.ts

import { TradeAction } from '../enum/tradeAction';
import { canTransition, isOutstanding, TradeStatus } from '../enum/tradeStatus';
import { InvalidTransition, ScheduleLoadError } from '../errors';
import { compareByExecution, TradeRecord } from '../models/TradeRecord';
import { TradeSummary } from '../models/TradeSummary';
import { DataReader } from '../readers/dataReader';
import { validateSchedule } from '../readers/normalize';

export interface ScheduleManagerOptions {
  graceWindowMs: number;
  /** relógio usado para datar linhas que só têm horário */
  now?: () => number;
}

/**
 * Dono da agenda de uma execução. A agenda é recriada a cada loadData();
 * depois disso só o status dos registros muda, sempre via mark().
 */
export class TradeScheduleManager {
  private schedule: TradeRecord[] | null = null;
  private byId = new Map<string, TradeRecord>();
  private loadError: ScheduleLoadError | null = null;
  private readonly now: () => number;

  constructor(
    private readonly reader: DataReader,
    private readonly options: ScheduleManagerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get lastError(): ScheduleLoadError | null {
    return this.loadError;
  }

  get isLoaded(): boolean {
    return this.schedule !== null;
  }

  /**
   * Lê a fonte e monta a agenda. Nunca lança: em caso de falha devolve false,
   * deixa a agenda sem valor e guarda o motivo em `lastError`.
   */
  async loadData(): Promise<boolean> {
    this.schedule = null;
    this.byId = new Map();
    this.loadError = null;

    try {
      const records = await this.reader.readSchedule(this.now());
      validateSchedule(records);

      this.schedule = [...records].sort(compareByExecution);
      this.byId = new Map(this.schedule.map((record) => [record.id, record]));

      console.log(`✅ Agenda carregada: ${this.schedule.length} registros (${this.reader.describe()})`);
      return true;
    } catch (err) {
      this.loadError = err instanceof ScheduleLoadError
        ? err
        : new ScheduleLoadError(err instanceof Error ? err.message : String(err), err);
      console.error(`❌ Erro ao carregar agenda: ${this.loadError.name}: ${this.loadError.message}`);
      return false;
    }
  }

  getSchedule(): readonly TradeRecord[] {
    return this.schedule ?? [];
  }

  getRecord(id: string): TradeRecord | undefined {
    return this.byId.get(id);
  }

  getLinkedExit(entryId: string): TradeRecord | undefined {
    return this.getSchedule().find((r) => r.linkedEntryId === entryId);
  }

  getTradeSummary(): TradeSummary {
    const records = this.getSchedule();
    const byInstrument: Record<string, number> = {};
    const byStatus: Record<TradeStatus, number> = {
      [TradeStatus.PENDING]: 0,
      [TradeStatus.PREPARED]: 0,
      [TradeStatus.EXECUTED]: 0,
      [TradeStatus.FAILED]: 0,
      [TradeStatus.SKIPPED]: 0
    };

    let earliest: number | null = null;
    let latest: number | null = null;

    for (const record of records) {
      byInstrument[record.instrument] = (byInstrument[record.instrument] ?? 0) + 1;
      byStatus[record.status] += 1;
      if (earliest === null || record.executeAt < earliest) earliest = record.executeAt;
      if (latest === null || record.executeAt > latest) latest = record.executeAt;
    }

    return { total: records.length, byInstrument, earliest, latest, byStatus };
  }

  /** PENDING com prepareAt <= now, em ordem de execução */
  dueForPreparation(now: number): TradeRecord[] {
    return this.getSchedule()
      .filter((r) => r.status === TradeStatus.PENDING && r.prepareAt <= now)
      .sort(compareByExecution);
  }

  /** PREPARED com executeAt <= now, em ordem de execução */
  dueForExecution(now: number): TradeRecord[] {
    return this.getSchedule()
      .filter((r) => r.status === TradeStatus.PREPARED && r.executeAt <= now)
      .sort(compareByExecution);
  }

  mark(recordId: string, newStatus: TradeStatus): TradeRecord {
    const record = this.byId.get(recordId);
    if (!record) {
      throw new InvalidTransition(recordId, undefined, newStatus);
    }
    if (!canTransition(record.status, newStatus)) {
      throw new InvalidTransition(recordId, record.status, newStatus);
    }
    record.status = newStatus;
    return record;
  }

  /**
   * Registros ainda pendentes cujo executeAt passou da janela de tolerância
   * viram SKIPPED, para um processo pausado não disparar trades velhos.
   */
  expire(now: number): TradeRecord[] {
    const cutoff = now - this.options.graceWindowMs;
    const expired = this.getSchedule().filter((r) => isOutstanding(r.status) && r.executeAt < cutoff);
    for (const record of expired) {
      this.mark(record.id, TradeStatus.SKIPPED);
    }
    return expired;
  }

  hasOutstanding(): boolean {
    return this.getSchedule().some((r) => isOutstanding(r.status));
  }

  /** ENTRY executadas cuja saída ainda não foi executada */
  openPositions(): TradeRecord[] {
    return this.getSchedule().filter((r) => {
      if (r.action !== TradeAction.ENTRY || r.status !== TradeStatus.EXECUTED) return false;
      const exit = this.getLinkedExit(r.id);
      return !exit || exit.status !== TradeStatus.EXECUTED;
    });
  }

  /** Grava na fonte que a entrada foi executada ou a saída fechada. Falha só é logada. */
  async markSource(record: TradeRecord): Promise<boolean> {
    const flag = record.action === TradeAction.ENTRY ? 'executed' : 'closed';
    try {
      return await this.reader.markRow(record.sourceRow, flag);
    } catch (err) {
      console.error(`❌ Erro ao gravar ${flag} para ${record.id}:`, err instanceof Error ? err.message : err);
      return false;
    }
  }
}
