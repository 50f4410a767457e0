// src/robot/dispatcher.ts

import { EventEmitter } from "events"
import { TradeAction } from "../enum/tradeAction"
import { isOutstanding, TradeStatus } from "../enum/tradeStatus"
import { errorMessage } from "../errors"
import type { TradeRecord } from "../models/TradeRecord"
import type { TradeSummary } from "../models/TradeSummary"
import type { FileService } from "../services/fileService"
import { formatTime } from "../utils/timeParsing"
import type { ExecutionSink, SinkResult } from "./executionSink"
import type { TradeScheduleManager } from "./tradeScheduleManager"

export interface DispatchEvent {
  record: TradeRecord
  at: number
  reason?: string
  diagnostic?: Record<string, unknown>
}

export interface TickReport {
  at: number
  prepared: string[]
  executed: string[]
  failed: string[]
  skipped: string[]
}

export interface RunResult {
  cancelled: boolean
  ticks: number
  summary: TradeSummary
}

export interface DispatcherEventMap {
  prepared: DispatchEvent
  executed: DispatchEvent
  failed: DispatchEvent
  skipped: DispatchEvent
  tick: TickReport
  finished: RunResult
}

export interface DispatcherOptions {
  tickIntervalMs: number
  /** limite de posições abertas; ENTRY que estouraria o limite vira SKIPPED */
  maxConcurrentPositions?: number
  journal?: FileService
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Loop de polling que dispara prepare/execute no sink nos horários da agenda.
 *
 * Cada registro é entregue ao sink no máximo uma vez por transição. O status
 * (PREPARED/EXECUTED) só é gravado depois que o sink responde sucesso; falha
 * grava FAILED. Se o processo cair entre a chamada ao sink e a gravação do
 * status, o registro volta a ser preparado na próxima execução, então o sink
 * precisa tolerar prepare repetido.
 *
 * Política de pares: ENTRY que termina FAILED ou SKIPPED leva a EXIT ligada
 * para SKIPPED. EXIT só é executada depois que a ENTRY foi EXECUTED.
 */
export class ScheduleDispatcher {
  private readonly emitter = new EventEmitter()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>
  private running = false

  constructor(
    private readonly manager: TradeScheduleManager,
    private readonly sink: ExecutionSink,
    private readonly options: DispatcherOptions,
  ) {
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)))
  }

  get isRunning(): boolean {
    return this.running
  }

  on<K extends keyof DispatcherEventMap>(event: K, listener: (payload: DispatcherEventMap[K]) => void): this {
    this.emitter.on(event, listener)
    return this
  }

  off<K extends keyof DispatcherEventMap>(event: K, listener: (payload: DispatcherEventMap[K]) => void): this {
    this.emitter.off(event, listener)
    return this
  }

  private emit<K extends keyof DispatcherEventMap>(event: K, payload: DispatcherEventMap[K]) {
    this.emitter.emit(event, payload)
  }

  /**
   * Roda até não sobrar registro PENDING/PREPARED ou até o sinal ser abortado.
   * O cancelamento é checado uma vez, no início de cada tick.
   */
  async run(signal?: AbortSignal): Promise<RunResult> {
    if (this.running) {
      throw new Error("Dispatcher já está rodando")
    }
    this.running = true

    let ticks = 0
    let cancelled = false

    console.log(`\n🚀 Dispatcher iniciado (tick=${this.options.tickIntervalMs}ms)`)

    try {
      while (this.manager.hasOutstanding()) {
        if (signal?.aborted) {
          cancelled = true
          console.log("🛑 Cancelamento recebido, encerrando dispatcher")
          break
        }

        await this.tick(this.now())
        ticks++

        if (!this.manager.hasOutstanding()) break
        await this.sleep(this.options.tickIntervalMs)
      }
    } finally {
      this.running = false
    }

    const result: RunResult = { cancelled, ticks, summary: this.manager.getTradeSummary() }
    console.log(`🏁 Dispatcher encerrado após ${ticks} ticks${cancelled ? " (cancelado)" : ""}`)
    this.emit("finished", result)
    return result
  }

  async tick(now: number): Promise<TickReport> {
    const report: TickReport = { at: now, prepared: [], executed: [], failed: [], skipped: [] }

    // 1. descarta o que passou da janela de tolerância
    for (const record of this.manager.expire(now)) {
      this.notify("skipped", record, now, report, { reason: "expirado (fora da janela de tolerância)" })
      this.applyPairPolicy(record, now, report)
    }

    // 2. prepara
    for (const record of this.manager.dueForPreparation(now)) {
      // a política de pares pode ter pulado o registro neste mesmo tick
      if (record.status !== TradeStatus.PENDING) continue
      await this.prepare(record, now, report)
    }

    // 3. executa
    for (const record of this.manager.dueForExecution(now)) {
      if (record.status !== TradeStatus.PREPARED) continue

      if (record.action === TradeAction.EXIT && !this.entryExecuted(record)) {
        continue
      }

      if (record.action === TradeAction.ENTRY && this.positionLimitReached()) {
        this.manager.mark(record.id, TradeStatus.SKIPPED)
        this.notify("skipped", record, now, report, {
          reason: `limite de ${this.options.maxConcurrentPositions} posições atingido`,
        })
        this.applyPairPolicy(record, now, report)
        continue
      }

      await this.execute(record, now, report)
    }

    this.emit("tick", report)
    return report
  }

  private async prepare(record: TradeRecord, now: number, report: TickReport) {
    console.log(`🔧 Preparando ${record.id}: ${record.instrument} ${record.side} ${record.quantity} (execução ${formatTime(record.executeAt)})`)

    const result = await this.callSink(() => this.sink.prepare(record))
    if (result.ok) {
      this.manager.mark(record.id, TradeStatus.PREPARED)
      this.notify("prepared", record, now, report, { diagnostic: result.diagnostic })
      return
    }

    this.manager.mark(record.id, TradeStatus.FAILED)
    this.notify("failed", record, now, report, { reason: "prepare falhou", diagnostic: result.diagnostic })
    this.applyPairPolicy(record, now, report)
  }

  private async execute(record: TradeRecord, now: number, report: TickReport) {
    const label = record.action === TradeAction.ENTRY ? `Entrada ${record.side}` : "Saída"
    console.log(`🔔 [${record.instrument}] ${label} ${record.id} @ ${formatTime(now)}`)

    const result = await this.callSink(() => this.sink.execute(record))
    if (result.ok) {
      this.manager.mark(record.id, TradeStatus.EXECUTED)
      // a marca na fonte vem antes de journal e listeners
      await this.manager.markSource(record)
      this.notify("executed", record, now, report, { diagnostic: result.diagnostic })
      return
    }

    this.manager.mark(record.id, TradeStatus.FAILED)
    this.notify("failed", record, now, report, { reason: "execute falhou", diagnostic: result.diagnostic })
    this.applyPairPolicy(record, now, report)
  }

  // Erro lançado pelo sink conta como falha do registro; nunca derruba o loop.
  private async callSink(call: () => Promise<SinkResult>): Promise<SinkResult> {
    try {
      return await call()
    } catch (err) {
      const message = errorMessage(err)
      console.error("❌ Erro no sink de execução:", message)
      return { ok: false, diagnostic: { error: message } }
    }
  }

  private applyPairPolicy(record: TradeRecord, now: number, report: TickReport) {
    if (record.action !== TradeAction.ENTRY) return
    if (record.status !== TradeStatus.FAILED && record.status !== TradeStatus.SKIPPED) return

    const exit = this.manager.getLinkedExit(record.id)
    if (!exit || !isOutstanding(exit.status)) return

    this.manager.mark(exit.id, TradeStatus.SKIPPED)
    this.notify("skipped", exit, now, report, { reason: `entrada ${record.id} ${record.status}` })
  }

  private entryExecuted(exit: TradeRecord): boolean {
    if (exit.linkedEntryId === undefined) return true
    return this.manager.getRecord(exit.linkedEntryId)?.status === TradeStatus.EXECUTED
  }

  private positionLimitReached(): boolean {
    const max = this.options.maxConcurrentPositions
    return max !== undefined && this.manager.openPositions().length >= max
  }

  private notify(
    type: "prepared" | "executed" | "failed" | "skipped",
    record: TradeRecord,
    now: number,
    report: TickReport,
    extra: { reason?: string; diagnostic?: Record<string, unknown> },
  ) {
    report[type].push(record.id)

    const icon = { prepared: "🟡", executed: "✅", failed: "❌", skipped: "⏭️" }[type]
    const line = `${icon} [${record.instrument}] ${record.id} ${record.action} -> ${record.status} @ ${formatTime(now)}${extra.reason ? ` (${extra.reason})` : ""}`
    if (type === "failed") {
      console.error(line, extra.diagnostic ?? "")
    } else {
      console.log(line)
    }

    const journal = this.options.journal
    if (journal) {
      try {
        journal.appendTradeLog(line)
        journal.saveTradeEvent({
          type: record.status,
          recordId: record.id,
          action: record.action,
          instrument: record.instrument,
          side: record.side,
          quantity: record.quantity,
          scheduledAt: new Date(record.executeAt).toISOString(),
          reason: extra.reason,
          diagnostic: extra.diagnostic,
          date: new Date(now).toISOString(),
        })
      } catch (err) {
        console.error(`❌ Erro ao gravar journal de ${record.id}:`, errorMessage(err))
      }
    }

    try {
      this.emit(type, { record, at: now, reason: extra.reason, diagnostic: extra.diagnostic })
    } catch (err) {
      console.error(`❌ Erro em listener de ${type} (${record.id}):`, errorMessage(err))
    }
  }
}
