// src/robot/tradingEngine.ts

import { AppConfig, ExecutionSettings, loadConfig } from "../config/settings";
import { TradeRecord } from "../models/TradeRecord";
import { TradeSummary } from "../models/TradeSummary";
import { createReader } from "../readers/createReader";
import { FileService } from "../services/fileService";
import { HttpExecutionSink } from "../services/httpExecutionSink";
import { PaperExecutionSink } from "../services/paperExecutionSink";
import { DispatchEvent, RunResult, ScheduleDispatcher, TickReport } from "./dispatcher";
import { ExecutionSink } from "./executionSink";
import { TradeScheduleManager } from "./tradeScheduleManager";

export type EngineEvent =
    | { type: "prepared" | "executed" | "failed" | "skipped"; payload: DispatchEvent }
    | { type: "tick"; payload: TickReport }
    | { type: "finished"; payload: RunResult };

export interface TradingEngineOptions {
    settingsPath?: string;
    tradingPath?: string;
    /** força o sink de simulação, ignorando `execution` do settings */
    dryRun?: boolean;
    fileService?: FileService;
    /** substitui o sink montado a partir da configuração */
    sink?: ExecutionSink;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface EngineStatus {
    running: boolean;
    loaded: boolean;
    source: string | null;
    sink: string | null;
    startedAt: string | null;
    summary: TradeSummary | null;
}

export function createSink(execution: ExecutionSettings, dryRun: boolean): ExecutionSink {
    if (dryRun || execution.type === "paper") {
        return new PaperExecutionSink();
    }
    return new HttpExecutionSink(execution.base_url, execution.timeout_ms);
}

/**
 * Liga configuração, leitor, manager, sink e dispatcher. Usado pelo CLI e
 * pelo servidor de controle.
 */
export class TradingEngine {
    private config: AppConfig | null = null;
    private manager: TradeScheduleManager | null = null;
    private sink: ExecutionSink | null = null;
    private source: string | null = null;
    private abort: AbortController | null = null;
    private runPromise: Promise<RunResult> | null = null;
    private startedAt: Date | null = null;
    private listeners = new Set<(event: EngineEvent) => void>();
    private readonly fileService: FileService;
    private readonly now: () => number;

    constructor(private readonly options: TradingEngineOptions = {}) {
        this.fileService = options.fileService ?? new FileService();
        this.now = options.now ?? Date.now;
    }

    get isRunning(): boolean {
        return this.runPromise !== null;
    }

    subscribe(listener: (event: EngineEvent) => void): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    /**
     * Lê a configuração e carrega a agenda. Lança ConfigError se a configuração
     * for inválida e o ScheduleLoadError do manager se a fonte falhar.
     */
    async load(): Promise<TradeSummary> {
        if (this.isRunning) {
            throw new Error("Não é possível recarregar a agenda com o robô rodando");
        }

        const config = loadConfig(this.options.settingsPath, this.options.tradingPath);
        const reader = createReader(config.settings.dataSource, config.trading);
        const manager = new TradeScheduleManager(reader, {
            graceWindowMs: config.trading.grace_window_seconds * 1000,
            now: this.now,
        });

        this.config = config;
        this.manager = manager;
        this.source = reader.describe();

        const ok = await manager.loadData();
        if (!ok) {
            throw manager.lastError ?? new Error("Falha ao carregar agenda");
        }

        const summary = manager.getTradeSummary();
        if (summary.total === 0) {
            console.warn("⚠️ Agenda vazia, nada para executar");
        }
        return summary;
    }

    /** Carrega a agenda e dispara o dispatcher em background */
    async start(): Promise<TradeSummary> {
        if (this.isRunning) {
            throw new Error("Robô já está rodando");
        }

        console.log("🚀 Inicializando TradingEngine...");
        const summary = await this.load();

        const { config, manager } = this.requireLoaded();
        this.sink = this.options.sink ?? createSink(config.settings.execution, this.options.dryRun ?? false);

        const dispatcher = new ScheduleDispatcher(manager, this.sink, {
            tickIntervalMs: config.trading.tick_interval_ms,
            maxConcurrentPositions: config.trading.max_concurrent_positions,
            journal: this.fileService,
            now: this.now,
            sleep: this.options.sleep,
        });
        this.forwardEvents(dispatcher);

        this.abort = new AbortController();
        this.startedAt = new Date(this.now());

        const source = this.source ?? "";
        const startedAt = this.startedAt;
        this.runPromise = dispatcher
            .run(this.abort.signal)
            .then((result) => {
                this.saveSession(source, startedAt, result);
                return result;
            })
            .finally(() => this.release());

        // o erro é reentregue por waitForFinish(); aqui só evita rejeição sem handler
        this.runPromise.catch((err) => {
            console.error("❌ Erro no dispatcher:", err instanceof Error ? err.message : err);
        });

        console.log(`🎯 Robô iniciado: ${summary.total} registros, sink=${this.sinkName()}`);
        return summary;
    }

    /** Pede o cancelamento cooperativo e espera o tick corrente terminar */
    async stop(): Promise<RunResult | null> {
        if (!this.runPromise || !this.abort) {
            return null;
        }
        console.log("🛑 Parando TradingEngine...");
        this.abort.abort();
        const result = await this.runPromise;
        console.log("👋 TradingEngine parado.");
        return result;
    }

    async waitForFinish(): Promise<RunResult | null> {
        return this.runPromise ?? null;
    }

    getSummary(): TradeSummary | null {
        return this.manager?.isLoaded ? this.manager.getTradeSummary() : null;
    }

    getSchedule(): readonly TradeRecord[] {
        return this.manager?.getSchedule() ?? [];
    }

    status(): EngineStatus {
        return {
            running: this.isRunning,
            loaded: this.manager?.isLoaded ?? false,
            source: this.source,
            sink: this.sink ? this.sinkName() : null,
            startedAt: this.startedAt?.toISOString() ?? null,
            summary: this.getSummary(),
        };
    }

    private requireLoaded(): { config: AppConfig; manager: TradeScheduleManager } {
        if (!this.config || !this.manager) {
            throw new Error("Agenda não carregada");
        }
        return { config: this.config, manager: this.manager };
    }

    private sinkName(): string {
        return this.sink instanceof PaperExecutionSink ? "paper" : this.sink instanceof HttpExecutionSink ? "http" : "custom";
    }

    private forwardEvents(dispatcher: ScheduleDispatcher) {
        const emit = (event: EngineEvent) => {
            for (const listener of this.listeners) listener(event);
        };
        for (const type of ["prepared", "executed", "failed", "skipped"] as const) {
            dispatcher.on(type, (payload) => emit({ type, payload }));
        }
        dispatcher.on("tick", (payload) => emit({ type: "tick", payload }));
        dispatcher.on("finished", (payload) => emit({ type: "finished", payload }));
    }

    private saveSession(source: string, startedAt: Date, result: RunResult) {
        try {
            const file = this.fileService.saveTradingSession({
                startedAt: startedAt.toISOString(),
                finishedAt: new Date(this.now()).toISOString(),
                source,
                cancelled: result.cancelled,
                summary: result.summary,
            });
            console.log(`💾 Sessão salva em ${file}`);
        } catch (err) {
            console.error("❌ Erro ao salvar sessão:", err instanceof Error ? err.message : err);
        }
    }

    private async release() {
        this.runPromise = null;
        this.abort = null;
        if (this.sink?.close) {
            await this.sink.close();
        }
    }
}
