import type { TradeRecord } from "../models/TradeRecord";

export interface SinkResult {
  ok: boolean;
  /** Payload de diagnóstico (screenshot, estado da página...). Só é logado. */
  diagnostic?: Record<string, unknown>;
}

/**
 * Camada que de fato executa o trade (automação do navegador, worker HTTP,
 * simulação). O núcleo só entrega o registro resolvido e espera o resultado;
 * política de timeout, se houver, é do sink.
 */
export interface ExecutionSink {
  /** Pré-posiciona a automação (abre a tela de ordem, escolhe o par, a quantidade) */
  prepare(record: TradeRecord): Promise<SinkResult>;

  /** Dispara a ação preparada (compra/venda na ENTRY, fechamento na EXIT) */
  execute(record: TradeRecord): Promise<SinkResult>;

  /** Libera conexões/recursos */
  close?(): Promise<void>;
}
