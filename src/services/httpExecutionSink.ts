// src/services/httpExecutionSink.ts

import axios, { AxiosInstance } from 'axios';
import type { TradeRecord } from '../models/TradeRecord';
import type { ExecutionSink, SinkResult } from '../robot/executionSink';
import { createHttpClient } from './httpClient';

interface WorkerResponse {
  ok?: boolean;
  diagnostic?: Record<string, unknown>;
}

function toPayload(record: TradeRecord) {
  return {
    id: record.id,
    action: record.action,
    side: record.side,
    instrument: record.instrument,
    quantity: record.quantity,
    executeAt: new Date(record.executeAt).toISOString(),
    linkedEntryId: record.linkedEntryId ?? null
  };
}

/**
 * Entrega prepare/execute a um worker de automação externo via HTTP
 * (POST /prepare e POST /execute). Resposta 2xx sem `ok: false` é sucesso.
 */
export class HttpExecutionSink implements ExecutionSink {
  private readonly client: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number, client?: AxiosInstance) {
    this.client = client ?? createHttpClient(baseURL, timeoutMs);
  }

  async prepare(record: TradeRecord): Promise<SinkResult> {
    return this.post('/prepare', record);
  }

  async execute(record: TradeRecord): Promise<SinkResult> {
    return this.post('/execute', record);
  }

  private async post(path: string, record: TradeRecord): Promise<SinkResult> {
    try {
      const res = await this.client.post<WorkerResponse | undefined>(path, toPayload(record));
      // 204 ou corpo vazio contam como sucesso
      const body: WorkerResponse = typeof res.data === 'object' && res.data !== null ? res.data : {};
      return { ok: body.ok !== false, diagnostic: { status: res.status, ...body.diagnostic } };
    } catch (err) {
      if (axios.isAxiosError(err)) {
        return {
          ok: false,
          diagnostic: {
            status: err.response?.status ?? null,
            error: err.response?.data ?? err.message
          }
        };
      }
      throw err;
    }
  }
}
