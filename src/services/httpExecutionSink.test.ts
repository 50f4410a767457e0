import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { TradeAction } from '../enum/tradeAction';
import { TradeStatus } from '../enum/tradeStatus';
import type { TradeRecord } from '../models/TradeRecord';
import { createHttpClient } from './httpClient';
import { HttpExecutionSink } from './httpExecutionSink';

const record: TradeRecord = {
  id: 'gsheets_3',
  action: TradeAction.ENTRY,
  side: 'BUY',
  instrument: 'USD/JPY',
  quantity: 1000,
  executeAt: Date.UTC(2026, 9, 19, 6, 15, 0),
  prepareAt: Date.UTC(2026, 9, 19, 6, 14, 30),
  sourceRow: 3,
  status: TradeStatus.PREPARED
};

interface Captured {
  url?: string;
  method?: string;
  body: unknown;
}

// Cliente axios real com adapter em memória: nada sai do processo.
function workerStub(reply: (config: InternalAxiosRequestConfig) => Promise<AxiosResponse> | AxiosResponse) {
  const captured: Captured[] = [];
  const client = createHttpClient('http://worker.test', 1000);
  client.defaults.adapter = async (config) => {
    captured.push({
      url: config.url,
      method: config.method,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data
    });
    return reply(config);
  };
  return { client, captured };
}

function response(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: {}, config };
}

describe('HttpExecutionSink', () => {
  it('envia o registro para /prepare e repassa o diagnóstico', async () => {
    const { client, captured } = workerStub((config) => response(config, 200, { ok: true, diagnostic: { screen: 'order' } }));
    const sink = new HttpExecutionSink('http://worker.test', 1000, client);

    await expect(sink.prepare(record)).resolves.toEqual({ ok: true, diagnostic: { status: 200, screen: 'order' } });
    expect(captured).toEqual([
      {
        url: '/prepare',
        method: 'post',
        body: {
          id: 'gsheets_3',
          action: 'ENTRY',
          side: 'BUY',
          instrument: 'USD/JPY',
          quantity: 1000,
          executeAt: '2026-10-19T06:15:00.000Z',
          linkedEntryId: null
        }
      }
    ]);
  });

  it('ok: false do worker é falha', async () => {
    const { client } = workerStub((config) => response(config, 200, { ok: false, diagnostic: { reason: 'botão não encontrado' } }));
    const sink = new HttpExecutionSink('http://worker.test', 1000, client);

    await expect(sink.execute(record)).resolves.toEqual({
      ok: false,
      diagnostic: { status: 200, reason: 'botão não encontrado' }
    });
  });

  it('corpo vazio conta como sucesso', async () => {
    const { client, captured } = workerStub((config) => response(config, 204, ''));
    const sink = new HttpExecutionSink('http://worker.test', 1000, client);

    await expect(sink.execute(record)).resolves.toEqual({ ok: true, diagnostic: { status: 204 } });
    expect(captured[0].url).toBe('/execute');
  });

  it('erro HTTP vira resultado com status', async () => {
    const { client } = workerStub((config) => {
      throw new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null,
        response(config, 503, { message: 'worker ocupado' }));
    });
    const sink = new HttpExecutionSink('http://worker.test', 1000, client);

    await expect(sink.prepare(record)).resolves.toEqual({
      ok: false,
      diagnostic: { status: 503, error: { message: 'worker ocupado' } }
    });
  });

  it('erro que não é do axios é relançado', async () => {
    const { client } = workerStub(() => {
      throw new TypeError('falha local');
    });
    const sink = new HttpExecutionSink('http://worker.test', 1000, client);

    await expect(sink.prepare(record)).rejects.toThrow('falha local');
  });
});
