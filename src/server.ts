// src/server.ts

import 'dotenv/config';
import express, { Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { WebSocket, WebSocketServer } from 'ws';
import { loadConfig } from './config/settings';
import { errorMessage } from './errors';
import { EngineEvent, TradingEngine } from './robot/tradingEngine';

export function createApp(engine: TradingEngine) {
  const app = express();

  app.use(cors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:4200'
  }));

  app.use(bodyParser.json());

  // 🚀 Endpoint para iniciar o robô
  app.post('/start', async (req: Request, res: Response) => {
    if (engine.isRunning) {
      return res.status(400).json({ message: 'Robô já está rodando' });
    }

    try {
      const summary = await engine.start();
      return res.json({ message: 'Robô iniciado com sucesso', summary });
    } catch (err) {
      console.error('❌ Erro ao iniciar o robô via API:', errorMessage(err));
      return res.status(500).json({ message: 'Erro ao iniciar o robô', error: errorMessage(err) });
    }
  });

  // 🛑 Endpoint para parar o robô
  app.post('/stop', async (req: Request, res: Response) => {
    if (!engine.isRunning) {
      return res.status(400).json({ message: 'Robô não está rodando' });
    }

    try {
      const result = await engine.stop();
      return res.json({ message: 'Robô parado com sucesso', result });
    } catch (err) {
      console.error('❌ Erro ao parar o robô via API:', errorMessage(err));
      return res.status(500).json({ message: 'Erro ao parar o robô', error: errorMessage(err) });
    }
  });

  app.get('/status', (req: Request, res: Response) => {
    return res.json({ ...engine.status(), timestamp: new Date().toISOString() });
  });

  // carrega a agenda sob demanda se o robô ainda não rodou
  app.get('/summary', async (req: Request, res: Response) => {
    try {
      const summary = engine.getSummary() ?? await engine.load();
      return res.json(summary);
    } catch (err) {
      return res.status(500).json({ message: 'Erro ao carregar agenda', error: errorMessage(err) });
    }
  });

  app.get('/schedule', (req: Request, res: Response) => {
    return res.json(engine.getSchedule());
  });

  return app;
}

/** Repassa os eventos do dispatcher para todos os clientes WebSocket conectados */
export function attachEventBroadcast(engine: TradingEngine, wss: WebSocketServer): () => void {
  const clients = new Set<WebSocket>();

  wss.on('connection', (ws) => {
    console.log('🔗 Cliente conectado em /events');
    clients.add(ws);
    ws.send(JSON.stringify({ type: 'status', payload: engine.status() }));

    ws.on('close', () => {
      console.log('❌ Cliente desconectado de /events');
      clients.delete(ws);
    });
  });

  return engine.subscribe((event: EngineEvent) => {
    const payload = JSON.stringify({ ...event, timestamp: new Date().toISOString() });
    for (const client of clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  });
}

// --- Inicializa REST API + WS de eventos
if (require.main === module) {
  const { settings } = loadConfig();
  const port = Number(process.env.PORT) || settings.server.port;
  const engine = new TradingEngine({ dryRun: process.env.DRY_RUN === 'true' });

  const wss = new WebSocketServer({ port: settings.server.ws_port });
  attachEventBroadcast(engine, wss);

  createApp(engine).listen(port, () => {
    console.log(`✅ API REST do robô rodando em http://localhost:${port}`);
    console.log(`✅ WS /events: ws://localhost:${settings.server.ws_port}`);
  });
}
