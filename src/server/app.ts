import express from 'express';
import http from 'node:http';
import type { WebSocketServer } from 'ws';
import { makeBoardsRoute } from './api/boards-route.js';
import { makeParticipantsRoute } from './api/participants-route.js';
import { makeStatusRoute } from './api/status-route.js';
import type { BoardContext } from './api/types.js';
import { Counters } from './metrics/counters.js';
import { BoardStore, type BoardStorage } from './persistence/board-store.js';
import { SessionCoordinator } from './session/session-coordinator.js';
import { ConnectionManager } from './transport/connection-manager.js';
import { mountWsServer } from './transport/ws-server.js';

export interface BoardServerOptions {
  port: number;
  boardDir: string;
  deliveryTimeoutMs: number;
  approvalTimeoutMs: number;
  boards?: BoardStorage;
  onClosed?: () => void;
}

export interface BoardServer {
  app: express.Express;
  server: http.Server;
  wss: WebSocketServer;
  ctx: BoardContext;
}

export function createBoardServer(options: BoardServerOptions): BoardServer {
  const app = express();
  const server = http.createServer(app);

  const counters = new Counters();
  const connectionManager = new ConnectionManager();
  const boards = options.boards ?? new BoardStore(options.boardDir);
  const coordinator = new SessionCoordinator(boards, counters, {
    deliveryTimeoutMs: options.deliveryTimeoutMs,
    approvalTimeoutMs: options.approvalTimeoutMs,
    onClosed: options.onClosed
  });

  const getMetrics = () => ({
    state: coordinator.getState(),
    participantsActive: coordinator.listActive().length,
    participantsPending: coordinator.listPending().length,
    actionLogSize: coordinator.actionCount(),
    wsConnections: connectionManager.size(),
    endpointsBusy: coordinator.busyEndpoints()
  });

  const ctx: BoardContext = { port: options.port, coordinator, connectionManager, counters, boards, getMetrics };

  app.use(express.json());
  app.use('/api', makeStatusRoute(ctx));
  app.use('/api', makeParticipantsRoute(ctx));
  app.use('/api', makeBoardsRoute(ctx));

  const wss = mountWsServer(server, ctx);

  return { app, server, wss, ctx };
}
