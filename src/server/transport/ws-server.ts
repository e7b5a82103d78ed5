import { WebSocket, WebSocketServer } from 'ws';
import type { Server } from 'node:http';
import { randomUUID } from 'node:crypto';
import type { BoardOutgoingMessage } from '../../shared/protocol.js';
import type { BoardContext } from '../api/types.js';
import { toErrorBody } from '../errors.js';
import { dispatchBoardRequest, parseBoardRequest, parseHello } from './ws-protocol.js';
import { WsEndpoint } from './ws-endpoint.js';

const POLICY_VIOLATION = 1008;

export function mountWsServer(server: Server, ctx: BoardContext): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });

  wss.on('connection', (ws, req) => {
    const connId = randomUUID();
    let participantId: string | undefined;
    let endpoint: WsEndpoint | undefined;

    ctx.connectionManager.registerConnection(connId, req.socket.remoteAddress, Date.now());

    const sendJson = (message: BoardOutgoingMessage): boolean => {
      if (ws.readyState !== WebSocket.OPEN) return false;
      ws.send(JSON.stringify(message));
      return true;
    };

    ws.on('message', (raw) => {
      const text = raw.toString();

      if (participantId === undefined) {
        const hello = parseHello(text);
        if (!hello.ok) {
          ws.close(POLICY_VIOLATION, hello.reason.slice(0, 120));
          return;
        }
        const candidate = new WsEndpoint(sendJson, (code, reason) => ws.close(code, reason));
        try {
          const registration = ctx.coordinator.registerUser(hello.message.participantId, candidate, hello.message.role === 'manager');
          participantId = registration.id;
          endpoint = candidate;
          ctx.connectionManager.bindConnectionToParticipant(connId, registration.id);
          sendJson({ type: 'welcome', participantId: registration.id, role: registration.role, admission: registration.admission });
        } catch (error) {
          const body = toErrorBody(error);
          sendJson({ type: 'error', ...body });
          ws.close(POLICY_VIOLATION, body.code);
        }
        return;
      }

      const request = parseBoardRequest(text);
      if (!request.ok) {
        sendJson({ type: 'error', code: 'invalid_params', message: request.reason });
        return;
      }
      dispatchBoardRequest(ctx.coordinator, participantId, request.message).then(
        (reply) => { sendJson(reply); },
        (error: unknown) => console.error(`[ws] failed to answer ${request.message.type}:`, error)
      );
    });

    // ws closes the socket after a protocol error; the close handler below deregisters
    ws.on('error', (error) => {
      console.error(`[ws] connection ${connId} error:`, error.message);
    });

    ws.on('close', (code) => {
      ctx.counters.markWsClose(code);
      ctx.connectionManager.unregisterConnection(connId);
      if (participantId === undefined || !endpoint || ctx.coordinator.getState() !== 'open') return;
      const id = participantId;
      ctx.coordinator.deregister(id, endpoint).catch((error: unknown) => {
        console.error(`[ws] failed to deregister ${id}:`, error);
      });
    });
  });

  server.on('upgrade', (req, socket, head) => {
    const url = req.url || '';
    if (!url.startsWith('/ws')) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit('connection', ws, req);
    });
  });

  return wss;
}
