import {
  boardRequestSchema,
  helloMessageSchema,
  parseFrame,
  type BoardOutgoingMessage,
  type BoardRequest,
  type HelloMessage,
  type ParseResult
} from '../../shared/protocol.js';
import { toErrorBody } from '../errors.js';
import type { SessionCoordinator } from '../session/session-coordinator.js';

export function parseHello(raw: string): ParseResult<HelloMessage> {
  const parsed = parseFrame(helloMessageSchema, raw);
  if (!parsed.ok) return { ok: false, reason: `first message must be hello (${parsed.reason})` };
  return parsed;
}

export function parseBoardRequest(raw: string): ParseResult<BoardRequest> {
  return parseFrame(boardRequestSchema, raw);
}

/**
 * Runs one request for `participantId` and turns the outcome into the reply
 * frame. The coordinator call starts synchronously, so requests take effect
 * in the order their frames arrived.
 */
export async function dispatchBoardRequest(coordinator: SessionCoordinator, participantId: string, request: BoardRequest): Promise<BoardOutgoingMessage> {
  try {
    const result = await runRequest(coordinator, participantId, request);
    return { type: 'ack', requestId: request.requestId, ...(result === undefined ? {} : { result }) };
  } catch (error) {
    const body = toErrorBody(error);
    if (body.code === 'internal_error') console.error(`[ws] ${request.type} from ${participantId} failed:`, error);
    return { type: 'error', requestId: request.requestId, ...body };
  }
}

async function runRequest(coordinator: SessionCoordinator, participantId: string, request: BoardRequest): Promise<unknown> {
  switch (request.type) {
    case 'approve':
      return coordinator.approveClient(participantId, request.participantId);
    case 'refuse':
      coordinator.refuseClient(participantId, request.participantId);
      return undefined;
    case 'canvas_action':
      return coordinator.canvasAction(participantId, request.payload);
    case 'clear_canvas':
      coordinator.clearCanvas(participantId);
      return undefined;
    case 'chat':
      coordinator.sendMessage(participantId, request.text);
      return undefined;
    case 'kick':
      return coordinator.kickUser(participantId, request.participantId);
    case 'new_board':
      coordinator.createNewBoard(participantId);
      return undefined;
    case 'open_board':
      return coordinator.openBoard(participantId, request.name);
    case 'save_board':
      await coordinator.saveBoard(participantId, request.name);
      return undefined;
    case 'close_board':
      await coordinator.closeBoard(participantId);
      return undefined;
    case 'get_state':
      return coordinator.getSessionState(participantId);
    case 'leave':
      return coordinator.deregister(participantId);
  }
}
