import { randomUUID } from 'node:crypto';
import WebSocket from 'ws';
import { z } from 'zod';
import {
  PROTOCOL_VERSION,
  boardOutgoingMessageSchema,
  parseFrame,
  type AdmissionDecision,
  type BoardEvent,
  type BoardOutgoingMessage,
  type BoardRequest,
  type HelloMessage,
  type ParticipantRole
} from '../shared/protocol.js';
import { RequestBroker } from './request-broker.js';

export interface BoardClientHandlers {
  onEvent?: (event: BoardEvent) => void;
  onMembership?: (participants: string[]) => void;
  onJoinRequest?: (participantId: string) => void;
  onJoinWithdrawn?: (participantId: string) => void;
  onDecision?: (decision: AdmissionDecision) => void;
  onDisconnect?: (reason: string) => void;
}

export interface BoardClientOptions {
  requestTimeoutMs?: number;
  handlers?: BoardClientHandlers;
}

export interface Welcome {
  participantId: string;
  role: ParticipantRole;
  admission: 'active' | 'pending';
}

export class BoardClientError extends Error {
  constructor(readonly code: string, message: string) {
    super(message);
    this.name = 'BoardClientError';
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type RequestBody = DistributiveOmit<BoardRequest, 'requestId'>;

const noResult = z.undefined();
const countResult = z.number().int();
const idListResult = z.array(z.string());
const removedResult = z.boolean();

/**
 * Remote side of a whiteboard session over WebSocket. Keeps a local replica
 * of the action log and the member list, fed by the server's pushes.
 */
export class BoardClient {
  readonly actions: string[] = [];
  readonly chat: Array<{ from: string; text: string }> = [];
  participants: string[] = [];
  disconnectReason?: string;

  private readonly requests = new RequestBroker<unknown>();
  private readonly ready: Promise<Welcome>;
  private readonly decision: Promise<AdmissionDecision>;
  private readonly disconnected: Promise<string>;
  private readonly closed: Promise<void>;
  private resolveReady: (welcome: Welcome) => void = () => undefined;
  private rejectReady: (reason: Error) => void = () => undefined;
  private resolveDecision: (decision: AdmissionDecision) => void = () => undefined;
  private resolveDisconnected: (reason: string) => void = () => undefined;

  private constructor(
    private readonly ws: WebSocket,
    hello: HelloMessage,
    private readonly requestTimeoutMs: number,
    private readonly handlers: BoardClientHandlers
  ) {
    this.ready = new Promise((resolve, reject) => {
      this.resolveReady = resolve;
      this.rejectReady = reject;
    });
    this.decision = new Promise((resolve) => { this.resolveDecision = resolve; });
    this.disconnected = new Promise((resolve) => { this.resolveDisconnected = resolve; });
    this.closed = new Promise((resolve) => ws.once('close', () => resolve()));

    ws.on('open', () => ws.send(JSON.stringify(hello)));
    ws.on('message', (raw) => this.onFrame(raw.toString()));
    ws.on('error', (error) => {
      console.error('[board-client] socket error:', error.message);
      this.rejectReady(error);
    });
    ws.on('close', (code, reason) => {
      const detail = reason.toString() || `code ${code}`;
      this.rejectReady(new BoardClientError('connection_closed', `connection closed before welcome: ${detail}`));
      this.resolveDecision('closed');
      this.resolveDisconnected(detail);
      this.requests.rejectAll(new BoardClientError('connection_closed', `connection closed: ${detail}`));
    });
  }

  static async connect(url: string, participantId: string, role: ParticipantRole, options: BoardClientOptions = {}): Promise<BoardClient> {
    const hello: HelloMessage = { type: 'hello', participantId, role, version: PROTOCOL_VERSION };
    const client = new BoardClient(new WebSocket(url), hello, options.requestTimeoutMs ?? 8_000, options.handlers ?? {});
    await client.ready;
    return client;
  }

  /** Resolves once the manager decided; managers resolve `approved` at once. */
  waitForDecision(timeoutMs?: number): Promise<AdmissionDecision> {
    if (timeoutMs === undefined) return this.decision;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error('timeout')), timeoutMs);
      void this.decision.then((decision) => {
        clearTimeout(timer);
        resolve(decision);
      });
    });
  }

  /** Resolves with the reason once the server disconnected this participant. */
  waitForDisconnect(): Promise<string> {
    return this.disconnected;
  }

  async approve(participantId: string): Promise<string[]> {
    return this.request({ type: 'approve', participantId }, idListResult);
  }

  async refuse(participantId: string): Promise<void> {
    await this.request({ type: 'refuse', participantId }, noResult);
  }

  async kick(participantId: string): Promise<boolean> {
    return this.request({ type: 'kick', participantId }, removedResult);
  }

  async canvasAction(payload: string): Promise<number> {
    return this.request({ type: 'canvas_action', payload }, countResult);
  }

  async clearCanvas(): Promise<void> {
    await this.request({ type: 'clear_canvas' }, noResult);
  }

  async sendMessage(text: string): Promise<void> {
    await this.request({ type: 'chat', text }, noResult);
  }

  async newBoard(): Promise<void> {
    await this.request({ type: 'new_board' }, noResult);
  }

  async openBoard(name: string): Promise<number> {
    return this.request({ type: 'open_board', name }, countResult);
  }

  async saveBoard(name: string): Promise<void> {
    await this.request({ type: 'save_board', name }, noResult);
  }

  /** The server disconnects the manager while closing, so either signal ends the call. */
  async closeBoard(): Promise<void> {
    const ack = this.request({ type: 'close_board' }, noResult);
    await Promise.race([ack, this.disconnected.then(() => undefined)]);
  }

  /** Re-fetches the full log and replaces the local replica with it. */
  async syncState(): Promise<string[]> {
    const payloads = await this.request({ type: 'get_state' }, idListResult);
    this.actions.splice(0, this.actions.length, ...payloads);
    return payloads;
  }

  async leave(): Promise<void> {
    await this.request({ type: 'leave' }, removedResult);
    await this.close();
  }

  async close(): Promise<void> {
    if (this.ws.readyState !== WebSocket.CLOSED) this.ws.close(1000, 'bye');
    await this.closed;
  }

  private async request<T>(body: RequestBody, schema: z.ZodType<T>): Promise<T> {
    const requestId = randomUUID();
    const result = this.requests.waitForResult(requestId, this.requestTimeoutMs);
    if (this.ws.readyState !== WebSocket.OPEN) {
      this.requests.rejectResult(requestId, new BoardClientError('connection_closed', 'connection is not open'));
    } else {
      this.ws.send(JSON.stringify({ ...body, requestId }));
    }
    const parsed = schema.safeParse(await result);
    if (!parsed.success) throw new BoardClientError('invalid_reply', `unexpected ${body.type} result`);
    return parsed.data;
  }

  private onFrame(raw: string): void {
    const frame = parseFrame(boardOutgoingMessageSchema, raw);
    if (!frame.ok) {
      console.warn(`[board-client] dropped frame: ${frame.reason}`);
      return;
    }
    this.apply(frame.message);
  }

  private apply(message: BoardOutgoingMessage): void {
    switch (message.type) {
      case 'welcome':
        this.resolveReady({ participantId: message.participantId, role: message.role, admission: message.admission });
        if (message.admission === 'active') this.resolveDecision('approved');
        break;
      case 'ack':
        if (message.requestId) this.requests.resolveResult(message.requestId, message.result);
        break;
      case 'error':
        if (message.requestId) {
          this.requests.rejectResult(message.requestId, new BoardClientError(message.code, message.message));
        } else {
          this.rejectReady(new BoardClientError(message.code, message.message));
          console.warn(`[board-client] ${message.code}: ${message.message}`);
        }
        break;
      case 'event':
        this.applyEvent(message.event);
        this.handlers.onEvent?.(message.event);
        break;
      case 'membership':
        this.participants = message.participants;
        this.handlers.onMembership?.(message.participants);
        break;
      case 'join_request':
        this.handlers.onJoinRequest?.(message.participantId);
        break;
      case 'join_withdrawn':
        this.handlers.onJoinWithdrawn?.(message.participantId);
        break;
      case 'decision':
        this.resolveDecision(message.decision);
        this.handlers.onDecision?.(message.decision);
        break;
      case 'disconnect':
        this.disconnectReason = message.reason;
        this.resolveDisconnected(message.reason);
        this.handlers.onDisconnect?.(message.reason);
        break;
    }
  }

  private applyEvent(event: BoardEvent): void {
    if (event.kind === 'action') this.actions.push(event.payload);
    else if (event.kind === 'clear') this.actions.length = 0;
    else this.chat.push({ from: event.from, text: event.text });
  }
}
