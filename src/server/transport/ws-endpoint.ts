import { SessionError } from '../errors.js';
import type { AdmissionDecision, BoardEvent, SessionEndpoint } from '../types.js';
import type { BoardOutgoingMessage } from '../../shared/protocol.js';

export const DISCONNECT_CLOSE_CODE = 4000;

export type SendJson = (message: BoardOutgoingMessage) => boolean;

/** SessionEndpoint backed by one WebSocket connection. */
export class WsEndpoint implements SessionEndpoint {
  constructor(
    private readonly sendJson: SendJson,
    private readonly close: (code: number, reason: string) => void
  ) {}

  deliverEvent(event: BoardEvent): void {
    this.push({ type: 'event', event });
  }

  deliverMembership(activeIds: string[]): void {
    this.push({ type: 'membership', participants: activeIds });
  }

  deliverJoinRequest(applicantId: string): void {
    this.push({ type: 'join_request', participantId: applicantId });
  }

  deliverJoinWithdrawn(applicantId: string): void {
    this.push({ type: 'join_withdrawn', participantId: applicantId });
  }

  deliverDecision(decision: AdmissionDecision): void {
    this.push({ type: 'decision', decision });
    if (decision !== 'approved') this.close(DISCONNECT_CLOSE_CODE, decision);
  }

  deliverDisconnect(reason: string): void {
    this.push({ type: 'disconnect', reason });
    this.close(DISCONNECT_CLOSE_CODE, 'disconnected');
  }

  private push(message: BoardOutgoingMessage): void {
    if (!this.sendJson(message)) {
      throw new SessionError('endpoint_unreachable', `socket is not open (${message.type})`);
    }
  }
}
