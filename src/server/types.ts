import type { AdmissionDecision, BoardEvent, ParticipantRole } from '../shared/protocol.js';

export type { AdmissionDecision, BoardEvent, ParticipantRole };
export type Admission = 'pending' | 'active' | 'rejected' | 'removed';
export type SessionState = 'waiting' | 'open' | 'closing' | 'closed';

export interface ActionRecord {
  sequence: number;
  payload: string;
}

/**
 * Push capability of one participant. Transports implement it; the session
 * core never sees sockets. A delivery may throw or return a rejected promise
 * when the participant is unreachable.
 */
export interface SessionEndpoint {
  deliverEvent(event: BoardEvent): void | Promise<void>;
  deliverMembership(activeIds: string[]): void | Promise<void>;
  deliverJoinRequest(applicantId: string): void | Promise<void>;
  deliverJoinWithdrawn(applicantId: string): void | Promise<void>;
  deliverDecision(decision: AdmissionDecision): void | Promise<void>;
  deliverDisconnect(reason: string): void | Promise<void>;
}

export interface Participant {
  id: string;
  role: ParticipantRole;
  admission: Admission;
  endpoint: SessionEndpoint;
  requestedAt: number;
  admittedAt?: number;
}

export interface SessionMetrics {
  state: SessionState;
  participantsActive: number;
  participantsPending: number;
  actionLogSize: number;
  wsConnections: number;
  endpointsBusy: number;
}
