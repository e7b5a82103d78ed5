import { SessionError } from '../errors.js';
import type { Participant, SessionEndpoint } from '../types.js';

export type RemovalOutcome =
  | { kind: 'none' }
  | { kind: 'active'; participant: Participant; active: string[] }
  | { kind: 'pending'; participant: Participant };

export class MembershipRegistry {
  private readonly participants = new Map<string, Participant>();
  // admission order of active ids; the manager is always first
  private readonly activeOrder: string[] = [];
  private manager?: string;

  registerManager(id: string, endpoint: SessionEndpoint, now: number): Participant {
    if (this.manager !== undefined) {
      throw new SessionError('duplicate_manager', `session already has a manager: ${this.manager}`);
    }
    const participant: Participant = { id, role: 'manager', admission: 'active', endpoint, requestedAt: now, admittedAt: now };
    this.manager = id;
    this.participants.set(id, participant);
    this.activeOrder.unshift(id);
    return participant;
  }

  /** Adds a pending applicant and returns the manager the request must be shown to. */
  requestJoin(id: string, endpoint: SessionEndpoint, now: number): { applicant: Participant; manager?: Participant } {
    const prev = this.participants.get(id);
    if (prev && (prev.admission === 'pending' || prev.admission === 'active')) {
      throw new SessionError('duplicate_id', `participant id already in use: ${id}`);
    }
    const applicant: Participant = { id, role: 'regular', admission: 'pending', endpoint, requestedAt: now };
    this.participants.set(id, applicant);
    return { applicant, manager: this.managerParticipant() };
  }

  approve(id: string, now: number): { participant: Participant; active: string[] } {
    const participant = this.requirePending(id);
    participant.admission = 'active';
    participant.admittedAt = now;
    this.activeOrder.push(id);
    return { participant, active: this.listActive() };
  }

  reject(id: string): Participant {
    const participant = this.requirePending(id);
    participant.admission = 'rejected';
    return participant;
  }

  remove(id: string): RemovalOutcome {
    const participant = this.participants.get(id);
    if (!participant) return { kind: 'none' };
    if (participant.admission === 'pending') {
      participant.admission = 'removed';
      return { kind: 'pending', participant };
    }
    if (participant.admission !== 'active') return { kind: 'none' };
    participant.admission = 'removed';
    const idx = this.activeOrder.indexOf(id);
    if (idx >= 0) this.activeOrder.splice(idx, 1);
    return { kind: 'active', participant, active: this.listActive() };
  }

  /** Marks every pending and active participant removed and returns them. */
  removeAll(): Participant[] {
    const removed: Participant[] = [];
    for (const p of this.participants.values()) {
      if (p.admission === 'pending' || p.admission === 'active') {
        p.admission = 'removed';
        removed.push(p);
      }
    }
    this.activeOrder.length = 0;
    return removed;
  }

  isActive(id: string): boolean {
    return this.participants.get(id)?.admission === 'active';
  }

  isActiveManager(id: string): boolean {
    return id === this.manager && this.isActive(id);
  }

  managerId(): string | undefined { return this.manager; }
  get(id: string): Participant | undefined { return this.participants.get(id); }
  listActive(): string[] { return [...this.activeOrder]; }
  listPending(): string[] { return this.byAdmission('pending').map((p) => p.id); }

  activeParticipants(): Participant[] {
    const out: Participant[] = [];
    for (const id of this.activeOrder) {
      const p = this.participants.get(id);
      if (p) out.push(p);
    }
    return out;
  }

  private managerParticipant(): Participant | undefined {
    return this.manager === undefined ? undefined : this.participants.get(this.manager);
  }

  private byAdmission(admission: Participant['admission']): Participant[] {
    return [...this.participants.values()].filter((p) => p.admission === admission);
  }

  private requirePending(id: string): Participant {
    const participant = this.participants.get(id);
    if (!participant || participant.admission !== 'pending') {
      throw new SessionError('unknown_pending_id', `no pending request for: ${id}`);
    }
    return participant;
  }
}
