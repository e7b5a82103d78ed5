import type { ZodType } from 'zod';
import { SessionError } from '../errors.js';
import type { Counters } from '../metrics/counters.js';
import { chatTextSchema, participantIdSchema, singleLineSchema } from '../persistence/board-schema.js';
import type { BoardStorage } from '../persistence/board-store.js';
import type { AdmissionDecision, ParticipantRole, SessionEndpoint, SessionState } from '../types.js';
import { ActionLog } from './action-log.js';
import { ApprovalBroker, type WaitOptions } from './approval-broker.js';
import { BroadcastEngine } from './broadcast-engine.js';
import { MembershipRegistry } from './membership-registry.js';

export interface SessionCoordinatorOptions {
  deliveryTimeoutMs: number;
  approvalTimeoutMs: number;
  onClosed?: () => void;
  now?: () => number;
}

export interface Registration {
  id: string;
  role: ParticipantRole;
  admission: 'active' | 'pending';
}

const KICK_REASON = 'You have been kicked out by the manager.';
const CLOSE_REASON = 'The whiteboard session is closing. You will be disconnected.';
const MANAGER_LEFT_REASON = 'The manager left. The whiteboard session is closing.';

/**
 * The one entry point of a whiteboard session.
 *
 * Every mutating operation applies its registry/log transition synchronously,
 * which makes it a single critical section on the event loop. Board file I/O
 * is awaited outside the transition, and state and authorization are checked
 * again once it completes.
 */
export class SessionCoordinator {
  private state: SessionState = 'waiting';
  private readonly registry = new MembershipRegistry();
  private readonly log = new ActionLog();
  private readonly engine: BroadcastEngine;
  private readonly approvals: ApprovalBroker;
  private readonly now: () => number;
  private closing?: Promise<void>;

  constructor(
    private readonly boards: BoardStorage,
    private readonly counters: Counters,
    private readonly options: SessionCoordinatorOptions
  ) {
    this.engine = new BroadcastEngine(this.registry, this.log, counters, { deliveryTimeoutMs: options.deliveryTimeoutMs });
    this.approvals = new ApprovalBroker((id) => this.expirePending(id));
    this.now = options.now ?? Date.now;
  }

  registerUser(id: string, endpoint: SessionEndpoint, isManager: boolean): Registration {
    this.assertNotClosed();
    const participantId = parse(participantIdSchema, id);

    if (isManager) {
      this.registry.registerManager(participantId, endpoint, this.now());
      this.state = 'open';
      console.log(`[session] manager ${participantId} registered, session open`);
      this.engine.publishMembershipUpdate();
      return { id: participantId, role: 'manager', admission: 'active' };
    }

    this.assertOpen();
    const { manager } = this.registry.requestJoin(participantId, endpoint, this.now());
    this.approvals.open(participantId, this.options.approvalTimeoutMs);
    if (manager) {
      this.engine.deliverTo(manager.endpoint, 'join_request', (ep) => ep.deliverJoinRequest(participantId));
    }
    console.log(`[session] ${participantId} is waiting for approval`);
    return { id: participantId, role: 'regular', admission: 'pending' };
  }

  /** Resolves once the applicant's pending request reaches a terminal state. */
  awaitDecision(id: string, options?: WaitOptions): Promise<AdmissionDecision> {
    return this.approvals.waitFor(id, options);
  }

  approveClient(callerId: string, id: string): string[] {
    this.assertManager(callerId, 'approve participants');
    const { participant, active } = this.registry.approve(id, this.now());
    this.approvals.settle(id, 'approved');
    this.counters.admissionTotal += 1;
    this.engine.deliverTo(participant.endpoint, 'decision', (ep) => ep.deliverDecision('approved'));
    this.engine.publishMembershipUpdate();
    this.engine.replayTo(participant.endpoint);
    console.log(`[session] approved ${id}, active: ${active.join(', ')}`);
    return active;
  }

  refuseClient(callerId: string, id: string): void {
    this.assertManager(callerId, 'refuse participants');
    const participant = this.registry.reject(id);
    this.approvals.settle(id, 'rejected');
    this.counters.rejectionTotal += 1;
    this.engine.deliverTo(participant.endpoint, 'decision', (ep) => ep.deliverDecision('rejected'));
    console.log(`[session] refused ${id}`);
  }

  canvasAction(callerId: string, payload: string): number {
    this.assertActive(callerId);
    const record = this.engine.publish(parse(singleLineSchema, payload));
    return record.sequence;
  }

  clearCanvas(callerId: string): void {
    this.assertActive(callerId);
    this.engine.publishClear();
  }

  sendMessage(callerId: string, text: string): void {
    this.assertActive(callerId);
    this.engine.publishChat(callerId, parse(chatTextSchema, text));
  }

  /** Returns false when there was nobody to remove. */
  kickUser(callerId: string, id: string): boolean {
    this.assertManager(callerId, 'kick participants');
    if (id === callerId) throw new SessionError('unauthorized', 'the manager cannot kick themselves');

    const outcome = this.registry.remove(id);
    if (outcome.kind === 'none') {
      console.warn(`[session] attempt to kick unknown participant ${id}`);
      return false;
    }
    if (outcome.kind === 'pending') this.approvals.settle(id, 'withdrawn');
    this.counters.kickTotal += 1;
    this.engine.deliverTo(outcome.participant.endpoint, 'disconnect', (ep) => ep.deliverDisconnect(KICK_REASON));
    if (outcome.kind === 'active') this.engine.publishMembershipUpdate();
    console.log(`[session] ${id} was kicked out by the manager`);
    return true;
  }

  createNewBoard(callerId: string): void {
    this.assertManager(callerId, 'create a new board');
    this.engine.publishClear();
  }

  async openBoard(callerId: string, name: string): Promise<number> {
    this.assertManager(callerId, 'open a board');
    const payloads = await this.boards.load(name);
    this.assertManager(callerId, 'open a board');
    const records = this.engine.restore(payloads);
    console.log(`[session] opened board ${name} with ${records.length} actions`);
    return records.length;
  }

  async saveBoard(callerId: string, name: string): Promise<void> {
    this.assertManager(callerId, 'save the board');
    const payloads = this.log.snapshot();
    await this.boards.save(name, payloads);
    console.log(`[session] saved board ${name} with ${payloads.length} actions`);
  }

  async closeBoard(callerId: string): Promise<void> {
    this.assertManager(callerId, 'close the board');
    await this.shutdown(CLOSE_REASON);
  }

  getSessionState(callerId: string): string[] {
    this.assertActive(callerId);
    return this.log.snapshot();
  }

  /**
   * Voluntary departure. A pending applicant withdraws its request; the
   * manager leaving closes the session. When `endpoint` is given, the call
   * only applies if the id is still bound to that endpoint.
   */
  async deregister(id: string, endpoint?: SessionEndpoint): Promise<boolean> {
    this.assertNotClosed();
    if (endpoint && this.registry.get(id)?.endpoint !== endpoint) return false;
    if (this.registry.isActiveManager(id)) {
      await this.shutdown(MANAGER_LEFT_REASON);
      return true;
    }
    const outcome = this.registry.remove(id);
    if (outcome.kind === 'pending') {
      this.approvals.settle(id, 'withdrawn');
      this.notifyManagerOfWithdrawal(id);
    }
    if (outcome.kind === 'active') this.engine.publishMembershipUpdate();
    if (outcome.kind !== 'none') console.log(`[session] ${id} left`);
    return outcome.kind !== 'none';
  }

  getState(): SessionState { return this.state; }
  getManagerId(): string | undefined { return this.registry.managerId(); }
  listActive(): string[] { return this.registry.listActive(); }
  listPending(): string[] { return this.registry.listPending(); }
  actionCount(): number { return this.log.size(); }
  busyEndpoints(): number { return this.engine.busyEndpoints(); }

  /** Resolves once every delivery dispatched so far has been attempted. */
  flush(): Promise<void> {
    return this.engine.flush();
  }

  private shutdown(reason: string): Promise<void> {
    if (this.closing) return this.closing;
    this.state = 'closing';
    const everyone = this.registry.removeAll();
    this.approvals.settleAll('closed');
    for (const p of everyone) {
      this.engine.deliverTo(p.endpoint, 'disconnect', (ep) => ep.deliverDisconnect(reason));
    }
    this.log.clear();
    console.log(`[session] closing, notified ${everyone.length} participants`);
    this.closing = this.engine.flush().then(() => {
      this.state = 'closed';
      console.log('[session] closed');
      this.options.onClosed?.();
    });
    return this.closing;
  }

  private expirePending(id: string): void {
    if (this.state !== 'open') return;
    const outcome = this.registry.remove(id);
    if (outcome.kind !== 'pending') return;
    this.approvals.settle(id, 'expired');
    this.engine.deliverTo(outcome.participant.endpoint, 'decision', (ep) => ep.deliverDecision('expired'));
    this.notifyManagerOfWithdrawal(id);
    console.warn(`[session] approval request from ${id} expired`);
  }

  private notifyManagerOfWithdrawal(id: string): void {
    const managerId = this.registry.managerId();
    const manager = managerId === undefined ? undefined : this.registry.get(managerId);
    if (manager?.admission !== 'active') return;
    this.engine.deliverTo(manager.endpoint, 'join_withdrawn', (ep) => ep.deliverJoinWithdrawn(id));
  }

  private assertNotClosed(): void {
    if (this.state === 'closing' || this.state === 'closed') {
      throw new SessionError('session_closed', 'the whiteboard session is closed');
    }
  }

  private assertOpen(): void {
    this.assertNotClosed();
    if (this.state === 'waiting') {
      throw new SessionError('session_not_open', 'the whiteboard session has no manager yet');
    }
  }

  private assertActive(callerId: string): void {
    this.assertOpen();
    if (!this.registry.isActive(callerId)) {
      throw new SessionError('unauthorized', `${callerId} is not an active participant`);
    }
  }

  private assertManager(callerId: string, action: string): void {
    this.assertOpen();
    if (!this.registry.isActiveManager(callerId)) {
      throw new SessionError('unauthorized', `only the manager can ${action}`);
    }
  }
}

function parse<T>(schema: ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SessionError('invalid_params', result.error.issues[0]?.message ?? 'invalid input');
  }
  return result.data;
}
