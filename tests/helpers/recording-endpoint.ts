import type { AdmissionDecision, BoardEvent, SessionEndpoint } from '../../src/server/types.js';

export type Delivery =
  | { type: 'event'; event: BoardEvent }
  | { type: 'membership'; participants: string[] }
  | { type: 'join_request'; participantId: string }
  | { type: 'join_withdrawn'; participantId: string }
  | { type: 'decision'; decision: AdmissionDecision }
  | { type: 'disconnect'; reason: string };

export type EndpointMode = 'ok' | 'throw' | 'hang' | 'slow';

export class RecordingEndpoint implements SessionEndpoint {
  readonly received: Delivery[] = [];

  constructor(private readonly mode: EndpointMode = 'ok', private readonly slowMs = 5) {}

  deliverEvent(event: BoardEvent): void | Promise<void> { return this.record({ type: 'event', event }); }
  deliverMembership(activeIds: string[]): void | Promise<void> { return this.record({ type: 'membership', participants: activeIds }); }
  deliverJoinRequest(applicantId: string): void | Promise<void> { return this.record({ type: 'join_request', participantId: applicantId }); }
  deliverJoinWithdrawn(applicantId: string): void | Promise<void> { return this.record({ type: 'join_withdrawn', participantId: applicantId }); }
  deliverDecision(decision: AdmissionDecision): void | Promise<void> { return this.record({ type: 'decision', decision }); }
  deliverDisconnect(reason: string): void | Promise<void> { return this.record({ type: 'disconnect', reason }); }

  last(): Delivery | undefined {
    return this.received[this.received.length - 1];
  }

  payloads(): string[] {
    return this.received.flatMap((d) => (d.type === 'event' && d.event.kind === 'action' ? [d.event.payload] : []));
  }

  /** Applies received events the way a drawing surface would. */
  replica(): string[] {
    const out: string[] = [];
    for (const d of this.received) {
      if (d.type !== 'event') continue;
      if (d.event.kind === 'action') out.push(d.event.payload);
      else if (d.event.kind === 'clear') out.length = 0;
    }
    return out;
  }

  private record(delivery: Delivery): void | Promise<void> {
    if (this.mode === 'throw') throw new Error('participant unreachable');
    if (this.mode === 'hang') return new Promise<void>(() => undefined);
    if (this.mode === 'slow') {
      return new Promise<void>((resolve) => setTimeout(() => {
        this.received.push(delivery);
        resolve();
      }, this.slowMs));
    }
    this.received.push(delivery);
  }
}
