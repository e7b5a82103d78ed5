import type { Counters } from '../metrics/counters.js';
import type { ActionRecord, BoardEvent, SessionEndpoint } from '../types.js';
import type { ActionLog } from './action-log.js';
import { DeliveryChannel, type DeliveryFailure, type DeliveryTask } from './delivery-channel.js';
import type { MembershipRegistry } from './membership-registry.js';

export interface BroadcastOptions {
  deliveryTimeoutMs: number;
}

/**
 * Fans session events out to every active participant.
 *
 * Each endpoint gets its own DeliveryChannel, so a participant that throws or
 * stalls only delays its own queue. Failures are logged and counted here and
 * never reach the publisher.
 */
export class BroadcastEngine {
  private readonly channels = new WeakMap<SessionEndpoint, DeliveryChannel>();
  private readonly inflight = new Set<DeliveryChannel>();

  constructor(
    private readonly registry: MembershipRegistry,
    private readonly log: ActionLog,
    private readonly counters: Counters,
    private readonly options: BroadcastOptions
  ) {}

  publish(payload: string): ActionRecord {
    const record = this.log.append(payload);
    this.counters.publishTotal += 1;
    this.fanOut('event', (ep) => ep.deliverEvent({ kind: 'action', sequence: record.sequence, payload: record.payload }));
    return record;
  }

  publishMembershipUpdate(): string[] {
    const active = this.registry.listActive();
    this.fanOut('membership', (ep) => ep.deliverMembership([...active]));
    return active;
  }

  publishClear(): void {
    this.log.clear();
    this.fanOut('clear', (ep) => ep.deliverEvent({ kind: 'clear' }));
  }

  publishChat(from: string, text: string): void {
    const event: BoardEvent = { kind: 'chat', from, text };
    this.fanOut('chat', (ep) => ep.deliverEvent(event));
  }

  /** Replaces the log and replays it to everyone on a cleared surface. */
  restore(payloads: readonly string[]): ActionRecord[] {
    const records = this.log.restore(payloads);
    this.fanOut('clear', (ep) => ep.deliverEvent({ kind: 'clear' }));
    for (const record of records) {
      this.fanOut('event', (ep) => ep.deliverEvent({ kind: 'action', sequence: record.sequence, payload: record.payload }));
    }
    return records;
  }

  /** Replays the current log to one endpoint, used when a participant is admitted. */
  replayTo(endpoint: SessionEndpoint): void {
    for (const record of this.log.records()) {
      this.deliverTo(endpoint, 'replay', (ep) => ep.deliverEvent({ kind: 'action', sequence: record.sequence, payload: record.payload }));
    }
  }

  deliverTo(endpoint: SessionEndpoint, label: string, task: DeliveryTask): void {
    const channel = this.channelFor(endpoint);
    this.counters.deliveryTotal += 1;
    channel.deliver(label, task);
    if (channel.busy && !this.inflight.has(channel)) {
      this.inflight.add(channel);
      void this.releaseWhenIdle(channel);
    }
  }

  /** Resolves when every delivery queued so far has been attempted. */
  async flush(): Promise<void> {
    for (;;) {
      const busy = [...this.inflight].filter((c) => c.busy);
      if (busy.length === 0) return;
      await Promise.all(busy.map((c) => c.idle()));
    }
  }

  /** Endpoints with a delivery still in flight. */
  busyEndpoints(): number {
    return this.inflight.size;
  }

  // only channels with pending work are held strongly; idle ones live in the WeakMap
  private async releaseWhenIdle(channel: DeliveryChannel): Promise<void> {
    while (channel.busy) await channel.idle();
    this.inflight.delete(channel);
  }

  private fanOut(label: string, task: DeliveryTask): void {
    for (const participant of this.registry.activeParticipants()) {
      this.deliverTo(participant.endpoint, label, task);
    }
  }

  private channelFor(endpoint: SessionEndpoint): DeliveryChannel {
    let channel = this.channels.get(endpoint);
    if (!channel) {
      channel = new DeliveryChannel(endpoint, this.options.deliveryTimeoutMs, (failure) => this.onFailure(failure));
      this.channels.set(endpoint, channel);
    }
    return channel;
  }

  private onFailure(failure: DeliveryFailure): void {
    this.counters.deliveryFailureTotal += 1;
    if (failure.timedOut) this.counters.deliveryTimeoutTotal += 1;
    console.error(`[broadcast] ${failure.error.message}`);
  }
}
