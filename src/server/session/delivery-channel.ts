import { SessionError } from '../errors.js';
import type { SessionEndpoint } from '../types.js';

export type DeliveryTask = (endpoint: SessionEndpoint) => void | Promise<void>;

export interface DeliveryFailure {
  label: string;
  error: SessionError;
  timedOut: boolean;
}

/**
 * Ordered delivery to a single endpoint. A task runs immediately when nothing
 * is in flight; otherwise it waits behind the previous task. Tasks never
 * reject: failures and timeouts are reported through `onFailure`.
 */
export class DeliveryChannel {
  private pending?: Promise<void>;

  constructor(
    private readonly endpoint: SessionEndpoint,
    private readonly timeoutMs: number,
    private readonly onFailure: (failure: DeliveryFailure) => void
  ) {}

  deliver(label: string, task: DeliveryTask): void {
    if (this.pending) {
      this.track(this.pending.then(() => this.attempt(label, task)));
      return;
    }
    const inflight = this.attempt(label, task);
    if (inflight) this.track(inflight);
  }

  idle(): Promise<void> {
    return this.pending ?? Promise.resolve();
  }

  get busy(): boolean {
    return this.pending !== undefined;
  }

  private track(p: Promise<void>): void {
    const tracked: Promise<void> = p.then(() => {
      if (this.pending === tracked) this.pending = undefined;
    });
    this.pending = tracked;
  }

  private attempt(label: string, task: DeliveryTask): Promise<void> | undefined {
    let result: void | Promise<void>;
    try {
      result = task(this.endpoint);
    } catch (error) {
      this.fail(label, error, false);
      return undefined;
    }
    if (!(result instanceof Promise)) return undefined;
    return this.settleWithin(label, result);
  }

  private settleWithin(label: string, result: Promise<void>): Promise<void> {
    return new Promise<void>((resolve) => {
      let settled = false;
      const finish = (failure?: { cause: unknown; timedOut: boolean }) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (failure) this.fail(label, failure.cause, failure.timedOut);
        resolve();
      };
      const timer = setTimeout(() => finish({ cause: new Error(`no answer within ${this.timeoutMs}ms`), timedOut: true }), this.timeoutMs);
      result.then(
        () => finish(),
        (error: unknown) => finish({ cause: error, timedOut: false })
      );
    });
  }

  private fail(label: string, cause: unknown, timedOut: boolean): void {
    const detail = cause instanceof Error ? cause.message : String(cause);
    this.onFailure({
      label,
      timedOut,
      error: new SessionError('endpoint_unreachable', `${label} delivery failed: ${detail}`, { cause })
    });
  }
}
