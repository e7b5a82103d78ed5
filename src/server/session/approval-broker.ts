import type { AdmissionDecision } from '../types.js';

interface PendingDecision {
  promise: Promise<AdmissionDecision>;
  resolve: (decision: AdmissionDecision) => void;
  timer?: NodeJS.Timeout;
}

export interface WaitOptions {
  signal?: AbortSignal;
}

/**
 * One-shot admission signals, keyed by applicant id. Each signal settles
 * exactly once and the decision stays readable until the id applies again.
 * Waiters can give up through an AbortSignal without affecting the
 * applicant's state.
 */
export class ApprovalBroker {
  private readonly pending = new Map<string, PendingDecision>();
  private readonly decided = new Map<string, AdmissionDecision>();

  constructor(private readonly onExpire: (id: string) => void) {}

  open(id: string, timeoutMs: number): void {
    this.settle(id, 'withdrawn');
    this.decided.delete(id);
    let resolve: (decision: AdmissionDecision) => void = () => undefined;
    const promise = new Promise<AdmissionDecision>((res) => { resolve = res; });
    const entry: PendingDecision = { promise, resolve };
    if (timeoutMs > 0) {
      entry.timer = setTimeout(() => this.onExpire(id), timeoutMs);
    }
    this.pending.set(id, entry);
  }

  waitFor(id: string, options: WaitOptions = {}): Promise<AdmissionDecision> {
    const hit = this.pending.get(id);
    if (!hit) {
      const decision = this.decided.get(id);
      return decision ? Promise.resolve(decision) : Promise.reject(new Error(`no pending decision for ${id}`));
    }
    const { signal } = options;
    if (!signal) return hit.promise;
    if (signal.aborted) return Promise.reject(abortReason(signal));
    return new Promise((resolve, reject) => {
      const onAbort = () => reject(abortReason(signal));
      signal.addEventListener('abort', onAbort, { once: true });
      hit.promise.then((decision) => {
        signal.removeEventListener('abort', onAbort);
        resolve(decision);
      }, reject);
    });
  }

  settle(id: string, decision: AdmissionDecision): boolean {
    const hit = this.pending.get(id);
    if (!hit) return false;
    clearTimeout(hit.timer);
    this.pending.delete(id);
    this.decided.set(id, decision);
    hit.resolve(decision);
    return true;
  }

  settleAll(decision: AdmissionDecision): void {
    for (const id of [...this.pending.keys()]) this.settle(id, decision);
  }

  has(id: string): boolean { return this.pending.has(id); }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}
