interface PendingRequest<T> {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
  timer: NodeJS.Timeout;
}

export class RequestBroker<T> {
  private readonly pending = new Map<string, PendingRequest<T>>();

  waitForResult(requestId: string, timeoutMs: number): Promise<T> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error('timeout'));
      }, timeoutMs);
      this.pending.set(requestId, { resolve, reject, timer });
    });
  }

  resolveResult(requestId: string, value: T): boolean {
    const hit = this.take(requestId);
    if (!hit) return false;
    hit.resolve(value);
    return true;
  }

  rejectResult(requestId: string, reason: Error): boolean {
    const hit = this.take(requestId);
    if (!hit) return false;
    hit.reject(reason);
    return true;
  }

  rejectAll(reason: Error): void {
    for (const requestId of [...this.pending.keys()]) this.rejectResult(requestId, reason);
  }

  size(): number { return this.pending.size; }

  private take(requestId: string): PendingRequest<T> | undefined {
    const hit = this.pending.get(requestId);
    if (!hit) return undefined;
    clearTimeout(hit.timer);
    this.pending.delete(requestId);
    return hit;
  }
}
