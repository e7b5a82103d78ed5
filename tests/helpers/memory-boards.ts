import { SessionError } from '../../src/server/errors.js';
import type { BoardStorage } from '../../src/server/persistence/board-store.js';

export class MemoryBoards implements BoardStorage {
  readonly files = new Map<string, string[]>();

  async load(name: string): Promise<string[]> {
    const payloads = this.files.get(name);
    if (!payloads) throw new SessionError('persistence_failure', `cannot read board ${name}`);
    return [...payloads];
  }

  async save(name: string, payloads: readonly string[]): Promise<void> {
    this.files.set(name, [...payloads]);
  }

  async list(): Promise<string[]> {
    return [...this.files.keys()].sort();
  }
}

export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof SessionError ? error.code : 'unexpected';
  }
  return undefined;
}

export async function rejectionCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return error instanceof SessionError ? error.code : 'unexpected';
  }
  return undefined;
}
