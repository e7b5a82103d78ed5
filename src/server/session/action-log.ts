import type { ActionRecord } from '../types.js';

export class ActionLog {
  private entries: ActionRecord[] = [];
  private nextSequence = 0;

  append(payload: string): ActionRecord {
    const record: ActionRecord = { sequence: this.nextSequence, payload };
    this.nextSequence += 1;
    this.entries.push(record);
    return record;
  }

  snapshot(): string[] { return this.entries.map((r) => r.payload); }
  records(): ActionRecord[] { return [...this.entries]; }
  size(): number { return this.entries.length; }

  /** Empties the log. Numbering continues, so sequences stay unique across clears. */
  clear(): void {
    this.entries = [];
  }

  restore(payloads: readonly string[]): ActionRecord[] {
    this.entries = [];
    this.nextSequence = 0;
    for (const payload of payloads) this.append(payload);
    return this.records();
  }
}

export function serializeActionLog(payloads: readonly string[]): string {
  return payloads.join('\n');
}

export function parseActionLog(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
