import fs from 'node:fs/promises';
import path from 'node:path';
import { SessionError } from '../errors.js';
import { parseActionLog, serializeActionLog } from '../session/action-log.js';
import { BOARD_FILE_EXTENSION, boardNameSchema } from './board-schema.js';

export interface BoardStorage {
  load(name: string): Promise<string[]>;
  save(name: string, payloads: readonly string[]): Promise<void>;
  list(): Promise<string[]>;
}

export class BoardStore implements BoardStorage {
  constructor(private readonly dir: string) {}

  async load(name: string): Promise<string[]> {
    const filePath = this.resolve(name);
    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new SessionError('persistence_failure', `cannot read board ${name}: ${describe(error)}`, { cause: error });
    }
    return parseActionLog(data);
  }

  async save(name: string, payloads: readonly string[]): Promise<void> {
    const filePath = this.resolve(name);
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmpPath, serializeActionLog(payloads), 'utf8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw new SessionError('persistence_failure', `cannot write board ${name}: ${describe(error)}`, { cause: error });
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new SessionError('persistence_failure', `cannot list boards: ${describe(error)}`, { cause: error });
    }
    return entries
      .filter((f) => f.endsWith(BOARD_FILE_EXTENSION))
      .map((f) => f.slice(0, -BOARD_FILE_EXTENSION.length))
      .sort();
  }

  private resolve(name: string): string {
    const parsed = boardNameSchema.safeParse(name);
    if (!parsed.success) {
      throw new SessionError('invalid_params', parsed.error.issues[0]?.message ?? 'invalid board name');
    }
    return path.join(this.dir, `${parsed.data}${BOARD_FILE_EXTENSION}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
