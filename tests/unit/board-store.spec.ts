import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BoardStore } from '../../src/server/persistence/board-store.js';
import { rejectionCode } from '../helpers/memory-boards.js';

describe('board-store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'board-store-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes one action per line and reads them back', async () => {
    const store = new BoardStore(dir);
    await store.save('sketch', ['DRAW Line 0 0 5 5 #FF0000', 'TEXT 3 3 hello world']);
    expect(await fs.readFile(path.join(dir, 'sketch.board'), 'utf8')).toBe('DRAW Line 0 0 5 5 #FF0000\nTEXT 3 3 hello world');
    expect(await store.load('sketch')).toEqual(['DRAW Line 0 0 5 5 #FF0000', 'TEXT 3 3 hello world']);
  });

  it('reads an empty board as no actions', async () => {
    const store = new BoardStore(dir);
    await store.save('blank', []);
    expect(await store.load('blank')).toEqual([]);
  });

  it('tolerates a trailing newline and CRLF line endings', async () => {
    await fs.writeFile(path.join(dir, 'crlf.board'), 'A\r\nB\r\n', 'utf8');
    expect(await new BoardStore(dir).load('crlf')).toEqual(['A', 'B']);
  });

  it('replaces an existing board', async () => {
    const store = new BoardStore(dir);
    await store.save('sketch', ['A', 'B']);
    await store.save('sketch', ['C']);
    expect(await store.load('sketch')).toEqual(['C']);
    expect(await fs.readdir(dir)).toEqual(['sketch.board']);
  });

  it('creates the board directory on first save', async () => {
    const store = new BoardStore(path.join(dir, 'nested', 'boards'));
    await store.save('first', ['A']);
    expect(await store.list()).toEqual(['first']);
  });

  it('lists saved boards by name', async () => {
    const store = new BoardStore(dir);
    await store.save('zeta', ['A']);
    await store.save('alpha', ['B']);
    await fs.writeFile(path.join(dir, 'notes.txt'), 'not a board', 'utf8');
    expect(await store.list()).toEqual(['alpha', 'zeta']);
  });

  it('lists nothing when the directory does not exist', async () => {
    expect(await new BoardStore(path.join(dir, 'missing')).list()).toEqual([]);
  });

  it('fails with persistence_failure for a missing board', async () => {
    expect(await rejectionCode(new BoardStore(dir).load('ghost'))).toBe('persistence_failure');
  });

  it('refuses names that would leave the board directory', async () => {
    const store = new BoardStore(dir);
    expect(await rejectionCode(store.save('../escape', ['A']))).toBe('invalid_params');
    expect(await rejectionCode(store.load('a/b'))).toBe('invalid_params');
    expect(await rejectionCode(store.load(''))).toBe('invalid_params');
  });
});
