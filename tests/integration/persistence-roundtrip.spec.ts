import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BoardStore } from '../../src/server/persistence/board-store.js';
import { startBoardServer, waitUntil, type Harness } from '../helpers/board-harness.js';

describe('persistence roundtrip', () => {
  let dir: string;
  let harness: Harness | undefined;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'board-roundtrip-'));
  });

  afterEach(async () => {
    await harness?.stop();
    harness = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('saves the board to disk and restores it for everyone', async () => {
    harness = await startBoardServer(new BoardStore(dir));
    const alice = await harness.connect('Alice', 'manager');
    const bob = await harness.connect('Bob');
    await alice.approve('Bob');
    await bob.waitForDecision(2_000);

    for (const payload of ['A', 'B', 'C']) await alice.canvasAction(payload);
    await waitUntil(() => bob.actions.length === 3);
    await alice.saveBoard('roundtrip');
    expect(await fs.readFile(path.join(dir, 'roundtrip.board'), 'utf8')).toBe('A\nB\nC');

    await alice.newBoard();
    await waitUntil(() => bob.actions.length === 0);
    expect(alice.actions).toEqual([]);

    expect(await alice.openBoard('roundtrip')).toBe(3);
    await waitUntil(() => bob.actions.length === 3);
    expect(bob.actions).toEqual(['A', 'B', 'C']);
    expect(alice.actions).toEqual(['A', 'B', 'C']);
  });

  it('reports a missing board without touching the canvas', async () => {
    harness = await startBoardServer(new BoardStore(dir));
    const alice = await harness.connect('Alice', 'manager');
    await alice.canvasAction('keep');

    await expect(alice.openBoard('ghost')).rejects.toMatchObject({ code: 'persistence_failure' });
    expect(await alice.syncState()).toEqual(['keep']);
  });
});
