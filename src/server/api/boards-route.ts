import { Router } from 'express';
import { toErrorBody } from '../errors.js';
import type { BoardContext } from './types.js';

export function makeBoardsRoute(ctx: BoardContext): Router {
  const router = Router();
  router.get('/boards', async (_req, res) => {
    try {
      res.json({ boards: await ctx.boards.list() });
    } catch (error) {
      console.error('[board-store] listing boards failed:', error);
      res.status(500).json({ ok: false, error: toErrorBody(error) });
    }
  });
  return router;
}
