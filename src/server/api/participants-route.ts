import { Router } from 'express';
import type { BoardContext } from './types.js';

export function makeParticipantsRoute(ctx: BoardContext): Router {
  const router = Router();
  router.get('/participants', (_req, res) => {
    res.json({ active: ctx.coordinator.listActive(), pending: ctx.coordinator.listPending() });
  });
  return router;
}
