import { Router } from 'express';
import { buildSessionHealthSummary } from '../metrics/health.js';
import type { BoardContext } from './types.js';

export function makeStatusRoute(ctx: BoardContext): Router {
  const router = Router();
  router.get('/status', (_req, res) => {
    const metrics = ctx.getMetrics();
    res.json(buildSessionHealthSummary(metrics, ctx.coordinator.getManagerId(), ctx.counters));
  });
  router.get('/healthz', (_req, res) => {
    res.json({ ok: true, port: ctx.port });
  });
  return router;
}
