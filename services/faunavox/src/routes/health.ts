import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const [jobStats, queuePing] = await Promise.all([ctx.store.stats(), ctx.queue.ping()]);

      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        inference: ctx.backend.name,
        storage: ctx.storage.name,
        store: ctx.store.name,
        queue: {
          backend: ctx.queue.backend,
          ping: queuePing,
          jobs: jobStats,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Health check failed';
      res.status(500).json({
        status: 'error',
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message,
        },
      });
    }
  });

  return router;
}
