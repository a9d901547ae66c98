import { Router, Request, Response } from 'express';
import type { Pool } from 'pg';
import type { PageRenderer } from '../content/renderer';
import { checkConnection } from '../db/client';
import { errorMessage } from '../errors';
import type { BuildQueue } from '../queue/build-queue';

export interface StatusRouterDeps {
  queue: BuildQueue;
  renderer: PageRenderer;
  pool: Pool | null;
}

export function createStatusRouter({ queue, renderer, pool }: StatusRouterDeps): Router {
  const router = Router();

  router.get('/health', async (_req: Request, res: Response) => {
    const current = queue.getCurrentBuild();
    const body = {
      status: 'ok',
      worker: queue.isActive ? 'running' : 'stopped',
      current_build: current ? current.id : null,
      queued: queue.getQueuedJobs().length,
      database: pool ? 'ok' : 'disabled',
    };

    if (pool) {
      try {
        await checkConnection(pool);
      } catch (err) {
        console.error(`[health] Database check failed: ${errorMessage(err)}`);
        res.status(503).json({ ...body, status: 'unhealthy', database: 'unreachable' });
        return;
      }
    }
    res.json(body);
  });

  router.get('/cache/stats', (_req: Request, res: Response) => {
    const { compiled, rendered } = renderer.cacheStats();
    res.json({ compiled, rendered });
  });

  return router;
}
