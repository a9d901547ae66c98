import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { BuildHistoryStore } from '../db/history';
import { BacklogError } from '../errors';
import { type BuildQueue, isTerminal } from '../queue/build-queue';
import { serializeHistory, serializeJob, serializeProgress } from './serialize';

export interface BuildsRouterDeps {
  queue: BuildQueue;
  history: BuildHistoryStore | null;
  apiToken: string;
}

const enqueueBody = z.object({
  requester_id: z.string().min(1).max(200).optional(),
});

const limitQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

function idParam(req: Request): string {
  const id = req.params.id;
  return Array.isArray(id) ? id[0] : id;
}

export function createBuildsRouter({ queue, history, apiToken }: BuildsRouterDeps): Router {
  const router = Router();

  const requireToken = (req: Request, res: Response, next: NextFunction) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || authHeader !== `Bearer ${apiToken}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };

  // POST /builds: queue a full site build
  router.post('/builds', requireToken, (req: Request, res: Response) => {
    const parsed = enqueueBody.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.issues });
      return;
    }

    try {
      const jobId = queue.enqueue(parsed.data.requester_id);
      const job = queue.getJob(jobId);
      res.status(202).json({ job_id: jobId, status: job ? job.status : 'queued' });
    } catch (err) {
      if (err instanceof BacklogError) {
        res.status(429).json({ error: err.message });
        return;
      }
      throw err;
    }
  });

  router.get('/builds/current', (_req: Request, res: Response) => {
    const job = queue.getCurrentBuild();
    res.json({ build: job ? serializeJob(job, { withProgress: true }) : null });
  });

  router.get('/builds/queue', (_req: Request, res: Response) => {
    res.json({ builds: queue.getQueuedJobs().map((job) => serializeJob(job)) });
  });

  router.get('/builds/recent', (req: Request, res: Response) => {
    const parsed = limitQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.issues });
      return;
    }
    res.json({ builds: queue.getRecentBuilds(parsed.data.limit).map((job) => serializeJob(job)) });
  });

  // GET /builds/history: persisted builds, newest first
  router.get('/builds/history', async (req: Request, res: Response) => {
    if (!history) {
      res.status(503).json({ error: 'Build history is not configured' });
      return;
    }
    const parsed = limitQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.issues });
      return;
    }
    const records = await history.listRecent(parsed.data.limit);
    res.json({ builds: records.map(serializeHistory) });
  });

  router.get('/builds/:id', (req: Request, res: Response) => {
    const job = queue.getJob(idParam(req));
    if (!job) {
      res.status(404).json({ error: 'Build not found' });
      return;
    }
    res.json(serializeJob(job, { withProgress: true }));
  });

  router.post('/builds/:id/cancel', requireToken, (req: Request, res: Response) => {
    const job = queue.getJob(idParam(req));
    if (!job) {
      res.status(404).json({ error: 'Build not found' });
      return;
    }
    if (!queue.cancel(job.id)) {
      res.status(409).json({ error: `Build is ${job.status} and can no longer be cancelled` });
      return;
    }
    res.json({ job_id: job.id, status: 'cancelled' });
  });

  // GET /builds/:id/events: server-sent progress stream
  router.get('/builds/:id/events', (req: Request, res: Response) => {
    const job = queue.getJob(idParam(req));
    if (!job) {
      res.status(404).json({ error: 'Build not found' });
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    const send = (event: string, data: unknown) => {
      res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
    };

    for (const progress of job.progress) {
      send('progress', serializeProgress(progress));
    }
    if (isTerminal(job.status)) {
      send('status', { status: job.status });
      res.end();
      return;
    }

    const unsubscribe = queue.subscribe(job.id, (event) => {
      if (event.type === 'progress') {
        send('progress', serializeProgress(event.progress));
        return;
      }
      send('status', { status: event.status });
      if (isTerminal(event.status)) {
        unsubscribe();
        res.end();
      }
    });
    req.on('close', unsubscribe);
  });

  return router;
}
