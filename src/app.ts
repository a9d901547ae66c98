import express, { Express, NextFunction, Request, Response } from 'express';
import type { Pool } from 'pg';
import type { PageRenderer } from './content/renderer';
import type { BuildHistoryStore } from './db/history';
import { errorMessage } from './errors';
import type { BuildQueue } from './queue/build-queue';
import { createBuildsRouter } from './routes/builds';
import { createStatusRouter } from './routes/status';

export interface AppDeps {
  queue: BuildQueue;
  renderer: PageRenderer;
  history: BuildHistoryStore | null;
  pool: Pool | null;
  apiToken: string;
}

function httpStatusOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(express.json({ limit: '10kb' }));

  app.use(createStatusRouter(deps));
  app.use(createBuildsRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusOf(err);
    if (status !== null) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    console.error(`[http] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
