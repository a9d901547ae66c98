import { z } from 'zod';
import type { BuildJob, BuildStats, JobStatus, RollbackOutcome } from '../types';
import { type Database, withTransaction } from './client';
import { listRecentBuildJobs, replaceBuildEvents, upsertBuildJob } from './queries';

export interface BuildHistoryRecord {
  id: string;
  requesterId: string | null;
  status: JobStatus;
  success: boolean | null;
  message: string | null;
  errorMessage: string | null;
  rollback: RollbackOutcome | null;
  stats: BuildStats;
  durationMs: number | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

/** Durable record of finished builds. */
export interface BuildHistoryStore {
  record(job: BuildJob): Promise<void>;
  listRecent(limit: number): Promise<BuildHistoryRecord[]>;
}

const jobRow = z.object({
  id: z.string(),
  requester_id: z.string().nullable(),
  status: z.enum(['queued', 'running', 'completed', 'failed', 'cancelled']),
  success: z.boolean().nullable(),
  message: z.string().nullable(),
  error_message: z.string().nullable(),
  rollback: z.enum(['restored', 'no-backup', 'failed']).nullable(),
  documents_processed: z.coerce.number().int(),
  pages_rendered: z.coerce.number().int(),
  assets_copied: z.coerce.number().int(),
  duration_ms: z.coerce.number().int().nullable(),
  created_at: z.coerce.date(),
  started_at: z.coerce.date().nullable(),
  completed_at: z.coerce.date().nullable(),
});

export class PgBuildHistory implements BuildHistoryStore {
  constructor(private readonly db: Database) {}

  async record(job: BuildJob): Promise<void> {
    const result = job.result;
    const events = job.progress.map((event) => ({
      phase: event.phase,
      message: event.message,
      percentage: event.percentage,
      details: { ...event.details },
      created_at: event.timestamp,
    }));
    await withTransaction(this.db, async (client) => {
      await upsertBuildJob(client, {
        id: job.id,
        requester_id: job.requesterId,
        status: job.status,
        success: result ? result.success : null,
        message: result ? result.message : null,
        error_message: job.errorMessage,
        rollback: result ? result.rollback : null,
        documents_processed: result ? result.stats.documentsProcessed : 0,
        pages_rendered: result ? result.stats.pagesRendered : 0,
        assets_copied: result ? result.stats.assetsCopied : 0,
        duration_ms: result ? Math.round(result.durationMs) : null,
        created_at: job.createdAt,
        started_at: job.startedAt,
        completed_at: job.completedAt,
      });
      await replaceBuildEvents(client, job.id, events);
    });
  }

  async listRecent(limit: number): Promise<BuildHistoryRecord[]> {
    const rows = await listRecentBuildJobs(this.db, limit);
    const records: BuildHistoryRecord[] = [];
    for (const raw of rows) {
      const parsed = jobRow.safeParse(raw);
      if (!parsed.success) {
        console.warn(`[history] Skipping malformed build_jobs row: ${parsed.error.issues[0]?.message}`);
        continue;
      }
      const row = parsed.data;
      records.push({
        id: row.id,
        requesterId: row.requester_id,
        status: row.status,
        success: row.success,
        message: row.message,
        errorMessage: row.error_message,
        rollback: row.rollback,
        stats: {
          documentsProcessed: row.documents_processed,
          pagesRendered: row.pages_rendered,
          assetsCopied: row.assets_copied,
        },
        durationMs: row.duration_ms,
        createdAt: row.created_at,
        startedAt: row.started_at,
        completedAt: row.completed_at,
      });
    }
    return records;
  }
}
