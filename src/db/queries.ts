import type { Queryable } from './client';

export interface BuildJobRow {
  id: string;
  requester_id: string | null;
  status: string;
  success: boolean | null;
  message: string | null;
  error_message: string | null;
  rollback: string | null;
  documents_processed: number;
  pages_rendered: number;
  assets_copied: number;
  duration_ms: number | null;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
}

export interface BuildEventRow {
  phase: string;
  message: string;
  percentage: number;
  details: Record<string, unknown>;
  created_at: Date;
}

export async function upsertBuildJob(db: Queryable, row: BuildJobRow): Promise<void> {
  await db.query(
    `INSERT INTO build_jobs (
       id, requester_id, status, success, message, error_message, rollback,
       documents_processed, pages_rendered, assets_copied, duration_ms,
       created_at, started_at, completed_at
     )
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
     ON CONFLICT (id) DO UPDATE SET
       status = EXCLUDED.status,
       success = EXCLUDED.success,
       message = EXCLUDED.message,
       error_message = EXCLUDED.error_message,
       rollback = EXCLUDED.rollback,
       documents_processed = EXCLUDED.documents_processed,
       pages_rendered = EXCLUDED.pages_rendered,
       assets_copied = EXCLUDED.assets_copied,
       duration_ms = EXCLUDED.duration_ms,
       started_at = EXCLUDED.started_at,
       completed_at = EXCLUDED.completed_at`,
    [
      row.id,
      row.requester_id,
      row.status,
      row.success,
      row.message,
      row.error_message,
      row.rollback,
      row.documents_processed,
      row.pages_rendered,
      row.assets_copied,
      row.duration_ms,
      row.created_at,
      row.started_at,
      row.completed_at,
    ]
  );
}

export async function replaceBuildEvents(
  db: Queryable,
  jobId: string,
  events: BuildEventRow[]
): Promise<void> {
  await db.query('DELETE FROM build_events WHERE job_id = $1', [jobId]);
  for (const event of events) {
    await db.query(
      `INSERT INTO build_events (job_id, phase, message, percentage, details, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [jobId, event.phase, event.message, event.percentage, JSON.stringify(event.details), event.created_at]
    );
  }
}

export async function listRecentBuildJobs(
  db: Queryable,
  limit: number
): Promise<Record<string, unknown>[]> {
  const { rows } = await db.query(
    `SELECT * FROM build_jobs
     WHERE completed_at IS NOT NULL
     ORDER BY completed_at DESC
     LIMIT $1`,
    [limit]
  );
  return rows;
}
