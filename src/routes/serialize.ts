import type { BuildHistoryRecord } from '../db/history';
import type { BuildJob, BuildProgress, BuildResult } from '../types';

export function serializeProgress(progress: BuildProgress) {
  return {
    phase: progress.phase,
    message: progress.message,
    percentage: progress.percentage,
    details: progress.details,
    timestamp: progress.timestamp.toISOString(),
  };
}

function serializeResult(result: BuildResult) {
  return {
    success: result.success,
    message: result.message,
    duration_ms: Math.round(result.durationMs),
    output_dir: result.outputDir,
    backup_dir: result.backupDir,
    rollback: result.rollback,
    stats: {
      documents_processed: result.stats.documentsProcessed,
      pages_rendered: result.stats.pagesRendered,
      assets_copied: result.stats.assetsCopied,
    },
    error: result.error ? { name: result.error.name, message: result.error.message } : null,
  };
}

export function serializeJob(job: BuildJob, options: { withProgress?: boolean } = {}) {
  return {
    id: job.id,
    status: job.status,
    requester_id: job.requesterId,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt ? job.startedAt.toISOString() : null,
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    error_message: job.errorMessage,
    result: job.result ? serializeResult(job.result) : null,
    ...(options.withProgress ? { progress: job.progress.map(serializeProgress) } : {}),
  };
}

export function serializeHistory(record: BuildHistoryRecord) {
  return {
    id: record.id,
    status: record.status,
    requester_id: record.requesterId,
    success: record.success,
    message: record.message,
    error_message: record.errorMessage,
    rollback: record.rollback,
    duration_ms: record.durationMs,
    stats: {
      documents_processed: record.stats.documentsProcessed,
      pages_rendered: record.stats.pagesRendered,
      assets_copied: record.stats.assetsCopied,
    },
    created_at: record.createdAt.toISOString(),
    started_at: record.startedAt ? record.startedAt.toISOString() : null,
    completed_at: record.completedAt ? record.completedAt.toISOString() : null,
  };
}
