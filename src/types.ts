export interface Document {
  slug: string;
  title: string;
  date: Date;
  draft: boolean;
  tags: string[];
  body: string;
  description?: string;
}

export interface DocumentProvider {
  /** Directory the documents are read from; only checked for existence. */
  readonly postsRootPath: string;
  /** Published documents, newest first, drafts excluded. */
  listPublishedDocuments(): Promise<Document[]>;
}

export type BuildPhase =
  | 'initializing'
  | 'backup_creation'
  | 'content_processing'
  | 'template_rendering'
  | 'asset_copying'
  | 'verification'
  | 'cleanup'
  | 'rollback'
  | 'completed'
  | 'failed';

export type BuildProgress = Readonly<{
  phase: BuildPhase;
  message: string;
  percentage: number;
  details: Readonly<Record<string, unknown>>;
  timestamp: Date;
}>;

export type ProgressListener = (progress: BuildProgress) => void;

export interface BuildStats {
  documentsProcessed: number;
  pagesRendered: number;
  assetsCopied: number;
}

export type RollbackOutcome = 'restored' | 'no-backup' | 'failed';

export type BuildResult = Readonly<{
  success: boolean;
  message: string;
  durationMs: number;
  outputDir: string | null;
  backupDir: string | null;
  stats: BuildStats;
  error: Error | null;
  rollback: RollbackOutcome | null;
  progress: readonly BuildProgress[];
}>;

export interface BuildRunner {
  runBuildOnce(onProgress?: ProgressListener): Promise<BuildResult>;
}

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface BuildJob {
  id: string;
  requesterId: string | null;
  status: JobStatus;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  progress: BuildProgress[];
  result: BuildResult | null;
  errorMessage: string | null;
}

export const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed', 'cancelled'];
