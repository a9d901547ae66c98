export type BuildErrorKind =
  | 'precondition'
  | 'backup'
  | 'content'
  | 'rendering'
  | 'assets'
  | 'verification'
  | 'timeout'
  | 'rollback';

/**
 * Tagged failure raised by a build phase. The orchestrator matches on
 * `kind` to choose between direct failure and rollback.
 */
export class BuildError extends Error {
  constructor(
    readonly kind: BuildErrorKind,
    message: string,
    readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class PreconditionError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('precondition', message, details);
  }
}

export class BackupError extends BuildError {
  constructor(message: string, cause?: unknown) {
    super('backup', message, {}, { cause });
  }
}

export class ContentTransformError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('content', message, details, { cause });
  }
}

export class TemplateRenderingError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('rendering', message, details, { cause });
  }
}

export class AssetSyncError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('assets', message, details);
  }
}

export class VerificationError extends BuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('verification', message, details);
  }
}

export class BuildTimeoutError extends BuildError {
  constructor(timeoutMs: number) {
    super('timeout', `Build exceeded timeout of ${timeoutMs}ms`, { timeoutMs });
  }
}

export class RollbackError extends BuildError {
  constructor(message: string, cause?: unknown) {
    super('rollback', message, {}, { cause });
  }
}

/** Raised by the queue when the backlog of queued builds is full. */
export class BacklogError extends Error {
  constructor(readonly limit: number) {
    super(`Too many builds queued (limit ${limit}). Please wait for current builds to complete.`);
    this.name = 'BacklogError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
