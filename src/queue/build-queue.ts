import { randomUUID } from 'crypto';
import { BacklogError, errorMessage } from '../errors';
import type { BuildHistoryStore } from '../db/history';
import {
  type BuildJob,
  type BuildProgress,
  type BuildRunner,
  type JobStatus,
  TERMINAL_STATUSES,
} from '../types';

export type JobEvent =
  | { type: 'progress'; jobId: string; progress: BuildProgress }
  | { type: 'status'; jobId: string; status: JobStatus };

export type JobListener = (event: JobEvent) => void;

export interface BuildQueueOptions {
  maxQueued?: number;
  retentionMs?: number;
  sweepIntervalMs?: number;
  /** Start the worker on the first enqueue. Defaults to true. */
  autoStart?: boolean;
  history?: BuildHistoryStore | null;
}

export const DEFAULT_MAX_QUEUED = 5;
export const DEFAULT_RETENTION_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;

function snapshot(job: BuildJob): BuildJob {
  return { ...job, progress: [...job.progress] };
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Serializes build requests onto a single worker. At most one job is
 * `running` at any time and jobs start in enqueue order.
 */
export class BuildQueue {
  private readonly jobs = new Map<string, BuildJob>();
  private readonly pending: string[] = [];
  private readonly listeners = new Map<string, Set<JobListener>>();
  private readonly maxQueued: number;
  private readonly retentionMs: number;
  private readonly sweepIntervalMs: number;
  private readonly autoStart: boolean;
  private readonly history: BuildHistoryStore | null;

  private current: BuildJob | null = null;
  private active = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private idleWaiters: (() => void)[] = [];
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly runner: BuildRunner,
    options: BuildQueueOptions = {}
  ) {
    this.maxQueued = options.maxQueued ?? DEFAULT_MAX_QUEUED;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.autoStart = options.autoStart ?? true;
    this.history = options.history ?? null;
  }

  get isActive(): boolean {
    return this.active;
  }

  enqueue(requesterId?: string | null): string {
    if (this.pending.length >= this.maxQueued) {
      throw new BacklogError(this.maxQueued);
    }

    const job: BuildJob = {
      id: randomUUID(),
      requesterId: requesterId ?? null,
      status: 'queued',
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      progress: [],
      result: null,
      errorMessage: null,
    };
    this.jobs.set(job.id, job);
    this.pending.push(job.id);
    console.log(`[queue] Build ${job.id} queued${job.requesterId ? ` by ${job.requesterId}` : ''}`);

    if (this.autoStart) this.start();
    this.signal();
    return job.id;
  }

  getJob(id: string): BuildJob | null {
    const job = this.jobs.get(id);
    return job ? snapshot(job) : null;
  }

  getCurrentBuild(): BuildJob | null {
    return this.current ? snapshot(this.current) : null;
  }

  getQueuedJobs(): BuildJob[] {
    return this.pending.flatMap((id) => {
      const job = this.jobs.get(id);
      return job ? [snapshot(job)] : [];
    });
  }

  /** Completed and failed jobs, most recently finished first. */
  getRecentBuilds(limit = 10): BuildJob[] {
    return [...this.jobs.values()]
      .reverse()
      .filter((job) => job.status === 'completed' || job.status === 'failed')
      .sort((a, b) => (b.completedAt?.getTime() ?? 0) - (a.completedAt?.getTime() ?? 0))
      .slice(0, Math.max(0, limit))
      .map(snapshot);
  }

  /** Returns a function that removes the subscription. */
  /** Unknown job ids get a no-op unsubscribe and register nothing. */
  subscribe(jobId: string, listener: JobListener): () => void {
    if (!this.jobs.has(jobId)) return () => undefined;
    let set = this.listeners.get(jobId);
    if (!set) {
      set = new Set();
      this.listeners.set(jobId, set);
    }
    set.add(listener);
    return () => {
      this.unsubscribe(jobId, listener);
    };
  }

  unsubscribe(jobId: string, listener: JobListener): boolean {
    const set = this.listeners.get(jobId);
    if (!set) return false;
    const removed = set.delete(listener);
    if (set.size === 0) this.listeners.delete(jobId);
    return removed;
  }

  /** Only queued jobs can be cancelled. */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job || job.status !== 'queued') return false;

    const index = this.pending.indexOf(jobId);
    if (index >= 0) this.pending.splice(index, 1);
    job.status = 'cancelled';
    job.completedAt = new Date();
    console.log(`[queue] Build ${jobId} cancelled`);

    this.publish(job, { type: 'status', jobId, status: job.status });
    void this.persist(job);
    this.settleIdle();
    return true;
  }

  /** Drops terminal jobs that finished more than `maxAgeMs` ago. */
  cleanupOldJobs(maxAgeMs: number = this.retentionMs): number {
    const cutoff = Date.now() - maxAgeMs;
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isTerminal(job.status) && job.completedAt && job.completedAt.getTime() < cutoff) {
        this.jobs.delete(id);
        this.listeners.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[queue] Removed ${removed} finished jobs older than ${Math.round(maxAgeMs / 60000)} minutes`);
    }
    return removed;
  }

  start(): void {
    if (this.active) return;
    if (this.loop) {
      console.warn('[queue] Build worker is stopping; start it again once stop() resolves');
      return;
    }
    this.active = true;

    this.sweepTimer = setInterval(() => {
      this.cleanupOldJobs();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();

    console.log(`[queue] Build worker started (max queued: ${this.maxQueued})`);
    this.loop = this.consume()
      .catch((err: unknown) => {
        this.active = false;
        console.error(`[queue] Build worker stopped unexpectedly: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.loop = null;
      });
  }

  /** Stops taking new jobs and waits for the running build to finish. */
  /** Waits for the running build; queued jobs stay queued. */
  async stop(): Promise<void> {
    if (!this.active) {
      await this.loop;
      return;
    }
    this.active = false;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.signal();
    await this.loop;
    this.settleIdle();
    console.log('[queue] Build worker stopped');
  }

  /** Resolves once nothing is running and nothing runnable is queued. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.current === null && (this.pending.length === 0 || !this.active);
  }

  private settleIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async consume(): Promise<void> {
    while (this.active) {
      const id = this.pending.shift();
      const job = id ? this.jobs.get(id) : undefined;
      if (!job) {
        this.settleIdle();
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        continue;
      }
      await this.execute(job);
    }
  }

  private async execute(job: BuildJob): Promise<void> {
    job.status = 'running';
    job.startedAt = new Date();
    this.current = job;
    console.log(`[queue] Build ${job.id} started`);
    this.publish(job, { type: 'status', jobId: job.id, status: job.status });

    try {
      const result = await this.runner.runBuildOnce((progress) => this.recordProgress(job, progress));
      job.result = result;
      job.status = result.success ? 'completed' : 'failed';
      job.errorMessage = result.success ? null : result.error?.message ?? result.message;
    } catch (err) {
      console.error(`[queue] Build ${job.id} crashed: ${errorMessage(err)}`);
      job.status = 'failed';
      job.errorMessage = errorMessage(err);
      const crashed: BuildProgress = Object.freeze({
        phase: 'failed',
        message: `Build crashed: ${errorMessage(err)}`,
        percentage: 0,
        details: Object.freeze({ error: errorMessage(err) }),
        timestamp: new Date(),
      });
      this.recordProgress(job, crashed);
    }

    job.completedAt = new Date();
    this.current = null;
    console.log(`[queue] Build ${job.id} ${job.status}`);
    this.publish(job, { type: 'status', jobId: job.id, status: job.status });
    await this.persist(job);
  }

  private recordProgress(job: BuildJob, progress: BuildProgress): void {
    job.progress.push(progress);
    this.publish(job, { type: 'progress', jobId: job.id, progress });
  }

  private publish(job: BuildJob, event: JobEvent): void {
    const set = this.listeners.get(job.id);
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[queue] Subscriber for ${job.id} threw: ${errorMessage(err)}`);
      }
    }
  }

  private async persist(job: BuildJob): Promise<void> {
    if (!this.history) return;
    try {
      await this.history.record(snapshot(job));
    } catch (err) {
      console.error(`[history] Failed to record build ${job.id}: ${errorMessage(err)}`);
    }
  }
}
