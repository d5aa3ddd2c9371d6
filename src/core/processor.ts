import { CancellationToken, sleep as cancellableSleep } from './cancellation.js';
import type { ConnectivitySignal } from './connectivity.js';
import { errorMessage } from './errors.js';
import type { NotificationSink } from './notifier.js';
import type { JobStore } from '../db/jobStore.js';
import {
  IN_FLIGHT_STATUSES,
  type AnalysisPayload,
  type FailureKind,
  type FailurePolicy,
  type Job,
  type Logger,
  type OperationResult,
  type Subscription,
} from './types.js';

export interface OperationHooks {
  onProgress(fraction: number): void;
  onAnalyzing(): void;
}

/** Opaque remote call: uploads an artifact and waits for its analysis. */
export interface UploadAnalyzeOperation {
  run(artifactRef: string, token: CancellationToken, hooks: OperationHooks): Promise<OperationResult>;
}

export type JobOutcome = 'completed' | 'failed' | 'rolled_back' | 'skipped';

export interface DrainReport {
  processed: { id: string; outcome: JobOutcome }[];
  aborted: 'connectivity' | 'cancelled' | 'failure_policy' | null;
}

export interface ProcessorSnapshot {
  draining: boolean;
  activeJobId: string | null;
  queued: readonly string[];
}

export interface QueueProcessorOptions {
  store: JobStore;
  connectivity: ConnectivitySignal;
  operation: UploadAnalyzeOperation;
  notifier: NotificationSink;
  interJobDelayMs?: number;
  failurePolicy?: FailurePolicy;
  logger?: Logger;
  sleep?: (ms: number, token?: CancellationToken) => Promise<void>;
}

interface ActiveJob {
  jobId: string;
  token: CancellationToken;
}

export function describeFailure(failure: FailureKind): string {
  switch (failure.kind) {
    case 'network':
      return failure.detail ? `Network error: ${failure.detail}` : 'Network error';
    case 'server_error':
      return failure.detail
        ? `Server error (${failure.code}): ${failure.detail}`
        : `Server error (${failure.code})`;
    case 'timeout':
      return 'Analysis timed out';
    case 'content_invalid':
      return failure.detail ? `Content rejected: ${failure.detail}` : 'Content rejected';
    case 'unauthorized':
      return 'Not authorized by the analysis service';
    case 'cancelled':
      return 'Cancelled';
  }
}

function looksLikeNetworkError(err: unknown) {
  if (!(err instanceof Error)) return false;
  const message = err.message.toLowerCase();
  return (
    err.name === 'TypeError' ||
    message.includes('fetch failed') ||
    message.includes('network') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('enotfound')
  );
}

/**
 * Drains pending jobs one at a time. A drain pass is single-flight and
 * carries a generation number; cancelAll() bumps the generation so a pass
 * that wakes up after being cancelled leaves all state alone.
 */
export class QueueProcessor {
  private readonly store: JobStore;
  private readonly connectivity: ConnectivitySignal;
  private readonly operation: UploadAnalyzeOperation;
  private readonly notifier: NotificationSink;
  private readonly interJobDelayMs: number;
  private readonly failurePolicy: FailurePolicy;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, token?: CancellationToken) => Promise<void>;

  private generation = 0;
  private draining = false;
  private rerunRequested = false;
  private runQueue: string[] = [];
  private active: ActiveJob | null = null;
  private pauseToken = new CancellationToken();
  private current: Promise<DrainReport | null> = Promise.resolve(null);

  constructor(options: QueueProcessorOptions) {
    this.store = options.store;
    this.connectivity = options.connectivity;
    this.operation = options.operation;
    this.notifier = options.notifier;
    this.interJobDelayMs = options.interJobDelayMs ?? 1_000;
    this.failurePolicy = options.failurePolicy ?? 'continue';
    this.logger = options.logger ?? console;
    this.sleep = options.sleep ?? cancellableSleep;
  }

  /** Create a pending job and start draining if idle and connected. */
  enqueue(artifactRef: string): string {
    const job = this.store.create(artifactRef);
    this.logger.info(`[queue] enqueued job ${job.id} (${artifactRef})`);
    this.schedule();
    return job.id;
  }

  /** Explicit manual retry of a failed job. */
  retry(id: string): Job {
    const job = this.store.retry(id);
    this.logger.info(`[queue] job ${id} re-queued by request`);
    this.schedule();
    return job;
  }

  delete(id: string) {
    if (this.active?.jobId === id) {
      this.active.token.cancel('job deleted');
      this.active = null;
    }
    this.runQueue = this.runQueue.filter((queued) => queued !== id);
    this.store.delete(id);
  }

  /**
   * Start a drain pass. Returns the pass report, or null when a pass is
   * already running or the connection is down.
   */
  processPending(): Promise<DrainReport | null> {
    if (this.draining) {
      this.logger.info('[queue] drain already running');
      return Promise.resolve(null);
    }
    if (!this.connectivity.isConnected) {
      this.logger.info('[queue] offline, jobs stay pending until the connection returns');
      return Promise.resolve(null);
    }

    this.draining = true;
    this.rerunRequested = false;
    const generation = ++this.generation;
    this.current = this.drain(generation);
    return this.current;
  }

  /** Resolves once the current drain pass (if any) has finished. */
  async whenIdle() {
    for (;;) {
      const pass = this.current;
      await pass;
      if (!this.draining || pass === this.current) return;
    }
  }

  /**
   * Cancel the in-flight call, roll it back to pending, clear the run queue
   * and release the single-flight flag. Safe to call at any time.
   */
  cancelAll() {
    const active = this.active;
    const hadWork = this.draining || active !== null;

    this.generation++;
    this.draining = false;
    this.rerunRequested = false;
    this.runQueue = [];
    this.active = null;
    this.pauseToken.cancel('cancelAll');
    this.pauseToken = new CancellationToken();

    if (active) active.token.cancel('cancelAll');

    let rolledBack = 0;
    for (const job of this.store.list({ status: IN_FLIGHT_STATUSES })) {
      try {
        this.store.updateStatus(job.id, 'pending');
        rolledBack++;
      } catch (err) {
        this.logger.error(`[queue] could not roll back job ${job.id}: ${errorMessage(err)}`);
      }
    }

    if (hadWork || rolledBack > 0) {
      this.logger.warn(`[queue] cancelled active work, ${rolledBack} job(s) rolled back to pending`);
    }
  }

  /** restored edge → drain, lost edge → cancel immediately. */
  attach(): Subscription {
    const restored = this.connectivity.onRestored(() => {
      this.logger.info('[queue] connection restored, checking for pending jobs');
      this.start();
    });
    const lost = this.connectivity.onLost(() => {
      this.logger.warn('[queue] connection lost, cancelling active uploads');
      this.cancelAll();
    });
    return {
      unsubscribe: () => {
        restored.unsubscribe();
        lost.unsubscribe();
      },
    };
  }

  snapshot(): ProcessorSnapshot {
    return {
      draining: this.draining,
      activeJobId: this.active?.jobId ?? null,
      queued: [...this.runQueue],
    };
  }

  private schedule() {
    if (this.draining) {
      this.rerunRequested = true;
      return;
    }
    if (this.connectivity.isConnected) this.start();
  }

  private start() {
    this.processPending().catch((err: unknown) => {
      this.logger.error(`[queue] drain failed: ${errorMessage(err)}`);
    });
  }

  private async drain(generation: number): Promise<DrainReport> {
    const report: DrainReport = { processed: [], aborted: null };
    try {
      this.runQueue = this.store.list({ status: 'pending', order: 'asc' }).map((job) => job.id);
      this.logger.info(`[queue] found ${this.runQueue.length} pending job(s)`);

      for (;;) {
        if (generation !== this.generation) {
          report.aborted = 'cancelled';
          break;
        }
        const id = this.runQueue.shift();
        if (id === undefined) break;

        if (!this.connectivity.isConnected) {
          this.runQueue.unshift(id);
          this.logger.warn(`[queue] connection lost, leaving ${this.runQueue.length} job(s) pending`);
          report.aborted = 'connectivity';
          break;
        }

        const outcome = await this.processJob(id);
        report.processed.push({ id, outcome });

        if (generation !== this.generation) {
          report.aborted = 'cancelled';
          break;
        }
        if (outcome === 'skipped') continue;
        if (outcome === 'failed' && this.failurePolicy === 'abort') {
          report.aborted = 'failure_policy';
          break;
        }

        await this.sleep(this.interJobDelayMs, this.pauseToken);
      }
    } finally {
      if (generation === this.generation) {
        this.draining = false;
        this.runQueue = [];
        if (this.rerunRequested && report.aborted === null) {
          this.rerunRequested = false;
          if (this.connectivity.isConnected) this.start();
        }
      }
    }
    return report;
  }

  private async processJob(id: string): Promise<JobOutcome> {
    const job = this.store.get(id);
    if (!job || job.status !== 'pending') {
      this.logger.info(`[queue] job ${id} is no longer pending, skipping`);
      return 'skipped';
    }

    const token = new CancellationToken();
    try {
      this.store.updateStatus(id, 'uploading');
    } catch (err) {
      this.logger.error(`[queue] could not start job ${id}: ${errorMessage(err)}`);
      return 'skipped';
    }
    this.active = { jobId: id, token };
    this.logger.info(`[queue] uploading job ${id} (attempt ${job.attempts + 1})`);

    let result: OperationResult;
    try {
      result = await this.operation.run(job.artifactRef, token, {
        onProgress: (fraction) => this.recordProgress(id, token, fraction),
        onAnalyzing: () => this.markAnalyzing(id, token),
      });
    } catch (err) {
      result = { ok: false, failure: this.classifyThrown(err, token) };
    } finally {
      if (this.active?.token === token) this.active = null;
    }

    if (token.isCancelled) {
      this.logger.info(`[queue] job ${id} cancelled (${token.reason ?? 'cancelled'})`);
      return 'rolled_back';
    }

    try {
      if (result.ok) return this.complete(id, result.payload);
      return this.fail(id, result.failure);
    } catch (err) {
      this.logger.error(`[queue] could not record outcome of job ${id}: ${errorMessage(err)}`);
      return 'skipped';
    }
  }

  private complete(id: string, payload: AnalysisPayload): JobOutcome {
    if (this.store.get(id)?.status === 'uploading') this.store.updateStatus(id, 'analyzing');
    const job = this.store.updateResult(id, payload);
    this.logger.info(`[queue] job ${id} completed`);
    this.notify(job);
    return 'completed';
  }

  private fail(id: string, failure: FailureKind): JobOutcome {
    if (this.isConnectivityLoss(failure)) {
      this.store.updateStatus(id, 'pending');
      this.logger.warn(`[queue] job ${id} interrupted by connectivity loss, will retry`);
      return 'rolled_back';
    }
    const message = describeFailure(failure);
    this.store.updateStatus(id, 'failed', message);
    this.logger.error(`[queue] job ${id} failed: ${message}`);
    return 'failed';
  }

  private isConnectivityLoss(failure: FailureKind) {
    if (failure.kind === 'cancelled') return true;
    if (failure.kind === 'network' || failure.kind === 'timeout') {
      return !this.connectivity.isConnected;
    }
    return false;
  }

  private classifyThrown(err: unknown, token: CancellationToken): FailureKind {
    if (token.isCancelled) return { kind: 'cancelled' };
    if (looksLikeNetworkError(err)) return { kind: 'network', detail: errorMessage(err) };
    return { kind: 'server_error', code: 0, detail: errorMessage(err) };
  }

  private recordProgress(id: string, token: CancellationToken, fraction: number) {
    if (token.isCancelled) return;
    try {
      this.store.updateProgress(id, fraction);
    } catch (err) {
      this.logger.warn(`[queue] progress update for job ${id} dropped: ${errorMessage(err)}`);
    }
  }

  private markAnalyzing(id: string, token: CancellationToken) {
    if (token.isCancelled) return;
    try {
      if (this.store.get(id)?.status === 'uploading') this.store.updateStatus(id, 'analyzing');
    } catch (err) {
      this.logger.warn(`[queue] could not mark job ${id} analyzing: ${errorMessage(err)}`);
    }
  }

  private notify(job: Job) {
    try {
      this.notifier.notify(job).catch((err: unknown) => {
        this.logger.warn(`[notify] notification for job ${job.id} failed: ${errorMessage(err)}`);
      });
    } catch (err) {
      this.logger.warn(`[notify] notification for job ${job.id} failed: ${errorMessage(err)}`);
    }
  }
}
