import { vi } from 'vitest';
import type { CancellationToken } from '../src/core/cancellation.js';
import type { ConnectivitySignal } from '../src/core/connectivity.js';
import type { OperationHooks, UploadAnalyzeOperation } from '../src/core/processor.js';
import { SqliteJobStore } from '../src/db/jobStore.js';
import type { AnalysisPayload, Job, JobStatus, Logger, OperationResult, Subscription } from '../src/core/types.js';

export function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

/**
 * Store that records the status after every write and the highest number
 * of jobs it ever saw uploading or analyzing at once.
 */
export class RecordingJobStore extends SqliteJobStore {
  readonly statuses: JobStatus[] = [];
  maxInFlight = 0;

  override create(artifactRef: string) {
    return this.record(super.create(artifactRef));
  }

  override updateStatus(id: string, status: JobStatus, error?: string | null) {
    return this.record(super.updateStatus(id, status, error));
  }

  override updateResult(id: string, result: AnalysisPayload) {
    return this.record(super.updateResult(id, result));
  }

  override updateProgress(id: string, progress: number) {
    return this.record(super.updateProgress(id, progress));
  }

  private record(job: Job) {
    this.statuses.push(job.status);
    this.maxInFlight = Math.max(this.maxInFlight, this.list({ status: ['uploading', 'analyzing'] }).length);
    return job;
  }
}

/** Hand-driven connectivity: `set()` fires edges, assigning `isConnected` does not. */
export class FakeConnectivity implements ConnectivitySignal {
  private readonly restored = new Set<() => void>();
  private readonly lost = new Set<() => void>();

  constructor(public isConnected = false) {}

  set(connected: boolean) {
    if (connected === this.isConnected) return;
    this.isConnected = connected;
    for (const cb of [...(connected ? this.restored : this.lost)]) cb();
  }

  onRestored(callback: () => void): Subscription {
    this.restored.add(callback);
    return { unsubscribe: () => this.restored.delete(callback) };
  }

  onLost(callback: () => void): Subscription {
    this.lost.add(callback);
    return { unsubscribe: () => this.lost.delete(callback) };
  }
}

type Handler = (token: CancellationToken, hooks: OperationHooks) => OperationResult | Promise<OperationResult>;

/**
 * Scripted remote operation. Each artifact takes its handlers in order;
 * without one the call succeeds with `{ artifact }` as payload.
 */
export class FakeOperation implements UploadAnalyzeOperation {
  readonly calls: string[] = [];
  maxConcurrent = 0;
  private running = 0;
  private readonly handlers = new Map<string, Handler[]>();

  when(artifactRef: string, handler: Handler) {
    const queue = this.handlers.get(artifactRef) ?? [];
    queue.push(handler);
    this.handlers.set(artifactRef, queue);
    return this;
  }

  async run(artifactRef: string, token: CancellationToken, hooks: OperationHooks): Promise<OperationResult> {
    this.calls.push(artifactRef);
    this.running++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.running);
    try {
      const handler = this.handlers.get(artifactRef)?.shift();
      if (!handler) return { ok: true, payload: { artifact: artifactRef } };
      return await handler(token, hooks);
    } finally {
      this.running--;
    }
  }
}

/** Handler that only settles once the token is cancelled. */
export function untilCancelled(onStart?: () => void): Handler {
  return (token) =>
    new Promise((resolve) => {
      onStart?.();
      token.onCancel(() => resolve({ ok: false, failure: { kind: 'cancelled' } }));
    });
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
