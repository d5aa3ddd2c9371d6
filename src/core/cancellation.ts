/**
 * Shared cancellation flag handed to a remote operation.
 * The operation polls `isCancelled`, registers `onCancel` hooks, or passes
 * `signal` to fetch so in-flight requests are torn down.
 */
export class CancellationToken {
  private cancelled = false;
  private cancelReason: string | null = null;
  private readonly listeners = new Set<(reason: string) => void>();
  private readonly controller = new AbortController();

  get isCancelled() {
    return this.cancelled;
  }

  get reason() {
    return this.cancelReason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = 'cancelled') {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    this.controller.abort(new CancelledError(reason));
    for (const listener of [...this.listeners]) {
      listener(reason);
    }
    this.listeners.clear();
  }

  /** Runs `listener` once on cancellation, immediately if already cancelled. */
  onCancel(listener: (reason: string) => void): () => void {
    if (this.cancelled) {
      listener(this.cancelReason ?? 'cancelled');
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  throwIfCancelled() {
    if (this.cancelled) throw new CancelledError(this.cancelReason ?? 'cancelled');
  }
}

export class CancelledError extends Error {
  constructor(reason: string) {
    super(`Operation cancelled: ${reason}`);
    this.name = 'CancelledError';
  }
}

/**
 * Waits `ms`, resolving early when `token` is cancelled.
 */
export function sleep(ms: number, token?: CancellationToken): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      detach();
      resolve();
    }, ms);
    const detach = token
      ? token.onCancel(() => {
          clearTimeout(timer);
          resolve();
        })
      : () => {};
  });
}
