import { errorMessage } from './errors.js';
import type { ConnectivityState, Logger, Subscription } from './types.js';

/** Raw network samples, e.g. interface polling. Returns a stop function. */
export interface ReachabilitySource {
  start(onSample: (reachable: boolean) => void): () => void;
}

/** Application-level check that the remote service answers. */
export type HealthProbe = () => Promise<boolean>;

/** What the queue needs from connectivity: a level plus edge callbacks. */
export interface ConnectivitySignal {
  readonly isConnected: boolean;
  onRestored(callback: () => void): Subscription;
  onLost(callback: () => void): Subscription;
}

export interface ConnectivityMonitorOptions {
  probe: HealthProbe;
  source?: ReachabilitySource;
  debounceMs?: number;
  clock?: () => number;
  logger?: Logger;
}

type Listener = (isConnected: boolean, state: ConnectivityState) => void;

/**
 * Combines raw reachability with a health probe and publishes debounced
 * edges. Only level changes are published, never repeated levels.
 */
export class ConnectivityMonitor implements ConnectivitySignal {
  private readonly probe: HealthProbe;
  private readonly source: ReachabilitySource | undefined;
  private readonly debounceMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly listeners = new Set<Listener>();

  private state: ConnectivityState;
  private lastEmissionAt: number | null = null;
  private latestRaw = false;
  private evaluating = false;
  private current: Promise<void> = Promise.resolve();
  private dirty = false;
  private trailing: ReturnType<typeof setTimeout> | null = null;
  private stopSource: (() => void) | null = null;

  constructor(options: ConnectivityMonitorOptions) {
    this.probe = options.probe;
    this.source = options.source;
    this.debounceMs = options.debounceMs ?? 500;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? console;
    this.state = { isConnected: false, lastChangeAt: this.clock() };
  }

  get isConnected() {
    return this.state.isConnected;
  }

  snapshot(): ConnectivityState {
    return { ...this.state };
  }

  start() {
    if (this.stopSource || !this.source) return;
    this.stopSource = this.source.start((reachable) => {
      this.report(reachable).catch((err: unknown) => {
        this.logger.error(`[connectivity] sample handling failed: ${errorMessage(err)}`);
      });
    });
  }

  stop() {
    this.stopSource?.();
    this.stopSource = null;
    this.clearTrailing();
  }

  subscribe(callback: Listener): Subscription {
    this.listeners.add(callback);
    return { unsubscribe: () => this.listeners.delete(callback) };
  }

  onRestored(callback: () => void): Subscription {
    return this.subscribe((isConnected) => {
      if (isConnected) callback();
    });
  }

  onLost(callback: () => void): Subscription {
    return this.subscribe((isConnected) => {
      if (!isConnected) callback();
    });
  }

  /**
   * Feed one raw reachability sample. Samples that arrive while a probe is
   * running collapse into a single re-evaluation with the latest value.
   */
  report(reachable: boolean): Promise<void> {
    this.latestRaw = reachable;
    if (this.evaluating) {
      this.dirty = true;
      return this.current;
    }
    this.evaluating = true;
    this.current = this.evaluate();
    return this.current;
  }

  private async evaluate() {
    try {
      do {
        this.dirty = false;
        const raw = this.latestRaw;
        const level = raw ? await this.confirm() : false;
        this.apply(level);
      } while (this.dirty);
    } finally {
      this.evaluating = false;
    }
  }

  private async confirm() {
    try {
      return await this.probe();
    } catch (err) {
      this.logger.warn(`[connectivity] health probe failed: ${errorMessage(err)}`);
      return false;
    }
  }

  private apply(level: boolean) {
    if (level === this.state.isConnected) {
      this.clearTrailing();
      return;
    }

    const now = this.clock();
    if (this.lastEmissionAt !== null) {
      const elapsed = now - this.lastEmissionAt;
      if (elapsed <= this.debounceMs) {
        this.scheduleTrailing(this.debounceMs - elapsed + 1);
        return;
      }
    }

    this.clearTrailing();
    this.publish(level, now);
  }

  private publish(level: boolean, now: number) {
    this.state = { isConnected: level, lastChangeAt: now };
    this.lastEmissionAt = now;
    this.logger.info(level ? '[connectivity] connection restored' : '[connectivity] connection lost');

    const snapshot = this.snapshot();
    for (const listener of [...this.listeners]) {
      try {
        listener(level, snapshot);
      } catch (err) {
        this.logger.error(`[connectivity] listener threw: ${errorMessage(err)}`);
      }
    }
  }

  private scheduleTrailing(delayMs: number) {
    if (this.trailing) return;
    this.trailing = setTimeout(() => {
      this.trailing = null;
      this.report(this.latestRaw).catch((err: unknown) => {
        this.logger.error(`[connectivity] trailing evaluation failed: ${errorMessage(err)}`);
      });
    }, delayMs);
  }

  private clearTrailing() {
    if (!this.trailing) return;
    clearTimeout(this.trailing);
    this.trailing = null;
  }
}
