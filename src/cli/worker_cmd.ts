import type { Server } from 'node:http';
import { closeDB, getDB } from '../db/db.js';
import { createContainer, type Container } from '../core/container.js';
import { errorMessage } from '../core/errors.js';
import { createDashboard, startDashboard } from '../web/server.js';

/** Start a drain when there is pending work that nobody is handling yet. */
export function rescan({ store, connectivity, processor }: Pick<Container, 'store' | 'connectivity' | 'processor'>) {
  if (!connectivity.isConnected || processor.snapshot().draining) return;
  if (store.summary().counts.pending === 0) return;
  processor.processPending().catch((err: unknown) => {
    console.error(`[queue] drain failed: ${errorMessage(err)}`);
  });
}

function waitForShutdown() {
  return new Promise<string>((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

/**
 * Run the queue until SIGINT/SIGTERM: connectivity monitor, processor and
 * optionally the dashboard. Jobs enqueued by other CLI invocations are
 * picked up on the next rescan.
 */
export async function startWorker(opts: { dashboard: boolean }) {
  const container = createContainer(getDB());
  const { settings, store, connectivity, processor } = container;

  const wiring = processor.attach();
  connectivity.start();
  const timer = setInterval(() => rescan(container), settings.reachability_poll_ms);

  let server: Server | null = null;
  if (opts.dashboard) {
    const app = createDashboard({ store, connectivity, queue: processor });
    server = await startDashboard(app, settings.dashboard_port);
  }

  console.log(`[worker] started against ${settings.api_base_url} (health: ${settings.health_url})`);
  const signal = await waitForShutdown();
  console.log(`[worker] ${signal} received, shutting down`);

  clearInterval(timer);
  wiring.unsubscribe();
  connectivity.stop();
  processor.cancelAll();
  await processor.whenIdle();
  if (server) {
    const closing = server;
    await new Promise<void>((resolve, reject) => closing.close((err) => (err ? reject(err) : resolve())));
  }
  closeDB();
}
