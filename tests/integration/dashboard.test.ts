import type { Server } from 'node:http';
import type express from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDB } from '../../src/db/db.js';
import { SqliteJobStore } from '../../src/db/jobStore.js';
import { LogNotificationSink } from '../../src/core/notifier.js';
import { QueueProcessor } from '../../src/core/processor.js';
import type { Job } from '../../src/core/types.js';
import { createDashboard, escapeHtml, renderJobsPage, startDashboard, statusLabel } from '../../src/web/server.js';
import { FakeConnectivity, FakeOperation, silentLogger } from '../helpers.js';

function job(overrides: Partial<Job>): Job {
  return {
    id: 'job-1',
    artifactRef: '/videos/a.mov',
    status: 'pending',
    progress: 0,
    error: null,
    result: null,
    attempts: 0,
    createdAt: '2026-04-01T10:00:00.000Z',
    updatedAt: '2026-04-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('statusLabel', () => {
  it('shows pending jobs as waiting while offline', () => {
    expect(statusLabel(job({}), false)).toBe('waiting for connection');
    expect(statusLabel(job({}), true)).toBe('pending');
  });

  it('shows upload progress', () => {
    expect(statusLabel(job({ status: 'uploading', progress: 0.25 }), true)).toBe('uploading 25%');
  });
});

describe('renderJobsPage', () => {
  const counts = { pending: 1, uploading: 0, analyzing: 0, completed: 0, failed: 1 };

  it('escapes job fields', () => {
    const page = renderJobsPage([job({ artifactRef: '/videos/<script>.mov' })], counts, true);

    expect(page).toContain('<td>/videos/&lt;script&gt;.mov</td>');
    expect(escapeHtml(`a&b "c" 'd'`)).toBe('a&amp;b &quot;c&quot; &#39;d&#39;');
  });

  it('offers retry only for failed jobs', () => {
    const page = renderJobsPage(
      [job({ id: 'waiting' }), job({ id: 'broken', status: 'failed', error: 'Analysis timed out' })],
      counts,
      false
    );

    expect(page).toContain(`<button onclick="retryJob('broken')">Retry</button>`);
    expect(page).not.toContain(`retryJob('waiting')`);
    expect(page).toContain('<span class="net offline">offline</span>');
    expect(page).toContain('<td>waiting for connection</td>');
  });
});

describe('dashboard routes', () => {
  let store: SqliteJobStore;
  let server: Server | null = null;
  let baseUrl: string;
  let logger: ReturnType<typeof silentLogger>;

  async function listen(app: express.Express) {
    server = await startDashboard(app, 0, logger);
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  }

  beforeEach(async () => {
    logger = silentLogger();
    store = new SqliteJobStore(openDB(':memory:'), { logger, removeArtifact: () => {} });
    const connectivity = new FakeConnectivity(false);
    const queue = new QueueProcessor({
      store,
      connectivity,
      operation: new FakeOperation(),
      notifier: new LogNotificationSink(logger),
      logger,
    });
    await listen(createDashboard({ store, connectivity, queue, logger }));
  });

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) await new Promise<void>((resolve) => running.close(() => resolve()));
  });

  it('redirects the root to the jobs page', async () => {
    store.create('/videos/a.mov');

    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.url).toBe(`${baseUrl}/jobs`);
    expect(res.headers.get('content-type')).toMatch(/^text\/html/);
    expect(await res.text()).toContain('<td>/videos/a.mov</td>');
  });

  it('lists jobs newest first and filters by status', async () => {
    const a = store.create('/videos/a.mov');
    const b = store.create('/videos/b.mov');
    store.updateStatus(a.id, 'failed', 'Content rejected');

    const all = await fetch(`${baseUrl}/api/jobs`).then((res) => res.json());
    const failed = await fetch(`${baseUrl}/api/jobs?status=failed`).then((res) => res.json());

    expect(all).toEqual([store.get(b.id), store.get(a.id)]);
    expect(failed).toEqual([store.get(a.id)]);
  });

  it('rejects unknown status filters', async () => {
    const res = await fetch(`${baseUrl}/api/jobs?status=queued`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Unknown status "queued"' });
  });

  it('reports counts, connectivity and the processor state', async () => {
    store.create('/videos/a.mov');

    const body = await fetch(`${baseUrl}/api/status`).then((res) => res.json());

    expect(body).toEqual({
      counts: { pending: 1, uploading: 0, analyzing: 0, completed: 0, failed: 0 },
      oldestPending: expect.any(String),
      connected: false,
      queue: { draining: false, activeJobId: null, queued: [] },
    });
  });

  it('retries failed jobs', async () => {
    const { id } = store.create('/videos/a.mov');
    store.updateStatus(id, 'failed', 'Network error');

    const res = await fetch(`${baseUrl}/api/jobs/${id}/retry`, { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ id, status: 'pending', error: null });
  });

  it('answers 409 for jobs that cannot be retried and 404 for unknown ones', async () => {
    const { id } = store.create('/videos/a.mov');

    const conflict = await fetch(`${baseUrl}/api/jobs/${id}/retry`, { method: 'POST' });
    const missing = await fetch(`${baseUrl}/api/jobs/nope/retry`, { method: 'POST' });

    expect(conflict.status).toBe(409);
    expect(await conflict.json()).toEqual({
      error: `Job ${id} cannot move from pending to pending.`,
      code: 'INVALID_TRANSITION',
    });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Job nope not found.', code: 'UNKNOWN_JOB' });
  });

  it('deletes jobs', async () => {
    const { id } = store.create('/videos/a.mov');

    const res = await fetch(`${baseUrl}/api/jobs/${id}`, { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect(store.get(id)).toBeUndefined();
  });

  it('answers 500 and logs unexpected failures', async () => {
    const running = server;
    server = null;
    if (running) await new Promise<void>((resolve) => running.close(() => resolve()));

    await listen(
      createDashboard({
        store,
        connectivity: { isConnected: true },
        queue: {
          retry: () => {
            throw new Error('disk full');
          },
          delete: () => {},
          snapshot: () => ({ draining: false, activeJobId: null, queued: [] }),
        },
        logger,
      })
    );

    const res = await fetch(`${baseUrl}/api/jobs/job-1/retry`, { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'disk full' });
    expect(logger.error).toHaveBeenCalledWith('[dashboard] request failed: disk full');
  });
});
