import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { JobStore } from '../db/jobStore.js';
import type { QueueProcessor } from '../core/processor.js';
import { InvalidTransitionError, QueueError, UnknownJobError, errorMessage } from '../core/errors.js';
import { JOB_STATUSES, type Job, type JobStatus, type Logger } from '../core/types.js';

export interface DashboardDeps {
  store: JobStore;
  connectivity: { readonly isConnected: boolean };
  queue: Pick<QueueProcessor, 'retry' | 'delete' | 'snapshot'>;
  logger?: Logger;
}

export function escapeHtml(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && JOB_STATUSES.some((s) => s === value);
}

/** What the dashboard shows in a job's status column. */
export function statusLabel(job: Job, isConnected: boolean) {
  if (job.status === 'pending' && !isConnected) return 'waiting for connection';
  if (job.status === 'uploading') return `uploading ${Math.round(job.progress * 100)}%`;
  return job.status;
}

function html(title: string, body: string) {
  return `
  <!DOCTYPE html>
  <html lang="en">
  <head>
    <meta charset="UTF-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1.0" />
    <title>${title}</title>
    <style>
      :root {
        --bg: #0d0d10;
        --card: #1b1b1f;
        --text: #e8e8e8;
        --border: #2a2a2d;
        --accent: #007bff;
        --success: #4caf50;
        --fail: #f44336;
        --warn: #ff9800;
      }
      body { margin: 0; font-family: 'Segoe UI', Roboto, sans-serif; background: var(--bg); color: var(--text); }
      header { background: #18181b; padding: 15px 25px; border-bottom: 1px solid var(--border); display: flex; justify-content: space-between; }
      header h1 { margin: 0; font-size: 1.5rem; color: var(--accent); }
      .net { font-size: 0.9rem; }
      .net.online { color: var(--success); }
      .net.offline { color: var(--fail); }
      main { padding: 20px 30px; }
      h2 { margin-top: 32px; color: var(--accent); border-left: 4px solid var(--accent); padding-left: 10px; }
      table { width: 100%; border-collapse: collapse; background: var(--card); margin-top: 10px; }
      th, td { padding: 10px 12px; border-bottom: 1px solid var(--border); font-size: 0.9rem; text-align: left; }
      th { background: #202024; color: #ccc; }
      button { background-color: var(--accent); color: white; border: none; padding: 6px 10px; border-radius: 4px; cursor: pointer; }
      .badge { padding: 3px 8px; border-radius: 5px; font-size: 0.75rem; font-weight: 600; text-transform: uppercase; }
      .badge.pending { background: var(--warn); color: #000; }
      .badge.uploading, .badge.analyzing { background: var(--accent); }
      .badge.completed { background: var(--success); color: #000; }
      .badge.failed { background: var(--fail); }
      .stats-bar { display: flex; justify-content: space-around; background: var(--card); border: 1px solid var(--border); padding: 15px; border-radius: 8px; }
      .stat { text-align: center; }
      .stat span { display: block; font-size: 1.4rem; margin-top: 5px; }
    </style>
  </head>
  <body>
    ${body}
    <script>
      async function retryJob(id) {
        const res = await fetch('/api/jobs/' + encodeURIComponent(id) + '/retry', { method: 'POST' });
        if (!res.ok) { alert('Retry failed: HTTP ' + res.status); return; }
        location.reload();
      }
    </script>
  </body>
  </html>`;
}

export function renderJobsPage(jobs: readonly Job[], counts: Record<JobStatus, number>, isConnected: boolean) {
  let body = `
  <header>
    <h1>Upload Queue</h1>
    <span class="net ${isConnected ? 'online' : 'offline'}">${isConnected ? 'online' : 'offline'}</span>
  </header>
  <main>
  <div class="stats-bar">
    ${JOB_STATUSES.map((s) => `<div class="stat ${s}">${s.toUpperCase()}<span>${counts[s]}</span></div>`).join('')}
  </div>`;

  for (const s of JOB_STATUSES) {
    const rows = jobs.filter((job) => job.status === s);
    body += `<h2>${s.toUpperCase()} <span class="badge ${s}">${rows.length}</span></h2>`;
    if (rows.length === 0) {
      body += `<p><i>No jobs</i></p>`;
      continue;
    }

    body += `<table><tr><th>ID</th><th>Artifact</th><th>Status</th><th>Created</th><th>Error</th><th></th></tr>`;
    for (const job of rows) {
      const action =
        job.status === 'failed'
          ? `<button onclick="retryJob('${escapeHtml(job.id)}')">Retry</button>`
          : '';
      body += `<tr>
        <td>${escapeHtml(job.id)}</td>
        <td>${escapeHtml(job.artifactRef)}</td>
        <td>${escapeHtml(statusLabel(job, isConnected))}</td>
        <td>${escapeHtml(job.createdAt)}</td>
        <td>${job.error ? `<span class="badge failed">${escapeHtml(job.error.slice(0, 80))}</span>` : ''}</td>
        <td>${action}</td>
      </tr>`;
    }
    body += `</table>`;
  }

  body += `</main>`;
  return html('Upload Queue', body);
}

export function createDashboard(deps: DashboardDeps) {
  const { store, connectivity, queue } = deps;
  const logger = deps.logger ?? console;
  const app = express();

  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => res.redirect('/jobs'));

  app.get('/jobs', (_req: Request, res: Response) => {
    const jobs = store.list({ order: 'desc' });
    res.send(renderJobsPage(jobs, store.summary().counts, connectivity.isConnected));
  });

  app.get('/api/jobs', (req: Request, res: Response) => {
    const raw = req.query.status;
    let status: JobStatus | undefined;
    if (raw !== undefined) {
      if (!isJobStatus(raw)) {
        res.status(400).json({ error: `Unknown status "${String(raw)}"` });
        return;
      }
      status = raw;
    }
    res.json(store.list({ status, order: 'desc' }));
  });

  app.get('/api/status', (_req: Request, res: Response) => {
    res.json({
      ...store.summary(),
      connected: connectivity.isConnected,
      queue: queue.snapshot(),
    });
  });

  app.post('/api/jobs/:id/retry', (req: Request, res: Response) => {
    res.json(queue.retry(req.params.id));
  });

  app.delete('/api/jobs/:id', (req: Request, res: Response) => {
    queue.delete(req.params.id);
    res.status(204).end();
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof UnknownJobError) {
      res.status(404).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof InvalidTransitionError) {
      res.status(409).json({ error: err.message, code: err.code });
      return;
    }
    logger.error(`[dashboard] request failed: ${errorMessage(err)}`);
    const code = err instanceof QueueError ? err.code : undefined;
    res.status(500).json({ error: errorMessage(err), code });
  });

  return app;
}

export function startDashboard(app: express.Express, port: number, logger: Logger = console): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      logger.info(`[dashboard] running at http://localhost:${port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
