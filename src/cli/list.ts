import type { JobStore } from '../db/jobStore.js';
import type { Job, JobStatus } from '../core/types.js';

function pct(progress: number) {
  return `${Math.round(progress * 100)}%`;
}

export function formatJobLine(job: Job) {
  const parts = [job.id, job.status.padEnd(9), pct(job.progress).padStart(4), job.createdAt, job.artifactRef];
  if (job.error) parts.push(`error: ${job.error}`);
  return parts.join('  ');
}

export function printList(store: JobStore, opts: { status?: JobStatus; limit?: number } = {}) {
  const jobs = store.list({ status: opts.status, order: 'desc', limit: opts.limit });
  if (jobs.length === 0) {
    console.log(opts.status ? `No ${opts.status} jobs.` : 'No jobs.');
    return;
  }
  for (const job of jobs) console.log(formatJobLine(job));
}
