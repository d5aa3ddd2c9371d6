import type { JobStore } from '../db/jobStore.js';
import type { Job } from '../core/types.js';

/** Manual retry: only failed jobs go back to pending. */
export function retryJob(store: JobStore, id: string): Job {
  const job = store.retry(id);
  console.log('Re-enqueued job', id);
  return job;
}

export function retryAllFailed(store: JobStore): number {
  const failed = store.list({ status: 'failed', order: 'asc' });
  for (const job of failed) store.retry(job.id);
  return failed.length;
}
