import type { JobStore } from '../db/jobStore.js';
import { JOB_STATUSES, type JobSummary } from '../core/types.js';

export function formatStatus(summary: JobSummary) {
  const total = JOB_STATUSES.reduce((sum, s) => sum + summary.counts[s], 0);
  const lines = JOB_STATUSES.map((s) => `${s.padEnd(10)} ${summary.counts[s]}`);
  lines.push(`${'total'.padEnd(10)} ${total}`);
  if (summary.oldestPending) lines.push(`oldest pending since ${summary.oldestPending}`);
  return lines.join('\n');
}

export function printStatus(store: JobStore) {
  console.log(formatStatus(store.summary()));
}
