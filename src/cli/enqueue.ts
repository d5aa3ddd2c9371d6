import fs from 'node:fs';
import path from 'node:path';
import type { JobStore } from '../db/jobStore.js';
import type { Job } from '../core/types.js';

/**
 * Enqueue artifacts by path. Paths are stored absolute so a daemon started
 * from another directory can still read them.
 */
export function enqueue(store: JobStore, files: readonly string[], cwd = process.cwd()): Job[] {
  const resolved = files.map((file) => path.resolve(cwd, file));

  for (const file of resolved) {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(file);
    } catch {
      throw new Error(`Artifact not found: ${file}`);
    }
    if (!stat.isFile()) throw new Error(`Artifact is not a file: ${file}`);
  }

  return resolved.map((file) => store.create(file));
}
