import fs from 'node:fs';
import { nanoid } from 'nanoid';
import type { DB } from './db.js';
import {
  ActiveJobConflictError,
  InvalidTransitionError,
  StorageError,
  UnknownJobError,
  errorMessage,
} from '../core/errors.js';
import {
  IN_FLIGHT_STATUSES,
  type AnalysisPayload,
  type Job,
  type JobFilter,
  type JobStatus,
  type JobSummary,
  type Logger,
} from '../core/types.js';

export interface JobStore {
  create(artifactRef: string): Job;
  updateStatus(id: string, status: JobStatus, error?: string | null): Job;
  updateResult(id: string, result: AnalysisPayload): Job;
  updateProgress(id: string, progress: number): Job;
  retry(id: string): Job;
  get(id: string): Job | undefined;
  list(filter?: JobFilter): Job[];
  delete(id: string): void;
  recoverInterrupted(): number;
  summary(): JobSummary;
  cleanup(olderThanDays: number): number;
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['uploading', 'failed'],
  uploading: ['analyzing', 'pending', 'failed'],
  analyzing: ['completed', 'pending', 'failed'],
  completed: ['failed'],
  failed: ['pending', 'failed'],
};

export function canTransition(from: JobStatus, to: JobStatus) {
  return TRANSITIONS[from].includes(to);
}

interface JobRow {
  seq: number;
  id: string;
  artifact_ref: string;
  status: JobStatus;
  progress: number;
  error: string | null;
  result: string | null;
  attempts: number;
  created_at: string;
  updated_at: string;
}

export interface SqliteJobStoreOptions {
  now?: () => Date;
  logger?: Logger;
  removeArtifact?: (artifactRef: string) => void;
  /**
   * Reset jobs left uploading/analyzing by a previous worker. Default false;
   * only the process that owns the queue processor turns it on.
   */
  recoverOnOpen?: boolean;
}

function clampProgress(progress: number) {
  if (!Number.isFinite(progress)) return 0;
  return Math.min(1, Math.max(0, progress));
}

/**
 * SQLite-backed job store. Every mutation is a single transaction that
 * commits before the method returns.
 */
export class SqliteJobStore implements JobStore {
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly removeArtifact: (artifactRef: string) => void;

  constructor(
    private readonly db: DB,
    options: SqliteJobStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.removeArtifact = options.removeArtifact ?? ((ref) => fs.rmSync(ref));
    if (options.recoverOnOpen) {
      const reset = this.recoverInterrupted();
      if (reset > 0) {
        this.logger.warn(`[store] reset ${reset} interrupted job(s) to pending`);
      }
    }
  }

  create(artifactRef: string): Job {
    const nowIso = this.now().toISOString();
    const id = nanoid(12);
    this.db
      .prepare(
        `INSERT INTO jobs(id, artifact_ref, status, progress, error, result, attempts, created_at, updated_at)
         VALUES (?, ?, 'pending', 0, NULL, NULL, 0, ?, ?)`
      )
      .run(id, artifactRef, nowIso, nowIso);
    return this.require(id);
  }

  /** BEGIN IMMEDIATE: the in-flight check and the claim share one write lock. */
  updateStatus(id: string, status: JobStatus, error: string | null = null): Job {
    const tx = this.db.transaction(() => {
      const current = this.require(id);
      if (!canTransition(current.status, status)) {
        throw new InvalidTransitionError(id, current.status, status);
      }
      if (status === 'uploading') {
        const active = this.findInFlight();
        if (active && active.id !== id) throw new ActiveJobConflictError(id, active.id);
      }

      const nowIso = this.now().toISOString();
      if (status === 'uploading') {
        this.db
          .prepare(
            `UPDATE jobs SET status='uploading', progress=0, error=NULL, attempts=attempts+1, updated_at=? WHERE id=?`
          )
          .run(nowIso, id);
      } else if (status === 'pending') {
        this.db
          .prepare(`UPDATE jobs SET status='pending', progress=0, error=NULL, updated_at=? WHERE id=?`)
          .run(nowIso, id);
      } else {
        this.db
          .prepare('UPDATE jobs SET status=?, error=?, updated_at=? WHERE id=?')
          .run(status, status === 'failed' ? error : null, nowIso, id);
      }
      return this.require(id);
    });
    return tx.immediate();
  }

  updateResult(id: string, result: AnalysisPayload): Job {
    const tx = this.db.transaction(() => {
      const current = this.require(id);
      if (!canTransition(current.status, 'completed')) {
        throw new InvalidTransitionError(id, current.status, 'completed');
      }
      this.db
        .prepare(
          `UPDATE jobs SET status='completed', result=?, progress=1, error=NULL, updated_at=? WHERE id=?`
        )
        .run(JSON.stringify(result), this.now().toISOString(), id);
      return this.require(id);
    });
    return tx.immediate();
  }

  updateProgress(id: string, progress: number): Job {
    const res = this.db
      .prepare('UPDATE jobs SET progress=?, updated_at=? WHERE id=?')
      .run(clampProgress(progress), this.now().toISOString(), id);
    if (res.changes === 0) throw new UnknownJobError(id);
    return this.require(id);
  }

  retry(id: string): Job {
    const current = this.require(id);
    if (current.status !== 'failed') {
      throw new InvalidTransitionError(id, current.status, 'pending');
    }
    return this.updateStatus(id, 'pending');
  }

  get(id: string): Job | undefined {
    const row = this.db.prepare('SELECT * FROM jobs WHERE id=?').get(id) as JobRow | undefined;
    return row ? this.toJob(row) : undefined;
  }

  list(filter: JobFilter = {}): Job[] {
    const where: string[] = [];
    const params: (string | number)[] = [];
    if (filter.status !== undefined) {
      const statuses: readonly JobStatus[] =
        typeof filter.status === 'string' ? [filter.status] : filter.status;
      if (statuses.length === 0) return [];
      where.push(`status IN (${statuses.map(() => '?').join(', ')})`);
      params.push(...statuses);
    }

    const dir = filter.order === 'desc' ? 'DESC' : 'ASC';
    let sql = 'SELECT * FROM jobs';
    if (where.length > 0) sql += ' WHERE ' + where.join(' AND ');
    sql += ` ORDER BY created_at ${dir}, seq ${dir}`;
    if (filter.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(Math.max(0, Math.floor(filter.limit)));
    }

    const rows = this.db.prepare(sql).all(...params) as JobRow[];
    return rows.map((row) => this.toJob(row));
  }

  delete(id: string): void {
    const job = this.require(id);
    let changes: number;
    try {
      changes = this.db.prepare('DELETE FROM jobs WHERE id=?').run(id).changes;
    } catch (err) {
      throw new StorageError(`Failed to delete job ${id}: ${errorMessage(err)}`, err);
    }
    if (changes === 0) throw new UnknownJobError(id);

    try {
      this.removeArtifact(job.artifactRef);
    } catch (err) {
      this.logger.warn(`[store] could not remove artifact for job ${id} (${job.artifactRef}): ${errorMessage(err)}`);
    }
  }

  recoverInterrupted(): number {
    return this.db
      .prepare(
        `UPDATE jobs SET status='pending', progress=0, error=NULL, updated_at=? WHERE status IN ('uploading','analyzing')`
      )
      .run(this.now().toISOString()).changes;
  }

  summary(): JobSummary {
    const rows = this.db
      .prepare('SELECT status, COUNT(*) as c FROM jobs GROUP BY status')
      .all() as { status: JobStatus; c: number }[];

    const counts: Record<JobStatus, number> = {
      pending: 0,
      uploading: 0,
      analyzing: 0,
      completed: 0,
      failed: 0,
    };
    for (const row of rows) counts[row.status] = row.c;

    const oldest = this.db
      .prepare("SELECT MIN(created_at) as m FROM jobs WHERE status='pending'")
      .get() as { m: string | null };

    return { counts, oldestPending: oldest.m };
  }

  cleanup(olderThanDays: number): number {
    const cutoff = new Date(this.now().getTime() - olderThanDays * 24 * 60 * 60 * 1000).toISOString();
    const rows = this.db
      .prepare(`SELECT id FROM jobs WHERE status='completed' AND created_at < ?`)
      .all(cutoff) as { id: string }[];
    for (const row of rows) this.delete(row.id);
    return rows.length;
  }

  private findInFlight(): Job | undefined {
    const placeholders = IN_FLIGHT_STATUSES.map(() => '?').join(', ');
    const row = this.db
      .prepare(`SELECT * FROM jobs WHERE status IN (${placeholders}) LIMIT 1`)
      .get(...IN_FLIGHT_STATUSES) as JobRow | undefined;
    return row ? this.toJob(row) : undefined;
  }

  private require(id: string): Job {
    const job = this.get(id);
    if (!job) throw new UnknownJobError(id);
    return job;
  }

  private toJob(row: JobRow): Job {
    return {
      id: row.id,
      artifactRef: row.artifact_ref,
      status: row.status,
      progress: row.progress,
      error: row.error,
      result: this.parseResult(row),
      attempts: row.attempts,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private parseResult(row: JobRow): AnalysisPayload | null {
    if (row.result === null) return null;
    try {
      const parsed: unknown = JSON.parse(row.result);
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
      this.logger.warn(`[store] job ${row.id} has a non-object result; ignoring it`);
      return null;
    } catch (err) {
      this.logger.warn(`[store] job ${row.id} has an unreadable result: ${errorMessage(err)}`);
      return null;
    }
  }
}
