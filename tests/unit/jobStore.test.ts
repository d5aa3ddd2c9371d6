import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDB, type DB } from '../../src/db/db.js';
import { SqliteJobStore, canTransition } from '../../src/db/jobStore.js';
import {
  ActiveJobConflictError,
  InvalidTransitionError,
  UnknownJobError,
} from '../../src/core/errors.js';
import { silentLogger } from '../helpers.js';

describe('SqliteJobStore', () => {
  let db: DB;
  let removeArtifact: ReturnType<typeof vi.fn>;
  let logger: ReturnType<typeof silentLogger>;
  let store: SqliteJobStore;

  beforeEach(() => {
    db = openDB(':memory:');
    removeArtifact = vi.fn();
    logger = silentLogger();
    store = new SqliteJobStore(db, { logger, removeArtifact });
  });

  it('creates pending jobs and persists them before returning', () => {
    const job = store.create('/videos/a.mov');

    expect(job.status).toBe('pending');
    expect(job.progress).toBe(0);
    expect(job.error).toBeNull();
    expect(job.result).toBeNull();
    expect(job.attempts).toBe(0);
    expect(store.get(job.id)).toEqual(job);
  });

  it('allocates distinct ids', () => {
    const a = store.create('/videos/a.mov');
    const b = store.create('/videos/a.mov');
    expect(a.id).not.toBe(b.id);
  });

  it('rejects updates to unknown jobs', () => {
    expect(() => store.updateStatus('missing', 'uploading')).toThrow(UnknownJobError);
    expect(() => store.updateProgress('missing', 0.5)).toThrow(UnknownJobError);
    expect(() => store.updateResult('missing', {})).toThrow(UnknownJobError);
  });

  it('walks the happy path and stores the result', () => {
    const { id } = store.create('/videos/a.mov');

    expect(store.updateStatus(id, 'uploading').attempts).toBe(1);
    expect(store.updateStatus(id, 'analyzing').status).toBe('analyzing');
    const done = store.updateResult(id, { score: 81, phases: ['setup'] });

    expect(done.status).toBe('completed');
    expect(done.progress).toBe(1);
    expect(store.get(id)?.result).toEqual({ score: 81, phases: ['setup'] });
  });

  it('rejects transitions outside the state machine', () => {
    const { id } = store.create('/videos/a.mov');

    expect(() => store.updateStatus(id, 'analyzing')).toThrow(InvalidTransitionError);
    expect(() => store.updateResult(id, {})).toThrow(InvalidTransitionError);
    expect(store.get(id)?.status).toBe('pending');
  });

  it('encodes the allowed transitions', () => {
    expect(canTransition('uploading', 'pending')).toBe(true);
    expect(canTransition('analyzing', 'pending')).toBe(true);
    expect(canTransition('completed', 'pending')).toBe(false);
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(true);
  });

  it('refuses to start a second job while one is in flight', () => {
    const a = store.create('/videos/a.mov');
    const b = store.create('/videos/b.mov');
    store.updateStatus(a.id, 'uploading');

    expect(() => store.updateStatus(b.id, 'uploading')).toThrow(ActiveJobConflictError);
    expect(store.get(b.id)?.status).toBe('pending');
  });

  it('records the error on failure and clears it on rollback', () => {
    const { id } = store.create('/videos/a.mov');
    store.updateStatus(id, 'uploading');
    store.updateProgress(id, 0.4);

    const rolledBack = store.updateStatus(id, 'pending');
    expect(rolledBack.progress).toBe(0);
    expect(rolledBack.error).toBeNull();

    store.updateStatus(id, 'uploading');
    const failed = store.updateStatus(id, 'failed', 'Server error (500)');
    expect(failed.error).toBe('Server error (500)');
    expect(failed.attempts).toBe(2);
  });

  it('clamps progress into [0, 1]', () => {
    const { id } = store.create('/videos/a.mov');
    expect(store.updateProgress(id, 1.7).progress).toBe(1);
    expect(store.updateProgress(id, -3).progress).toBe(0);
    expect(store.updateProgress(id, Number.NaN).progress).toBe(0);
  });

  it('only retries failed jobs', () => {
    const { id } = store.create('/videos/a.mov');
    expect(() => store.retry(id)).toThrow(InvalidTransitionError);

    store.updateStatus(id, 'failed', 'Content rejected');
    const retried = store.retry(id);
    expect(retried.status).toBe('pending');
    expect(retried.error).toBeNull();
  });

  it('lists oldest first for processing and newest first for display', () => {
    const a = store.create('/videos/a.mov');
    const b = store.create('/videos/b.mov');
    const c = store.create('/videos/c.mov');
    store.updateStatus(b.id, 'failed', 'x');

    expect(store.list({ order: 'asc' }).map((j) => j.id)).toEqual([a.id, b.id, c.id]);
    expect(store.list({ order: 'desc' }).map((j) => j.id)).toEqual([c.id, b.id, a.id]);
    expect(store.list({ status: 'pending' }).map((j) => j.id)).toEqual([a.id, c.id]);
    expect(store.list({ status: ['failed', 'completed'] }).map((j) => j.id)).toEqual([b.id]);
    expect(store.list({ status: [] })).toEqual([]);
    expect(store.list({ order: 'desc', limit: 1 }).map((j) => j.id)).toEqual([c.id]);
  });

  it('orders by creation time before insertion order', () => {
    let now = new Date('2026-03-01T10:00:00.000Z');
    const clocked = new SqliteJobStore(db, { now: () => now, logger });
    const late = clocked.create('/videos/late.mov');
    now = new Date('2026-03-01T09:00:00.000Z');
    const early = clocked.create('/videos/early.mov');

    expect(clocked.list({ order: 'asc' }).map((j) => j.id)).toEqual([early.id, late.id]);
  });

  it('deletes the record and then the artifact', () => {
    const { id } = store.create('/videos/a.mov');
    store.delete(id);

    expect(store.get(id)).toBeUndefined();
    expect(removeArtifact).toHaveBeenCalledWith('/videos/a.mov');
  });

  it('logs artifact removal failures without failing the delete', () => {
    removeArtifact.mockImplementation(() => {
      throw new Error('EACCES');
    });
    const { id } = store.create('/videos/a.mov');

    expect(() => store.delete(id)).not.toThrow();
    expect(store.get(id)).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      `[store] could not remove artifact for job ${id} (/videos/a.mov): EACCES`
    );
  });

  it('surfaces deletion of unknown jobs', () => {
    expect(() => store.delete('missing')).toThrow(UnknownJobError);
    expect(removeArtifact).not.toHaveBeenCalled();
  });

  it('resets interrupted jobs to pending when reopened', () => {
    const a = store.create('/videos/a.mov');
    const b = store.create('/videos/b.mov');
    store.updateStatus(a.id, 'uploading');
    store.updateStatus(a.id, 'analyzing');
    store.updateProgress(a.id, 0.9);

    const reopened = new SqliteJobStore(db, { logger, recoverOnOpen: true });

    expect(reopened.get(a.id)?.status).toBe('pending');
    expect(reopened.get(a.id)?.progress).toBe(0);
    expect(reopened.get(b.id)?.status).toBe('pending');
    expect(logger.warn).toHaveBeenCalledWith('[store] reset 1 interrupted job(s) to pending');
  });

  it('leaves interrupted jobs alone unless asked to recover', () => {
    const a = store.create('/videos/a.mov');
    store.updateStatus(a.id, 'uploading');

    const reopened = new SqliteJobStore(db, { logger });
    expect(reopened.get(a.id)?.status).toBe('uploading');
    expect(reopened.recoverInterrupted()).toBe(1);
    expect(reopened.get(a.id)?.status).toBe('pending');
  });

  it('summarises counts per status', () => {
    const a = store.create('/videos/a.mov');
    store.create('/videos/b.mov');
    store.updateStatus(a.id, 'failed', 'x');

    const summary = store.summary();
    expect(summary.counts).toEqual({ pending: 1, uploading: 0, analyzing: 0, completed: 0, failed: 1 });
    expect(summary.oldestPending).not.toBeNull();
  });

  it('cleans up completed jobs older than the cutoff', () => {
    let now = new Date('2026-01-01T00:00:00.000Z');
    const clocked = new SqliteJobStore(db, { now: () => now, logger, removeArtifact });
    const old = clocked.create('/videos/old.mov');
    clocked.updateStatus(old.id, 'uploading');
    clocked.updateStatus(old.id, 'analyzing');
    clocked.updateResult(old.id, {});
    const oldFailed = clocked.create('/videos/old-failed.mov');
    clocked.updateStatus(oldFailed.id, 'failed', 'x');

    now = new Date('2026-02-15T00:00:00.000Z');
    const fresh = clocked.create('/videos/fresh.mov');
    clocked.updateStatus(fresh.id, 'uploading');
    clocked.updateStatus(fresh.id, 'analyzing');
    clocked.updateResult(fresh.id, {});

    expect(clocked.cleanup(30)).toBe(1);
    expect(clocked.get(old.id)).toBeUndefined();
    expect(clocked.get(oldFailed.id)?.status).toBe('failed');
    expect(clocked.get(fresh.id)?.status).toBe('completed');
    expect(removeArtifact).toHaveBeenCalledWith('/videos/old.mov');
  });

});

describe('SqliteJobStore on a shared database file', () => {
  let dir: string;
  let file: string;
  const handles: DB[] = [];

  function open() {
    const db = openDB(file);
    handles.push(db);
    return db;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'uploadctl-store-'));
    file = path.join(dir, 'queue.db');
  });

  afterEach(() => {
    for (const db of handles.splice(0)) db.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('does not touch a job another connection has in flight', () => {
    const worker = new SqliteJobStore(open(), { logger: silentLogger(), recoverOnOpen: true });
    const { id } = worker.create('/videos/a.mov');
    worker.updateStatus(id, 'uploading');

    const reader = new SqliteJobStore(open(), { logger: silentLogger() });

    expect(reader.get(id)?.status).toBe('uploading');
    worker.updateStatus(id, 'analyzing');
    expect(worker.updateResult(id, { score: 64 }).status).toBe('completed');
    expect(reader.get(id)?.result).toEqual({ score: 64 });
  });

  it('refuses a claim from a second connection while a job is in flight', () => {
    const first = new SqliteJobStore(open(), { logger: silentLogger() });
    const second = new SqliteJobStore(open(), { logger: silentLogger() });
    const a = first.create('/videos/a.mov');
    const b = first.create('/videos/b.mov');
    first.updateStatus(a.id, 'uploading');

    expect(() => second.updateStatus(b.id, 'uploading')).toThrow(ActiveJobConflictError);
    expect(first.get(b.id)?.status).toBe('pending');
  });

  it('holds the write lock for the whole claim', () => {
    const other = open();
    other.pragma('busy_timeout = 0');
    let writeDuringClaim: unknown = 'not attempted';
    let armed = false;
    const store = new SqliteJobStore(open(), {
      logger: silentLogger(),
      now: () => {
        if (armed) {
          armed = false;
          try {
            other.prepare(`INSERT INTO config(key, value) VALUES ('debounce_ms', '100')`).run();
            writeDuringClaim = null;
          } catch (err) {
            writeDuringClaim = err;
          }
        }
        return new Date();
      },
    });
    const { id } = store.create('/videos/a.mov');

    armed = true;
    store.updateStatus(id, 'uploading');

    expect(writeDuringClaim).toMatchObject({ code: 'SQLITE_BUSY' });
    expect(store.get(id)?.status).toBe('uploading');
  });
});
