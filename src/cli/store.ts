import { getDB, type DB } from '../db/db.js';
import { SqliteJobStore } from '../db/jobStore.js';

/**
 * Store for one-shot commands. These may run beside `uploadctl run`, so they
 * never reset in-flight jobs; only the worker recovers them.
 */
export function openCliStore(db: DB = getDB()) {
  return new SqliteJobStore(db, { recoverOnOpen: false });
}
