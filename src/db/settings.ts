import type { DB } from './db.js';

interface ConfigRow {
  key: string;
  value: string;
}

export function readConfig(db: DB): Record<string, string> {
  const rows = db.prepare('SELECT key, value FROM config ORDER BY key').all() as ConfigRow[];
  const res: Record<string, string> = {};
  for (const row of rows) res[row.key] = row.value;
  return res;
}

/**
 * Set or update a config key/value pair
 */
export function writeConfig(db: DB, key: string, value: string) {
  db.prepare(`
    INSERT INTO config(key, value)
    VALUES (?, ?)
    ON CONFLICT(key)
    DO UPDATE SET value = excluded.value
  `).run(key, value);
}

export function deleteConfig(db: DB, key: string) {
  return db.prepare('DELETE FROM config WHERE key=?').run(key).changes > 0;
}
