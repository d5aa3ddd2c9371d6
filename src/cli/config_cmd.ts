import type { DB } from '../db/db.js';
import { deleteConfig, readConfig, writeConfig } from '../db/settings.js';
import { SETTING_KEYS, validateSetting } from '../core/settings.js';
import { ConfigError } from '../core/errors.js';

export function getConfigAll(db: DB) {
  const raw = readConfig(db);
  const res: Record<string, string | number> = {};

  for (const [key, value] of Object.entries(raw)) {
    const num = Number(value);
    res[key] = value.trim() === '' || isNaN(num) ? value : num;
  }

  return res;
}

export function setConfigKV(db: DB, key: string, value: string) {
  validateSetting(key, value);
  writeConfig(db, key, value);
}

export function unsetConfigKey(db: DB, key: string) {
  if (!SETTING_KEYS.includes(key)) throw new ConfigError(`Unknown config key "${key}".`);
  return deleteConfig(db, key);
}
