import { z } from 'zod';
import { ConfigError } from './errors.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const settingsSchema = z.object({
  api_base_url: z.string().url().default('http://localhost:8000/api/v1'),
  api_token: z.string().min(1).optional(),
  health_url: z.string().url().optional(),
  inter_job_delay_ms: nonNegativeInt(1_000),
  debounce_ms: nonNegativeInt(500),
  probe_timeout_ms: positiveInt(5_000),
  reachability_poll_ms: positiveInt(5_000),
  request_timeout_ms: positiveInt(120_000),
  poll_interval_ms: positiveInt(2_000),
  poll_max_attempts: positiveInt(60),
  failure_policy: z.enum(['continue', 'abort']).default('continue'),
  dashboard_port: z.coerce.number().int().min(0).max(65_535).default(3_000),
  on_complete_cmd: z.string().min(1).optional(),
});

export type Settings = Omit<z.infer<typeof settingsSchema>, 'health_url'> & { health_url: string };

export const SETTING_KEYS = Object.keys(settingsSchema.shape);

export function isSettingKey(key: string) {
  return SETTING_KEYS.includes(key);
}

/**
 * Parse raw config-table values into typed settings, filling defaults.
 * Throws ConfigError listing every invalid key.
 */
export function parseSettings(raw: Record<string, string>): Settings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const base = parsed.data.api_base_url.replace(/\/$/, '');
  return {
    ...parsed.data,
    api_base_url: base,
    health_url: parsed.data.health_url ?? `${base}/health`,
  };
}

/** Validate a single value before it is written. */
export function validateSetting(key: string, value: string) {
  if (!isSettingKey(key)) {
    throw new ConfigError(`Unknown config key "${key}". Known keys: ${SETTING_KEYS.join(', ')}`);
  }
  parseSettings({ [key]: value });
}
