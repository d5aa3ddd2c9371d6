import type { DB } from '../db/db.js';
import { SqliteJobStore } from '../db/jobStore.js';
import { readConfig } from '../db/settings.js';
import { HttpAnalysisClient } from '../net/analysisClient.js';
import { InterfaceReachabilitySource, createHttpHealthProbe } from '../net/reachability.js';
import { ConnectivityMonitor } from './connectivity.js';
import {
  CommandNotificationSink,
  CompositeNotificationSink,
  LogNotificationSink,
  type NotificationSink,
} from './notifier.js';
import { QueueProcessor } from './processor.js';
import { parseSettings, type Settings } from './settings.js';
import type { Logger } from './types.js';

export interface Container {
  settings: Settings;
  store: SqliteJobStore;
  connectivity: ConnectivityMonitor;
  processor: QueueProcessor;
}

/**
 * Composition root: builds every service once and wires them by reference.
 */
export function createContainer(db: DB, logger: Logger = console): Container {
  const settings = parseSettings(readConfig(db));
  const store = new SqliteJobStore(db, { logger, recoverOnOpen: true });

  const connectivity = new ConnectivityMonitor({
    probe: createHttpHealthProbe(settings.health_url, settings.probe_timeout_ms),
    source: new InterfaceReachabilitySource(settings.reachability_poll_ms),
    debounceMs: settings.debounce_ms,
    logger,
  });

  const operation = new HttpAnalysisClient({
    baseUrl: settings.api_base_url,
    apiToken: settings.api_token,
    requestTimeoutMs: settings.request_timeout_ms,
    pollIntervalMs: settings.poll_interval_ms,
    pollMaxAttempts: settings.poll_max_attempts,
    logger,
  });

  const sinks: NotificationSink[] = [new LogNotificationSink(logger)];
  if (settings.on_complete_cmd) sinks.push(new CommandNotificationSink(settings.on_complete_cmd, { logger }));

  const processor = new QueueProcessor({
    store,
    connectivity,
    operation,
    notifier: new CompositeNotificationSink(sinks, logger),
    interJobDelayMs: settings.inter_job_delay_ms,
    failurePolicy: settings.failure_policy,
    logger,
  });

  return { settings, store, connectivity, processor };
}
