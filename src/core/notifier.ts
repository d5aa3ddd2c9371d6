import { execa } from 'execa';
import { errorMessage } from './errors.js';
import type { Job, Logger } from './types.js';

export interface NotificationSink {
  notify(job: Job): Promise<void>;
}

export class LogNotificationSink implements NotificationSink {
  constructor(private readonly logger: Logger = console) {}

  async notify(job: Job) {
    this.logger.info(`[notify] job ${job.id} ${job.status} (${job.artifactRef})`);
  }
}

export interface CommandNotificationSinkOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs a shell command for every finished job. The job is described to the
 * command through UPLOADCTL_* environment variables.
 */
export class CommandNotificationSink implements NotificationSink {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly command: string,
    options: CommandNotificationSinkOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.logger = options.logger ?? console;
  }

  async notify(job: Job) {
    const proc = await execa(this.command, {
      shell: true,
      all: true,
      reject: false,
      timeout: this.timeoutMs,
      windowsHide: true,
      env: {
        UPLOADCTL_JOB_ID: job.id,
        UPLOADCTL_JOB_STATUS: job.status,
        UPLOADCTL_ARTIFACT: job.artifactRef,
      },
    });

    if (proc.failed) {
      throw new Error(`notify command exited with ${proc.exitCode ?? 'no code'}: ${truncate(proc.all ?? '')}`);
    }
    if (proc.all?.trim()) this.logger.info(`[notify] command output:\n${truncate(proc.all)}`);
  }
}

/** Fan out to several sinks; one failing sink does not stop the others. */
export class CompositeNotificationSink implements NotificationSink {
  constructor(
    private readonly sinks: readonly NotificationSink[],
    private readonly logger: Logger = console
  ) {}

  async notify(job: Job) {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.notify(job)));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn(`[notify] sink failed for job ${job.id}: ${errorMessage(result.reason)}`);
      }
    }
  }
}

function truncate(s: string, max = 2000) {
  if (s.length <= max) return s;
  return s.slice(0, max) + `\n...[truncated ${s.length - max} chars]`;
}
