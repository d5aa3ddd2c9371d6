import type { JobStatus } from './types.js';

export type QueueErrorCode =
  | 'UNKNOWN_JOB'
  | 'INVALID_TRANSITION'
  | 'ACTIVE_JOB_CONFLICT'
  | 'STORAGE_FAILURE'
  | 'INVALID_CONFIG';

export class QueueError extends Error {
  constructor(
    readonly code: QueueErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownJobError extends QueueError {
  constructor(readonly jobId: string) {
    super('UNKNOWN_JOB', `Job ${jobId} not found.`);
  }
}

export class InvalidTransitionError extends QueueError {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super('INVALID_TRANSITION', `Job ${jobId} cannot move from ${from} to ${to}.`);
  }
}

export class ActiveJobConflictError extends QueueError {
  constructor(
    readonly jobId: string,
    readonly activeJobId: string
  ) {
    super('ACTIVE_JOB_CONFLICT', `Job ${jobId} cannot start while job ${activeJobId} is in flight.`);
  }
}

export class StorageError extends QueueError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_FAILURE', message, { cause });
  }
}

export class ConfigError extends QueueError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
