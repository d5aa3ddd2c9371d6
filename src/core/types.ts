export type JobStatus = 'pending' | 'uploading' | 'analyzing' | 'completed' | 'failed';

export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'uploading',
  'analyzing',
  'completed',
  'failed',
];

export const IN_FLIGHT_STATUSES: readonly JobStatus[] = ['uploading', 'analyzing'];

export type AnalysisPayload = Record<string, unknown>;

export interface Job {
  id: string;
  artifactRef: string;
  status: JobStatus;
  progress: number; // 0..1
  error: string | null;
  result: AnalysisPayload | null;
  attempts: number;
  createdAt: string;
  updatedAt: string;
}

export interface JobFilter {
  status?: JobStatus | readonly JobStatus[];
  order?: 'asc' | 'desc';
  limit?: number;
}

export interface JobSummary {
  counts: Record<JobStatus, number>;
  oldestPending: string | null;
}

export type FailureKind =
  | { kind: 'network'; detail?: string }
  | { kind: 'server_error'; code: number; detail?: string }
  | { kind: 'timeout' }
  | { kind: 'content_invalid'; detail?: string }
  | { kind: 'unauthorized' }
  | { kind: 'cancelled' };

export type OperationResult =
  | { ok: true; payload: AnalysisPayload }
  | { ok: false; failure: FailureKind };

export interface ConnectivityState {
  isConnected: boolean;
  lastChangeAt: number;
}

export interface Subscription {
  unsubscribe(): void;
}

export interface Logger {
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export type FailurePolicy = 'continue' | 'abort';
