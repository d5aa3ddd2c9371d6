import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CancellationToken, sleep } from '../core/cancellation.js';
import { errorMessage } from '../core/errors.js';
import type { OperationHooks, UploadAnalyzeOperation } from '../core/processor.js';
import type { AnalysisPayload, FailureKind, Logger, OperationResult } from '../core/types.js';

const UNAUTHORIZED_STATUSES = new Set([401, 403]);
const CONTENT_INVALID_STATUSES = new Set([400, 413, 415, 422]);

const uploadResponseSchema = z.object({
  video_id: z.union([z.number().int(), z.string().min(1)]),
  status: z.string().optional(),
});

const analysisResponseSchema = z.object({
  success: z.boolean().optional(),
  analysis: z
    .object({
      id: z.union([z.number(), z.string()]),
      status: z.string(),
      ai_analysis: z.record(z.unknown()).nullable().optional(),
      error: z.string().nullable().optional(),
    })
    .nullable()
    .optional(),
});

export interface HttpAnalysisClientOptions {
  baseUrl: string;
  apiToken?: string;
  requestTimeoutMs?: number;
  pollIntervalMs?: number;
  pollMaxAttempts?: number;
  title?: string;
  logger?: Logger;
  readArtifact?: (artifactRef: string) => Promise<Buffer>;
}

/** Carries a classified failure out of the request helpers. */
class RemoteFailure extends Error {
  constructor(readonly failure: FailureKind) {
    super(failure.kind);
    this.name = 'RemoteFailure';
  }
}

function contentTypeFor(file: string) {
  const ext = path.extname(file).toLowerCase();
  if (ext === '.mov') return 'video/quicktime';
  if (ext === '.mp4' || ext === '.m4v') return 'video/mp4';
  return 'application/octet-stream';
}

function failureForStatus(status: number, detail: string): FailureKind {
  if (UNAUTHORIZED_STATUSES.has(status)) return { kind: 'unauthorized' };
  if (CONTENT_INVALID_STATUSES.has(status)) return { kind: 'content_invalid', detail };
  return { kind: 'server_error', code: status, detail };
}

function isMissingFile(err: unknown) {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Uploads an artifact to the analysis service, triggers analysis and polls
 * until the service reports a terminal state.
 */
export class HttpAnalysisClient implements UploadAnalyzeOperation {
  private readonly baseUrl: string;
  private readonly apiToken: string | undefined;
  private readonly requestTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly pollMaxAttempts: number;
  private readonly title: string;
  private readonly logger: Logger;
  private readonly readArtifact: (artifactRef: string) => Promise<Buffer>;

  constructor(options: HttpAnalysisClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.apiToken = options.apiToken;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.pollMaxAttempts = options.pollMaxAttempts ?? 60;
    this.title = options.title ?? 'Swing Analysis';
    this.logger = options.logger ?? console;
    this.readArtifact = options.readArtifact ?? ((ref) => readFile(ref));
  }

  async run(artifactRef: string, token: CancellationToken, hooks: OperationHooks): Promise<OperationResult> {
    try {
      const data = await this.load(artifactRef);
      token.throwIfCancelled();

      hooks.onProgress(0);
      const form = new FormData();
      form.append('file', new Blob([data], { type: contentTypeFor(artifactRef) }), path.basename(artifactRef));
      form.append('title', this.title);
      const upload = uploadResponseSchema.parse(
        await this.request(token, '/videos/upload', { method: 'POST', body: form })
      );
      hooks.onProgress(1);

      const videoId = String(upload.video_id);
      await this.request(token, `/video-analysis/analyze/${encodeURIComponent(videoId)}`, { method: 'POST' });
      hooks.onAnalyzing();

      const payload = await this.poll(videoId, token);
      return { ok: true, payload };
    } catch (err) {
      return { ok: false, failure: this.classify(err, token) };
    }
  }

  private async load(artifactRef: string) {
    let data: Buffer;
    try {
      data = await this.readArtifact(artifactRef);
    } catch (err) {
      if (isMissingFile(err)) {
        throw new RemoteFailure({ kind: 'content_invalid', detail: `artifact not found: ${artifactRef}` });
      }
      throw err;
    }
    if (data.length === 0) {
      throw new RemoteFailure({ kind: 'content_invalid', detail: `artifact is empty: ${artifactRef}` });
    }
    return data;
  }

  private async poll(videoId: string, token: CancellationToken): Promise<AnalysisPayload> {
    for (let attempt = 1; attempt <= this.pollMaxAttempts; attempt += 1) {
      const body = analysisResponseSchema.parse(
        await this.request(token, `/video-analysis/video/${encodeURIComponent(videoId)}`, { method: 'GET' })
      );
      const analysis = body.analysis;

      if (analysis?.status === 'completed' && analysis.ai_analysis) {
        return {
          videoId,
          analysisId: String(analysis.id),
          status: analysis.status,
          analysis: analysis.ai_analysis,
        };
      }
      if (analysis?.status === 'failed') {
        throw new RemoteFailure({ kind: 'content_invalid', detail: analysis.error ?? 'analysis failed' });
      }

      if (attempt < this.pollMaxAttempts) {
        await sleep(this.pollIntervalMs, token);
        token.throwIfCancelled();
      }
    }

    this.logger.warn(`[remote] analysis of video ${videoId} not ready after ${this.pollMaxAttempts} polls`);
    throw new RemoteFailure({ kind: 'timeout' });
  }

  private async request(token: CancellationToken, route: string, init: RequestInit): Promise<unknown> {
    const deadline = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      deadline.abort();
    }, this.requestTimeoutMs);
    const signal = AbortSignal.any([deadline.signal, token.signal]);

    const headers = new Headers(init.headers);
    headers.set('Accept', 'application/json');
    if (this.apiToken) headers.set('Authorization', `Bearer ${this.apiToken}`);

    try {
      let res: Response;
      try {
        res = await fetch(`${this.baseUrl}${route}`, { ...init, headers, signal });
      } catch (err) {
        if (token.isCancelled) throw new RemoteFailure({ kind: 'cancelled' });
        if (timedOut) throw new RemoteFailure({ kind: 'timeout' });
        throw new RemoteFailure({ kind: 'network', detail: errorMessage(err) });
      }

      const text = await res.text();
      if (!res.ok) {
        throw new RemoteFailure(failureForStatus(res.status, text.slice(0, 400)));
      }
      if (text.length === 0) return {};
      try {
        return JSON.parse(text);
      } catch {
        throw new RemoteFailure({ kind: 'server_error', code: res.status, detail: 'response is not JSON' });
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private classify(err: unknown, token: CancellationToken): FailureKind {
    if (token.isCancelled) return { kind: 'cancelled' };
    if (err instanceof RemoteFailure) return err.failure;
    if (err instanceof z.ZodError) {
      return { kind: 'server_error', code: 200, detail: 'unexpected response shape' };
    }
    if (err instanceof Error && err.name === 'AbortError') return { kind: 'timeout' };
    return { kind: 'network', detail: errorMessage(err) };
  }
}
