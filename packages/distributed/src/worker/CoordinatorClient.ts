import type { Logger } from 'pino';
import type { PartialMetrics, Registration, RegistrationRequest, SubmissionOutcome } from '@logfleet/core';
import { withRetry } from '../retry.js';
import { isJsonObject } from '../http/requestBody.js';

export interface CoordinatorClientOptions {
  /** e.g. `http://127.0.0.1:8000`. */
  readonly baseUrl: string;
  /** Per-request timeout. Default: `5000`. */
  readonly timeoutMs?: number;
  /** Retries for transient failures (network errors, timeouts, 5xx). Default: `3`. */
  readonly maxRetries?: number;
  /** Base delay for exponential backoff. Default: `200`. */
  readonly retryDelayMs?: number;
  readonly logger?: Logger;
}

/** Reply to a started/failed report. */
export interface TransitionReply {
  readonly applied: boolean;
  readonly reason?: string;
}

/** The coordinator answered with an error status. `code` is the coordinator error code, when present. */
export class CoordinatorRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = 'CoordinatorRequestError';
  }
}

const OUTCOMES: readonly SubmissionOutcome[] = ['ACCEPTED', 'DUPLICATE', 'STALE', 'UNKNOWN_CHUNK', 'REJECTED'];

/** Network failures, timeouts and 5xx answers are worth another try; 4xx answers are not. */
export function isTransient(error: unknown): boolean {
  if (error instanceof CoordinatorRequestError) return error.status >= 500;
  if (!(error instanceof Error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError' || error instanceof TypeError;
}

function parseBody(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function malformed(path: string): Error {
  return new Error(`Malformed response from coordinator for ${path}`);
}

/** Worker-side client for the coordinator's HTTP API. */
export class CoordinatorClient {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(private readonly options: CoordinatorClientOptions) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async register(request: RegistrationRequest): Promise<Registration> {
    const path = '/workers/register';
    const body = await this.post(path, request);
    if (!isJsonObject(body) || typeof body['workerId'] !== 'string' || typeof body['generation'] !== 'number') {
      throw malformed(path);
    }
    return { workerId: body['workerId'], generation: body['generation'] };
  }

  /** @throws CoordinatorRequestError with code `STALE_GENERATION` or `UNKNOWN_WORKER` when the worker must register again. */
  async heartbeat(workerId: string, generation: number): Promise<void> {
    await this.post('/workers/heartbeat', { workerId, generation });
  }

  async reportStarted(chunkId: string, attemptToken: number): Promise<TransitionReply> {
    const path = `/chunks/${encodeURIComponent(chunkId)}/started`;
    return this.transition(path, await this.post(path, { attemptToken }));
  }

  async reportFailed(chunkId: string, attemptToken: number, error: string): Promise<TransitionReply> {
    const path = `/chunks/${encodeURIComponent(chunkId)}/failed`;
    return this.transition(path, await this.post(path, { attemptToken, error }));
  }

  async submitResult(chunkId: string, attemptToken: number, metrics: PartialMetrics): Promise<SubmissionOutcome> {
    const path = '/results';
    const body = await this.post(path, { chunkId, attemptToken, metrics });
    const outcome = isJsonObject(body) ? OUTCOMES.find((candidate) => candidate === body['outcome']) : undefined;
    if (!outcome) throw malformed(path);
    return outcome;
  }

  private transition(path: string, body: unknown): TransitionReply {
    if (!isJsonObject(body) || typeof body['applied'] !== 'boolean') throw malformed(path);
    const reason = body['reason'];
    return typeof reason === 'string' ? { applied: body['applied'], reason } : { applied: body['applied'] };
  }

  private post(path: string, payload: unknown): Promise<unknown> {
    return withRetry(() => this.send(path, payload), {
      maxRetries: this.maxRetries,
      retryDelayMs: this.retryDelayMs,
      isRetryable: isTransient,
      onRetry: (err, attempt, delayMs) => {
        this.options.logger?.warn({ err, path, attempt, delayMs }, 'Coordinator request failed, retrying');
      },
    });
  }

  private async send(path: string, payload: unknown): Promise<unknown> {
    const response = await fetch(new URL(path, this.options.baseUrl), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();
    const body = parseBody(text);

    if (!response.ok) {
      const code = isJsonObject(body) && typeof body['code'] === 'string' ? body['code'] : undefined;
      const message = isJsonObject(body) && typeof body['error'] === 'string' ? body['error'] : text;
      throw new CoordinatorRequestError(response.status, code, message);
    }
    return body;
  }
}
