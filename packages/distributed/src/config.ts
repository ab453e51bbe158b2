import { ConfigurationError } from '@logfleet/core';

/** Environment variables as read from `process.env` (after `dotenv`). */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Coordinator process settings. */
export interface CoordinatorSettings {
  readonly host: string;
  readonly port: number;
  readonly suspectTimeoutMs: number;
  readonly deadTimeoutMs: number;
  readonly sweepIntervalMs: number;
  readonly maxAttempts: number;
  readonly windowSizeMs: number;
  /** Timeout for each assignment pushed to a worker. */
  readonly requestTimeoutMs: number;
  /** Chunks per source. Takes precedence over `chunkSizeBytes`. */
  readonly chunkCount?: number;
  readonly chunkSizeBytes?: number;
}

/** Worker process settings. */
export interface WorkerSettings {
  readonly workerId?: string;
  readonly host: string;
  readonly port: number;
  readonly coordinatorUrl: string;
  readonly heartbeatIntervalMs: number;
  readonly requestTimeoutMs: number;
}

/** Chunk size used when neither a chunk count nor a chunk size is configured. */
export const DEFAULT_CHUNK_SIZE_BYTES = 1024 * 1024;

function raw(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function optionalInteger(env: Environment, name: string): number | undefined {
  const value = raw(env, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) <= 0 || !Number.isSafeInteger(Number(value))) {
    throw new ConfigurationError(`${name} must be a positive integer, got '${value}'`);
  }
  return Number(value);
}

function integer(env: Environment, name: string, fallback: number): number {
  return optionalInteger(env, name) ?? fallback;
}

function port(env: Environment, name: string, fallback: number): number {
  const value = raw(env, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed > 65535) {
    throw new ConfigurationError(`${name} must be a port number, got '${value}'`);
  }
  return parsed;
}

function url(env: Environment, name: string, fallback: string): string {
  const value = raw(env, name) ?? fallback;
  if (!URL.canParse(value)) {
    throw new ConfigurationError(`${name} must be a URL, got '${value}'`);
  }
  return value;
}

/**
 * Read coordinator settings from the environment.
 *
 * @throws ConfigurationError for non-numeric or non-positive values, or when the
 *   suspect timeout is not lower than the dead timeout.
 */
export function loadCoordinatorSettings(env: Environment): CoordinatorSettings {
  const suspectTimeoutMs = integer(env, 'LOGFLEET_SUSPECT_TIMEOUT_MS', 15_000);
  const deadTimeoutMs = integer(env, 'LOGFLEET_DEAD_TIMEOUT_MS', 30_000);
  if (suspectTimeoutMs >= deadTimeoutMs) {
    throw new ConfigurationError(
      `LOGFLEET_SUSPECT_TIMEOUT_MS (${String(suspectTimeoutMs)}) must be lower than LOGFLEET_DEAD_TIMEOUT_MS (${String(deadTimeoutMs)})`,
    );
  }

  const chunkCount = optionalInteger(env, 'LOGFLEET_CHUNK_COUNT');
  const chunkSizeBytes = optionalInteger(env, 'LOGFLEET_CHUNK_SIZE_BYTES');

  return {
    host: raw(env, 'LOGFLEET_HOST') ?? '127.0.0.1',
    port: port(env, 'LOGFLEET_PORT', 8000),
    suspectTimeoutMs,
    deadTimeoutMs,
    sweepIntervalMs: integer(env, 'LOGFLEET_SWEEP_INTERVAL_MS', 5_000),
    maxAttempts: integer(env, 'LOGFLEET_MAX_ATTEMPTS', 3),
    windowSizeMs: integer(env, 'LOGFLEET_WINDOW_SECONDS', 60) * 1000,
    requestTimeoutMs: integer(env, 'LOGFLEET_REQUEST_TIMEOUT_MS', 5_000),
    ...(chunkCount === undefined && chunkSizeBytes === undefined
      ? { chunkSizeBytes: DEFAULT_CHUNK_SIZE_BYTES }
      : { chunkCount, chunkSizeBytes }),
  };
}

/** Read worker settings from the environment. */
export function loadWorkerSettings(env: Environment): WorkerSettings {
  const workerId = raw(env, 'LOGFLEET_WORKER_ID');
  return {
    ...(workerId === undefined ? {} : { workerId }),
    host: raw(env, 'LOGFLEET_HOST') ?? '127.0.0.1',
    port: port(env, 'LOGFLEET_WORKER_PORT', 8001),
    coordinatorUrl: url(env, 'LOGFLEET_COORDINATOR_URL', 'http://127.0.0.1:8000'),
    heartbeatIntervalMs: integer(env, 'LOGFLEET_HEARTBEAT_INTERVAL_MS', 5_000),
    requestTimeoutMs: integer(env, 'LOGFLEET_REQUEST_TIMEOUT_MS', 5_000),
  };
}

/** Overlay defined values (e.g. CLI flags) on an environment. */
export function withOverrides(env: Environment, overrides: Environment): Environment {
  const merged: Record<string, string | undefined> = { ...env };
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[name] = value;
  }
  return merged;
}
