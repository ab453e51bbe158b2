import type { ChunkStatus } from './ChunkStatus.js';

/** Half-open byte range `[start, end)` into a log source. */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

/** A contiguous byte range of a log source, processed as one unit of work. */
export interface Chunk extends ByteRange {
  /** `<sourceId>/<index>`. */
  readonly chunkId: string;
  readonly sourceId: string;
  /** Zero-based position of the chunk within its source. */
  readonly index: number;
  readonly status: ChunkStatus;
  /** Worker currently holding the chunk, `null` unless `ASSIGNED` or `PROCESSING`. */
  readonly workerId: string | null;
  /** Number of attempts that ended in failure or reclaim. */
  readonly attemptCount: number;
  /**
   * Token of the current assignment. `null` while the chunk is waiting in the pending pool,
   * so a token from an abandoned attempt can never match.
   */
  readonly attemptToken: number | null;
  /** Epoch ms of the current assignment. */
  readonly assignedAt: number | null;
  /** Reason recorded by the last failed or reclaimed attempt. */
  readonly lastError?: string;
}

/** Create a chunk in `PENDING` status. */
export function createPendingChunk(sourceId: string, index: number, range: ByteRange): Chunk {
  return {
    chunkId: `${sourceId}/${String(index)}`,
    sourceId,
    index,
    start: range.start,
    end: range.end,
    status: 'PENDING',
    workerId: null,
    attemptCount: 0,
    attemptToken: null,
    assignedAt: null,
  };
}

/** Transition a chunk to `ASSIGNED` under a freshly issued attempt token. */
export function markChunkAssigned(chunk: Chunk, workerId: string, attemptToken: number, now: number): Chunk {
  return { ...chunk, status: 'ASSIGNED', workerId, attemptToken, assignedAt: now };
}

/** Transition a chunk to `PROCESSING`. */
export function markChunkProcessing(chunk: Chunk): Chunk {
  return { ...chunk, status: 'PROCESSING' };
}

/** Transition a chunk to `COMPLETED`. The token and worker are kept for auditing. */
export function markChunkCompleted(chunk: Chunk): Chunk {
  return { ...chunk, status: 'COMPLETED' };
}

/**
 * Record a failed attempt: back to `PENDING`, or `FAILED` once `maxAttempts` attempts have failed.
 * The attempt token is cleared either way.
 */
export function markChunkAttemptFailed(chunk: Chunk, maxAttempts: number, error: string): Chunk {
  const attemptCount = chunk.attemptCount + 1;
  return {
    ...chunk,
    status: attemptCount >= maxAttempts ? 'FAILED' : 'PENDING',
    workerId: null,
    attemptCount,
    attemptToken: null,
    assignedAt: null,
    lastError: error,
  };
}

/** Byte length of a range. */
export function rangeLength(range: ByteRange): number {
  return range.end - range.start;
}

/**
 * Put a chunk back in the pending pool without counting an attempt, e.g. when a
 * restored coordinator has lost the metrics of a completed chunk.
 */
export function markChunkRequeued(chunk: Chunk): Chunk {
  return { ...chunk, status: 'PENDING', workerId: null, attemptToken: null, assignedAt: null };
}
