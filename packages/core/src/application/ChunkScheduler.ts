import type { ByteRange, Chunk } from '../domain/model/Chunk.js';
import {
  createPendingChunk,
  markChunkAssigned,
  markChunkAttemptFailed,
  markChunkCompleted,
  markChunkProcessing,
} from '../domain/model/Chunk.js';
import { ChunkStatus, canTransitionChunk, isInFlight, isTerminal } from '../domain/model/ChunkStatus.js';
import type { ChunkProgress } from '../domain/model/Metrics.js';
import type { AssignmentPolicy } from '../domain/ports/AssignmentPolicy.js';
import { InvalidTransitionError, UnknownWorkerError } from '../domain/errors/CoordinatorErrors.js';
import { isAssignable } from '../domain/model/WorkerStatus.js';
import { ChunkSplitter } from '../domain/services/ChunkSplitter.js';
import type { EventBus } from './EventBus.js';
import type { WorkerRegistry } from './WorkerRegistry.js';

/** Why a token-checked transition was not applied. */
export type TransitionRejection = 'UNKNOWN_CHUNK' | 'STALE_TOKEN' | 'TERMINAL' | 'ALREADY_PROCESSING';

/** Result of a token-checked transition. A rejection is a normal outcome, not an error. */
export type TransitionOutcome =
  | { readonly applied: true; readonly chunk: Chunk }
  | { readonly applied: false; readonly reason: TransitionRejection };

export interface ChunkSchedulerOptions {
  /** A chunk is `FAILED` once this many attempts have failed. */
  readonly maxAttempts: number;
  /** Upper bound on chunks a worker holds at once. */
  readonly maxChunksPerWorker: number;
  readonly policy: AssignmentPolicy;
}

/**
 * Owns the chunk table and its state machine.
 *
 * Assignment, marks and reclaim are synchronous and therefore atomic with respect to
 * each other. Every transition out of `ASSIGNED`/`PROCESSING` is keyed on the attempt
 * token, so the first of two racing messages wins and the other finds a stale token.
 */
export class ChunkScheduler {
  private readonly chunks = new Map<string, Chunk>();
  private readonly splitter = new ChunkSplitter();
  private nextToken = 1;

  constructor(
    private readonly registry: WorkerRegistry,
    private readonly eventBus: EventBus,
    private readonly options: ChunkSchedulerOptions,
  ) {}

  /** Cut `[0, sourceLength)` into ranges that start on entry boundaries. */
  split(sourceLength: number, entryBoundaries: readonly number[], targetChunkCount: number): ByteRange[] {
    return this.splitter.split(sourceLength, entryBoundaries, targetChunkCount);
  }

  /** Enqueue `PENDING` chunks for the ranges of one source. */
  addChunks(sourceId: string, ranges: readonly ByteRange[]): readonly Chunk[] {
    const created = ranges.map((range, index) => createPendingChunk(sourceId, index, range));
    for (const chunk of created) {
      if (this.chunks.has(chunk.chunkId)) {
        throw new Error(`Chunk '${chunk.chunkId}' already exists`);
      }
    }
    for (const chunk of created) {
      this.chunks.set(chunk.chunkId, chunk);
    }
    return created;
  }

  /**
   * Hand one pending chunk to a worker under a fresh attempt token.
   *
   * Returns `null` when nothing is pending, the worker may not take work (suspected,
   * dead) or it already holds `maxChunksPerWorker` chunks.
   *
   * @throws UnknownWorkerError
   */
  assign(workerId: string, now: number = Date.now()): Chunk | null {
    const worker = this.registry.get(workerId);
    if (!worker) throw new UnknownWorkerError(workerId);
    if (!isAssignable(worker.status)) return null;
    if (worker.assignedChunkIds.length >= this.options.maxChunksPerWorker) return null;

    const selected = this.options.policy.selectChunk(this.pending());
    if (!selected) return null;
    if (selected.status !== ChunkStatus.PENDING) {
      throw new InvalidTransitionError('chunk', selected.status, ChunkStatus.ASSIGNED);
    }

    const token = this.nextToken++;
    const assigned = markChunkAssigned(selected, workerId, token, now);
    this.chunks.set(assigned.chunkId, assigned);
    this.registry.attachChunk(workerId, assigned.chunkId);

    this.eventBus.emit({
      type: 'chunk:assigned',
      chunkId: assigned.chunkId,
      workerId,
      attemptToken: token,
      attempt: assigned.attemptCount + 1,
      timestamp: now,
    });
    return assigned;
  }

  /** The worker reports it started on the chunk. */
  markProcessing(chunkId: string, attemptToken: number): TransitionOutcome {
    const checked = this.check(chunkId, attemptToken);
    if (!checked.applied) return checked;
    if (checked.chunk.status === ChunkStatus.PROCESSING) {
      return { applied: false, reason: 'ALREADY_PROCESSING' };
    }

    const processing = markChunkProcessing(checked.chunk);
    this.chunks.set(chunkId, processing);
    this.eventBus.emit({
      type: 'chunk:started',
      chunkId,
      workerId: processing.workerId ?? '',
      attemptToken,
      timestamp: Date.now(),
    });
    return { applied: true, chunk: processing };
  }

  /** Terminal success. Callers merge the chunk's metrics in the same synchronous step. */
  markCompleted(chunkId: string, attemptToken: number): TransitionOutcome {
    const checked = this.check(chunkId, attemptToken);
    if (!checked.applied) return checked;

    const completed = markChunkCompleted(checked.chunk);
    this.chunks.set(chunkId, completed);
    this.release(checked.chunk);
    this.eventBus.emit({
      type: 'chunk:completed',
      chunkId,
      workerId: completed.workerId ?? '',
      attemptToken,
      timestamp: Date.now(),
    });
    return { applied: true, chunk: completed };
  }

  /** Failed attempt: requeue with `attemptCount + 1`, or `FAILED` once attempts run out. */
  markFailed(chunkId: string, attemptToken: number, reason: string): TransitionOutcome {
    const checked = this.check(chunkId, attemptToken);
    if (!checked.applied) return checked;
    return { applied: true, chunk: this.failAttempt(checked.chunk, reason) };
  }

  /**
   * Take chunks back from a worker that is gone. Chunks no longer in flight are skipped.
   * Returns the chunks after the transition.
   */
  reclaim(chunkIds: readonly string[], reason: string): readonly Chunk[] {
    const reclaimed: Chunk[] = [];
    for (const chunkId of chunkIds) {
      const chunk = this.chunks.get(chunkId);
      if (!chunk || !isInFlight(chunk.status)) continue;
      reclaimed.push(this.failAttempt(chunk, reason));
    }
    return reclaimed;
  }

  get(chunkId: string): Chunk | undefined {
    return this.chunks.get(chunkId);
  }

  /** All chunks in creation order. */
  list(): readonly Chunk[] {
    return [...this.chunks.values()];
  }

  /** The pending pool, in creation order. */
  pending(): readonly Chunk[] {
    return this.list().filter((chunk) => chunk.status === ChunkStatus.PENDING);
  }

  /** Permanently failed chunks. */
  failed(): readonly Chunk[] {
    return this.list().filter((chunk) => chunk.status === ChunkStatus.FAILED);
  }

  progress(): ChunkProgress {
    let pending = 0;
    let inFlight = 0;
    let completed = 0;
    let failed = 0;
    for (const chunk of this.chunks.values()) {
      if (chunk.status === ChunkStatus.PENDING) pending++;
      else if (isInFlight(chunk.status)) inFlight++;
      else if (chunk.status === ChunkStatus.COMPLETED) completed++;
      else failed++;
    }
    return { total: this.chunks.size, pending, inFlight, completed, failed };
  }

  /** `true` when there is at least one chunk and every chunk is terminal. */
  isComplete(): boolean {
    if (this.chunks.size === 0) return false;
    for (const chunk of this.chunks.values()) {
      if (!isTerminal(chunk.status)) return false;
    }
    return true;
  }

  /** Next token to be issued (persisted so tokens never repeat across restarts). */
  get nextAttemptToken(): number {
    return this.nextToken;
  }

  /** Replace the table with persisted chunks. */
  restore(chunks: readonly Chunk[], nextAttemptToken: number): void {
    this.chunks.clear();
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, chunk);
    }
    this.nextToken = nextAttemptToken;
  }

  private check(chunkId: string, attemptToken: number): TransitionOutcome {
    const chunk = this.chunks.get(chunkId);
    if (!chunk) return { applied: false, reason: 'UNKNOWN_CHUNK' };
    if (isTerminal(chunk.status)) return { applied: false, reason: 'TERMINAL' };
    if (chunk.attemptToken !== attemptToken) return { applied: false, reason: 'STALE_TOKEN' };
    return { applied: true, chunk };
  }

  private failAttempt(chunk: Chunk, reason: string): Chunk {
    const next = markChunkAttemptFailed(chunk, this.options.maxAttempts, reason);
    if (!canTransitionChunk(chunk.status, next.status)) {
      throw new InvalidTransitionError('chunk', chunk.status, next.status);
    }
    this.chunks.set(chunk.chunkId, next);
    this.release(chunk);

    const timestamp = Date.now();
    if (next.status === ChunkStatus.FAILED) {
      this.eventBus.emit({
        type: 'chunk:exhausted',
        chunkId: next.chunkId,
        start: next.start,
        end: next.end,
        attemptCount: next.attemptCount,
        reason,
        timestamp,
      });
    } else {
      this.eventBus.emit({
        type: 'chunk:requeued',
        chunkId: next.chunkId,
        attemptCount: next.attemptCount,
        maxAttempts: this.options.maxAttempts,
        reason,
        timestamp,
      });
    }
    return next;
  }

  private release(chunk: Chunk): void {
    if (chunk.workerId !== null) {
      this.registry.detachChunk(chunk.workerId, chunk.chunkId);
    }
  }
}
