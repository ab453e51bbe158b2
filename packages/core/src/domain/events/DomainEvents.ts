import type { CoverageGap } from '../model/Metrics.js';

/** Emitted when a worker registers or re-registers under a new generation. */
export interface WorkerRegisteredEvent {
  readonly type: 'worker:registered';
  readonly workerId: string;
  readonly address: string;
  readonly generation: number;
  /** Chunks taken back from a superseded generation. */
  readonly reclaimedChunkIds: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a worker misses heartbeats past the suspect timeout. */
export interface WorkerSuspectedEvent {
  readonly type: 'worker:suspected';
  readonly workerId: string;
  readonly generation: number;
  readonly silentForMs: number;
  readonly timestamp: number;
}

/** Emitted when a suspected worker heartbeats again. */
export interface WorkerRecoveredEvent {
  readonly type: 'worker:recovered';
  readonly workerId: string;
  readonly generation: number;
  readonly timestamp: number;
}

/** Emitted when a worker is declared dead. Its in-flight chunks are reclaimed in the same step. */
export interface WorkerDeadEvent {
  readonly type: 'worker:dead';
  readonly workerId: string;
  readonly generation: number;
  readonly silentForMs: number;
  readonly reclaimedChunkIds: readonly string[];
  readonly timestamp: number;
}

/** Emitted when a source has been split into chunks. */
export interface SourceSplitEvent {
  readonly type: 'source:split';
  readonly sourceId: string;
  readonly sourceRef: string;
  readonly sourceLength: number;
  readonly chunkCount: number;
  readonly timestamp: number;
}

export interface ChunkAssignedEvent {
  readonly type: 'chunk:assigned';
  readonly chunkId: string;
  readonly workerId: string;
  readonly attemptToken: number;
  /** 1-based number of this attempt. */
  readonly attempt: number;
  readonly timestamp: number;
}

export interface ChunkStartedEvent {
  readonly type: 'chunk:started';
  readonly chunkId: string;
  readonly workerId: string;
  readonly attemptToken: number;
  readonly timestamp: number;
}

export interface ChunkCompletedEvent {
  readonly type: 'chunk:completed';
  readonly chunkId: string;
  readonly workerId: string;
  readonly attemptToken: number;
  readonly timestamp: number;
}

/** Emitted when a failed or reclaimed chunk goes back to the pending pool. */
export interface ChunkRequeuedEvent {
  readonly type: 'chunk:requeued';
  readonly chunkId: string;
  readonly attemptCount: number;
  readonly maxAttempts: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when a chunk has used up its attempts and is permanently `FAILED`. */
export interface ChunkExhaustedEvent {
  readonly type: 'chunk:exhausted';
  readonly chunkId: string;
  readonly start: number;
  readonly end: number;
  readonly attemptCount: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when an assignment could not be delivered to its worker. */
export interface DispatchFailedEvent {
  readonly type: 'dispatch:failed';
  readonly chunkId: string;
  readonly workerId: string;
  readonly attemptToken: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a result submission is merged into the metrics. */
export interface ResultAcceptedEvent {
  readonly type: 'result:accepted';
  readonly chunkId: string;
  readonly attemptToken: number;
  readonly requestCount: number;
  readonly parseErrors: number;
  readonly timestamp: number;
}

/** Emitted when a result submission is dropped without effect. */
export interface ResultDiscardedEvent {
  readonly type: 'result:discarded';
  readonly chunkId: string;
  readonly attemptToken: number;
  readonly outcome: 'DUPLICATE' | 'STALE' | 'UNKNOWN_CHUNK';
  readonly timestamp: number;
}

/** Emitted when a result submission failed validation; the attempt counts as failed. */
export interface ResultRejectedEvent {
  readonly type: 'result:rejected';
  readonly chunkId: string;
  readonly attemptToken: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Final summary emitted with `analysis:completed`. */
export interface AnalysisSummary {
  readonly totalChunks: number;
  readonly completedChunks: number;
  readonly failedChunks: number;
  readonly requestCount: number;
  readonly errorCount: number;
  readonly parseErrors: number;
  readonly coverageGaps: readonly CoverageGap[];
  readonly elapsedMs: number;
}

/** Emitted once every chunk of every source has reached a terminal state. */
export interface AnalysisCompletedEvent {
  readonly type: 'analysis:completed';
  readonly coordinatorId: string;
  readonly summary: AnalysisSummary;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | WorkerRegisteredEvent
  | WorkerSuspectedEvent
  | WorkerRecoveredEvent
  | WorkerDeadEvent
  | SourceSplitEvent
  | ChunkAssignedEvent
  | ChunkStartedEvent
  | ChunkCompletedEvent
  | ChunkRequeuedEvent
  | ChunkExhaustedEvent
  | DispatchFailedEvent
  | ResultAcceptedEvent
  | ResultDiscardedEvent
  | ResultRejectedEvent
  | AnalysisCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
