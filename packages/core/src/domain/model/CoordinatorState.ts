import type { Chunk } from './Chunk.js';
import type { WorkerRecord } from './Worker.js';

/** A source registered with the coordinator. */
export interface SourceDescriptor {
  /** `source-<n>`. */
  readonly sourceId: string;
  readonly sourceRef: string;
  readonly sourceLength: number;
  readonly addedAt: number;
}

/** Serialisable snapshot of the coordinator ledger (for persistence via StateStore). */
export interface CoordinatorState {
  readonly id: string;
  readonly windowSizeMs: number;
  readonly maxAttempts: number;
  readonly sources: readonly SourceDescriptor[];
  readonly chunks: readonly Chunk[];
  readonly workers: readonly WorkerRecord[];
  /** Next attempt token to issue. Tokens never repeat across restarts. */
  readonly nextAttemptToken: number;
  readonly startedAt: number;
  readonly updatedAt: number;
}
