import type { SourceDescriptor } from '../../domain/model/CoordinatorState.js';
import type { ChunkProgress } from '../../domain/model/Metrics.js';
import type { WorkerStatus } from '../../domain/model/WorkerStatus.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

export interface WorkerSummary {
  readonly workerId: string;
  readonly address: string;
  readonly generation: number;
  readonly status: WorkerStatus;
  readonly lastHeartbeatAt: number;
  readonly inFlightChunkIds: readonly string[];
}

/** Result of querying coordinator status. */
export interface CoordinatorStatus {
  readonly coordinatorId: string;
  readonly startedAt: number;
  readonly progress: ChunkProgress;
  /** `true` once there are chunks and every one of them is terminal. */
  readonly complete: boolean;
  readonly sources: readonly SourceDescriptor[];
  readonly workers: readonly WorkerSummary[];
}

/** Use case: chunk counts and per-worker summaries. */
export class GetCoordinatorStatus {
  constructor(private readonly ctx: CoordinatorContext) {}

  execute(): CoordinatorStatus {
    return {
      coordinatorId: this.ctx.coordinatorId,
      startedAt: this.ctx.startedAt,
      progress: this.ctx.scheduler.progress(),
      complete: this.ctx.scheduler.isComplete(),
      sources: [...this.ctx.sources],
      workers: this.ctx.registry.list().map((worker) => ({
        workerId: worker.workerId,
        address: worker.address,
        generation: worker.generation,
        status: worker.status,
        lastHeartbeatAt: worker.lastHeartbeatAt,
        inFlightChunkIds: worker.assignedChunkIds,
      })),
    };
  }
}
