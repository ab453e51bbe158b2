import type { ChunkAssignment, ChunkDispatcher } from '../../domain/ports/ChunkDispatcher.js';
import { ChunkStatus } from '../../domain/model/ChunkStatus.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';
import { toAssignment } from './AssignChunk.js';

export interface DispatchPassResult {
  readonly assignments: readonly ChunkAssignment[];
  /** Chunks a failed delivery sent back to `PENDING`. */
  readonly requeuedChunkIds: readonly string[];
}

/**
 * Use case: pair pending chunks with assignable workers and push the assignments.
 *
 * Workers are served one chunk per round, in the order the assignment policy gives,
 * until no worker can take another chunk or nothing is pending. Assignment happens
 * before the first delivery is awaited. An undeliverable assignment counts as a failed
 * attempt and the worker is suspected until it heartbeats again.
 */
export class DispatchPending {
  constructor(private readonly ctx: CoordinatorContext) {}

  async execute(): Promise<DispatchPassResult> {
    const dispatcher = this.ctx.settings.dispatcher;
    if (!dispatcher) return { assignments: [], requeuedChunkIds: [] };

    const assignments = this.assignAll();
    if (assignments.length === 0) return { assignments, requeuedChunkIds: [] };

    await this.ctx.persist();
    const delivered = await Promise.all(assignments.map((assignment) => this.deliver(dispatcher, assignment)));
    const requeuedChunkIds = assignments
      .filter((_, i) => delivered[i] === false)
      .map((assignment) => assignment.chunkId)
      .filter((chunkId) => this.ctx.scheduler.get(chunkId)?.status === ChunkStatus.PENDING);
    return { assignments, requeuedChunkIds };
  }

  private assignAll(): ChunkAssignment[] {
    const assignments: ChunkAssignment[] = [];
    const { registry, scheduler, settings } = this.ctx;

    let assignedInRound = true;
    while (assignedInRound && scheduler.pending().length > 0) {
      assignedInRound = false;
      for (const worker of settings.assignmentPolicy.orderWorkers(registry.assignable())) {
        const chunk = scheduler.assign(worker.workerId);
        if (!chunk) continue;
        assignments.push(toAssignment(this.ctx, chunk, worker.workerId));
        assignedInRound = true;
      }
    }
    return assignments;
  }

  /** `false` when the delivery failed. */
  private async deliver(dispatcher: ChunkDispatcher, assignment: ChunkAssignment): Promise<boolean> {
    try {
      await dispatcher.dispatch(assignment);
      return true;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.ctx.eventBus.emit({
        type: 'dispatch:failed',
        chunkId: assignment.chunkId,
        workerId: assignment.workerId,
        attemptToken: assignment.attemptToken,
        error: message,
        timestamp: Date.now(),
      });
      const outcome = this.ctx.scheduler.markFailed(
        assignment.chunkId,
        assignment.attemptToken,
        `dispatch failed: ${message}`,
      );
      if (!outcome.applied) return false;
      this.ctx.registry.suspect(assignment.workerId);
      this.ctx.checkCompletion();
      await this.ctx.persist();
      return false;
    }
  }
}
