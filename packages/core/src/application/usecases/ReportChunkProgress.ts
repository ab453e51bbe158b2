import type { TransitionOutcome } from '../ChunkScheduler.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** Use case: start and failure reports from the worker holding a chunk. */
export class ReportChunkProgress {
  constructor(private readonly ctx: CoordinatorContext) {}

  async started(chunkId: string, attemptToken: number): Promise<TransitionOutcome> {
    const outcome = this.ctx.scheduler.markProcessing(chunkId, attemptToken);
    if (outcome.applied) await this.ctx.persist();
    return outcome;
  }

  async failed(chunkId: string, attemptToken: number, reason: string): Promise<TransitionOutcome> {
    const outcome = this.ctx.scheduler.markFailed(chunkId, attemptToken, reason);
    if (outcome.applied) {
      this.ctx.checkCompletion();
      await this.ctx.persist();
    }
    return outcome;
  }
}
