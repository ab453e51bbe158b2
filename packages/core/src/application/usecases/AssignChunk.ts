import type { Chunk } from '../../domain/model/Chunk.js';
import type { ChunkAssignment } from '../../domain/ports/ChunkDispatcher.js';
import { UnknownWorkerError } from '../../domain/errors/CoordinatorErrors.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** Build the AssignChunk message for a freshly assigned chunk. */
export function toAssignment(ctx: CoordinatorContext, chunk: Chunk, workerId: string): ChunkAssignment {
  const worker = ctx.registry.get(workerId);
  if (!worker) throw new UnknownWorkerError(workerId);
  if (chunk.attemptToken === null) {
    throw new Error(`Chunk '${chunk.chunkId}' has no attempt token`);
  }
  const source = ctx.sources.find((s) => s.sourceId === chunk.sourceId);
  return {
    chunkId: chunk.chunkId,
    attemptToken: chunk.attemptToken,
    sourceId: chunk.sourceId,
    sourceRef: source?.sourceRef ?? chunk.sourceId,
    start: chunk.start,
    end: chunk.end,
    windowSizeMs: ctx.settings.windowSizeMs,
    workerId,
    workerAddress: worker.address,
  };
}

/** Use case: pull-style assignment of one pending chunk to the calling worker. */
export class AssignChunk {
  constructor(private readonly ctx: CoordinatorContext) {}

  async execute(workerId: string): Promise<ChunkAssignment | null> {
    const chunk = this.ctx.scheduler.assign(workerId);
    if (!chunk) return null;
    const assignment = toAssignment(this.ctx, chunk, workerId);
    await this.ctx.persist();
    return assignment;
  }
}
