import type { Chunk } from '../../domain/model/Chunk.js';
import type { LogSource } from '../../domain/ports/LogSource.js';
import { ConfigurationError } from '../../domain/errors/CoordinatorErrors.js';
import { ChunkSplitter } from '../../domain/services/ChunkSplitter.js';
import { scanEntryBoundaries } from '../../domain/services/scanEntryBoundaries.js';
import type { CoordinatorContext } from '../CoordinatorContext.js';

/** How finely to split a source. Give one of the two; the count wins when both are set. */
export interface AddSourceOptions {
  readonly targetChunkCount?: number;
  readonly targetChunkSizeBytes?: number;
}

export interface AddSourceResult {
  readonly sourceId: string;
  readonly sourceRef: string;
  readonly sourceLength: number;
  readonly chunks: readonly Chunk[];
}

/** Use case: scan a source for entry boundaries, split it and enqueue its chunks. */
export class AddSource {
  constructor(private readonly ctx: CoordinatorContext) {}

  async execute(source: LogSource, options: AddSourceOptions): Promise<AddSourceResult> {
    const sourceLength = await source.size();
    const boundaries = await scanEntryBoundaries(source);
    const chunkCount = this.chunkCount(sourceLength, options);

    // Everything below runs without yielding, so ids and chunks appear together.
    const sourceId = this.ctx.nextSourceId();
    const ranges = this.ctx.scheduler.split(sourceLength, boundaries, chunkCount);
    const chunks = this.ctx.scheduler.addChunks(sourceId, ranges);
    const addedAt = Date.now();
    this.ctx.sources.push({ sourceId, sourceRef: source.sourceRef, sourceLength, addedAt });
    if (chunks.length > 0) this.ctx.completionAnnounced = false;

    this.ctx.eventBus.emit({
      type: 'source:split',
      sourceId,
      sourceRef: source.sourceRef,
      sourceLength,
      chunkCount: chunks.length,
      timestamp: addedAt,
    });

    await this.ctx.persist();
    return { sourceId, sourceRef: source.sourceRef, sourceLength, chunks };
  }

  private chunkCount(sourceLength: number, options: AddSourceOptions): number {
    if (options.targetChunkCount !== undefined) return options.targetChunkCount;
    if (options.targetChunkSizeBytes !== undefined) {
      return ChunkSplitter.chunkCountForSize(sourceLength, options.targetChunkSizeBytes);
    }
    throw new ConfigurationError('Either targetChunkCount or targetChunkSizeBytes is required');
  }
}
