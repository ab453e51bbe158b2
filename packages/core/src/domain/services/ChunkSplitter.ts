import type { ByteRange } from '../model/Chunk.js';

/**
 * Domain service that partitions a source into contiguous byte ranges.
 *
 * Pure logic, no I/O. Cut points are snapped forward to the next entry boundary,
 * so every range starts at an entry and no entry straddles two ranges. The
 * ranges always cover `[0, sourceLength)` exactly; when the source has fewer
 * boundaries than requested cuts, fewer ranges are produced.
 */
export class ChunkSplitter {
  /**
   * Split `[0, sourceLength)` into at most `targetChunkCount` ranges.
   *
   * @param sourceLength - Source length in bytes.
   * @param entryBoundaries - Byte offsets at which entries start. Offsets outside
   *   `(0, sourceLength)` are ignored; order and duplicates do not matter.
   * @param targetChunkCount - Desired number of ranges (at least 1).
   */
  split(sourceLength: number, entryBoundaries: readonly number[], targetChunkCount: number): ByteRange[] {
    if (!Number.isInteger(targetChunkCount) || targetChunkCount < 1) {
      throw new Error('Target chunk count must be a positive integer');
    }
    if (!Number.isInteger(sourceLength) || sourceLength < 0) {
      throw new Error('Source length must be a non-negative integer');
    }
    if (sourceLength === 0) return [];

    const boundaries = [...new Set(entryBoundaries)]
      .filter((b) => Number.isInteger(b) && b > 0 && b < sourceLength)
      .sort((a, b) => a - b);

    const cuts: number[] = [];
    let cursor = 0;
    let previous = 0;

    for (let i = 1; i < targetChunkCount; i++) {
      const naive = Math.floor((i * sourceLength) / targetChunkCount);
      let candidate = boundaries[cursor];
      while (candidate !== undefined && (candidate < naive || candidate <= previous)) {
        cursor++;
        candidate = boundaries[cursor];
      }
      if (candidate === undefined) break;

      cuts.push(candidate);
      previous = candidate;
      cursor++;
    }

    const ranges: ByteRange[] = [];
    let start = 0;
    for (const cut of cuts) {
      ranges.push({ start, end: cut });
      start = cut;
    }
    ranges.push({ start, end: sourceLength });
    return ranges;
  }

  /** Number of chunks needed for ranges of roughly `targetChunkSizeBytes` each. */
  static chunkCountForSize(sourceLength: number, targetChunkSizeBytes: number): number {
    if (!Number.isInteger(targetChunkSizeBytes) || targetChunkSizeBytes < 1) {
      throw new Error('Target chunk size must be a positive integer');
    }
    return Math.max(1, Math.ceil(sourceLength / targetChunkSizeBytes));
  }
}
