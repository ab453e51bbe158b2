import type { Chunk } from '../model/Chunk.js';
import type { WorkerRecord } from '../model/Worker.js';
import type { AssignmentPolicy } from '../ports/AssignmentPolicy.js';

function byLoad(workers: readonly WorkerRecord[]): readonly WorkerRecord[] {
  // Array.prototype.sort is stable, so ties keep registration order.
  return [...workers].sort((a, b) => a.assignedChunkIds.length - b.assignedChunkIds.length);
}

/**
 * Fresh chunks before retried ones, least-loaded workers first.
 *
 * Ties on attempt count fall back to creation order.
 */
export class LeastAttemptsPolicy implements AssignmentPolicy {
  selectChunk(pending: readonly Chunk[]): Chunk | undefined {
    let best: Chunk | undefined;
    for (const chunk of pending) {
      if (best === undefined || chunk.attemptCount < best.attemptCount) best = chunk;
    }
    return best;
  }

  orderWorkers(workers: readonly WorkerRecord[]): readonly WorkerRecord[] {
    return byLoad(workers);
  }
}

/** Chunks in creation order; workers served in rotation across dispatch passes. */
export class FifoRoundRobinPolicy implements AssignmentPolicy {
  private offset = 0;

  selectChunk(pending: readonly Chunk[]): Chunk | undefined {
    return pending[0];
  }

  orderWorkers(workers: readonly WorkerRecord[]): readonly WorkerRecord[] {
    if (workers.length === 0) return workers;
    const start = this.offset % workers.length;
    this.offset = start + 1;
    return [...workers.slice(start), ...workers.slice(0, start)];
  }
}
