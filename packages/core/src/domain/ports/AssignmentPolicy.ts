import type { Chunk } from '../model/Chunk.js';
import type { WorkerRecord } from '../model/Worker.js';

/**
 * Strategy deciding which pending chunk a worker receives and which workers are
 * served first when the coordinator pushes work.
 */
export interface AssignmentPolicy {
  /** Pick one chunk from the pending pool (given in creation order), or `undefined` to assign nothing. */
  selectChunk(pending: readonly Chunk[]): Chunk | undefined;
  /** Order assignable workers for a dispatch pass. */
  orderWorkers(workers: readonly WorkerRecord[]): readonly WorkerRecord[];
}
