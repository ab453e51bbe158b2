/** AssignChunk message sent from the coordinator to a worker. */
export interface ChunkAssignment {
  readonly chunkId: string;
  readonly attemptToken: number;
  readonly sourceId: string;
  readonly sourceRef: string;
  readonly start: number;
  readonly end: number;
  /** Window width the worker must bucket its metrics with. */
  readonly windowSizeMs: number;
  readonly workerId: string;
  /** Address of the worker the assignment is meant for. */
  readonly workerAddress: string;
}

/**
 * Port for delivering assignments to workers.
 *
 * Fire-and-forget: resolving means the worker accepted the message, not that the
 * chunk was processed. The result arrives later through SubmitResult. A rejection
 * counts as a failed attempt for the assignment's token.
 */
export interface ChunkDispatcher {
  dispatch(assignment: ChunkAssignment): Promise<void>;
}
