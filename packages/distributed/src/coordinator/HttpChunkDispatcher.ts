import type { ChunkAssignment, ChunkDispatcher } from '@logfleet/core';

export interface HttpChunkDispatcherOptions {
  /** Default: `5000`. */
  readonly timeoutMs?: number;
}

/**
 * Pushes assignments to `POST {workerAddress}/assignments`.
 *
 * No retries: a worker that cannot take the assignment costs the chunk one attempt and
 * the coordinator reassigns it.
 */
export class HttpChunkDispatcher implements ChunkDispatcher {
  private readonly timeoutMs: number;

  constructor(options: HttpChunkDispatcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async dispatch(assignment: ChunkAssignment): Promise<void> {
    const response = await fetch(new URL('/assignments', assignment.workerAddress), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(assignment),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new Error(`Worker '${assignment.workerId}' answered ${String(response.status)}: ${text}`);
    }
  }
}
