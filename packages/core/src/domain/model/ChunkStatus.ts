/**
 * Finite state machine for a chunk of the log source.
 *
 * Valid transitions:
 * - `PENDING` → `ASSIGNED`
 * - `ASSIGNED` → `PROCESSING` | `COMPLETED` | `PENDING` | `FAILED`
 * - `PROCESSING` → `COMPLETED` | `PENDING` | `FAILED`
 * - `COMPLETED`, `FAILED` → (terminal)
 *
 * `ASSIGNED` → `COMPLETED` covers a worker whose result arrives before (or without)
 * its start report.
 */
export const ChunkStatus = {
  PENDING: 'PENDING',
  ASSIGNED: 'ASSIGNED',
  PROCESSING: 'PROCESSING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type ChunkStatus = (typeof ChunkStatus)[keyof typeof ChunkStatus];

const VALID_TRANSITIONS: Record<ChunkStatus, readonly ChunkStatus[]> = {
  [ChunkStatus.PENDING]: [ChunkStatus.ASSIGNED],
  [ChunkStatus.ASSIGNED]: [ChunkStatus.PROCESSING, ChunkStatus.COMPLETED, ChunkStatus.PENDING, ChunkStatus.FAILED],
  [ChunkStatus.PROCESSING]: [ChunkStatus.COMPLETED, ChunkStatus.PENDING, ChunkStatus.FAILED],
  [ChunkStatus.COMPLETED]: [],
  [ChunkStatus.FAILED]: [],
};

/** Check whether a chunk state transition is valid. */
export function canTransitionChunk(from: ChunkStatus, to: ChunkStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** `true` for `COMPLETED` and `FAILED`. */
export function isTerminal(status: ChunkStatus): boolean {
  return status === ChunkStatus.COMPLETED || status === ChunkStatus.FAILED;
}

/** `true` while a worker holds the chunk (`ASSIGNED` or `PROCESSING`). */
export function isInFlight(status: ChunkStatus): boolean {
  return status === ChunkStatus.ASSIGNED || status === ChunkStatus.PROCESSING;
}
