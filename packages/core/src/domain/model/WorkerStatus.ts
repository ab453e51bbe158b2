/**
 * Liveness state machine for a registered worker.
 *
 * Valid transitions:
 * - `REGISTERED` → `ACTIVE` | `SUSPECTED` | `DEAD`
 * - `ACTIVE` → `SUSPECTED` | `DEAD`
 * - `SUSPECTED` → `ACTIVE` | `DEAD`
 * - `DEAD` → (terminal for the generation; re-registration starts a new one)
 */
export const WorkerStatus = {
  REGISTERED: 'REGISTERED',
  ACTIVE: 'ACTIVE',
  SUSPECTED: 'SUSPECTED',
  DEAD: 'DEAD',
} as const;

export type WorkerStatus = (typeof WorkerStatus)[keyof typeof WorkerStatus];

const VALID_TRANSITIONS: Record<WorkerStatus, readonly WorkerStatus[]> = {
  [WorkerStatus.REGISTERED]: [WorkerStatus.ACTIVE, WorkerStatus.SUSPECTED, WorkerStatus.DEAD],
  [WorkerStatus.ACTIVE]: [WorkerStatus.SUSPECTED, WorkerStatus.DEAD],
  [WorkerStatus.SUSPECTED]: [WorkerStatus.ACTIVE, WorkerStatus.DEAD],
  [WorkerStatus.DEAD]: [],
};

/** Check whether a liveness transition is valid. */
export function canTransitionWorker(from: WorkerStatus, to: WorkerStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Workers in these states are still considered alive and are swept for staleness. */
export function isLive(status: WorkerStatus): boolean {
  return status !== WorkerStatus.DEAD;
}

/** Workers in these states may receive new chunk assignments. */
export function isAssignable(status: WorkerStatus): boolean {
  return status === WorkerStatus.REGISTERED || status === WorkerStatus.ACTIVE;
}
