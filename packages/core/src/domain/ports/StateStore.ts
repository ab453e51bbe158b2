import type { CoordinatorState } from '../model/CoordinatorState.js';

/**
 * Port for persisting the coordinator's ledger (sources, chunks, workers).
 *
 * Metrics are never persisted; see `Coordinator.restore()` for how a restored
 * ledger is reconciled with the empty window table.
 */
export interface StateStore {
  /** Persist the full ledger snapshot, replacing any earlier snapshot for the same coordinator. */
  saveState(state: CoordinatorState): Promise<void>;
  /** Retrieve the last snapshot, or `null` when none exists. */
  getState(coordinatorId: string): Promise<CoordinatorState | null>;
}
