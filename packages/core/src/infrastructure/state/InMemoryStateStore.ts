import type { StateStore } from '../../domain/ports/StateStore.js';
import type { CoordinatorState } from '../../domain/model/CoordinatorState.js';

/** Non-persistent in-memory state store. Used as the default when no custom StateStore is provided. */
export class InMemoryStateStore implements StateStore {
  private states = new Map<string, CoordinatorState>();

  saveState(state: CoordinatorState): Promise<void> {
    this.states.set(state.id, state);
    return Promise.resolve();
  }

  getState(coordinatorId: string): Promise<CoordinatorState | null> {
    return Promise.resolve(this.states.get(coordinatorId) ?? null);
  }
}
