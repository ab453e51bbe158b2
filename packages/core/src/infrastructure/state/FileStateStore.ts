import { writeFile, readFile, mkdir, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { StateStore } from '../../domain/ports/StateStore.js';
import type { CoordinatorState } from '../../domain/model/CoordinatorState.js';

export interface FileStateStoreOptions {
  /** Directory where state files are stored. Default: `'.logfleet'`. */
  readonly directory?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-based state store: one `{coordinatorId}.json` per coordinator.
 *
 * A save writes a temporary file and renames it over the previous snapshot.
 *
 * Node.js only.
 */
export class FileStateStore implements StateStore {
  private readonly directory: string;

  constructor(options?: FileStateStoreOptions) {
    this.directory = options?.directory ?? '.logfleet';
  }

  async saveState(state: CoordinatorState): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const filePath = this.stateFilePath(state.id);
    const tmpPath = `${filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tmpPath, filePath);
  }

  async getState(coordinatorId: string): Promise<CoordinatorState | null> {
    let content: string;
    try {
      content = await readFile(this.stateFilePath(coordinatorId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    return JSON.parse(content) as CoordinatorState;
  }

  private stateFilePath(coordinatorId: string): string {
    return join(this.directory, `${coordinatorId}.json`);
  }
}
