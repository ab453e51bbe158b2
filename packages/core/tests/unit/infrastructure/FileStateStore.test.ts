import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateStore } from '../../../src/infrastructure/state/FileStateStore.js';
import { sampleState } from '../../fixtures.js';

describe('FileStateStore', () => {
  let directory: string;
  let store: FileStateStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'logfleet-state-'));
    store = new FileStateStore({ directory: join(directory, 'state') });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write one JSON file per coordinator', async () => {
    const state = sampleState();
    await store.saveState(state);

    expect(await readdir(join(directory, 'state'))).toEqual(['coord-test.json']);
    expect(await store.getState('coord-test')).toEqual(state);
  });

  it('should return null when no snapshot exists', async () => {
    expect(await store.getState('coord-test')).toBeNull();
  });

  it('should overwrite the previous snapshot', async () => {
    await store.saveState(sampleState());
    await store.saveState(sampleState({ nextAttemptToken: 42 }));

    expect((await store.getState('coord-test'))?.nextAttemptToken).toBe(42);
  });

  it('should surface a corrupt snapshot', async () => {
    await mkdir(join(directory, 'state'), { recursive: true });
    await writeFile(join(directory, 'state', 'coord-test.json'), '{ not json', 'utf-8');

    await expect(store.getState('coord-test')).rejects.toThrow(SyntaxError);
  });
});
