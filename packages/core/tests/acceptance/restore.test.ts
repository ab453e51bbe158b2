import { describe, it, expect } from 'vitest';
import { Coordinator } from '../../src/Coordinator.js';
import { processChunk } from '../../src/application/usecases/ProcessChunk.js';
import { BufferLogSource } from '../../src/infrastructure/sources/BufferLogSource.js';
import { InMemoryStateStore } from '../../src/infrastructure/state/InMemoryStateStore.js';
import type { StateStore } from '../../src/domain/ports/StateStore.js';
import type { CoordinatorState } from '../../src/domain/model/CoordinatorState.js';
import { T0, silentLogger, standardLine } from '../fixtures.js';

const log = `${[0, 1, 2, 3].map((i) => standardLine(T0 + i * 1_000, 'INFO', 7)).join('\n')}\n`;

describe('ledger persistence', () => {
  it('should save the ledger after every state change', async () => {
    const stateStore = new InMemoryStateStore();
    const coordinator = new Coordinator({ coordinatorId: 'coord-p', stateStore, logger: silentLogger() });

    await coordinator.addSource(new BufferLogSource(log), { targetChunkCount: 2 });
    await coordinator.register({ workerId: 'w1', address: 'http://w1' });
    await coordinator.assignChunk('w1');
    await coordinator.idle();

    const saved = await stateStore.getState('coord-p');
    expect(saved?.sources).toEqual([expect.objectContaining({ sourceId: 'source-1', sourceLength: log.length })]);
    expect(saved?.chunks.map((chunk) => chunk.status)).toEqual(['ASSIGNED', 'PENDING']);
    expect(saved?.workers.map((worker) => worker.assignedChunkIds)).toEqual([['source-1/0']]);
    expect(saved?.nextAttemptToken).toBe(2);
  });

  it('should reject the call whose save failed and keep saving afterwards', async () => {
    const saved: CoordinatorState[] = [];
    let failNext = true;
    const stateStore: StateStore = {
      saveState: (state) => {
        if (failNext) {
          failNext = false;
          return Promise.reject(new Error('disk full'));
        }
        saved.push(state);
        return Promise.resolve();
      },
      getState: () => Promise.resolve(null),
    };
    const coordinator = new Coordinator({ stateStore, logger: silentLogger() });

    await expect(coordinator.addSource(new BufferLogSource(log), { targetChunkCount: 2 })).rejects.toThrow(
      'disk full',
    );
    await coordinator.register({ workerId: 'w1', address: 'http://w1' });

    expect(saved).toHaveLength(1);
    expect(saved[0]?.chunks).toHaveLength(2);
  });
});

describe('Coordinator.restore', () => {
  it('should requeue every unfinished chunk and retire every worker', async () => {
    const stateStore = new InMemoryStateStore();
    const source = new BufferLogSource(log);
    const first = new Coordinator({ coordinatorId: 'coord-r', stateStore, logger: silentLogger() });
    await first.addSource(source, { targetChunkCount: 2 });
    await first.register({ workerId: 'w1', address: 'http://w1' });
    const done = await first.assignChunk('w1');
    if (!done) throw new Error('expected an assignment');
    await first.submitResult(done.chunkId, done.attemptToken, await processChunk(source, done));
    const inFlight = await first.assignChunk('w1');
    if (!inFlight) throw new Error('expected an assignment');
    await first.idle();

    const restored = await Coordinator.restore('coord-r', { stateStore, logger: silentLogger() });
    if (!restored) throw new Error('expected a restored coordinator');

    const status = restored.getStatus();
    expect(status.coordinatorId).toBe('coord-r');
    expect(status.progress).toEqual({ total: 2, pending: 2, inFlight: 0, completed: 0, failed: 0 });
    expect(status.workers).toEqual([
      expect.objectContaining({ workerId: 'w1', generation: 1, status: 'DEAD', inFlightChunkIds: [] }),
    ]);
    expect(restored.queryMetrics().totals.requestCount).toBe(0);
    expect((await stateStore.getState('coord-r'))?.workers[0]?.status).toBe('DEAD');

    expect(await restored.register({ workerId: 'w1', address: 'http://w1' })).toEqual({
      workerId: 'w1',
      generation: 2,
    });
    const again = await restored.assignChunk('w1');
    expect(again).toMatchObject({ chunkId: 'source-1/0', attemptToken: 3 });

    expect(await restored.submitResult(inFlight.chunkId, inFlight.attemptToken, await processChunk(source, inFlight))).toBe(
      'STALE',
    );
  });

  it('should return null when nothing was saved', async () => {
    expect(await Coordinator.restore('missing', { stateStore: new InMemoryStateStore(), logger: silentLogger() })).toBeNull();
  });
});
