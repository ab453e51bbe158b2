import { describe, it, expect, vi } from 'vitest';
import { ResultAggregator } from '../../../src/application/ResultAggregator.js';
import { ChunkScheduler } from '../../../src/application/ChunkScheduler.js';
import { WorkerRegistry } from '../../../src/application/WorkerRegistry.js';
import { EventBus } from '../../../src/application/EventBus.js';
import { LeastAttemptsPolicy } from '../../../src/domain/services/AssignmentPolicies.js';
import { MetricsAggregationEngine } from '../../../src/domain/services/MetricsAggregationEngine.js';
import { T0, partialFor } from '../../fixtures.js';

function setup() {
  const bus = new EventBus();
  const events = vi.fn();
  bus.onAny(events);
  const registry = new WorkerRegistry(bus);
  const scheduler = new ChunkScheduler(registry, bus, {
    maxAttempts: 3,
    maxChunksPerWorker: 1,
    policy: new LeastAttemptsPolicy(),
  });
  const engine = new MetricsAggregationEngine(60_000);
  const aggregator = new ResultAggregator(scheduler, engine, bus);
  registry.register({ workerId: 'w1', address: 'http://w1' }, 0);
  registry.register({ workerId: 'w2', address: 'http://w2' }, 0);
  scheduler.addChunks('source-1', [
    { start: 0, end: 10 },
    { start: 10, end: 20 },
  ]);
  const assigned = scheduler.assign('w1');
  if (!assigned || assigned.attemptToken === null) throw new Error('expected an assignment');
  return { events, registry, scheduler, engine, aggregator, chunkId: assigned.chunkId, token: assigned.attemptToken };
}

describe('ResultAggregator', () => {
  it('should merge the metrics and complete the chunk', () => {
    const { aggregator, scheduler, engine, events, chunkId, token } = setup();

    expect(aggregator.submit(chunkId, token, partialFor(T0, 5, 1))).toBe('ACCEPTED');

    expect(scheduler.get(chunkId)?.status).toBe('COMPLETED');
    expect(engine.totals()).toEqual({ requestCount: 5, errorCount: 1, errorRate: 0.2 });
    expect(events).toHaveBeenLastCalledWith({
      type: 'result:accepted',
      chunkId,
      attemptToken: token,
      requestCount: 5,
      parseErrors: 0,
      timestamp: expect.any(Number),
    });
  });

  it('should treat a retransmission as a duplicate', () => {
    const { aggregator, engine, chunkId, token } = setup();
    aggregator.submit(chunkId, token, partialFor(T0, 5, 1));

    expect(aggregator.submit(chunkId, token, partialFor(T0, 5, 1))).toBe('DUPLICATE');
    expect(engine.totals().requestCount).toBe(5);
  });

  it('should discard a stale token without touching chunk or metrics', () => {
    const { aggregator, scheduler, engine, chunkId, token } = setup();

    expect(aggregator.submit(chunkId, token + 1, partialFor(T0, 5, 1))).toBe('STALE');
    expect(scheduler.get(chunkId)?.status).toBe('ASSIGNED');
    expect(engine.snapshot()).toEqual([]);
  });

  it('should discard a straggler from a reclaimed attempt after the new attempt completed', () => {
    const { aggregator, registry, scheduler, engine, chunkId, token } = setup();
    registry.register({ workerId: 'w3', address: 'http://w3' }, 0);
    scheduler.assign('w2');
    scheduler.reclaim([chunkId], 'worker w1 declared dead');
    const retry = scheduler.assign('w3');
    if (!retry || retry.attemptToken === null) throw new Error('expected a reassignment');

    expect(retry.chunkId).toBe(chunkId);
    expect(aggregator.submit(chunkId, retry.attemptToken, partialFor(T0, 3, 0))).toBe('ACCEPTED');
    expect(aggregator.submit(chunkId, token, partialFor(T0, 5, 1))).toBe('STALE');
    expect(engine.totals()).toEqual({ requestCount: 3, errorCount: 0, errorRate: 0 });
  });

  it('should report unknown chunks', () => {
    const { aggregator, events } = setup();

    expect(aggregator.submit('source-7/0', 1, partialFor(T0, 1, 0))).toBe('UNKNOWN_CHUNK');
    expect(events).toHaveBeenLastCalledWith({
      type: 'result:discarded',
      chunkId: 'source-7/0',
      attemptToken: 1,
      outcome: 'UNKNOWN_CHUNK',
      timestamp: expect.any(Number),
    });
  });

  it('should reject an inconsistent payload and fail the attempt', () => {
    const { aggregator, scheduler, engine, chunkId, token } = setup();

    expect(aggregator.submit(chunkId, token, partialFor(T0, 1, 4))).toBe('REJECTED');

    expect(scheduler.get(chunkId)).toMatchObject({ status: 'PENDING', attemptCount: 1 });
    expect(engine.snapshot()).toEqual([]);
  });

  it('should fail the attempt for an undecodable payload with a current token', () => {
    const { aggregator, scheduler, chunkId, token } = setup();

    expect(aggregator.reject(chunkId, token, 'metrics must be an object')).toBe('REJECTED');
    expect(scheduler.get(chunkId)).toMatchObject({ status: 'PENDING', lastError: 'metrics must be an object' });
  });

  it('should discard an undecodable payload with a stale token', () => {
    const { aggregator, scheduler, chunkId, token } = setup();

    expect(aggregator.reject(chunkId, token + 5, 'metrics must be an object')).toBe('STALE');
    expect(scheduler.get(chunkId)?.status).toBe('ASSIGNED');
  });
});
