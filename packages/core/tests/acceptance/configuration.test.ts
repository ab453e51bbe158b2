import { describe, it, expect } from 'vitest';
import { Coordinator } from '../../src/Coordinator.js';
import { BufferLogSource } from '../../src/infrastructure/sources/BufferLogSource.js';
import { ConfigurationError, DuplicateActiveWorkerError, UnknownWorkerError } from '../../src/domain/errors/CoordinatorErrors.js';
import { silentLogger } from '../fixtures.js';

describe('coordinator configuration', () => {
  it('should require the suspect timeout to be lower than the dead timeout', () => {
    expect(
      () => new Coordinator({ suspectTimeoutMs: 30_000, deadTimeoutMs: 30_000, logger: silentLogger() }),
    ).toThrow(ConfigurationError);
  });

  it('should reject non-positive settings', () => {
    expect(() => new Coordinator({ maxAttempts: 0, logger: silentLogger() })).toThrow(
      'maxAttempts must be a positive integer, got 0',
    );
  });

  it('should require a chunk count or a chunk size when adding a source', async () => {
    const coordinator = new Coordinator({ logger: silentLogger() });

    await expect(coordinator.addSource(new BufferLogSource('a\n'), {})).rejects.toThrow(ConfigurationError);
  });

  it('should split by target chunk size', async () => {
    const coordinator = new Coordinator({ logger: silentLogger() });

    const result = await coordinator.addSource(new BufferLogSource('aaaa\nbbbb\ncccc\ndddd\n'), {
      targetChunkSizeBytes: 10,
    });

    expect(result.chunks.map((chunk) => [chunk.start, chunk.end])).toEqual([
      [0, 10],
      [10, 20],
    ]);
  });
});

describe('worker identity', () => {
  it('should refuse a second active worker under the same id', async () => {
    const coordinator = new Coordinator({ logger: silentLogger() });
    const { generation } = await coordinator.register({ workerId: 'w1', address: 'http://a' });
    coordinator.heartbeat('w1', generation);

    await expect(coordinator.register({ workerId: 'w1', address: 'http://b' })).rejects.toThrow(
      DuplicateActiveWorkerError,
    );
  });

  it('should assign an id when the worker brings none', async () => {
    const coordinator = new Coordinator({ logger: silentLogger() });

    const registration = await coordinator.register({ address: 'http://anon' });

    expect(registration.workerId).toMatch(/^[0-9a-f-]{36}$/);
    expect(registration.generation).toBe(1);
  });

  it('should reject heartbeats from unknown workers', () => {
    const coordinator = new Coordinator({ logger: silentLogger() });

    expect(() => coordinator.heartbeat('ghost', 1)).toThrow(UnknownWorkerError);
  });
});
