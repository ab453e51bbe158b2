import pino from 'pino';
import type { Logger } from 'pino';
import type { CoordinatorState } from '../src/domain/model/CoordinatorState.js';
import type { PartialMetrics } from '../src/domain/model/Metrics.js';
import type { LogSource } from '../src/domain/ports/LogSource.js';
import type { Coordinator } from '../src/Coordinator.js';
import { processChunk } from '../src/application/usecases/ProcessChunk.js';

/** 2024-01-24 12:00:00 UTC. */
export const T0 = Date.UTC(2024, 0, 24, 12, 0, 0);

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** `2024-01-24 12:00:05.000 INFO Request processed in 42ms` */
export function standardLine(timestamp: number, level: string, responseTimeMs?: number): string {
  const stamp = new Date(timestamp).toISOString().slice(0, 23).replace('T', ' ');
  const message = responseTimeMs === undefined ? 'Something happened' : `Request processed in ${String(responseTimeMs)}ms`;
  return `${stamp} ${level} ${message}`;
}

/** One window of hand-made counters. */
export function partialFor(
  windowStart: number,
  requestCount: number,
  errorCount: number,
  windowSizeMs = 60_000,
): PartialMetrics {
  return {
    windowSizeMs,
    windows: [{ windowStart, requestCount, errorCount, responseTimeSum: 0, responseTimeCount: 0 }],
    parseErrors: 0,
    entryCount: requestCount,
  };
}

/** A small ledger: one source cut into two chunks, one of them held by `w1`. */
export function sampleState(overrides?: Partial<CoordinatorState>): CoordinatorState {
  return {
    id: 'coord-test',
    windowSizeMs: 60_000,
    maxAttempts: 3,
    sources: [{ sourceId: 'source-1', sourceRef: '/var/log/app.log', sourceLength: 200, addedAt: T0 }],
    chunks: [
      {
        chunkId: 'source-1/0',
        sourceId: 'source-1',
        index: 0,
        start: 0,
        end: 100,
        status: 'ASSIGNED',
        workerId: 'w1',
        attemptCount: 0,
        attemptToken: 1,
        assignedAt: T0,
      },
      {
        chunkId: 'source-1/1',
        sourceId: 'source-1',
        index: 1,
        start: 100,
        end: 200,
        status: 'PENDING',
        workerId: null,
        attemptCount: 1,
        attemptToken: null,
        assignedAt: null,
        lastError: 'worker w2 (generation 1) declared dead',
      },
    ],
    workers: [
      {
        workerId: 'w1',
        address: 'http://127.0.0.1:7101',
        generation: 1,
        status: 'ACTIVE',
        registeredAt: T0,
        lastHeartbeatAt: T0,
        assignedChunkIds: ['source-1/0'],
      },
    ],
    nextAttemptToken: 2,
    startedAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

/**
 * Drive every worker in turn through assign → started → process → submit until no
 * worker gets another chunk.
 */
export async function drainPull(coordinator: Coordinator, source: LogSource, workerIds: readonly string[]): Promise<void> {
  for (;;) {
    let progressed = false;
    for (const workerId of workerIds) {
      const assignment = await coordinator.assignChunk(workerId);
      if (!assignment) continue;
      progressed = true;
      await coordinator.reportStarted(assignment.chunkId, assignment.attemptToken);
      const partial = await processChunk(source, assignment, { windowSizeMs: assignment.windowSizeMs });
      await coordinator.submitResult(assignment.chunkId, assignment.attemptToken, partial);
    }
    if (!progressed) return;
  }
}
