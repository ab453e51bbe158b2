import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Sequelize } from 'sequelize';
import type { CoordinatorState } from '@logfleet/core';
import { BetterSqlite3Database } from './better-sqlite3-adapter.js';

/** 2024-01-24 12:00:00 UTC. */
export const T0 = Date.UTC(2024, 0, 24, 12, 0, 0);

/** A SQLite database in a fresh temporary directory. `dispose()` closes and removes it. */
export function createSqlite(): { sequelize: Sequelize; dispose: () => Promise<void> } {
  const directory = mkdtempSync(join(tmpdir(), 'logfleet-seq-'));
  const sequelize = new Sequelize({
    dialect: 'sqlite',
    storage: join(directory, 'state.sqlite'),
    logging: false,
    dialectModule: { Database: BetterSqlite3Database },
    pool: {
      max: 1,
      min: 1,
      idle: 30000,
      acquire: 60000,
      evict: 30000,
    },
  });
  return {
    sequelize,
    dispose: async () => {
      await sequelize.close();
      rmSync(directory, { recursive: true, force: true });
    },
  };
}

/** One source in three chunks: one completed, one held by `w1`, one pending after a failure. */
export function sampleState(overrides?: Partial<CoordinatorState>): CoordinatorState {
  return {
    id: 'coord-seq',
    windowSizeMs: 60_000,
    maxAttempts: 3,
    sources: [{ sourceId: 'source-1', sourceRef: '/var/log/app.log', sourceLength: 300, addedAt: T0 }],
    chunks: [
      {
        chunkId: 'source-1/0',
        sourceId: 'source-1',
        index: 0,
        start: 0,
        end: 100,
        status: 'COMPLETED',
        workerId: null,
        attemptCount: 0,
        attemptToken: 1,
        assignedAt: T0 + 10,
      },
      {
        chunkId: 'source-1/1',
        sourceId: 'source-1',
        index: 1,
        start: 100,
        end: 200,
        status: 'PROCESSING',
        workerId: 'w1',
        attemptCount: 0,
        attemptToken: 3,
        assignedAt: T0 + 20,
      },
      {
        chunkId: 'source-1/2',
        sourceId: 'source-1',
        index: 2,
        start: 200,
        end: 300,
        status: 'PENDING',
        workerId: null,
        attemptCount: 1,
        attemptToken: null,
        assignedAt: null,
        lastError: 'worker w2 declared dead',
      },
    ],
    workers: [
      {
        workerId: 'w1',
        address: 'http://127.0.0.1:8001',
        generation: 1,
        status: 'ACTIVE',
        registeredAt: T0,
        lastHeartbeatAt: T0 + 25,
        assignedChunkIds: ['source-1/1'],
      },
      {
        workerId: 'w2',
        address: 'http://127.0.0.1:8002',
        generation: 2,
        status: 'DEAD',
        registeredAt: T0 + 5,
        lastHeartbeatAt: T0 + 5,
        assignedChunkIds: [],
      },
    ],
    nextAttemptToken: 4,
    startedAt: T0,
    updatedAt: T0 + 30,
    ...overrides,
  };
}
