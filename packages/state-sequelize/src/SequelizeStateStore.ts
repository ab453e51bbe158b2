import type { Sequelize } from 'sequelize';
import type { CoordinatorState, StateStore } from '@logfleet/core';
import { defineCoordinatorModel } from './models/CoordinatorModel.js';
import type { CoordinatorModel } from './models/CoordinatorModel.js';
import { defineChunkModel } from './models/ChunkModel.js';
import type { ChunkModel } from './models/ChunkModel.js';
import { defineWorkerModel } from './models/WorkerModel.js';
import type { WorkerModel } from './models/WorkerModel.js';
import * as StateMapper from './mappers/StateMapper.js';

export interface SequelizeStateStoreOptions {
  /** Prefix for the three tables. Default: `'logfleet_'`. */
  readonly tablePrefix?: string;
}

/**
 * Sequelize-based StateStore adapter for `@logfleet/core`.
 *
 * Persists the coordinator ledger to a relational database using Sequelize v6:
 * one row per coordinator, one per chunk and one per worker. Supports any dialect
 * supported by Sequelize (PostgreSQL, MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Each save replaces the previous snapshot inside a single transaction.
 *
 * Call `initialize()` after construction to create tables.
 */
export class SequelizeStateStore implements StateStore {
  private readonly Coordinator: CoordinatorModel;
  private readonly Chunk: ChunkModel;
  private readonly Worker: WorkerModel;

  constructor(
    private readonly sequelize: Sequelize,
    options?: SequelizeStateStoreOptions,
  ) {
    const tablePrefix = options?.tablePrefix ?? 'logfleet_';
    this.Coordinator = defineCoordinatorModel(sequelize, tablePrefix);
    this.Chunk = defineChunkModel(sequelize, tablePrefix);
    this.Worker = defineWorkerModel(sequelize, tablePrefix);
  }

  async initialize(): Promise<void> {
    await this.Coordinator.sync();
    await this.Chunk.sync();
    await this.Worker.sync();
  }

  async saveState(state: CoordinatorState): Promise<void> {
    const rows = StateMapper.toRows(state);
    const where = { coordinatorId: state.id };

    await this.sequelize.transaction(async (transaction) => {
      await this.Coordinator.upsert(rows.coordinator, { transaction });
      await this.Chunk.destroy({ where, transaction });
      await this.Worker.destroy({ where, transaction });
      if (rows.chunks.length > 0) await this.Chunk.bulkCreate([...rows.chunks], { transaction });
      if (rows.workers.length > 0) await this.Worker.bulkCreate([...rows.workers], { transaction });
    });
  }

  async getState(coordinatorId: string): Promise<CoordinatorState | null> {
    return this.sequelize.transaction(async (transaction) => {
      const coordinator = await this.Coordinator.findByPk(coordinatorId, { transaction });
      if (!coordinator) return null;

      const where = { coordinatorId };
      const chunks = await this.Chunk.findAll({ where, order: [['position', 'ASC']], transaction });
      const workers = await this.Worker.findAll({ where, order: [['position', 'ASC']], transaction });

      return StateMapper.toDomain({
        coordinator: coordinator.get({ plain: true }),
        chunks: chunks.map((row) => row.get({ plain: true })),
        workers: workers.map((row) => row.get({ plain: true })),
      });
    });
  }

  /** Delete a coordinator's snapshot. Resolves to `false` when there was none. */
  async deleteState(coordinatorId: string): Promise<boolean> {
    return this.sequelize.transaction(async (transaction) => {
      const where = { coordinatorId };
      await this.Chunk.destroy({ where, transaction });
      await this.Worker.destroy({ where, transaction });
      const deleted = await this.Coordinator.destroy({ where: { id: coordinatorId }, transaction });
      return deleted > 0;
    });
  }
}
