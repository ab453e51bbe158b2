import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Sequelize } from 'sequelize';

export interface ChunkRow {
  coordinatorId: string;
  chunkId: string;
  /** Position in the ledger; chunks are read back in this order. */
  position: number;
  sourceId: string;
  chunkIndex: number;
  start: number | string;
  end: number | string;
  status: string;
  workerId: string | null;
  attemptCount: number;
  attemptToken: number | string | null;
  assignedAt: number | string | null;
  lastError: string | null;
}

export type ChunkModel = ModelStatic<Model<ChunkRow, ChunkRow>>;

export function defineChunkModel(sequelize: Sequelize, tablePrefix: string): ChunkModel {
  return sequelize.define<Model<ChunkRow, ChunkRow>>(
    'LogfleetChunk',
    {
      coordinatorId: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      chunkId: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      position: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      sourceId: {
        type: DataTypes.STRING(64),
        allowNull: false,
      },
      chunkIndex: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      start: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      end: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      workerId: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      attemptCount: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      attemptToken: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      assignedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      lastError: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}chunks`,
      timestamps: false,
      indexes: [{ fields: ['coordinatorId', 'position'] }],
    },
  );
}
