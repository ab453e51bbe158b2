import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Sequelize } from 'sequelize';

export interface WorkerRow {
  coordinatorId: string;
  workerId: string;
  position: number;
  address: string;
  generation: number;
  status: string;
  registeredAt: number | string;
  lastHeartbeatAt: number | string;
  assignedChunkIds: unknown;
}

export type WorkerModel = ModelStatic<Model<WorkerRow, WorkerRow>>;

export function defineWorkerModel(sequelize: Sequelize, tablePrefix: string): WorkerModel {
  return sequelize.define<Model<WorkerRow, WorkerRow>>(
    'LogfleetWorker',
    {
      coordinatorId: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      workerId: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      position: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      address: {
        type: DataTypes.STRING(2048),
        allowNull: false,
      },
      generation: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      registeredAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      lastHeartbeatAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      assignedChunkIds: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
    },
    {
      tableName: `${tablePrefix}workers`,
      timestamps: false,
    },
  );
}
