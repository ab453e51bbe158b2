import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Sequelize } from 'sequelize';

export interface CoordinatorRow {
  id: string;
  windowSizeMs: number;
  maxAttempts: number;
  sources: unknown;
  nextAttemptToken: number | string;
  startedAt: number | string;
  updatedAt: number | string;
}

export type CoordinatorModel = ModelStatic<Model<CoordinatorRow, CoordinatorRow>>;

export function defineCoordinatorModel(sequelize: Sequelize, tablePrefix: string): CoordinatorModel {
  return sequelize.define<Model<CoordinatorRow, CoordinatorRow>>(
    'LogfleetCoordinator',
    {
      id: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      windowSizeMs: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      maxAttempts: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      sources: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      nextAttemptToken: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
      updatedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName: `${tablePrefix}coordinators`,
      timestamps: false,
    },
  );
}
