import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";

// Sample model: one stored image file inside a dataset.
export class Sample extends Model {
  public id!: number;
  public datasetId!: number;
  public filePath!: string;
  public sha256!: string;
  public mime!: string | null;
  public createdBy!: number;
  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    Sample.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        datasetId: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        filePath: {
          type: DataTypes.STRING(1024),
          allowNull: false,
        },
        sha256: {
          type: DataTypes.STRING(64),
          allowNull: false,
          unique: true,
        },
        mime: {
          type: DataTypes.STRING(128),
          allowNull: true,
        },
        createdBy: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
      },
      {
        sequelize,
        modelName: "Sample",
        tableName: "samples",
        timestamps: true,
        updatedAt: false,
        underscored: true,
      }
    );
  }
}
