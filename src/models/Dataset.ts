import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";
import { Visibility } from "../types/domain";

// Dataset model grouping image samples under one visibility setting.
export class Dataset extends Model {
  public id!: number;
  public name!: string;
  public description!: string | null;
  public version!: string | null;
  public visibility!: Visibility;
  public createdBy!: number;
  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    Dataset.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        name: {
          type: DataTypes.STRING(255),
          allowNull: false,
          unique: true,
        },
        description: {
          type: DataTypes.TEXT,
          allowNull: true,
        },
        version: {
          type: DataTypes.STRING(64),
          allowNull: true,
        },
        visibility: {
          type: DataTypes.ENUM(...Object.values(Visibility)),
          allowNull: false,
          defaultValue: Visibility.Group,
        },
        createdBy: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
      },
      {
        sequelize,
        modelName: "Dataset",
        tableName: "datasets",
        timestamps: true,
        updatedAt: false,
        underscored: true,
      }
    );
  }
}
