import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";
import { AnnotationStatus, AnnotationType } from "../types/domain";

// Annotation model; versions count up per sample.
export class Annotation extends Model {
  public id!: number;
  public sampleId!: number;
  public authorId!: number;
  public annoType!: AnnotationType;
  public payload!: string;
  public status!: AnnotationStatus;
  public version!: number;
  public reviewedBy!: number | null;
  public reviewedAt!: Date | null;
  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    Annotation.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        sampleId: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        authorId: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        annoType: {
          type: DataTypes.ENUM(...Object.values(AnnotationType)),
          allowNull: false,
        },
        payload: {
          type: DataTypes.TEXT,
          allowNull: false,
        },
        status: {
          type: DataTypes.ENUM(...Object.values(AnnotationStatus)),
          allowNull: false,
          defaultValue: AnnotationStatus.Submitted,
        },
        version: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        reviewedBy: {
          type: DataTypes.INTEGER,
          allowNull: true,
        },
        reviewedAt: {
          type: DataTypes.DATE,
          allowNull: true,
        },
      },
      {
        sequelize,
        modelName: "Annotation",
        tableName: "annotations",
        timestamps: true,
        updatedAt: false,
        underscored: true,
        indexes: [
          { unique: true, fields: ["sample_id", "version"] },
        ],
      }
    );
  }
}
