import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";
import { Decision, ResourceType } from "../types/domain";

// Approval model: a download request and its review outcome.
export class Approval extends Model {
  public id!: number;
  public applicantId!: number;
  public resourceType!: ResourceType;
  public resourceId!: number;
  public purpose!: string;
  public decision!: Decision;
  public expiresAt!: Date | null;
  public reviewedBy!: number | null;
  public reviewedAt!: Date | null;
  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    Approval.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        applicantId: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        resourceType: {
          type: DataTypes.ENUM(...Object.values(ResourceType)),
          allowNull: false,
        },
        resourceId: {
          type: DataTypes.INTEGER,
          allowNull: false,
        },
        purpose: {
          type: DataTypes.TEXT,
          allowNull: false,
        },
        decision: {
          type: DataTypes.ENUM(...Object.values(Decision)),
          allowNull: false,
          defaultValue: Decision.Pending,
        },
        expiresAt: {
          type: DataTypes.DATE,
          allowNull: true,
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
        modelName: "Approval",
        tableName: "approvals",
        timestamps: true,
        updatedAt: false,
        underscored: true,
        indexes: [
          { fields: ["applicant_id", "resource_type", "resource_id"] },
        ],
      }
    );
  }
}
