import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";
import { AuditResult } from "../types/domain";

// Append-only audit entry.
export class AuditLog extends Model {
  public id!: number;
  public actorId!: number | null;
  public action!: string;
  public resourceType!: string | null;
  public resourceId!: number | null;
  public ip!: string | null;
  public result!: AuditResult;
  public detail!: string | null;
  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    AuditLog.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        actorId: {
          type: DataTypes.INTEGER,
          allowNull: true,
        },
        action: {
          type: DataTypes.STRING(64),
          allowNull: false,
        },
        resourceType: {
          type: DataTypes.STRING(32),
          allowNull: true,
        },
        resourceId: {
          type: DataTypes.INTEGER,
          allowNull: true,
        },
        ip: {
          type: DataTypes.STRING(64),
          allowNull: true,
        },
        result: {
          type: DataTypes.ENUM(...Object.values(AuditResult)),
          allowNull: false,
        },
        detail: {
          type: DataTypes.TEXT,
          allowNull: true,
        },
      },
      {
        sequelize,
        modelName: "AuditLog",
        tableName: "audit_logs",
        timestamps: true,
        updatedAt: false,
        underscored: true,
      }
    );
  }
}
