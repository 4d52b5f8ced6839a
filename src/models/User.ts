import { DataTypes, Model, Sequelize } from "sequelize";
import { DbConnection } from "../config/database";
import { UserRole } from "../types/domain";

// User model representing an account in the system.
export class User extends Model {
  public id!: number;
  public username!: string;
  public passwordHash!: string;
  public role!: UserRole;

  public readonly createdAt!: Date;

  static initialize() {
    const sequelize: Sequelize = DbConnection.getSequelizeInstance();

    User.init(
      {
        id: {
          type: DataTypes.INTEGER,
          primaryKey: true,
          autoIncrement: true,
        },
        username: {
          type: DataTypes.STRING(64),
          allowNull: false,
          unique: true,
          validate: {
            len: [3, 64],
          },
        },
        passwordHash: {
          type: DataTypes.STRING(255),
          allowNull: false,
        },
        role: {
          type: DataTypes.ENUM(...Object.values(UserRole)),
          allowNull: false,
          defaultValue: UserRole.Researcher,
        },
      },
      {
        sequelize,
        modelName: "User",
        tableName: "users",
        timestamps: true,
        updatedAt: false,
        underscored: true,
      }
    );
  }
}
