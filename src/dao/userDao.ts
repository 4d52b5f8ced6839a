import { User } from "../models/User";
import { ErrorStatus } from "../factory/status";
import { NewUser, QueryOptions, UserRepository } from "../repository/types";
import { UserRecord } from "../types/domain";
import { rethrowAsManaged } from "./daoErrors";

function toRecord(user: User): UserRecord {
    return {
        id: user.id,
        username: user.username,
        passwordHash: user.passwordHash,
        role: user.role,
        createdAt: user.createdAt
    };
}

/** A Data Access Object (DAO) for the User model.
 * Implemented as a Singleton to ensure a single, shared instance throughout the application.
 */
export class UserDao implements UserRepository {
    private static instance: UserDao;

    private constructor() {}

    public static getInstance(): UserDao {
        if (!UserDao.instance) {
            UserDao.instance = new UserDao();
        }
        return UserDao.instance;
    }

    public async create(data: NewUser, options: QueryOptions = {}): Promise<UserRecord> {
        try {
            const user = await User.create({ ...data }, { transaction: options.transaction });
            return toRecord(user);
        } catch (error) {
            rethrowAsManaged(error, "create", "User", ErrorStatus.creationInternalServerError);
        }
    }

    public async findById(id: number, options: QueryOptions = {}): Promise<UserRecord | null> {
        try {
            const user = await User.findByPk(id, { transaction: options.transaction });
            return user ? toRecord(user) : null;
        } catch (error) {
            rethrowAsManaged(error, "findById", "User", ErrorStatus.readInternalServerError);
        }
    }

    public async findByUsername(username: string, options: QueryOptions = {}): Promise<UserRecord | null> {
        try {
            const user = await User.findOne({ where: { username }, transaction: options.transaction });
            return user ? toRecord(user) : null;
        } catch (error) {
            rethrowAsManaged(error, "findByUsername", "User", ErrorStatus.readInternalServerError);
        }
    }
}
