import { Sequelize, Transaction } from "sequelize";
import { TransactionRunner } from "../repository/types";

// Managed Sequelize transaction: commits when the work resolves, rolls back when it throws.
export class SequelizeTransactionRunner implements TransactionRunner {
    constructor(private readonly sequelize: Sequelize) {}

    public async run<T>(work: (transaction: Transaction | undefined) => Promise<T>): Promise<T> {
        return await this.sequelize.transaction(async (t) => work(t));
    }
}
