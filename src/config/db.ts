// src/config/db.ts
import { QueryTypes, Sequelize } from 'sequelize';
import type { Options, Transaction } from 'sequelize';
import { TABLES } from '../models/schema';
import {
  ConnectionFailureError,
  ConstraintViolationError,
  NoResultFoundError,
  classifySaveError,
} from '../utils/errors';
import type { DatabaseConfig } from './env';
import { sqlJsDialectModule } from './sqljs';

/** Anything Database.persist can write: a row of one table, keyed by a generated id. */
export interface Persistable {
  id?: number;
  readonly tableName: string;
  /** Column values to write, keyed by column name, without the id. */
  columns(): Record<string, string | number>;
  /** Local checks run before any SQL is sent; each entry describes one problem. */
  validate(): string[];
}

export type SaveResult<T> =
  | { status: 'saved'; record: T }
  | { status: 'constraint-violation'; error: ConstraintViolationError }
  | { status: 'connection-failure'; error: ConnectionFailureError }
  | { status: 'not-found'; error: NoResultFoundError };

const baseOptions = (config: DatabaseConfig): Options => ({
  logging: config.logging ? console.log : false,
});

const mysqlOptions = (config: DatabaseConfig): Options => ({
  ...baseOptions(config),
  dialect: 'mysql',
  host: config.host,
  port: config.port,
  username: config.user,
  password: config.password,
});

export class Database {
  private bound: Sequelize;
  /** Server-level connection with no default database, for CREATE/DROP DATABASE. */
  readonly server: Sequelize;

  constructor(readonly config: DatabaseConfig) {
    if (config.dialect === 'sqlite') {
      // 1) sqlite: an in-memory sql.js database, one instance does everything.
      this.bound = new Sequelize({
        ...baseOptions(config),
        dialect: 'sqlite',
        storage: ':memory:',
        dialectModule: sqlJsDialectModule,
      });
      this.server = this.bound;
    } else {
      // 2) mysql: same credentials, with and without the database selected.
      this.bound = this.connectToDatabase();
      this.server = new Sequelize(mysqlOptions(config));
    }
  }

  /** Bound to the configured database; every table operation goes through it. */
  get sequelize(): Sequelize {
    return this.bound;
  }

  private connectToDatabase(): Sequelize {
    return new Sequelize({ ...mysqlOptions(this.config), database: this.config.name });
  }

  private get isSqlite(): boolean {
    return this.config.dialect === 'sqlite';
  }

  private quote(identifier: string): string {
    return this.sequelize.getQueryInterface().quoteIdentifier(identifier);
  }

  async createDatabase(): Promise<void> {
    if (this.isSqlite) return;
    await this.server.query(`CREATE DATABASE IF NOT EXISTS ${this.quote(this.config.name)}`, { raw: true });
  }

  /** Creates the database and any missing tables. Existing tables are left untouched. */
  async initializeSchema(): Promise<void> {
    await this.createDatabase();

    const queryInterface = this.sequelize.getQueryInterface();
    for (const table of TABLES) {
      await queryInterface.createTable(table.name, table.columns);
    }

    console.log(`---Initialized database "${this.config.name}"---`);
  }

  async dropDatabase(): Promise<void> {
    if (this.isSqlite) {
      const queryInterface = this.sequelize.getQueryInterface();
      for (const table of [...TABLES].reverse()) {
        await queryInterface.dropTable(table.name);
      }
    } else {
      await this.server.query(`DROP DATABASE IF EXISTS ${this.quote(this.config.name)}`, { raw: true });
      // Pooled sessions lose their default database with the drop; start a fresh pool.
      const stale = this.bound;
      this.bound = this.connectToDatabase();
      await stale.close();
    }

    console.log(`---Dropped database "${this.config.name}"---`);
  }

  async tableNames(): Promise<string[]> {
    const names = await this.sequelize.getQueryInterface().showAllTables();
    return [...names].sort();
  }

  /** Runs fn in one transaction: committed when fn resolves, rolled back when it throws. */
  withUnitOfWork<T>(fn: (transaction: Transaction) => Promise<T>): Promise<T> {
    return this.sequelize.transaction(fn);
  }

  /**
   * Inserts the record, or updates it when it already has an id, in its own unit of work.
   * Constraint and connection failures, and updates of a row that no longer exists, are
   * rolled back, logged and returned; anything else is rethrown after the rollback.
   */
  async persist<T extends Persistable>(record: T): Promise<SaveResult<T>> {
    const problems = record.validate();
    if (problems.length > 0) {
      const error = new ConstraintViolationError('invalid-value', problems.join('; '));
      console.error(`Error saving to ${record.tableName}:`, error.message);
      return { status: 'constraint-violation', error };
    }

    try {
      const id = await this.withUnitOfWork((transaction) => this.write(record, transaction));
      record.id = id;
      return { status: 'saved', record };
    } catch (err) {
      const failure = classifySaveError(err);
      console.error(`Error saving to ${record.tableName}:`, err);
      if (failure instanceof ConnectionFailureError) {
        return { status: 'connection-failure', error: failure };
      }
      if (failure instanceof ConstraintViolationError) {
        return { status: 'constraint-violation', error: failure };
      }
      if (err instanceof NoResultFoundError) {
        return { status: 'not-found', error: err };
      }
      throw err;
    }
  }

  private async write(record: Persistable, transaction: Transaction): Promise<number> {
    const columns = record.columns();
    const names = Object.keys(columns);
    const table = this.quote(record.tableName);

    if (record.id === undefined) {
      const sql =
        `INSERT INTO ${table} (${names.map((name) => this.quote(name)).join(', ')}) ` +
        `VALUES (${names.map((name) => `:${name}`).join(', ')})`;
      const [insertId] = await this.sequelize.query(sql, {
        type: QueryTypes.INSERT,
        replacements: columns,
        transaction,
      });
      return insertId;
    }

    const id = record.id;
    const [existing] = await this.sequelize.query<{ id: unknown }>(
      `SELECT ${this.quote('id')} FROM ${table} WHERE ${this.quote('id')} = :id`,
      { type: QueryTypes.SELECT, replacements: { id }, transaction }
    );
    if (existing === undefined) {
      throw new NoResultFoundError(`${record.tableName} with id ${id}`);
    }

    const assignments = names.map((name) => `${this.quote(name)} = :${name}`).join(', ');
    await this.sequelize.query(`UPDATE ${table} SET ${assignments} WHERE ${this.quote('id')} = :id`, {
      type: QueryTypes.UPDATE,
      replacements: { ...columns, id },
      transaction,
    });
    return id;
  }

  async close(): Promise<void> {
    await this.sequelize.close();
    if (this.server !== this.sequelize) {
      await this.server.close();
    }
  }
}
