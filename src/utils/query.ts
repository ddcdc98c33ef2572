// src/utils/query.ts
import { QueryTypes } from 'sequelize';
import type { Sequelize, Transaction } from 'sequelize';
import { MultipleResultsFoundError, NoResultFoundError, RowShapeError } from './errors';

export type Row = Record<string, unknown>;
export type Replacements = Record<string, string | number>;

/** Whatever owns the connection; read on every run, so a reconnect is picked up. */
export interface QuerySource {
  readonly sequelize: Sequelize;
}

/**
 * A SELECT that has not run yet. Each terminal method issues one round-trip;
 * pass a transaction to read inside an open unit of work.
 */
export class Query<T> implements AsyncIterable<T> {
  constructor(
    private readonly source: QuerySource,
    private readonly sql: string,
    private readonly replacements: Replacements,
    private readonly map: (row: Row) => T,
    /** Used in cardinality errors, e.g. "categories with name 'Work'". */
    readonly description: string
  ) {}

  private rows(sql: string, transaction?: Transaction): Promise<Row[]> {
    return this.source.sequelize.query<Row>(sql, {
      type: QueryTypes.SELECT,
      replacements: this.replacements,
      transaction,
    });
  }

  async all(transaction?: Transaction): Promise<T[]> {
    const rows = await this.rows(this.sql, transaction);
    return rows.map(this.map);
  }

  async first(transaction?: Transaction): Promise<T | null> {
    const rows = await this.rows(`${this.sql} LIMIT 1`, transaction);
    return rows.length > 0 ? this.map(rows[0]) : null;
  }

  async one(transaction?: Transaction): Promise<T> {
    const rows = await this.rows(this.sql, transaction);
    if (rows.length === 0) {
      throw new NoResultFoundError(this.description);
    }
    if (rows.length > 1) {
      throw new MultipleResultsFoundError(this.description, rows.length);
    }
    return this.map(rows[0]);
  }

  async count(transaction?: Transaction): Promise<number> {
    const rows = await this.rows(`SELECT COUNT(*) AS total FROM (${this.sql}) AS counted`, transaction);
    return readInteger(rows[0] ?? {}, 'total');
  }

  async *iterate(transaction?: Transaction): AsyncGenerator<T> {
    for (const item of await this.all(transaction)) {
      yield item;
    }
  }

  /** Iterates outside any unit of work; use iterate(transaction) inside one. */
  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterate();
  }
}

// mysql2 hands back BIGINT aggregates as strings in some configurations.
export const readInteger = (row: Row, column: string): number => {
  const value = row[column];
  const parsed = typeof value === 'string' && /^-?\d+$/.test(value) ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
    throw new RowShapeError(`Column "${column}" is not an integer: ${String(value)}`);
  }
  return parsed;
};

export const readString = (row: Row, column: string): string => {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new RowShapeError(`Column "${column}" is not a string: ${String(value)}`);
  }
  return value;
};
