// src/config/sqljs.ts
import initSqlJs from 'sql.js';
import type { BindParams, Database as SqlJsDatabase, QueryExecResult, SqlJsStatic, SqlValue } from 'sql.js';

type Row = Record<string, SqlValue>;

interface RunResult {
  lastID: number;
  changes: number;
}

type Callback = (this: RunResult, err: Error | null, rows?: Row[]) => void;
type Args = Array<BindParams | Callback | undefined>;

let runtime: Promise<SqlJsStatic> | undefined;
const loadRuntime = (): Promise<SqlJsStatic> => (runtime ??= initSqlJs());

const splitArgs = (args: Args): { params: BindParams | undefined; callback: Callback | undefined } => {
  const [first, second] = args;
  if (typeof first === 'function') {
    return { params: undefined, callback: first };
  }
  return { params: first, callback: typeof second === 'function' ? second : undefined };
};

const toRows = (results: QueryExecResult[]): Row[] => {
  const last = results[results.length - 1];
  if (last === undefined) return [];
  return last.values.map((values) => Object.fromEntries(last.columns.map((column, i) => [column, values[i]])));
};

// Sequelize's sqlite dialect reads err.code and the "CODE: message" prefix.
const driverError = (error: unknown): Error => {
  const message = error instanceof Error ? error.message : String(error);
  const code = /constraint failed/i.test(message) ? 'SQLITE_CONSTRAINT' : 'SQLITE_ERROR';
  return Object.assign(new Error(`${code}: ${message}`), { code });
};

/**
 * One in-memory sql.js database behind the callback API Sequelize's sqlite dialect
 * drives (run, all, serialize, close). Statements run synchronously.
 */
export class SqlJsConnection {
  private db: SqlJsDatabase | null = null;

  constructor(readonly filename: string, _mode: number, callback: (err: Error | null) => void) {
    if (filename !== ':memory:') {
      queueMicrotask(() => callback(new Error(`sql.js connections are in-memory only, got storage "${filename}"`)));
      return;
    }
    void loadRuntime().then(
      (SQL) => {
        this.db = new SQL.Database();
        callback(null);
      },
      (error: unknown) => callback(error instanceof Error ? error : new Error(String(error)))
    );
  }

  private open(): SqlJsDatabase {
    if (this.db === null) {
      throw new Error('sql.js database is not open');
    }
    return this.db;
  }

  private execute(sql: string, params: BindParams | undefined): { rows: Row[]; result: RunResult } {
    const db = this.open();
    let rows: Row[];
    try {
      rows = toRows(db.exec(sql, params));
    } catch (error) {
      throw driverError(error);
    }
    const changes = db.getRowsModified();
    const lastId = db.exec('SELECT last_insert_rowid() AS id')[0]?.values[0]?.[0];
    return { rows, result: { lastID: typeof lastId === 'number' ? lastId : 0, changes } };
  }

  private dispatch(sql: string, args: Args, withRows: boolean): this {
    const { params, callback } = splitArgs(args);
    let outcome: { rows: Row[]; result: RunResult };
    try {
      outcome = this.execute(sql, params);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      if (callback === undefined) throw failure;
      callback.call({ lastID: 0, changes: 0 }, failure);
      return this;
    }
    callback?.call(outcome.result, null, withRows ? outcome.rows : undefined);
    return this;
  }

  run(sql: string, ...args: Args): this {
    return this.dispatch(sql, args, false);
  }

  all(sql: string, ...args: Args): this {
    return this.dispatch(sql, args, true);
  }

  serialize(callback?: () => void): void {
    callback?.();
  }

  close(callback?: (err: Error | null) => void): void {
    this.db?.close();
    this.db = null;
    callback?.(null);
  }
}

/** Passed as Sequelize's `dialectModule` for the sqlite dialect. */
export const sqlJsDialectModule = {
  Database: SqlJsConnection,
  OPEN_READONLY: 0x00000001,
  OPEN_READWRITE: 0x00000002,
  OPEN_CREATE: 0x00000004,
};
