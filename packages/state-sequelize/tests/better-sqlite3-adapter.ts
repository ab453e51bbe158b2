import Database from 'better-sqlite3';

type SQLiteCallback = (...args: unknown[]) => void;
type BindValue = string | number | bigint | Buffer | null;
type BindRecord = Record<string, BindValue>;
type BindParam = BindValue | BindRecord;

/** `this` inside a `run()` callback, as the sqlite3 package provides it. */
interface RunContext {
  lastID: number;
  changes: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isCallback(value: unknown): value is SQLiteCallback {
  return typeof value === 'function';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return !(value instanceof Uint8Array || value instanceof Date);
}

function toBindValue(value: unknown): BindValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (value instanceof Date) return value.getTime();
  if (value instanceof Uint8Array) return Buffer.from(value);
  throw new TypeError(`Cannot bind a value of type ${typeof value}`);
}

/** Named parameters arrive as `$name`; better-sqlite3 expects the bare name. */
function toBindRecord(source: Record<string, unknown>): BindRecord {
  const record: BindRecord = {};
  for (const [key, value] of Object.entries(source)) {
    const name = key.startsWith('$') || key.startsWith(':') || key.startsWith('@') ? key.slice(1) : key;
    record[name] = toBindValue(value);
  }
  return record;
}

function splitArgs(params: unknown[]): { args: BindParam[]; callback?: SQLiteCallback } {
  const last = params[params.length - 1];
  const callback = isCallback(last) ? last : undefined;
  const values = callback ? params.slice(0, -1) : params;

  const args: BindParam[] = [];
  for (const value of values) {
    if (value === undefined) continue;
    if (Array.isArray(value)) args.push(...value.map(toBindValue));
    else if (isPlainObject(value)) args.push(toBindRecord(value));
    else args.push(toBindValue(value));
  }
  return { args, callback };
}

/**
 * The subset of the `sqlite3` package's `Database` that Sequelize's sqlite dialect calls,
 * backed by better-sqlite3. Pass `{ Database: BetterSqlite3Database }` as `dialectModule`.
 */
export class BetterSqlite3Database {
  private readonly db: Database.Database | null;

  constructor(filename: string, mode?: number | SQLiteCallback, callback?: SQLiteCallback) {
    const done = isCallback(mode) ? mode : callback;
    let db: Database.Database | null = null;
    let error: Error | null = null;
    try {
      db = new Database(filename);
    } catch (err) {
      if (!done) throw err;
      error = toError(err);
    }
    this.db = db;
    if (done) {
      setTimeout(() => {
        done(error);
      }, 0);
    }
  }

  private get connection(): Database.Database {
    if (!this.db) throw new Error('Database is not open');
    return this.db;
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);
    try {
      const info = this.connection.prepare(sql).run(...args);
      const context: RunContext = { lastID: Number(info.lastInsertRowid), changes: info.changes };
      callback?.call(context, null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);
    try {
      const statement = this.connection.prepare(sql);
      // DDL reaches all() too; only readers return rows
      if (statement.reader) {
        callback?.(null, statement.all(...args));
      } else {
        statement.run(...args);
        callback?.(null, []);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: SQLiteCallback): this {
    try {
      this.connection.exec(sql);
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  close(callback?: SQLiteCallback): void {
    try {
      if (this.db?.open) this.db.close();
      callback?.(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
  }

  serialize(callback?: SQLiteCallback): void {
    callback?.();
  }

  parallelize(callback?: SQLiteCallback): void {
    callback?.();
  }
}
