import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';

import { buildSqlQuery, readInvoiceSchema, StorageBackend, toSqlParams } from '@app/data/storage-backend.js';
import type { SqlExecutor } from '@app/data/storage-backend.js';
import { StorageError, StorageInitError, errorMessage } from '@app/errors.js';
import { assertRows } from '@app/tools/assertion.js';
import type { SqlRow } from '@app/tools/assertion.js';

export type SqliteStorageBackendOptions = {
  busyTimeoutMs?: number;
};

export class SqliteStorageBackend extends StorageBackend {
  readonly kind = 'local';

  #path: string;
  #busyTimeoutMs: number;
  #db: Database.Database | undefined;
  #transactionQueue: Promise<void> = Promise.resolve();
  #inTransaction = false;

  constructor(path: string, options: SqliteStorageBackendOptions = {}) {
    super();
    this.#path = path;
    this.#busyTimeoutMs = options.busyTimeoutMs ?? 5000;
  }

  get path(): string {
    return this.#path;
  }

  protected async open(): Promise<void> {
    const inMemory = this.#path === ':memory:';
    try {
      if (!inMemory) {
        await mkdir(dirname(this.#path), { recursive: true });
      }
      this.#db = new Database(this.#path, { timeout: this.#busyTimeoutMs });
    }
    catch (error) {
      throw new StorageInitError(`Cannot open SQLite database at ${this.#path}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      if (!inMemory) {
        this.#db.pragma('journal_mode = WAL');
      }
      this.#db.pragma('synchronous = FULL');
      this.#db.exec(await readInvoiceSchema());
    }
    catch (error) {
      throw new StorageInitError(`Cannot migrate SQLite database at ${this.#path}: ${errorMessage(error)}`, { cause: error });
    }
  }

  protected async release(): Promise<void> {
    await this.#transactionQueue;
    this.#db?.close();
    this.#db = undefined;
  }

  async rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
    while (this.#inTransaction) {
      await this.#transactionQueue;
    }
    return this.#execute(query, params);
  }

  /**
   * Transactions are queued so only one holds the connection at a time. Statements issued
   * outside a transaction wait until the open one settles.
   */
  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const previous = this.#transactionQueue;
    let done = function () { };
    this.#transactionQueue = new Promise<void>(function (resolve) {
      done = function () {
        resolve();
      };
    });
    await previous;
    try {
      const db = this.#connection();
      db.exec('BEGIN IMMEDIATE');
      this.#inTransaction = true;
      try {
        const result = await work(this.#executor());
        db.exec('COMMIT');
        return result;
      }
      catch (error) {
        if (db.inTransaction) {
          db.exec('ROLLBACK');
        }
        throw error;
      }
    }
    finally {
      this.#inTransaction = false;
      done();
    }
  }

  #executor(): SqlExecutor {
    const execute = this.#execute.bind(this);
    return {
      async sql(query: TemplateStringsArray, ...params: unknown[]): Promise<SqlRow[]> {
        return execute(buildSqlQuery(query, params.length), params);
      },
      async rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
        return execute(query, params);
      },
    };
  }

  async #execute(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
    const db = this.#connection();
    const values = toSqlParams(params);
    let result: unknown;
    try {
      const stmt = db.prepare(query);
      if (stmt.reader) {
        result = stmt.all(...values);
      }
      else {
        stmt.run(...values);
        result = [];
      }
    }
    catch (error) {
      throw new StorageError(`SQLite query failed: ${errorMessage(error)}`, { cause: error });
    }
    assertRows(result);
    return result;
  }

  #connection(): Database.Database {
    if (this.#db === undefined) {
      throw new StorageInitError('SQLite database is not open');
    }
    return this.#db;
  }
}
