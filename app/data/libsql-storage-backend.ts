import { createClient } from '@libsql/client';
import type { Client, InStatement, ResultSet, Transaction } from '@libsql/client';

import { buildSqlQuery, readInvoiceSchema, StorageBackend, toSqlParams } from '@app/data/storage-backend.js';
import type { SqlExecutor } from '@app/data/storage-backend.js';
import { ConnectionError, StorageError, StorageInitError, errorMessage } from '@app/errors.js';
import type { SqlRow } from '@app/tools/assertion.js';
import { withTimeout } from '@app/tools/timeout.js';

export type LibsqlStorageBackendOptions = {
  url: string;
  authToken?: string;
  queryTimeoutMs?: number;
};

export class LibsqlStorageBackend extends StorageBackend {
  readonly kind = 'remote';

  #url: string;
  #authToken: string | undefined;
  #queryTimeoutMs: number;
  #lib: Client | undefined;

  constructor(options: LibsqlStorageBackendOptions) {
    super();
    this.#url = options.url;
    this.#authToken = options.authToken;
    this.#queryTimeoutMs = options.queryTimeoutMs ?? 10_000;
  }

  protected async open(): Promise<void> {
    let lib: Client;
    try {
      lib = createClient({ url: this.#url, authToken: this.#authToken });
    }
    catch (error) {
      throw new ConnectionError(`Cannot create libSQL client for ${this.#url}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const schema = await readInvoiceSchema();
      await this.#bounded(function () {
        return lib.executeMultiple(schema);
      });
    }
    catch (error) {
      lib.close();
      throw new ConnectionError(`Cannot reach or migrate libSQL database at ${this.#url}: ${errorMessage(error)}`, { cause: error });
    }
    this.#lib = lib;
  }

  protected async release(): Promise<void> {
    this.#lib?.close();
    this.#lib = undefined;
  }

  async rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
    const lib = this.#client();
    return this.#execute(function (statement) {
      return lib.execute(statement);
    }, query, params);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const lib = this.#client();
    let tx: Transaction;
    try {
      tx = await this.#bounded(function () {
        return lib.transaction('write');
      });
    }
    catch (error) {
      throw new StorageError(`Cannot begin libSQL transaction: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const result = await work(this.#executor(tx));
      await this.#bounded(function () {
        return tx.commit();
      });
      return result;
    }
    catch (error) {
      if (!tx.closed) {
        await tx.rollback();
      }
      throw error;
    }
    finally {
      tx.close();
    }
  }

  #executor(tx: Transaction): SqlExecutor {
    const execute = this.#execute.bind(this);
    function run(statement: InStatement): Promise<ResultSet> {
      return tx.execute(statement);
    }
    return {
      async sql(query: TemplateStringsArray, ...params: unknown[]): Promise<SqlRow[]> {
        return execute(run, buildSqlQuery(query, params.length), params);
      },
      async rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
        return execute(run, query, params);
      },
    };
  }

  async #execute(run: (statement: InStatement) => Promise<ResultSet>, query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]> {
    const args = toSqlParams(params);
    let result: ResultSet;
    try {
      result = await this.#bounded(function () {
        return run({ sql: query, args });
      });
    }
    catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(`libSQL query failed: ${errorMessage(error)}`, { cause: error });
    }
    return result.rows.map(function (row) {
      return Object.fromEntries(result.columns.map(function (column, index) {
        return [column, row[index]];
      }));
    });
  }

  #bounded<T>(operation: () => Promise<T>): Promise<T> {
    const timeoutMs = this.#queryTimeoutMs;
    return withTimeout(operation, timeoutMs, function () {
      return new StorageError(`libSQL operation timed out after ${timeoutMs}ms`);
    });
  }

  #client(): Client {
    if (this.#lib === undefined) {
      throw new StorageInitError('libSQL client is not open');
    }
    return this.#lib;
  }
}
