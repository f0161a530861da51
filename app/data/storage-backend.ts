import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { StorageError, StorageInitError } from '@app/errors.js';
import type { SqlRow } from '@app/tools/assertion.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export type SqlParam = string | number | null;

export type StorageState = 'uninitialized' | 'ready' | 'closed';

export interface SqlExecutor {
  sql(query: TemplateStringsArray, ...params: unknown[]): Promise<SqlRow[]>;
  rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]>;
}

/**
 * The session object shared by every domain service. Writes that must land together go
 * through `transaction`, which commits when the callback resolves and rolls back otherwise.
 */
export interface StorageHandle extends SqlExecutor {
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

export abstract class StorageBackend implements StorageHandle {
  abstract readonly kind: 'local' | 'remote';

  #state: StorageState = 'uninitialized';

  get state(): StorageState {
    return this.#state;
  }

  get handle(): StorageHandle {
    if (this.#state !== 'ready') {
      throw new StorageInitError(`Storage backend is ${this.#state}`);
    }
    return this;
  }

  /**
   * Opens the store and applies the schema. Resolves only once the schema is current.
   */
  async connect(): Promise<void> {
    if (this.#state !== 'uninitialized') {
      throw new StorageInitError(`Storage backend cannot connect while ${this.#state}`);
    }
    await this.open();
    this.#state = 'ready';
  }

  async close(): Promise<void> {
    if (this.#state === 'closed') {
      return;
    }
    this.#state = 'closed';
    await this.release();
  }

  async sql(query: TemplateStringsArray, ...params: unknown[]): Promise<SqlRow[]> {
    return this.rawSql(buildSqlQuery(query, params.length), params);
  }

  abstract rawSql(query: string, params?: ReadonlyArray<unknown>): Promise<SqlRow[]>;

  abstract transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;

  protected abstract open(): Promise<void>;

  protected abstract release(): Promise<void>;
}

export function buildSqlQuery(query: TemplateStringsArray, paramCount: number): string {
  return query.reduce(function (fullSql, partialSql, index) {
    return fullSql + partialSql + (index < paramCount ? '?' : '');
  }, '');
}

export function toSqlParams(params: ReadonlyArray<unknown> = []): SqlParam[] {
  return params.map(function (param) {
    if (typeof param === 'boolean') {
      return param ? 1 : 0;
    }
    else if (typeof param === 'string' || typeof param === 'number') {
      if (Number.isNaN(param)) {
        throw new StorageError('NaN is not a valid SQL parameter');
      }
      return param;
    }
    else if (param === null || param === undefined) {
      return null;
    }
    else {
      throw new StorageError(`Unsupported SQL parameter type: ${typeof param}`);
    }
  });
}

export async function readInvoiceSchema(): Promise<string> {
  return readFile(join(__dirname, './invoice-schema.sql'), { encoding: 'utf-8' });
}
