import { deepStrictEqual, rejects, strictEqual, throws } from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import type { StorageBackend } from '@app/data/storage-backend.js';
import { StorageError, StorageInitError } from '@app/errors.js';

export async function runStorageBackendTestSuite(
  name: string,
  createBackend: () => Promise<StorageBackend>,
): Promise<void> {
  describe(name, function () {
    let backend: StorageBackend;

    beforeEach(async function () {
      backend = await createBackend();
    });

    afterEach(async function () {
      await backend.close();
    });

    describe('lifecycle', function () {
      it('starts uninitialized and refuses to hand out a session', function () {
        strictEqual(backend.state, 'uninitialized');
        throws(function () {
          return backend.handle;
        }, StorageInitError);
      });

      it('becomes ready after connect and applies the schema', async function () {
        await backend.connect();
        strictEqual(backend.state, 'ready');
        const tables = await backend.handle.sql`
          SELECT name FROM sqlite_master
          WHERE type = 'table' AND name IN ('invoice_categories', 'invoice_companies', 'invoices', 'invoice_items')
          ORDER BY name
        `;
        deepStrictEqual(tables.map(function (row) {
          return row.name;
        }), ['invoice_categories', 'invoice_companies', 'invoice_items', 'invoices']);
      });

      it('rejects a second connect', async function () {
        await backend.connect();
        await rejects(backend.connect(), StorageInitError);
      });

      it('closes once and stays closed', async function () {
        await backend.connect();
        await backend.close();
        await backend.close();
        strictEqual(backend.state, 'closed');
        throws(function () {
          return backend.handle;
        }, StorageInitError);
      });
    });

    describe('queries', function () {
      beforeEach(async function () {
        await backend.connect();
      });

      it('binds template parameters and returns plain rows', async function () {
        const now = '2024-01-01T00:00:00.000Z';
        const inserted = await backend.handle.sql`
          INSERT INTO invoice_categories (owner, name, description, color, created_at, updated_at)
          VALUES (${'local'}, ${'Utilities'}, ${null}, ${'#336699'}, ${now}, ${now})
          RETURNING id, name, description, color
        `;
        deepStrictEqual(inserted, [{ id: 1, name: 'Utilities', description: null, color: '#336699' }]);
      });

      it('runs statements that return no rows', async function () {
        const rows = await backend.handle.rawSql('DELETE FROM invoice_categories WHERE id = ?', [42]);
        deepStrictEqual(rows, []);
      });

      it('wraps driver failures in StorageError', async function () {
        await rejects(backend.handle.rawSql('SELECT * FROM missing_table'), StorageError);
      });

      it('rejects NaN parameters', async function () {
        await rejects(backend.handle.rawSql('SELECT ? AS value', [Number.NaN]), StorageError);
      });
    });

    describe('transaction', function () {
      beforeEach(async function () {
        await backend.connect();
      });

      it('commits when the work resolves', async function () {
        const now = '2024-01-01T00:00:00.000Z';
        const id = await backend.handle.transaction(async function (tx) {
          const [row] = await tx.sql`
            INSERT INTO invoice_companies (owner, name, created_at, updated_at)
            VALUES (${'local'}, ${'Acme'}, ${now}, ${now})
            RETURNING id
          `;
          return row?.id;
        });
        strictEqual(id, 1);
        const rows = await backend.handle.sql`SELECT name FROM invoice_companies`;
        deepStrictEqual(rows, [{ name: 'Acme' }]);
      });

      it('rolls back when the work rejects', async function () {
        const now = '2024-01-01T00:00:00.000Z';
        await rejects(backend.handle.transaction(async function (tx) {
          await tx.sql`
            INSERT INTO invoice_companies (owner, name, created_at, updated_at)
            VALUES (${'local'}, ${'Rolled Back'}, ${now}, ${now})
          `;
          throw new Error('abort');
        }), { message: 'abort' });
        const rows = await backend.handle.sql`SELECT COUNT(*) AS total FROM invoice_companies`;
        deepStrictEqual(rows, [{ total: 0 }]);
      });
    });
  });
}
