import { rejects, strictEqual } from 'node:assert/strict';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { after, describe, it } from 'node:test';
import { pathToFileURL } from 'node:url';

import { LibsqlStorageBackend } from '@app/data/libsql-storage-backend.js';
import { runStorageBackendTestSuite } from '@app/data/storage-backend-test-suite.js';
import { ConnectionError } from '@app/errors.js';

const directory = await mkdtemp(join(tmpdir(), 'invoice-libsql-'));
let databaseCount = 0;

// Transactions hand the connection over, which empties an in-memory database, so each case gets a file.
await runStorageBackendTestSuite('LibsqlStorageBackend', async function () {
  databaseCount += 1;
  return new LibsqlStorageBackend({
    url: pathToFileURL(join(directory, `suite-${databaseCount}.db`)).href,
  });
});

describe('LibsqlStorageBackend connection failures', function () {
  after(async function () {
    await rm(directory, { recursive: true, force: true });
  });

  it('fails with ConnectionError for an unsupported endpoint', async function () {
    const backend = new LibsqlStorageBackend({ url: 'ftp://database.invalid', authToken: 'test-token' });
    await rejects(backend.connect(), ConnectionError);
    strictEqual(backend.state, 'uninitialized');
    await backend.close();
    strictEqual(backend.state, 'closed');
  });
});
