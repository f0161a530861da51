import { deepStrictEqual, ok, rejects, strictEqual } from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { mkdtemp, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { loadConfig } from '@app/config.js';
import { StorageInitError, UnauthorizedError } from '@app/errors.js';
import type { Identity } from '@app/http/authentication-bridge.js';
import { createLogger } from '@app/logger.js';
import { MemoryObjectStorage } from '@app/object-storage/object-storage-test-utils.js';
import { runUntilSignalled, startInvoiceService } from '@app/supervisor.js';
import type { ServiceRuntime } from '@app/supervisor.js';
import { isRecord } from '@app/tools/assertion.js';

const logger = createLogger('silent');

describe('startInvoiceService', function () {
  let directory: string;
  let runtime: ServiceRuntime | undefined;

  function testEnv(extra: Record<string, string> = {}): NodeJS.ProcessEnv {
    return {
      PORT: '0',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'silent',
      SQLITE_DB_PATH: join(directory, 'data', 'invoice.db'),
      SHUTDOWN_TIMEOUT_MS: '500',
      ...extra,
    };
  }

  function url(path: string): string {
    ok(runtime !== undefined);
    return `http://127.0.0.1:${runtime.port}${path}`;
  }

  async function health(): Promise<Record<string, unknown>> {
    const body: unknown = await (await fetch(url('/health'))).json();
    ok(isRecord(body));
    return body;
  }

  beforeEach(async function () {
    directory = await mkdtemp(join(tmpdir(), 'invoice-supervisor-'));
    runtime = undefined;
  });

  afterEach(async function () {
    await runtime?.stop();
    await rm(directory, { recursive: true, force: true });
  });

  it('serves the domain over a local database without optional features', async function () {
    runtime = await startInvoiceService(loadConfig(testEnv()), logger);

    deepStrictEqual(await health(), {
      status: 'ok',
      storage: { kind: 'local', state: 'ready' },
      objectStorage: 'absent',
      authentication: 'disabled',
    });
    ok((await stat(join(directory, 'data', 'invoice.db'))).isFile());

    const created = await fetch(url('/api/categories'), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ name: 'Utilities' }),
    });
    strictEqual(created.status, 201);
    const fetched: unknown = await (await fetch(url('/api/categories/1'))).json();
    ok(isRecord(fetched));
    strictEqual(fetched.name, 'Utilities');

    const upload = await fetch(url('/api/upload?filename=scan.pdf'), {
      method: 'POST',
      headers: { 'content-type': 'application/pdf' },
      body: '%PDF-1.4',
    });
    strictEqual(upload.status, 503);
  });

  it('keeps running without file storage when the S3 settings are incomplete', async function () {
    runtime = await startInvoiceService(loadConfig(testEnv({ S3_BUCKET: 'invoices' })), logger);
    strictEqual((await health()).objectStorage, 'absent');
  });

  it('uses the object storage the factory builds', async function () {
    runtime = await startInvoiceService(loadConfig(testEnv({ S3_BUCKET: 'test-bucket' })), logger, {
      objectStorageFactory: function () {
        return new MemoryObjectStorage();
      },
    });
    strictEqual((await health()).objectStorage, 'present');
  });

  it('enables authentication when an authority server is configured', async function () {
    runtime = await startInvoiceService(loadConfig(testEnv({ MCPROUTER_SERVER_URL: 'https://router.test' })), logger, {
      authority: {
        async validate(token: string): Promise<Identity> {
          if (token !== 'test-token') {
            throw new UnauthorizedError('Bearer token was rejected');
          }
          return { subject: 'user-1', roles: [] };
        },
      },
    });

    strictEqual((await fetch(url('/api/categories'))).status, 401);
    const accepted = await fetch(url('/api/categories'), { headers: { authorization: 'Bearer test-token' } });
    strictEqual(accepted.status, 200);
    strictEqual((await health()).authentication, 'enabled');
  });

  it('continues unauthenticated when the authority cannot be set up', async function () {
    runtime = await startInvoiceService(loadConfig(testEnv({ MCPROUTER_SERVER_URL: 'not a url' })), logger);
    strictEqual((await health()).authentication, 'disabled');
    strictEqual((await fetch(url('/api/categories'))).status, 200);
  });

  it('fails without listening when the database cannot be opened', async function () {
    const blocker = join(directory, 'blocker');
    await writeFile(blocker, 'not a directory');
    await rejects(
      startInvoiceService(loadConfig(testEnv({ SQLITE_DB_PATH: join(blocker, 'invoice.db') })), logger),
      StorageInitError,
    );
  });

  it('stops once and releases storage', async function () {
    const objectStorage = new MemoryObjectStorage();
    runtime = await startInvoiceService(loadConfig(testEnv({ S3_BUCKET: 'test-bucket' })), logger, {
      objectStorageFactory: function () {
        return objectStorage;
      },
    });
    const first = runtime.stop();
    strictEqual(runtime.stop(), first);
    await first;
    await runtime.closed;
    strictEqual(runtime.storage.state, 'closed');
    strictEqual(objectStorage.closeCount, 1);
    await rejects(fetch(url('/health')));
  });

  it('releases object storage when startup fails after resolving it', async function () {
    const objectStorage = new MemoryObjectStorage();
    const blocker = await startInvoiceService(loadConfig(testEnv()), logger);
    try {
      await rejects(startInvoiceService(loadConfig(testEnv({
        PORT: String(blocker.port),
        SQLITE_DB_PATH: join(directory, 'second.db'),
        S3_BUCKET: 'test-bucket',
      })), logger, {
        objectStorageFactory: function () {
          return objectStorage;
        },
      }));
      strictEqual(objectStorage.closeCount, 1);
    }
    finally {
      await blocker.stop();
    }
  });
});

describe('runUntilSignalled', function () {
  let directory: string;

  beforeEach(async function () {
    directory = await mkdtemp(join(tmpdir(), 'invoice-signal-'));
  });

  afterEach(async function () {
    await rm(directory, { recursive: true, force: true });
  });

  it('stops the runtime on SIGTERM and detaches its listeners', async function () {
    const runtime = await startInvoiceService(loadConfig({
      PORT: '0',
      HOST: '127.0.0.1',
      SQLITE_DB_PATH: join(directory, 'invoice.db'),
      SHUTDOWN_TIMEOUT_MS: '500',
    }), logger);
    const signals = new EventEmitter();

    const running = runUntilSignalled(runtime, logger, ['SIGINT', 'SIGTERM'], signals);
    strictEqual(signals.listenerCount('SIGTERM'), 1);

    signals.emit('SIGTERM');
    strictEqual(await running, 'SIGTERM');
    strictEqual(runtime.storage.state, 'closed');
    strictEqual(signals.listenerCount('SIGINT'), 0);
    strictEqual(signals.listenerCount('SIGTERM'), 0);
    await rejects(fetch(`http://127.0.0.1:${runtime.port}/health`));
  });

  it('forces the stop when a second signal arrives', async function () {
    const signals = new EventEmitter();
    const forces: AbortSignal[] = [];
    const running = runUntilSignalled({
      async stop(force?: AbortSignal): Promise<void> {
        ok(force !== undefined);
        forces.push(force);
        strictEqual(force.aborted, false);
        signals.emit('SIGINT');
      },
    }, logger, ['SIGINT', 'SIGTERM'], signals);

    signals.emit('SIGTERM');
    strictEqual(await running, 'SIGTERM');
    const [force] = forces;
    ok(force !== undefined);
    strictEqual(force.aborted, true);
    strictEqual(signals.listenerCount('SIGINT'), 0);
  });
});
