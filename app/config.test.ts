import { deepStrictEqual, strictEqual, throws } from 'node:assert/strict';
import { describe, it } from 'node:test';

import { loadConfig } from '@app/config.js';
import { ConfigError } from '@app/errors.js';

describe('loadConfig', function () {
  it('applies defaults to an empty environment', function () {
    deepStrictEqual(loadConfig({}), {
      port: 8080,
      host: '0.0.0.0',
      logLevel: 'info',
      storage: { kind: 'local', path: 'invoice.db' },
      objectStorage: undefined,
      authentication: undefined,
      shutdownTimeoutMs: 10_000,
      requestTimeoutMs: 10_000,
    });
  });

  it('treats empty strings as absent', function () {
    const config = loadConfig({ PORT: '', TURSO_DATABASE_URL: '', S3_BUCKET: '  ', MCPROUTER_SERVER_URL: '' });
    strictEqual(config.port, 8080);
    deepStrictEqual(config.storage, { kind: 'local', path: 'invoice.db' });
    strictEqual(config.objectStorage, undefined);
    strictEqual(config.authentication, undefined);
  });

  it('selects the remote database only when both URL and token are set', function () {
    deepStrictEqual(loadConfig({ TURSO_DATABASE_URL: 'libsql://db.example.test' }).storage, {
      kind: 'local',
      path: 'invoice.db',
    });
    deepStrictEqual(loadConfig({
      TURSO_DATABASE_URL: 'libsql://db.example.test',
      TURSO_AUTH_TOKEN: 'test-secret',
      SQLITE_DB_PATH: '/var/lib/invoice.db',
    }).storage, {
      kind: 'remote',
      url: 'libsql://db.example.test',
      authToken: 'test-secret',
    });
  });

  it('builds the object storage settings from the S3 variables', function () {
    deepStrictEqual(loadConfig({
      S3_BUCKET: 'invoices',
      S3_ENDPOINT: 'http://localhost:9000',
      S3_ACCESS_KEY: 'test-access-key',
      S3_SECRET_KEY: 'test-secret',
      S3_USE_PATH_STYLE: 'true',
      REQUEST_TIMEOUT_MS: '2500',
    }).objectStorage, {
      bucket: 'invoices',
      endpoint: 'http://localhost:9000',
      accessKey: 'test-access-key',
      secretKey: 'test-secret',
      region: 'us-east-1',
      usePathStyle: true,
      requestTimeoutMs: 2500,
    });
  });

  it('reads the authentication server settings', function () {
    deepStrictEqual(loadConfig({
      MCPROUTER_SERVER_URL: 'https://router.test',
      MCPROUTER_SERVER_API_KEY: 'test-api-key',
    }).authentication, {
      serverUrl: 'https://router.test',
      apiKey: 'test-api-key',
    });
  });

  it('rejects invalid values with a ConfigError naming the variable', function () {
    throws(function () {
      loadConfig({ PORT: 'eighty' });
    }, ConfigError);
    throws(function () {
      loadConfig({ LOG_LEVEL: 'verbose' });
    }, /LOG_LEVEL/);
    throws(function () {
      loadConfig({ SHUTDOWN_TIMEOUT_MS: '-1' });
    }, /SHUTDOWN_TIMEOUT_MS/);
  });
});
