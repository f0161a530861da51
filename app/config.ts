import z from 'zod/v3';

import { selectStorageBackend } from '@app/data/storage-selection.js';
import type { StorageSelection } from '@app/data/storage-selection.js';
import { ConfigError } from '@app/errors.js';
import type { ObjectStorageConfig } from '@app/object-storage/object-storage.js';

function emptyToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

function numberWithDefault(defaultValue: number) {
  return z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(defaultValue));
}

const EnvSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).max(65535).default(8080)),
  HOST: z.preprocess(emptyToUndefined, z.string().default('0.0.0.0')),
  LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')),

  TURSO_DATABASE_URL: optionalString,
  TURSO_AUTH_TOKEN: optionalString,
  SQLITE_DB_PATH: z.preprocess(emptyToUndefined, z.string().default('invoice.db')),

  S3_BUCKET: optionalString,
  S3_ENDPOINT: optionalString,
  S3_ACCESS_KEY: optionalString,
  S3_SECRET_KEY: optionalString,
  S3_REGION: z.preprocess(emptyToUndefined, z.string().default('us-east-1')),
  S3_USE_PATH_STYLE: optionalString,

  MCPROUTER_SERVER_URL: optionalString,
  MCPROUTER_SERVER_API_KEY: optionalString,

  SHUTDOWN_TIMEOUT_MS: numberWithDefault(10_000),
  REQUEST_TIMEOUT_MS: numberWithDefault(10_000),
});

export type LogLevel = z.infer<typeof EnvSchema>['LOG_LEVEL'];

export type AuthenticationConfig = {
  serverUrl: string;
  apiKey?: string;
};

export type AppConfig = {
  port: number;
  host: string;
  logLevel: LogLevel;
  storage: StorageSelection;
  objectStorage?: ObjectStorageConfig;
  authentication?: AuthenticationConfig;
  shutdownTimeoutMs: number;
  requestTimeoutMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(function (issue) {
      return `${issue.path.join('.')}: ${issue.message}`;
    });
    throw new ConfigError(`Invalid environment configuration: ${details.join('; ')}`);
  }
  const values = parsed.data;

  return {
    port: values.PORT,
    host: values.HOST,
    logLevel: values.LOG_LEVEL,
    storage: selectStorageBackend({
      tursoDatabaseUrl: values.TURSO_DATABASE_URL,
      tursoAuthToken: values.TURSO_AUTH_TOKEN,
      sqliteDbPath: values.SQLITE_DB_PATH,
    }),
    // The bucket is what opts a deployment into object storage; the rest is validated on construction.
    objectStorage: values.S3_BUCKET === undefined ? undefined : {
      bucket: values.S3_BUCKET,
      endpoint: values.S3_ENDPOINT,
      accessKey: values.S3_ACCESS_KEY,
      secretKey: values.S3_SECRET_KEY,
      region: values.S3_REGION,
      usePathStyle: values.S3_USE_PATH_STYLE === 'true',
      requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    },
    authentication: values.MCPROUTER_SERVER_URL === undefined ? undefined : {
      serverUrl: values.MCPROUTER_SERVER_URL,
      apiKey: values.MCPROUTER_SERVER_API_KEY,
    },
    shutdownTimeoutMs: values.SHUTDOWN_TIMEOUT_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
  };
}
