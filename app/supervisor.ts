import type { EventEmitter } from 'node:events';

import type { AppConfig } from '@app/config.js';
import type { StorageBackend } from '@app/data/storage-backend.js';
import { createStorageBackend, describeStorageSelection } from '@app/data/storage-selection.js';
import { AuthenticationSetupError, errorMessage } from '@app/errors.js';
import { ApiServer } from '@app/http/api-server.js';
import { McpRouterAuthority } from '@app/http/authentication-bridge.js';
import type { Authority } from '@app/http/authentication-bridge.js';
import type { Logger } from '@app/logger.js';
import { resolveObjectStorage } from '@app/object-storage/object-storage.js';
import type { ObjectStorageFactory, ObjectStorageHandle } from '@app/object-storage/object-storage.js';
import { createS3ObjectStorage } from '@app/object-storage/s3-object-storage.js';
import { domainServicesFactory } from '@app/services/domain-services.js';

export type ServiceOverrides = {
  authority?: Authority;
  objectStorageFactory?: ObjectStorageFactory;
};

export type ServiceRuntime = {
  readonly apiServer: ApiServer;
  readonly storage: StorageBackend;
  readonly objectStorage: ObjectStorageHandle;
  readonly port: number;
  readonly closed: Promise<void>;
  /**
   * Shuts the API server down, then releases storage and object storage. Aborting `force`
   * cuts the grace period short.
   */
  stop(force?: AbortSignal): Promise<void>;
};

/**
 * Composition root. Opens storage, wires the optional object storage and authentication, and
 * starts the API server. Storage is released again when anything before the listener fails.
 */
export async function startInvoiceService(
  config: AppConfig,
  logger: Logger,
  overrides: ServiceOverrides = {},
): Promise<ServiceRuntime> {
  const log = logger.child({ component: 'supervisor' });

  const storage = await createStorageBackend(config.storage, { queryTimeoutMs: config.requestTimeoutMs });
  log.info({ storage: describeStorageSelection(config.storage) }, 'opening storage');

  let started = false;
  let objectStorage: ObjectStorageHandle | undefined;
  try {
    await storage.connect();

    objectStorage = resolveObjectStorage(config.objectStorage, overrides.objectStorageFactory ?? createS3ObjectStorage);
    if (objectStorage.kind === 'absent') {
      log.warn({ reason: objectStorage.reason }, 'file storage disabled');
    }
    else {
      log.info({ bucket: objectStorage.storage.bucket }, 'file storage enabled');
    }

    const apiServer = new ApiServer({
      services: domainServicesFactory(storage.handle, objectStorage),
      storage,
      logger,
      shutdownTimeoutMs: config.shutdownTimeoutMs,
      authenticationTimeoutMs: config.requestTimeoutMs,
    });
    apiServer.setupRoutes();

    if (config.authentication !== undefined) {
      try {
        apiServer.enableAuthentication(overrides.authority ?? new McpRouterAuthority(config.authentication));
      }
      catch (error) {
        if (!(error instanceof AuthenticationSetupError)) {
          throw error;
        }
        log.warn({ reason: errorMessage(error) }, 'authentication disabled');
      }
    }

    apiServer.enableStreamableHTTP();
    const port = await apiServer.start(config.port, config.host);
    started = true;

    const handle = objectStorage;
    let stopping: Promise<void> | undefined;
    return {
      apiServer,
      storage,
      objectStorage: handle,
      port,
      closed: apiServer.closed,
      stop: function (force) {
        stopping ??= (async function () {
          await apiServer.shutdown(force);
          await storage.close();
          await closeObjectStorage(handle);
          log.info('service stopped');
        })();
        return stopping;
      },
    };
  }
  finally {
    if (!started) {
      await storage.close();
      await closeObjectStorage(objectStorage);
    }
  }
}

async function closeObjectStorage(handle: ObjectStorageHandle | undefined): Promise<void> {
  if (handle?.kind === 'present') {
    await handle.storage.close();
  }
}

export type SignalSource = Pick<EventEmitter, 'on' | 'off'>;

/**
 * Resolves once one of `signals` arrives and the runtime has stopped. A further signal while
 * stopping forces the remaining connections closed.
 */
export async function runUntilSignalled(
  runtime: Pick<ServiceRuntime, 'stop'>,
  logger: Logger,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'],
  source: SignalSource = process,
): Promise<NodeJS.Signals> {
  const force = new AbortController();
  let requested = false;
  let requestStop: (signal: NodeJS.Signals) => void = function () {};
  const stopRequested = new Promise<NodeJS.Signals>(function (resolve) {
    requestStop = resolve;
  });

  const listeners = signals.map(function (signal) {
    const listener = function () {
      if (requested) {
        logger.warn({ signal }, 'shutdown forced');
        force.abort();
        return;
      }
      requested = true;
      requestStop(signal);
    };
    source.on(signal, listener);
    return { signal, listener };
  });

  try {
    const received = await stopRequested;
    logger.info({ signal: received }, 'shutdown requested');
    await runtime.stop(force.signal);
    return received;
  }
  finally {
    for (const { signal, listener } of listeners) {
      source.off(signal, listener);
    }
  }
}
