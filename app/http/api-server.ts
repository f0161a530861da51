import { randomUUID } from 'node:crypto';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { performance } from 'node:perf_hooks';

import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import express from 'express';
import type { ErrorRequestHandler, Express, Response } from 'express';

import type { StorageBackend } from '@app/data/storage-backend.js';
import { InvoiceServiceError } from '@app/errors.js';
import type { ErrorCode } from '@app/errors.js';
import { AuthenticationBridge } from '@app/http/authentication-bridge.js';
import type { AuthenticationContext, Authority } from '@app/http/authentication-bridge.js';
import { createCategoryRouter } from '@app/http/routes/category-routes.js';
import { createCompanyRouter } from '@app/http/routes/company-routes.js';
import { createInvoiceRouter } from '@app/http/routes/invoice-routes.js';
import { UPLOAD_BODY_LIMIT, createUploadRouter } from '@app/http/routes/upload-routes.js';
import type { Logger } from '@app/logger.js';
import { buildInvoiceToolRegistry, createInvoiceMcpServer } from '@app/mcp-server/mcp-server.js';
import { LOCAL_OWNER } from '@app/services/domain-services.js';
import type { DomainServices, DomainServicesFactory } from '@app/services/domain-services.js';
import { isRecord } from '@app/tools/assertion.js';

declare global {
  namespace Express {
    interface Locals {
      authentication?: AuthenticationContext;
    }
  }
}

export const AUTHENTICATE_CHALLENGE = 'Bearer realm="invoice-management"';

const HTTP_STATUS_BY_CODE: Record<ErrorCode, number> = {
  CONNECTION_ERROR: 500,
  STORAGE_INIT_ERROR: 500,
  UPLOAD_CONFIG_ERROR: 500,
  STORAGE_UNAVAILABLE: 503,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  CONFLICT: 409,
  STORAGE_ERROR: 500,
  UNKNOWN_TOOL: 404,
  SCHEMA_VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  AUTH_UNAVAILABLE: 503,
  AUTHENTICATION_SETUP_ERROR: 500,
  CONFIG_ERROR: 500,
};

export type ErrorResponse = {
  status: number;
  code: string;
  message: string;
};

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof InvoiceServiceError) {
    return { status: HTTP_STATUS_BY_CODE[error.code], code: error.code, message: error.message };
  }
  // Body parser failures carry their own 4xx status.
  if (error instanceof Error && isRecord(error) && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return {
      status: error.status,
      code: error.status === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST',
      message: error.message,
    };
  }
  return { status: 500, code: 'INTERNAL_ERROR', message: 'Internal server error' };
}

function sendError(res: Response, response: ErrorResponse): void {
  if (response.status === 401) {
    res.set('WWW-Authenticate', AUTHENTICATE_CHALLENGE);
  }
  res.status(response.status).json({ error: { code: response.code, message: response.message } });
}

function jsonRpcError(message: string) {
  return {
    jsonrpc: '2.0',
    error: { code: -32000, message },
    id: null,
  };
}

function untilClosed(responses: ReadonlySet<Response>): Promise<void[]> {
  return Promise.all(Array.from(responses, function (res) {
    return new Promise<void>(function (resolve) {
      res.once('close', function () {
        resolve();
      });
    });
  }));
}

function toAuthInfo(context: AuthenticationContext | undefined): AuthInfo | undefined {
  if (context?.state !== 'authenticated') {
    return undefined;
  }
  return {
    token: context.token,
    clientId: context.identity.subject,
    scopes: context.identity.roles,
  };
}

/**
 * Records belong to the authenticated subject, or to the local owner while authentication is
 * disabled.
 */
export function ownerOf(context: AuthenticationContext | undefined): string {
  return context?.state === 'authenticated' ? context.identity.subject : LOCAL_OWNER;
}

type McpSession = {
  transport: StreamableHTTPServerTransport;
  owner: string;
};

export type ApiServerOptions = {
  services: DomainServicesFactory;
  storage: Pick<StorageBackend, 'kind' | 'state'>;
  logger: Logger;
  shutdownTimeoutMs: number;
  authenticationTimeoutMs: number;
};

/**
 * HTTP front of the service: REST routes, the `/mcp` Streamable HTTP endpoint and the
 * authentication gate in front of both.
 */
export class ApiServer {
  readonly authentication: AuthenticationBridge;
  readonly closed: Promise<void>;

  #app: Express;
  #services: DomainServicesFactory;
  #storage: Pick<StorageBackend, 'kind' | 'state'>;
  #logger: Logger;
  #shutdownTimeoutMs: number;

  #sessions = new Map<string, McpSession>();
  // Open MCP responses: tool calls and other posts, and standalone GET streams.
  #mcpCalls = new Set<Response>();
  #mcpStreams = new Set<Response>();
  #routesReady = false;
  #streamableHttpReady = false;
  #finalized = false;
  #server: Server | undefined;
  #shutdown: Promise<void> | undefined;
  #markClosed: () => void = function () {};

  constructor(options: ApiServerOptions) {
    this.#services = options.services;
    this.#storage = options.storage;
    this.#logger = options.logger.child({ component: 'api-server' });
    this.#shutdownTimeoutMs = options.shutdownTimeoutMs;
    this.authentication = new AuthenticationBridge({ timeoutMs: options.authenticationTimeoutMs });
    this.closed = new Promise<void>((resolve) => {
      this.#markClosed = function () {
        resolve();
      };
    });

    const app = express();
    const logger = this.#logger;
    const authentication = this.authentication;

    app.disable('x-powered-by');

    app.use(function (req, res, next) {
      const startedAt = performance.now();
      res.on('finish', function () {
        const [path] = req.originalUrl.split('?');
        logger.info({
          method: req.method,
          path,
          status: res.statusCode,
          durationMs: Math.round(performance.now() - startedAt),
        }, 'request');
      });
      next();
    });

    app.use(async function (req, res, next) {
      if (req.path === '/health') {
        next();
        return;
      }
      res.locals.authentication = await authentication.authenticate(req.get('authorization'));
      next();
    });

    app.use('/api/upload', express.raw({
      type: function () {
        return true;
      },
      limit: UPLOAD_BODY_LIMIT,
    }));
    app.use(express.json({ limit: '1mb' }));

    this.#app = app;
  }

  get app(): Express {
    return this.#app;
  }

  get sessionCount(): number {
    return this.#sessions.size;
  }

  setupRoutes(): void {
    this.#assertNotStarted('setupRoutes');
    if (this.#routesReady) {
      return;
    }
    this.#routesReady = true;

    const app = this.#app;
    const servicesFor = this.#services;
    const storage = this.#storage;
    const authentication = this.authentication;
    const uploadsAvailable = servicesFor(LOCAL_OWNER).uploads.available;

    function services(res: Response): DomainServices {
      return servicesFor(ownerOf(res.locals.authentication));
    }

    app.get('/health', function (_req, res) {
      const ready = storage.state === 'ready';
      res.status(ready ? 200 : 503).json({
        status: ready ? 'ok' : 'unavailable',
        storage: { kind: storage.kind, state: storage.state },
        objectStorage: uploadsAvailable ? 'present' : 'absent',
        authentication: authentication.enabled ? 'enabled' : 'disabled',
      });
    });

    app.get('/authentication', function (_req, res) {
      const context = res.locals.authentication;
      res.json(context?.state === 'authenticated'
        ? { state: context.state, identity: context.identity }
        : { state: 'disabled' });
    });

    app.use('/api/categories', createCategoryRouter(function (res) {
      return services(res).categories;
    }));
    app.use('/api/companies', createCompanyRouter(function (res) {
      return services(res).companies;
    }));
    app.use('/api/invoices', createInvoiceRouter(function (res) {
      return services(res).invoices;
    }));
    app.use('/api/upload', createUploadRouter(servicesFor(LOCAL_OWNER).uploads));
  }

  enableAuthentication(authority: Authority | undefined): void {
    this.authentication.enable(authority);
    this.#logger.info('authentication enabled');
  }

  enableStreamableHTTP(): void {
    this.#assertNotStarted('enableStreamableHTTP');
    if (this.#streamableHttpReady) {
      return;
    }
    this.#streamableHttpReady = true;

    const sessions = this.#sessions;
    const calls = this.#mcpCalls;
    const streams = this.#mcpStreams;
    const servicesFor = this.#services;
    const logger = this.#logger;

    this.#app.all('/mcp', async (req, res) => {
      if (this.#shutdown !== undefined) {
        res.status(503).json(jsonRpcError('Server is shutting down'));
        return;
      }

      const owner = ownerOf(res.locals.authentication);
      const sessionId = req.get('mcp-session-id');
      const session = sessionId === undefined ? undefined : sessions.get(sessionId);
      let transport: StreamableHTTPServerTransport;

      if (session !== undefined) {
        // A session answers only to the identity that opened it.
        if (session.owner !== owner) {
          logger.warn({ sessionId }, 'MCP session used by another identity');
          res.status(400).json(jsonRpcError('Bad Request: No valid session'));
          return;
        }
        transport = session.transport;
      }
      else {
        if (sessionId !== undefined || req.method !== 'POST' || !isInitializeRequest(req.body)) {
          res.status(400).json(jsonRpcError('Bad Request: No valid session'));
          return;
        }
        const created: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: randomUUID,
          onsessioninitialized: function (id) {
            sessions.set(id, { transport: created, owner });
            logger.debug({ sessionId: id }, 'MCP session opened');
          },
        });
        created.onclose = function () {
          if (created.sessionId !== undefined) {
            sessions.delete(created.sessionId);
            logger.debug({ sessionId: created.sessionId }, 'MCP session closed');
          }
        };
        await createInvoiceMcpServer(buildInvoiceToolRegistry(servicesFor(owner)), logger).connect(created);
        transport = created;
      }

      const open = req.method === 'GET' ? streams : calls;
      open.add(res);
      res.once('close', function () {
        open.delete(res);
      });

      try {
        const auth = toAuthInfo(res.locals.authentication);
        await transport.handleRequest(Object.assign(req, { auth }), res, req.body);
      }
      catch (error) {
        logger.error({ err: error, sessionId }, 'MCP request failed');
        if (!res.headersSent) {
          res.status(500).json(jsonRpcError('Internal server error'));
        }
      }
    });
  }

  /**
   * Starts listening. Resolves with the bound port, which differs from `port` when it is 0.
   */
  async start(port: number, host: string): Promise<number> {
    if (this.#server !== undefined || this.#shutdown !== undefined) {
      throw new Error('API server has already been started');
    }
    this.#finalize();

    const server = createServer(this.#app);
    await new Promise<void>(function (resolve, reject) {
      server.once('error', reject);
      server.listen(port, host, function () {
        server.off('error', reject);
        resolve();
      });
    });
    this.#server = server;

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('API server is not bound to a TCP port');
    }
    this.#logger.info({ host, port: address.port }, 'API server listening');
    return address.port;
  }

  /**
   * Stops accepting connections and lets in-flight requests, MCP tool calls included, finish
   * within the shutdown grace period. MCP sessions are closed once their calls are done, which
   * ends their standalone streams. Connections still open after the grace period, or after
   * `force` aborts, are destroyed. Safe to call more than once.
   */
  shutdown(force?: AbortSignal): Promise<void> {
    const server = this.#server;
    if (server === undefined) {
      return Promise.resolve();
    }
    this.#shutdown ??= this.#performShutdown(server, force);
    return this.#shutdown;
  }

  async #performShutdown(server: Server, force: AbortSignal | undefined): Promise<void> {
    this.#logger.info({ sessions: this.#sessions.size, calls: this.#mcpCalls.size }, 'API server shutting down');
    const listenerClosed = new Promise<void>(function (resolve, reject) {
      server.close(function (error) {
        if (error === undefined) {
          resolve();
        }
        else {
          reject(error);
        }
      });
    });
    server.closeIdleConnections();

    const logger = this.#logger;
    const grace = setTimeout(function () {
      logger.warn('shutdown grace period elapsed, closing remaining connections');
      server.closeAllConnections();
    }, this.#shutdownTimeoutMs);
    const forceClose = function () {
      logger.warn('shutdown forced, closing remaining connections');
      server.closeAllConnections();
    };
    if (force?.aborted) {
      forceClose();
    }
    else {
      force?.addEventListener('abort', forceClose, { once: true });
    }

    try {
      await untilClosed(this.#mcpCalls);
      await this.#closeSessions();
      await untilClosed(this.#mcpStreams);
      server.closeIdleConnections();
      await listenerClosed;
    }
    finally {
      clearTimeout(grace);
      force?.removeEventListener('abort', forceClose);
      await this.#closeSessions();
      this.#logger.info('API server stopped');
      this.#markClosed();
    }
  }

  async #closeSessions(): Promise<void> {
    const open = Array.from(this.#sessions.values());
    this.#sessions.clear();
    await Promise.all(open.map(function (session) {
      return session.transport.close();
    }));
  }

  #finalize(): void {
    if (this.#finalized) {
      return;
    }
    this.#finalized = true;

    const logger = this.#logger;

    this.#app.use(function (req, res) {
      sendError(res, { status: 404, code: 'NOT_FOUND', message: `Route ${req.method} ${req.path} not found` });
    });

    const handleError: ErrorRequestHandler = function (error: unknown, req, res, next) {
      if (res.headersSent) {
        next(error);
        return;
      }
      const response = toErrorResponse(error);
      if (response.status >= 500) {
        logger.error({ err: error, method: req.method, path: req.path, code: response.code }, 'request failed');
      }
      sendError(res, response);
    };
    this.#app.use(handleError);
  }

  #assertNotStarted(operation: string): void {
    if (this.#finalized) {
      throw new Error(`${operation} must be called before the API server starts`);
    }
  }
}
