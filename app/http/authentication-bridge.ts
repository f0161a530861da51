import z from 'zod/v3';

import {
  AuthUnavailableError,
  AuthenticationSetupError,
  UnauthorizedError,
  errorMessage,
} from '@app/errors.js';
import { withTimeout } from '@app/tools/timeout.js';

export type Identity = {
  subject: string;
  roles: string[];
};

export type AuthenticationContext =
  | { readonly state: 'disabled' }
  | { readonly state: 'authenticated'; readonly token: string; readonly identity: Identity };

/**
 * An external validation oracle. Rejecting a token must throw `UnauthorizedError`; any other
 * failure is treated as the authority being unavailable.
 */
export interface Authority {
  validate(token: string, signal: AbortSignal): Promise<Identity>;
}

const BEARER_PATTERN = /^Bearer[ \t]+([A-Za-z0-9\-._~+/]+=*)[ \t]*$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (header === undefined) {
    return null;
  }
  const match = BEARER_PATTERN.exec(header);
  return match?.[1] ?? null;
}

export type AuthenticationBridgeOptions = {
  timeoutMs: number;
};

export class AuthenticationBridge {
  #authority: Authority | undefined;
  #timeoutMs: number;

  constructor(options: AuthenticationBridgeOptions) {
    this.#timeoutMs = options.timeoutMs;
  }

  get enabled(): boolean {
    return this.#authority !== undefined;
  }

  /**
   * One-way switch from Disabled to Enabled.
   */
  enable(authority: Authority | undefined): void {
    if (authority === undefined) {
      throw new AuthenticationSetupError('No authentication authority is configured');
    }
    if (this.#authority !== undefined) {
      throw new AuthenticationSetupError('Authentication is already enabled');
    }
    this.#authority = authority;
  }

  async authenticate(authorizationHeader: string | undefined): Promise<AuthenticationContext> {
    const authority = this.#authority;
    if (authority === undefined) {
      return { state: 'disabled' };
    }

    const token = extractBearerToken(authorizationHeader);
    if (token === null) {
      throw new UnauthorizedError('Missing or invalid Bearer token');
    }

    const timeoutMs = this.#timeoutMs;
    try {
      const identity = await withTimeout(function (signal) {
        return authority.validate(token, signal);
      }, timeoutMs, function () {
        return new AuthUnavailableError(`Authentication authority did not answer within ${timeoutMs}ms`);
      });
      return { state: 'authenticated', token, identity };
    }
    catch (error) {
      if (error instanceof UnauthorizedError || error instanceof AuthUnavailableError) {
        throw error;
      }
      throw new AuthUnavailableError(`Authentication authority failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

const AuthorityUserSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  role: z.string().optional(),
  roles: z.array(z.string()).optional(),
});

export type McpRouterAuthorityOptions = {
  serverUrl: string;
  apiKey?: string;
};

/**
 * Validates bearer tokens against an MCPRouter server's user endpoint.
 */
export class McpRouterAuthority implements Authority {
  #endpoint: URL;
  #apiKey: string | undefined;

  constructor(options: McpRouterAuthorityOptions) {
    try {
      this.#endpoint = new URL('/api/auth/user', options.serverUrl);
    }
    catch (error) {
      throw new AuthenticationSetupError(`Invalid MCPRouter server URL: ${options.serverUrl}`, { cause: error });
    }
    this.#apiKey = options.apiKey;
  }

  get endpoint(): string {
    return this.#endpoint.href;
  }

  async validate(token: string, signal: AbortSignal): Promise<Identity> {
    const headers: Record<string, string> = {
      accept: 'application/json',
      authorization: `Bearer ${token}`,
    };
    if (this.#apiKey !== undefined) {
      headers['x-api-key'] = this.#apiKey;
    }

    let response: Response;
    try {
      response = await fetch(this.#endpoint, { headers, signal });
    }
    catch (error) {
      throw new AuthUnavailableError(`Authentication authority is unreachable: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status === 401 || response.status === 403) {
      throw new UnauthorizedError('Bearer token was rejected');
    }
    if (!response.ok) {
      throw new AuthUnavailableError(`Authentication authority responded with HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    }
    catch (error) {
      throw new AuthUnavailableError('Authentication authority returned a malformed body', { cause: error });
    }
    const parsed = AuthorityUserSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthUnavailableError('Authentication authority returned an unexpected user payload');
    }
    const { id, role, roles } = parsed.data;
    return {
      subject: id,
      roles: roles ?? (role === undefined ? [] : [role]),
    };
  }
}
