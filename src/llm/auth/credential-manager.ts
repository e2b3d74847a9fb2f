import { Mutex } from '../../concurrency/locks.js';
import {
  ConfigurationError,
  TokenRefreshError,
  TransportError,
  describeError,
} from '../../errors.js';
import { createLogger } from '../../logging.js';
import { type AccessToken, requestClientCredentialsToken } from './oauth2.js';
import type { Auth, ClientCredentials } from './types.js';

const logger = createLogger('credentials');

export interface CredentialManagerOptions {
  baseUrl: string;
  auth: Auth;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  fetch?: typeof fetch;
  now?: () => number;
}

/**
 * Endpoint settings shared by every HTTP-backed model adapter.
 */
export interface EndpointOptions {
  url: string;
  auth: Auth;
  fetch?: typeof fetch;
  now?: () => number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * Authenticated POST capability bound to one upstream endpoint. Static API keys are baked into
 * the headers or the resolved URL at construction; OAuth2 tokens are cached and refreshed on
 * demand.
 */
export class CredentialManager {
  readonly url: URL;

  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly credentials?: ClientCredentials;
  private readonly tokenLock = new Mutex();
  private cachedToken?: AccessToken;

  constructor(options: CredentialManagerOptions) {
    const params = { ...options.params };
    const headers: Record<string, string> = { ...options.headers };
    const { auth } = options;

    if (auth.kind === 'api_key') {
      if (auth.location.kind === 'header') {
        headers[auth.location.name] = auth.location.value;
      } else {
        params[auth.location.name] = auth.location.value;
      }
    } else if (auth.kind === 'oauth2') {
      assertValidUrl(auth.tokenUrl, 'token URL');
      this.credentials = {
        tokenUrl: auth.tokenUrl,
        clientId: auth.clientId,
        clientSecret: auth.clientSecret,
        ...(auth.scope ? { scope: auth.scope } : {}),
      };
    }

    this.url = resolveUrl(options.baseUrl, params);
    this.headers = headers;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetches the first OAuth2 token ahead of traffic. No-op for the other auth modes.
   */
  async prime(options: CallOptions = {}): Promise<void> {
    if (this.credentials) {
      await this.currentToken(this.credentials, options.signal);
    }
  }

  async call(url: URL, body: unknown, options: CallOptions = {}): Promise<string> {
    const headers: Record<string, string> = {
      'content-type': 'application/json',
      ...this.headers,
    };

    if (this.credentials) {
      const token = await this.currentToken(this.credentials, options.signal);
      headers.authorization = `Bearer ${token}`;
    }

    const target = `${url.origin}${url.pathname}`;
    logger.debug(`POST ${target}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: options.signal,
      });
    } catch (error) {
      throw new TransportError(undefined, `Request to ${url.host} failed`, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new TransportError(
        response.ok ? undefined : response.status,
        `Reading response from ${url.host} failed`,
        { cause: error },
      );
    }

    if (!response.ok) {
      logger.warn(`${target} responded with status ${response.status}`);
      logger.debug(`Upstream error body: ${text}`);
      throw new TransportError(
        response.status,
        `Upstream responded with status ${response.status}`,
      );
    }

    logger.debug(`Response from ${target}: ${text}`);
    return text;
  }

  /**
   * Check, refresh and store happen under the lock; the caller issues its request after the lock
   * is released. A caller that waited behind a refresh sees the new expiry and reuses the token.
   */
  private async currentToken(
    credentials: ClientCredentials,
    signal?: AbortSignal,
  ): Promise<string> {
    return this.tokenLock.runExclusive(async () => {
      const cached = this.cachedToken;
      if (cached && cached.expiresAt > this.now()) {
        return cached.token;
      }

      logger.debug(`Requesting client-credentials token from ${credentials.tokenUrl}`);
      try {
        const fresh = await requestClientCredentialsToken(credentials, {
          fetch: this.fetchImpl,
          now: this.now,
          signal,
        });
        this.cachedToken = fresh;
        return fresh.token;
      } catch (error) {
        logger.error(`Couldn't get token: ${describeError(error)}`);
        throw error instanceof TokenRefreshError ? error : new TokenRefreshError({ cause: error });
      }
    });
  }
}

function assertValidUrl(value: string, label: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${label} "${value}"`, { cause: error });
  }
}

export function resolveUrl(baseUrl: string, params: Record<string, string>): URL {
  const url = assertValidUrl(baseUrl, 'URL');
  for (const [name, value] of Object.entries(params)) {
    url.searchParams.set(name, value);
  }
  return url;
}
