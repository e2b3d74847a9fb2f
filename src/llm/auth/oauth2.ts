import { z } from 'zod';

import { TokenRefreshError } from '../../errors.js';
import type { ClientCredentials } from './types.js';

export interface AccessToken {
  token: string;
  /** Epoch milliseconds after which the token must not be used. */
  expiresAt: number;
}

export interface TokenRequestOptions {
  fetch: typeof fetch;
  now: () => number;
  signal?: AbortSignal;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().finite().nonnegative(),
});

function basicAuthorization(clientId: string, clientSecret: string): string {
  const pair = `${encodeURIComponent(clientId)}:${encodeURIComponent(clientSecret)}`;
  return `Basic ${Buffer.from(pair).toString('base64')}`;
}

/**
 * Runs the OAuth2 client-credentials grant against the token endpoint. Every failure is reported
 * as a TokenRefreshError carrying the underlying cause.
 */
export async function requestClientCredentialsToken(
  credentials: ClientCredentials,
  options: TokenRequestOptions,
): Promise<AccessToken> {
  const form = new URLSearchParams({ grant_type: 'client_credentials' });
  if (credentials.scope) {
    form.set('scope', credentials.scope);
  }

  const requestedAt = options.now();

  let response: Response;
  try {
    response = await options.fetch(credentials.tokenUrl, {
      method: 'POST',
      headers: {
        accept: 'application/json',
        authorization: basicAuthorization(credentials.clientId, credentials.clientSecret),
        'content-type': 'application/x-www-form-urlencoded',
      },
      body: form.toString(),
      signal: options.signal,
    });
  } catch (error) {
    throw new TokenRefreshError({ cause: error });
  }

  if (!response.ok) {
    throw new TokenRefreshError({
      cause: new Error(`Token endpoint responded with status ${response.status}`),
    });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new TokenRefreshError({ cause: error });
  }

  const parsed = tokenResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TokenRefreshError({
      cause: new Error('Token response is missing access_token or expires_in'),
    });
  }

  return {
    token: parsed.data.access_token,
    expiresAt: requestedAt + parsed.data.expires_in * 1000,
  };
}
