export type AuthLocation =
  | { kind: 'header'; name: string; value: string }
  | { kind: 'params'; name: string; value: string };

export interface ClientCredentials {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  scope?: string;
}

export type Auth =
  | { kind: 'api_key'; location: AuthLocation }
  | ({ kind: 'oauth2' } & ClientCredentials)
  | { kind: 'none' };

export const NO_AUTH: Auth = { kind: 'none' };
