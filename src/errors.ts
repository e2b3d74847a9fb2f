/**
 * Base error for the gateway. Every error that can reach a caller carries the HTTP status it maps
 * to and a short message safe to return in the `{ status, message }` body.
 */
export class GatewayError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GatewayError';
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid or inconsistent configuration. Raised while wiring the gateway at startup.
 */
export class ConfigurationError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-2xx answer or network failure while talking to an upstream provider.
 */
export class TransportError extends GatewayError {
  constructor(status: number | undefined, message: string, options?: { cause?: unknown }) {
    super(status ?? 500, message, options);
    this.name = 'TransportError';
  }
}

/**
 * The OAuth2 client-credentials exchange failed.
 */
export class TokenRefreshError extends GatewayError {
  constructor(options?: { cause?: unknown }) {
    super(500, "Couldn't renew token", options);
    this.name = 'TokenRefreshError';
  }
}

/**
 * A provider or tool server answered with something the gateway cannot represent.
 */
export class ProtocolError extends GatewayError {
  readonly detail?: string;

  constructor(message: string, detail?: string) {
    super(500, message);
    this.name = 'ProtocolError';
    this.detail = detail;
  }
}

/**
 * The model asked for a tool that no provider of the workspace exposes.
 */
export class ToolResolutionError extends GatewayError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(404, "Function doesn't exist");
    this.name = 'ToolResolutionError';
    this.toolName = toolName;
  }
}

export class ToolExecutionError extends GatewayError {
  readonly toolName: string;

  constructor(toolName: string, options?: { cause?: unknown }) {
    super(500, `Tool "${toolName}" failed`, options);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

/**
 * A tool server could not be reached while listing its tools.
 */
export class ToolProviderError extends GatewayError {
  readonly providerName: string;

  constructor(providerName: string, options?: { cause?: unknown }) {
    super(500, `Tool server "${providerName}" is unavailable`, options);
    this.name = 'ToolProviderError';
    this.providerName = providerName;
  }
}

export class IterationLimitError extends GatewayError {
  readonly limit: number;

  constructor(limit: number) {
    super(500, 'Maximum tool-calling iterations reached');
    this.name = 'IterationLimitError';
    this.limit = limit;
  }
}

export class RequestTimeoutError extends GatewayError {
  constructor() {
    super(504, 'Request timed out');
    this.name = 'RequestTimeoutError';
  }
}

/**
 * The caller's body could not be turned into a conversation.
 */
export class RequestError extends GatewayError {
  constructor(message: string) {
    super(400, message);
    this.name = 'RequestError';
  }
}

export interface ErrorBody {
  status: number;
  message: string;
}

export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof GatewayError) {
    return { status: error.status, message: error.message };
  }

  return { status: 500, message: 'Internal server error' };
}

export function describeError(error: unknown): string {
  if (error instanceof ProtocolError && error.detail) {
    return `${error.message}: ${error.detail}`;
  }

  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }

  return String(error);
}
