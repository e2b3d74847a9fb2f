import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from '../errors.js';
import type { Auth, ModelDefinition } from '../llm/index.js';
import { NO_AUTH } from '../llm/auth/types.js';
import type { ToolFilter } from '../tools/index.js';
import { ALLOW_ALL } from '../tools/index.js';
import type { McpServerDefinition } from '../tools/mcp.js';

export const DEFAULT_PORT = 7000;
export const DEFAULT_ADDRESS = '127.0.0.1';

const nonEmpty = z.string().min(1);

const apiKeySchema = z.discriminatedUnion('location', [
  z.object({
    location: z.literal('header'),
    name: nonEmpty,
    value: z.string(),
    prefix: z.string().optional(),
  }),
  z.object({
    location: z.literal('parameter'),
    name: nonEmpty,
    value: z.string(),
  }),
]);

const authSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('apikey'), config: apiKeySchema }),
  z.object({
    type: z.literal('oauth2'),
    config: z.object({
      url: nonEmpty,
      client_id: nonEmpty,
      client_secret: z.string(),
      scope: z.string().optional(),
    }),
  }),
]);

const modelSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('openai'),
    url: nonEmpty,
    model: nonEmpty,
    auth: authSchema.optional(),
  }),
  z.object({
    type: z.literal('azure'),
    url: nonEmpty,
    'api-version': nonEmpty,
    auth: authSchema.optional(),
  }),
  z.object({
    type: z.literal('anthropic'),
    url: nonEmpty,
    model: nonEmpty,
    'anthropic-version': nonEmpty.optional(),
    auth: authSchema.optional(),
  }),
  z.object({ type: z.literal('gemini'), url: nonEmpty, auth: authSchema.optional() }),
  z.object({ type: z.literal('mock'), model: nonEmpty.optional() }),
]);

const filterSchema = z.union([
  z.object({ include: z.array(z.string()) }).strict(),
  z.object({ exclude: z.array(z.string()) }).strict(),
]);

const mcpSchema = z.union([
  z.object({
    command: nonEmpty,
    args: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
    env: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).optional(),
    filter: filterSchema.optional(),
  }),
  z.object({
    url: nonEmpty,
    sse: z.boolean().optional(),
    auth: authSchema.optional(),
    filter: filterSchema.optional(),
  }),
]);

const workspaceSchema = z.object({
  model: nonEmpty,
  mcps: z.array(nonEmpty).optional(),
  config: z.object({
    path: z.string().startsWith('/', { message: 'Path must start with "/"' }),
    port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
    address: nonEmpty.default(DEFAULT_ADDRESS),
  }),
});

export const configSchema = z.object({
  settings: z
    .object({
      request_timeout_ms: z.number().int().positive().optional(),
      max_iterations: z.number().int().positive().optional(),
    })
    .optional(),
  models: z.record(modelSchema),
  mcps: z.record(mcpSchema).optional(),
  workspaces: z.record(workspaceSchema),
});

export type GatewayConfig = z.infer<typeof configSchema>;
export type ModelConfig = z.infer<typeof modelSchema>;
export type McpConfig = z.infer<typeof mcpSchema>;
export type AuthConfig = z.infer<typeof authSchema>;
export type FilterConfig = z.infer<typeof filterSchema>;
export type WorkspaceConfig = z.infer<typeof workspaceSchema>;

export type Environment = Record<string, string | undefined>;

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces `${NAME}` in every string of the parsed document with the matching environment
 * variable.
 */
export function interpolateEnv(value: unknown, env: Environment, path: string[] = []): unknown {
  if (typeof value === 'string') {
    return value.replace(VARIABLE_PATTERN, (_match, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        throw new ConfigurationError(
          `Environment variable "${name}" is not set (at ${path.join('.') || '<root>'})`,
        );
      }
      return replacement;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateEnv(item, env, [...path, String(index)]));
  }

  if (typeof value === 'object' && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = interpolateEnv(nested, env, [...path, key]);
    }
    return result;
  }

  return value;
}

export function parseConfig(text: string, env: Environment = process.env): GatewayConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const reason = error instanceof YAMLParseError ? error.message : 'unreadable YAML';
    throw new ConfigurationError(`Invalid configuration: ${reason}`, { cause: error });
  }

  const parsed = configSchema.safeParse(interpolateEnv(document, env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  return parsed.data;
}

export function toAuth(config: AuthConfig | undefined): Auth {
  if (!config) {
    return NO_AUTH;
  }

  if (config.type === 'oauth2') {
    return {
      kind: 'oauth2',
      tokenUrl: config.config.url,
      clientId: config.config.client_id,
      clientSecret: config.config.client_secret,
      ...(config.config.scope !== undefined ? { scope: config.config.scope } : {}),
    };
  }

  const apiKey = config.config;
  if (apiKey.location === 'parameter') {
    return {
      kind: 'api_key',
      location: { kind: 'params', name: apiKey.name, value: apiKey.value },
    };
  }

  return {
    kind: 'api_key',
    location: {
      kind: 'header',
      name: apiKey.name,
      value: apiKey.prefix ? `${apiKey.prefix} ${apiKey.value}` : apiKey.value,
    },
  };
}

export function toModelDefinition(config: ModelConfig): ModelDefinition {
  switch (config.type) {
    case 'openai':
      return { type: 'openai', url: config.url, model: config.model, auth: toAuth(config.auth) };
    case 'azure':
      return {
        type: 'azure',
        url: config.url,
        apiVersion: config['api-version'],
        auth: toAuth(config.auth),
      };
    case 'anthropic':
      return {
        type: 'anthropic',
        url: config.url,
        model: config.model,
        ...(config['anthropic-version'] !== undefined
          ? { anthropicVersion: config['anthropic-version'] }
          : {}),
        auth: toAuth(config.auth),
      };
    case 'gemini':
      return { type: 'gemini', url: config.url, auth: toAuth(config.auth) };
    case 'mock':
      return { type: 'mock', ...(config.model !== undefined ? { model: config.model } : {}) };
  }
}

export function toToolFilter(config: FilterConfig | undefined): ToolFilter {
  if (!config) {
    return ALLOW_ALL;
  }

  return 'include' in config
    ? { kind: 'include', names: new Set(config.include) }
    : { kind: 'exclude', names: new Set(config.exclude) };
}

export function toMcpDefinition(config: McpConfig): McpServerDefinition {
  if ('command' in config) {
    return {
      transport: 'stdio',
      command: config.command,
      args: config.args ?? [],
      env: config.env ?? {},
      filter: toToolFilter(config.filter),
    };
  }

  return {
    transport: 'http',
    url: config.url,
    sse: config.sse ?? false,
    auth: toAuth(config.auth),
    filter: toToolFilter(config.filter),
  };
}
