import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';

import {
  ConfigurationError,
  ProtocolError,
  ToolExecutionError,
  ToolProviderError,
  describeError,
} from '../errors.js';
import type { Auth, JsonObject, ToolSpecification } from '../llm/index.js';
import { createLogger } from '../logging.js';
import packageJson from '../../package.json' with { type: 'json' };
import {
  ALLOW_ALL,
  applyToolFilter,
  type ToolCallOptions,
  type ToolFilter,
  type ToolProvider,
} from './index.js';

export const CLIENT_INFO = { name: packageJson.name, version: packageJson.version };

export interface McpToolDescriptor {
  name: string;
  description?: string;
  inputSchema: JsonObject;
}

/**
 * The part of the SDK client the gateway relies on.
 */
export interface McpSession {
  listTools(
    params?: { cursor?: string },
    options?: { signal?: AbortSignal },
  ): Promise<{ tools: McpToolDescriptor[]; nextCursor?: string }>;
  callTool(
    params: { name: string; arguments?: Record<string, unknown> },
    resultSchema?: undefined,
    options?: { signal?: AbortSignal },
  ): Promise<unknown>;
  close(): Promise<void>;
}

export type McpServerDefinition =
  | {
      transport: 'stdio';
      command: string;
      args?: string[];
      env?: Record<string, string>;
      filter?: ToolFilter;
    }
  | {
      transport: 'http';
      url: string;
      sse?: boolean;
      auth: Auth;
      filter?: ToolFilter;
    };

const callToolResultSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      annotations: z.unknown().optional(),
    }),
  ),
  isError: z.boolean().optional(),
});

const logger = createLogger('mcp');

export class McpToolProvider implements ToolProvider {
  constructor(
    readonly name: string,
    private readonly session: McpSession,
    private readonly filter: ToolFilter = ALLOW_ALL,
  ) {}

  async listTools(options: ToolCallOptions = {}): Promise<ToolSpecification[]> {
    const tools: ToolSpecification[] = [];
    let cursor: string | undefined;

    do {
      let page: Awaited<ReturnType<McpSession['listTools']>>;
      try {
        page = await this.session.listTools(cursor ? { cursor } : undefined, {
          signal: options.signal,
        });
      } catch (error) {
        logger.error(`Listing tools of "${this.name}" failed: ${describeError(error)}`);
        throw new ToolProviderError(this.name, { cause: error });
      }

      for (const tool of page.tools) {
        tools.push({
          name: tool.name,
          ...(tool.description !== undefined ? { description: tool.description } : {}),
          inputSchema: tool.inputSchema,
        });
      }
      cursor = page.nextCursor;
    } while (cursor);

    return applyToolFilter(tools, this.filter);
  }

  async callTool(
    name: string,
    args: JsonObject | undefined,
    options: ToolCallOptions = {},
  ): Promise<string> {
    let result: unknown;
    try {
      result = await this.session.callTool(
        { name, ...(args ? { arguments: args } : {}) },
        undefined,
        { signal: options.signal },
      );
    } catch (error) {
      logger.error(`Calling "${name}" on "${this.name}" failed: ${describeError(error)}`);
      throw new ToolExecutionError(name, { cause: error });
    }

    return extractText(name, result);
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

export function extractText(toolName: string, result: unknown): string {
  const parsed = callToolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new ProtocolError('Unsupported tool response', `"${toolName}" returned no content list`);
  }

  const { content, isError } = parsed.data;
  if (isError) {
    logger.error(`Tool "${toolName}" reported an error`, content);
  } else {
    logger.debug(`Tool "${toolName}" answered`, content);
  }

  const [item] = content;
  if (!item || content.length !== 1) {
    throw new ProtocolError(
      'Unsupported tool response',
      `"${toolName}" returned ${content.length} content items`,
    );
  }

  if (item.annotations !== undefined) {
    logger.warn(`Annotations on "${toolName}" results are not handled`);
  }

  if (item.type !== 'text' || typeof item.text !== 'string') {
    throw new ProtocolError(
      'Unsupported tool response',
      `"${toolName}" returned ${item.type} content`,
    );
  }

  return item.text;
}

function inheritedEnvironment(overrides: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === 'string') {
      env[key] = value;
    }
  }
  return { ...env, ...overrides };
}

export function createTransport(name: string, definition: McpServerDefinition): Transport {
  if (definition.transport === 'stdio') {
    return new StdioClientTransport({
      command: definition.command,
      args: definition.args ?? [],
      env: inheritedEnvironment(definition.env),
    });
  }

  const { auth } = definition;
  let url: URL;
  try {
    url = new URL(definition.url);
  } catch (error) {
    throw new ConfigurationError(`MCP server "${name}": invalid URL "${definition.url}"`, {
      cause: error,
    });
  }

  const headers: Record<string, string> = {};
  if (auth.kind === 'oauth2') {
    throw new ConfigurationError(`MCP server "${name}": OAuth2 is not supported for tool servers`);
  }
  if (auth.kind === 'api_key') {
    if (auth.location.kind === 'header') {
      headers[auth.location.name] = auth.location.value;
    } else {
      url.searchParams.set(auth.location.name, auth.location.value);
    }
  }

  const requestInit = { headers };
  return definition.sse
    ? new SSEClientTransport(url, { requestInit })
    : new StreamableHTTPClientTransport(url, { requestInit });
}

export async function connectMcpServer(
  name: string,
  definition: McpServerDefinition,
): Promise<McpToolProvider> {
  const transport = createTransport(name, definition);
  const client = new Client(CLIENT_INFO, { capabilities: {} });

  try {
    await client.connect(transport);
  } catch (error) {
    throw new ConfigurationError(`Couldn't connect to MCP server "${name}"`, { cause: error });
  }

  logger.info(`Connected to MCP server "${name}"`);
  return new McpToolProvider(name, client, definition.filter);
}
