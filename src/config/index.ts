import 'dotenv/config';

import { readFile } from 'node:fs/promises';

import {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  WorkspaceAgent,
} from '../agent/loop.js';
import { ConfigurationError, describeError } from '../errors.js';
import {
  createModelAdapter,
  type CreateModelAdapterOptions,
  type ModelAdapter,
} from '../llm/index.js';
import { createLogger } from '../logging.js';
import type { WorkspaceBinding } from '../server/index.js';
import type { ToolProvider } from '../tools/index.js';
import { connectMcpServer, type McpServerDefinition } from '../tools/mcp.js';
import {
  parseConfig,
  toMcpDefinition,
  toModelDefinition,
  type Environment,
  type GatewayConfig,
} from './schema.js';

export * from './schema.js';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export type ConnectToolServer = (
  name: string,
  definition: McpServerDefinition,
) => Promise<ToolProvider>;

export interface BuildGatewayOptions extends CreateModelAdapterOptions {
  connect?: ConnectToolServer;
}

export interface GatewayPlan {
  models: Map<string, ModelAdapter>;
  toolProviders: Map<string, ToolProvider>;
  bindings: WorkspaceBinding[];
}

const logger = createLogger('config');

export function resolveConfigPath(explicit?: string, env: Environment = process.env): string {
  return explicit ?? env.MCP_GATEWAY_CONFIG ?? DEFAULT_CONFIG_FILE;
}

export async function loadConfigFile(
  path: string,
  env: Environment = process.env,
): Promise<GatewayConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Couldn't read configuration file "${path}"`, { cause: error });
  }

  logger.debug(`Loaded configuration from ${path}`);
  return parseConfig(text, env);
}

/**
 * Names of the tool servers workspaces actually use. Fails on references to models or servers
 * that are not defined.
 */
export function validateReferences(config: GatewayConfig): Set<string> {
  const mcps = config.mcps ?? {};
  const used = new Set<string>();

  for (const [name, workspace] of Object.entries(config.workspaces)) {
    if (!(workspace.model in config.models)) {
      throw new ConfigurationError(`Workspace "${name}" uses undefined model "${workspace.model}"`);
    }

    for (const mcp of workspace.mcps ?? []) {
      if (!(mcp in mcps)) {
        throw new ConfigurationError(`Workspace "${name}" uses undefined MCP server "${mcp}"`);
      }
      used.add(mcp);
    }
  }

  return used;
}

export function createModels(
  config: GatewayConfig,
  options: CreateModelAdapterOptions = {},
): Map<string, ModelAdapter> {
  const models = new Map<string, ModelAdapter>();
  for (const [name, model] of Object.entries(config.models)) {
    models.set(name, createModelAdapter(name, toModelDefinition(model), options));
  }
  return models;
}

async function warmUp(models: Map<string, ModelAdapter>): Promise<void> {
  for (const [name, model] of models) {
    if (!model.warmUp) {
      continue;
    }

    try {
      await model.warmUp();
    } catch (error) {
      throw new ConfigurationError(`Model "${name}" couldn't acquire credentials`, {
        cause: error,
      });
    }
  }
}

async function closeAll(providers: Iterable<ToolProvider>): Promise<void> {
  for (const provider of providers) {
    try {
      await provider.close?.();
    } catch (error) {
      logger.warn(`Closing "${provider.name}" failed: ${describeError(error)}`);
    }
  }
}

/**
 * Turns a validated configuration into live objects: model adapters with their credentials
 * acquired, connected tool servers and one agent per workspace. Model adapters and tool
 * servers are shared by every workspace that names them.
 */
export async function buildGateway(
  config: GatewayConfig,
  options: BuildGatewayOptions = {},
): Promise<GatewayPlan> {
  const { connect = connectMcpServer, ...adapterOptions } = options;
  const usedMcps = validateReferences(config);
  const models = createModels(config, adapterOptions);
  const toolProviders = new Map<string, ToolProvider>();

  try {
    await warmUp(models);

    for (const [name, mcp] of Object.entries(config.mcps ?? {})) {
      if (!usedMcps.has(name)) {
        logger.warn(`MCP server "${name}" is not used by any workspace`);
        continue;
      }
      toolProviders.set(name, await connect(name, toMcpDefinition(mcp)));
    }
  } catch (error) {
    await closeAll(toolProviders.values());
    throw error;
  }

  const bindings: WorkspaceBinding[] = [];
  for (const [name, workspace] of Object.entries(config.workspaces)) {
    const model = models.get(workspace.model);
    if (!model) {
      throw new ConfigurationError(`Workspace "${name}" uses undefined model "${workspace.model}"`);
    }

    const providers: ToolProvider[] = [];
    for (const mcp of workspace.mcps ?? []) {
      const provider = toolProviders.get(mcp);
      if (provider) {
        providers.push(provider);
      }
    }

    bindings.push({
      path: workspace.config.path,
      address: workspace.config.address,
      port: workspace.config.port,
      agent: new WorkspaceAgent({
        name,
        model,
        toolProviders: providers,
        maxIterations: config.settings?.max_iterations ?? DEFAULT_MAX_ITERATIONS,
        timeoutMs: config.settings?.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
      }),
    });
  }

  return { models, toolProviders, bindings };
}

/**
 * Human-readable overview of a configuration, one line per entry.
 */
export function describeConfig(config: GatewayConfig): string[] {
  const lines: string[] = ['Models:'];
  for (const [name, model] of Object.entries(config.models)) {
    lines.push(`  ${name} (${model.type})`);
  }

  const mcps = Object.entries(config.mcps ?? {});
  if (mcps.length > 0) {
    lines.push('MCP servers:');
    for (const [name, mcp] of mcps) {
      lines.push(`  ${name} (${'command' in mcp ? `stdio: ${mcp.command}` : `http: ${mcp.url}`})`);
    }
  }

  lines.push('Workspaces:');
  for (const [name, workspace] of Object.entries(config.workspaces)) {
    const { address, port, path } = workspace.config;
    const tools = workspace.mcps?.length ? ` + ${workspace.mcps.join(', ')}` : '';
    lines.push(`  ${name}: POST http://${address}:${port}${path} → ${workspace.model}${tools}`);
  }

  return lines;
}
