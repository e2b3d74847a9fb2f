import { createServer, type Server } from 'node:http';

import type { WorkspaceAgent } from '../agent/loop.js';
import { ConfigurationError, describeError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { ToolProvider } from '../tools/index.js';
import { createListenerApp } from './app.js';
import { WorkspaceRouter } from './router.js';

export { createListenerApp } from './app.js';
export { WorkspaceRouter } from './router.js';

export interface WorkspaceBinding {
  path: string;
  address: string;
  port: number;
  agent: WorkspaceAgent;
}

export interface Listener {
  address: string;
  port: number;
  router: WorkspaceRouter;
  server: Server;
}

const logger = createLogger('gateway');

export function listenerKey(address: string, port: number): string {
  return `${address}:${port}`;
}

/**
 * Groups workspaces sharing an address and port into one routing table.
 */
export function groupBindings(
  bindings: readonly WorkspaceBinding[],
): Map<string, { address: string; port: number; routes: Map<string, WorkspaceAgent> }> {
  const groups = new Map<
    string,
    { address: string; port: number; routes: Map<string, WorkspaceAgent> }
  >();

  for (const binding of bindings) {
    if (!binding.path.startsWith('/')) {
      throw new ConfigurationError(
        `Workspace "${binding.agent.name}": path "${binding.path}" must start with "/"`,
      );
    }

    const key = listenerKey(binding.address, binding.port);
    let group = groups.get(key);
    if (!group) {
      group = { address: binding.address, port: binding.port, routes: new Map() };
      groups.set(key, group);
    }

    const existing = group.routes.get(binding.path);
    if (existing) {
      throw new ConfigurationError(
        `Workspaces "${existing.name}" and "${binding.agent.name}" both use ${key}${binding.path}`,
      );
    }
    group.routes.set(binding.path, binding.agent);
  }

  return groups;
}

function listen(server: Server, port: number, address: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, address);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

export class Gateway {
  private constructor(
    readonly listeners: readonly Listener[],
    private readonly toolProviders: readonly ToolProvider[],
  ) {}

  /**
   * Binds one HTTP server per distinct address and port. If any bind fails, the servers already
   * started are closed again before the error is rethrown.
   */
  static async start(
    bindings: readonly WorkspaceBinding[],
    toolProviders: readonly ToolProvider[] = [],
  ): Promise<Gateway> {
    const listeners: Listener[] = [];

    try {
      for (const group of groupBindings(bindings).values()) {
        const router = new WorkspaceRouter(group.routes);
        listeners.push(await startListener(router, group.address, group.port));
      }
    } catch (error) {
      await Promise.allSettled(listeners.map((listener) => closeServer(listener.server)));
      throw error;
    }

    return new Gateway(listeners, toolProviders);
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled([
      ...this.listeners.map((listener) => closeServer(listener.server)),
      ...this.toolProviders.map((provider) => provider.close?.()),
    ]);

    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn(`Shutdown step failed: ${describeError(result.reason)}`);
      }
    }
    logger.info('Gateway stopped');
  }
}

async function startListener(
  router: WorkspaceRouter,
  address: string,
  port: number,
): Promise<Listener> {
  const server = createServer(createListenerApp(router));
  await listen(server, port, address);

  const bound = server.address();
  const actualPort = bound !== null && typeof bound === 'object' ? bound.port : port;
  logger.info(`Listening on ${listenerKey(address, actualPort)}: ${router.paths().join(', ')}`);
  return { address, port: actualPort, router, server };
}
