import { ToolResolutionError } from '../errors.js';
import type { JsonObject, ToolSpecification } from '../llm/index.js';
import { createLogger } from '../logging.js';

export type { ToolSpecification } from '../llm/index.js';

export type ToolFilter =
  | { kind: 'include'; names: ReadonlySet<string> }
  | { kind: 'exclude'; names: ReadonlySet<string> };

export const ALLOW_ALL: ToolFilter = { kind: 'exclude', names: new Set() };

export interface ToolCallOptions {
  signal?: AbortSignal;
}

/**
 * A source of tools, typically one MCP server. `listTools` returns the already filtered catalog;
 * `callTool` returns the single text payload of the result.
 */
export interface ToolProvider {
  readonly name: string;
  listTools(options?: ToolCallOptions): Promise<ToolSpecification[]>;
  callTool(
    name: string,
    args: JsonObject | undefined,
    options?: ToolCallOptions,
  ): Promise<string>;
  close?(): Promise<void>;
}

const logger = createLogger('tools');

export function isToolAllowed(name: string, filter: ToolFilter = ALLOW_ALL): boolean {
  return filter.kind === 'include' ? filter.names.has(name) : !filter.names.has(name);
}

export function applyToolFilter<T extends { name: string }>(
  tools: T[],
  filter: ToolFilter = ALLOW_ALL,
): T[] {
  return tools.filter((tool) => isToolAllowed(tool.name, filter));
}

interface CatalogEntry {
  provider: ToolProvider;
  spec: ToolSpecification;
}

/**
 * Flattened name → provider routing for one request. A name registered twice is routed to the
 * provider registered last, and only that provider's definition is listed.
 */
export class ToolCatalog {
  private readonly entries = new Map<string, CatalogEntry>();

  register(provider: ToolProvider, spec: ToolSpecification): void {
    const existing = this.entries.get(spec.name);
    if (existing) {
      logger.warn(
        `Tool "${spec.name}" from "${provider.name}" shadows the one from ` +
          `"${existing.provider.name}"`,
      );
      this.entries.delete(spec.name);
    }

    this.entries.set(spec.name, { provider, spec });
  }

  get(name: string): ToolProvider | undefined {
    return this.entries.get(name)?.provider;
  }

  resolve(name: string): ToolProvider {
    const provider = this.get(name);
    if (!provider) {
      throw new ToolResolutionError(name);
    }
    return provider;
  }

  list(): ToolSpecification[] {
    return Array.from(this.entries.values(), (entry) => entry.spec);
  }

  get size(): number {
    return this.entries.size;
  }
}

export async function buildToolCatalog(
  providers: readonly ToolProvider[],
  options: ToolCallOptions = {},
): Promise<ToolCatalog> {
  const listings = await Promise.all(providers.map((provider) => provider.listTools(options)));
  const catalog = new ToolCatalog();

  providers.forEach((provider, index) => {
    for (const spec of listings[index] ?? []) {
      catalog.register(provider, spec);
    }
  });

  return catalog;
}
