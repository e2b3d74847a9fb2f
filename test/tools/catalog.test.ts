import { describe, expect, it, vi } from 'vitest';

import { ToolProviderError, ToolResolutionError } from '../../src/errors.js';
import {
  ALLOW_ALL,
  ToolCatalog,
  applyToolFilter,
  buildToolCatalog,
  type ToolFilter,
  type ToolProvider,
  type ToolSpecification,
} from '../../src/tools/index.js';

function spec(name: string, description = `${name} tool`): ToolSpecification {
  return { name, description, inputSchema: { type: 'object' } };
}

function provider(name: string, tools: ToolSpecification[]): ToolProvider {
  return {
    name,
    listTools: vi.fn(async () => tools),
    callTool: vi.fn(async (tool: string) => `${name}:${tool}`),
  };
}

describe('applyToolFilter', () => {
  const tools = [spec('a'), spec('b'), spec('c')];
  const names = (filter: ToolFilter) => applyToolFilter(tools, filter).map((tool) => tool.name);

  it('keeps only included names', () => {
    expect(names({ kind: 'include', names: new Set(['a']) })).toEqual(['a']);
  });

  it('drops excluded names', () => {
    expect(names({ kind: 'exclude', names: new Set(['a']) })).toEqual(['b', 'c']);
  });

  it('keeps everything without a filter', () => {
    expect(names(ALLOW_ALL)).toEqual(['a', 'b', 'c']);
  });
});

describe('ToolCatalog', () => {
  it('routes each name to its provider', async () => {
    const files = provider('files', [spec('read'), spec('write')]);
    const web = provider('web', [spec('fetch')]);

    const catalog = await buildToolCatalog([files, web]);

    expect(catalog.list().map((tool) => tool.name)).toEqual(['read', 'write', 'fetch']);
    expect(catalog.resolve('fetch')).toBe(web);
    expect(catalog.get('read')).toBe(files);
    expect(catalog.size).toBe(3);
  });

  it('lets the last registration win and lists a single definition', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const first = provider('first', [spec('search', 'first search'), spec('only-first')]);
    const second = provider('second', [spec('search', 'second search')]);

    const catalog = await buildToolCatalog([first, second]);

    expect(catalog.list()).toEqual([
      spec('only-first'),
      { name: 'search', description: 'second search', inputSchema: { type: 'object' } },
    ]);
    expect(catalog.resolve('search')).toBe(second);
    expect(warn).toHaveBeenCalledWith(
      expect.any(String),
      'Tool "search" from "second" shadows the one from "first"',
    );
  });

  it('throws a resolution error for an unknown name', () => {
    const catalog = new ToolCatalog();

    expect(() => catalog.resolve('missing')).toThrow(ToolResolutionError);
    expect(() => catalog.resolve('missing')).toThrow("Function doesn't exist");
  });

  it('fails when a provider cannot list its tools', async () => {
    const broken: ToolProvider = {
      name: 'broken',
      listTools: vi.fn(async () => {
        throw new ToolProviderError('broken');
      }),
      callTool: vi.fn(async () => ''),
    };

    await expect(buildToolCatalog([provider('ok', [spec('a')]), broken])).rejects.toMatchObject({
      status: 500,
      message: 'Tool server "broken" is unavailable',
    });
  });
});
