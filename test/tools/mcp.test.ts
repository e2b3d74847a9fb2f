import { describe, expect, it, vi } from 'vitest';

import {
  ConfigurationError,
  ProtocolError,
  ToolExecutionError,
  ToolProviderError,
} from '../../src/errors.js';
import {
  CLIENT_INFO,
  McpToolProvider,
  createTransport,
  type McpSession,
} from '../../src/tools/mcp.js';
import packageJson from '../../package.json' with { type: 'json' };

function createSession(callResult: unknown = { content: [{ type: 'text', text: 'ok' }] }) {
  const listTools = vi.fn<McpSession['listTools']>(async (params) =>
    params?.cursor === 'page-2'
      ? { tools: [{ name: 'write_file', inputSchema: { type: 'object' } }] }
      : {
          tools: [
            { name: 'read_file', description: 'Reads a file', inputSchema: { type: 'object' } },
            { name: 'delete_file', description: 'Deletes a file', inputSchema: { type: 'object' } },
          ],
          nextCursor: 'page-2',
        },
  );
  const callTool = vi.fn<McpSession['callTool']>(async () => callResult);
  const close = vi.fn<McpSession['close']>(async () => undefined);

  return { session: { listTools, callTool, close }, listTools, callTool, close };
}

describe('McpToolProvider', () => {
  it('follows pagination and applies the filter', async () => {
    const { session, listTools } = createSession();
    const provider = new McpToolProvider('files', session, {
      kind: 'exclude',
      names: new Set(['delete_file']),
    });

    const tools = await provider.listTools();

    expect(listTools).toHaveBeenCalledTimes(2);
    expect(listTools.mock.calls[0]?.[0]).toBeUndefined();
    expect(listTools.mock.calls[1]?.[0]).toEqual({ cursor: 'page-2' });
    expect(tools).toEqual([
      { name: 'read_file', description: 'Reads a file', inputSchema: { type: 'object' } },
      { name: 'write_file', inputSchema: { type: 'object' } },
    ]);
  });

  it('reports a listing failure as an unavailable tool server', async () => {
    const { session, listTools } = createSession();
    listTools.mockRejectedValueOnce(new Error('connection reset'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(new McpToolProvider('files', session).listTools()).rejects.toBeInstanceOf(
      ToolProviderError,
    );
  });

  it('returns the single text item of a result', async () => {
    const { session, callTool } = createSession({
      content: [{ type: 'text', text: 'hello from the file' }],
    });
    const provider = new McpToolProvider('files', session);
    const signal = new AbortController().signal;

    const output = await provider.callTool('read_file', { path: '/tmp/a.txt' }, { signal });

    expect(output).toBe('hello from the file');
    expect(callTool).toHaveBeenCalledWith(
      { name: 'read_file', arguments: { path: '/tmp/a.txt' } },
      undefined,
      { signal },
    );
  });

  it('omits arguments the model did not send', async () => {
    const { session, callTool } = createSession();

    await new McpToolProvider('files', session).callTool('list', undefined);

    expect(callTool.mock.calls[0]?.[0]).toEqual({ name: 'list' });
  });

  it('passes error results through to the model and logs them', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { session } = createSession({
      content: [{ type: 'text', text: 'no such file' }],
      isError: true,
    });

    const output = await new McpToolProvider('files', session).callTool('read_file', {});

    expect(output).toBe('no such file');
    expect(error).toHaveBeenCalledTimes(1);
  });

  it.each([
    ['no content items', { content: [] }],
    [
      'several content items',
      {
        content: [
          { type: 'text', text: 'a' },
          { type: 'text', text: 'b' },
        ],
      },
    ],
    ['an image item', { content: [{ type: 'image', data: 'AAAA', mimeType: 'image/png' }] }],
    ['no content list', { structuredContent: { value: 1 } }],
  ])('rejects a result with %s', async (_label, result) => {
    const { session } = createSession(result);

    const failure = new McpToolProvider('files', session).callTool('read_file', {});

    await expect(failure).rejects.toBeInstanceOf(ProtocolError);
    await expect(failure).rejects.toThrow('Unsupported tool response');
  });

  it('reports a failed call as a tool execution error', async () => {
    const { session, callTool } = createSession();
    callTool.mockRejectedValueOnce(new Error('server crashed'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const failure = new McpToolProvider('files', session).callTool('read_file', {});

    await expect(failure).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(failure).rejects.toThrow('Tool "read_file" failed');
  });

  it('closes the session', async () => {
    const { session, close } = createSession();

    await new McpToolProvider('files', session).close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});

describe('createTransport', () => {
  it('refuses OAuth2 for remote tool servers', () => {
    expect(() =>
      createTransport('remote', {
        transport: 'http',
        url: 'https://tools.test/mcp',
        auth: {
          kind: 'oauth2',
          tokenUrl: 'https://auth.test/token',
          clientId: 'client',
          clientSecret: 'test-secret',
        },
      }),
    ).toThrow(ConfigurationError);
  });

  it('rejects an invalid URL', () => {
    expect(() =>
      createTransport('remote', { transport: 'http', url: 'nope', auth: { kind: 'none' } }),
    ).toThrow('MCP server "remote": invalid URL "nope"');
  });
});

describe('CLIENT_INFO', () => {
  it('announces the package name and version to tool servers', () => {
    expect(CLIENT_INFO).toEqual({ name: 'llm-mcp-gateway', version: packageJson.version });
  });
});
