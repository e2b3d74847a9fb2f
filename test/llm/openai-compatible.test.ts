import { describe, expect, it, vi } from 'vitest';

import { ProtocolError, RequestError } from '../../src/errors.js';
import { OpenAICompatibleAdapter } from '../../src/llm/clients/openai-compatible.js';
import type { Conversation, ToolSpecification } from '../../src/llm/types.js';
import { createFetchMock, jsonResponse, requestJson, requestUrl } from '../helpers.js';

const ENDPOINT = 'https://llm.test/v1/chat/completions';
const USAGE = { prompt_tokens: 111, completion_tokens: 7, total_tokens: 118 };

function chatCompletion(...choices: Array<Record<string, unknown>>) {
  return { id: 'chatcmpl-1', object: 'chat.completion', choices, usage: USAGE };
}

function createAdapter(body: unknown) {
  const fetchMock = createFetchMock(() => jsonResponse(body));
  const adapter = new OpenAICompatibleAdapter({
    name: 'gpt',
    url: ENDPOINT,
    model: 'gpt-test',
    auth: {
      kind: 'api_key',
      location: { kind: 'header', name: 'authorization', value: 'Bearer test-secret' },
    },
    fetch: fetchMock,
  });
  return { adapter, fetchMock };
}

const USER_ONLY: Conversation = { messages: [{ kind: 'text', role: 'user', content: 'Hi' }] };

describe('OpenAICompatibleAdapter', () => {
  it('maps the conversation and tools, and parses tool calls from the response', async () => {
    const { adapter, fetchMock } = createAdapter(
      chatCompletion({
        index: 0,
        finish_reason: 'tool_calls',
        message: {
          role: 'assistant',
          content: 'Working on it.',
          tool_calls: [
            {
              id: 'call-2',
              type: 'function',
              function: { name: 'compute', arguments: '{"value":84}' },
            },
          ],
        },
      }),
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const conversation: Conversation = {
      messages: [
        { kind: 'text', role: 'system', content: 'Stay concise.' },
        { kind: 'text', role: 'user', content: 'Compute something.' },
        {
          kind: 'tool_calls',
          role: 'assistant',
          calls: [{ id: 'call-1', name: 'compute', arguments: { value: 21 } }],
        },
        { kind: 'tool_output', callId: 'call-1', output: '42' },
      ],
      temperature: 0.2,
      maxTokens: 512,
    };

    const tools: ToolSpecification[] = [
      {
        name: 'compute',
        description: 'Performs a computation',
        inputSchema: { type: 'object', properties: { value: { type: 'number' } } },
      },
      { name: 'ping', inputSchema: { type: 'object' } },
    ];

    const response = await adapter.call(conversation, tools);

    expect(requestUrl(fetchMock)).toBe(ENDPOINT);
    expect(requestJson(fetchMock)).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: 'Stay concise.' },
        { role: 'user', content: 'Compute something.' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: 'call-1',
              type: 'function',
              function: { name: 'compute', arguments: '{"value":21}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'call-1', content: '42' },
      ],
      temperature: 0.2,
      max_tokens: 512,
      tools: [
        {
          type: 'function',
          function: {
            name: 'compute',
            description: 'Performs a computation',
            parameters: { type: 'object', properties: { value: { type: 'number' } } },
          },
        },
        {
          type: 'function',
          function: { name: 'ping', description: '', parameters: { type: 'object' } },
        },
      ],
      tool_choice: 'auto',
    });
    expect(warn).toHaveBeenCalledWith(
      expect.any(String),
      'Tool "ping" doesn\'t have a description',
    );

    expect(response).toEqual({
      decisions: [
        { kind: 'text', text: 'Working on it.' },
        {
          kind: 'tool_calls',
          calls: [{ id: 'call-2', name: 'compute', arguments: { value: 84 } }],
        },
      ],
      usage: { promptTokens: 111, completionTokens: 7, totalTokens: 118 },
    });
  });

  it('omits tools and tool_choice when there are no tools', async () => {
    const { adapter, fetchMock } = createAdapter(
      chatCompletion({ finish_reason: 'stop', message: { role: 'assistant', content: 'Hello!' } }),
    );

    const response = await adapter.call(USER_ONLY, []);

    expect(requestJson(fetchMock)).toEqual({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'Hi' }],
    });
    expect(response.decisions).toEqual([{ kind: 'text', text: 'Hello!' }]);
  });

  it('uses the first of several choices', async () => {
    const { adapter } = createAdapter(
      chatCompletion(
        { finish_reason: 'stop', message: { content: 'first' } },
        { finish_reason: 'stop', message: { content: 'second' } },
      ),
    );
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const response = await adapter.call(USER_ONLY, []);

    expect(response.decisions).toEqual([{ kind: 'text', text: 'first' }]);
    expect(warn).toHaveBeenCalledWith(
      expect.any(String),
      'Model gave multiple choices, moving on with first one',
    );
  });

  it('rejects a stop that carries tool calls', async () => {
    const { adapter } = createAdapter(
      chatCompletion({
        finish_reason: 'stop',
        message: {
          content: null,
          tool_calls: [{ id: 'call-1', function: { name: 'compute', arguments: '{}' } }],
        },
      }),
    );

    await expect(adapter.call(USER_ONLY, [])).rejects.toBeInstanceOf(ProtocolError);
  });

  it('rejects unsupported finish reasons', async () => {
    const { adapter } = createAdapter(
      chatCompletion({ finish_reason: 'length', message: { content: 'Truncat' } }),
    );

    await expect(adapter.call(USER_ONLY, [])).rejects.toThrow(
      'OpenAI finished with unsupported reason "length"',
    );
  });

  it('rejects duplicate tool call ids', async () => {
    const call = { id: 'call-1', function: { name: 'compute', arguments: '{}' } };
    const { adapter } = createAdapter(
      chatCompletion({ finish_reason: 'tool_calls', message: { tool_calls: [call, call] } }),
    );

    await expect(adapter.call(USER_ONLY, [])).rejects.toThrow(
      'OpenAI reused tool call id "call-1"',
    );
  });

  it('rejects arguments that are not a JSON object', async () => {
    const { adapter } = createAdapter(
      chatCompletion({
        finish_reason: 'tool_calls',
        message: {
          tool_calls: [{ id: 'call-1', function: { name: 'compute', arguments: '[1, 2]' } }],
        },
      }),
    );

    await expect(adapter.call(USER_ONLY, [])).rejects.toThrow(
      'OpenAI sent non-object arguments for tool "compute"',
    );
  });

  it('rejects a body that is not JSON', async () => {
    const fetchMock = createFetchMock(() => new Response('<html>oops</html>', { status: 200 }));
    const adapter = new OpenAICompatibleAdapter({
      name: 'gpt',
      url: ENDPOINT,
      model: 'gpt-test',
      auth: { kind: 'none' },
      fetch: fetchMock,
    });

    await expect(adapter.call(USER_ONLY, [])).rejects.toThrow(
      'OpenAI returned a response that is not JSON',
    );
  });

  it('refuses a tool-role text message', async () => {
    const { adapter, fetchMock } = createAdapter(chatCompletion());

    await expect(
      adapter.call({ messages: [{ kind: 'text', role: 'tool', content: '42' }] }, []),
    ).rejects.toBeInstanceOf(RequestError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
