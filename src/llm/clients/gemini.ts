import { customAlphabet } from 'nanoid';
import { z } from 'zod';

import { ProtocolError, RequestError } from '../../errors.js';
import { createLogger } from '../../logging.js';
import { CredentialManager, type EndpointOptions } from '../auth/credential-manager.js';
import type {
  Conversation,
  JsonObject,
  Message,
  ModelAdapter,
  ModelCallOptions,
  ModelDecision,
  ModelResponse,
  ToolCall,
  ToolSpecification,
} from '../types.js';
import { describeTool, isJsonObject, parseJson } from './chat-completions.js';

export interface GeminiAdapterOptions extends EndpointOptions {
  name: string;
}

const CALL_ID_LENGTH = 24;
const ALPHANUMERIC = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';
const STRIPPED_SCHEMA_KEYS = new Set(['$schema', 'additionalProperties']);

export const createCallId = customAlphabet(ALPHANUMERIC, CALL_ID_LENGTH);

const logger = createLogger('gemini');

export type GeminiRole = 'model' | 'user' | 'function';

export type GeminiPart =
  | { text: string }
  | { function_call: { name: string; args?: JsonObject } }
  | {
      function_response: {
        name: string;
        response: { name: string; content: string };
      };
    };

export interface GeminiContent {
  role: GeminiRole;
  parts: GeminiPart[];
}

export interface GeminiRequest {
  contents: GeminiContent[];
  system_instruction?: { parts: Array<{ text: string }> };
  tools?: Array<{
    function_declarations: Array<{
      name: string;
      description: string;
      parameters: JsonObject;
    }>;
  }>;
  generation_config?: {
    temperature?: number;
    max_output_tokens?: number;
    top_p?: number;
  };
}

const functionCallSchema = z.object({
  name: z.string(),
  args: z.record(z.unknown()).nullish(),
});

const partSchema = z.object({
  text: z.string().optional(),
  functionCall: functionCallSchema.optional(),
  function_call: functionCallSchema.optional(),
});

const candidateSchema = z.object({
  content: z.object({
    role: z.string().optional(),
    parts: z.array(partSchema),
  }),
  finishReason: z.string().optional(),
  finish_reason: z.string().optional(),
});

const usageSchema = z.object({
  promptTokenCount: z.number().optional(),
  prompt_token_count: z.number().optional(),
  candidatesTokenCount: z.number().optional(),
  candidates_token_count: z.number().optional(),
  totalTokenCount: z.number().optional(),
  total_token_count: z.number().optional(),
});

const responseSchema = z.object({
  candidates: z.array(candidateSchema),
  usageMetadata: usageSchema.optional(),
  usage_metadata: usageSchema.optional(),
});

/**
 * Gemini has no tool-role message: a tool output is attached to the content entry that carries
 * the calls (or the outputs before it), and only starts its own `function` entry when it follows
 * plain text.
 */
export function buildGeminiContents(messages: Message[]): {
  contents: GeminiContent[];
  system: string[];
} {
  const contents: GeminiContent[] = [];
  const system: string[] = [];
  const callNames = new Map<string, string>();
  let openEntry: GeminiContent | undefined;

  for (const message of messages) {
    switch (message.kind) {
      case 'text': {
        openEntry = undefined;
        if (message.role === 'system') {
          system.push(message.content);
          break;
        }
        if (message.role === 'tool') {
          throw new RequestError('Gemini cannot take a tool-role message without a call_id');
        }
        contents.push({
          role: message.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: message.content }],
        });
        break;
      }
      case 'tool_calls': {
        if (message.role !== 'assistant') {
          throw new RequestError('Tool calls can only come from the assistant');
        }
        const entry: GeminiContent = {
          role: 'model',
          parts: message.calls.map((call) => {
            callNames.set(call.id, call.name);
            return {
              function_call: {
                name: call.name,
                ...(call.arguments ? { args: call.arguments } : {}),
              },
            };
          }),
        };
        contents.push(entry);
        openEntry = entry;
        break;
      }
      case 'tool_output': {
        const name = callNames.get(message.callId) ?? message.callId;
        const part: GeminiPart = {
          function_response: {
            name,
            response: { name, content: message.output },
          },
        };

        if (openEntry) {
          openEntry.parts.push(part);
        } else {
          openEntry = { role: 'function', parts: [part] };
          contents.push(openEntry);
        }
        break;
      }
    }
  }

  return { contents, system };
}

export function stripUnsupportedSchemaKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => stripUnsupportedSchemaKeys(item));
  }

  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, nested] of Object.entries(value)) {
      if (!STRIPPED_SCHEMA_KEYS.has(key)) {
        result[key] = stripUnsupportedSchemaKeys(nested);
      }
    }
    return result;
  }

  return value;
}

export function buildGeminiRequest(
  conversation: Conversation,
  tools: ToolSpecification[],
): GeminiRequest {
  const { contents, system } = buildGeminiContents(conversation.messages);
  const request: GeminiRequest = { contents };

  if (system.length > 0) {
    request.system_instruction = { parts: system.map((text) => ({ text })) };
  }

  if (tools.length > 0) {
    request.tools = [
      {
        function_declarations: tools.map((tool) => {
          const parameters = stripUnsupportedSchemaKeys(tool.inputSchema);
          return {
            name: tool.name,
            description: describeTool(tool, logger),
            parameters: isJsonObject(parameters) ? parameters : {},
          };
        }),
      },
    ];
  }

  const { temperature, maxTokens, topP } = conversation;
  if (temperature !== undefined || maxTokens !== undefined || topP !== undefined) {
    request.generation_config = {
      ...(temperature !== undefined ? { temperature } : {}),
      ...(maxTokens !== undefined ? { max_output_tokens: maxTokens } : {}),
      ...(topP !== undefined ? { top_p: topP } : {}),
    };
  }

  return request;
}

export function parseGeminiResponse(text: string): ModelResponse {
  const parsed = responseSchema.safeParse(parseJson(text, 'Gemini'));
  if (!parsed.success) {
    throw new ProtocolError(
      'Gemini returned an unexpected response',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const { candidates } = parsed.data;
  const [candidate] = candidates;
  if (!candidate) {
    throw new ProtocolError('Gemini returned no candidates');
  }

  if (candidates.length > 1) {
    logger.warn('Model gave multiple candidates, moving on with first one');
  }

  const finishReason = candidate.finishReason ?? candidate.finish_reason;
  if (finishReason !== 'STOP') {
    throw new ProtocolError(
      `Gemini finished with unsupported reason "${finishReason ?? 'none'}"`,
    );
  }

  return {
    decisions: mapParts(candidate.content.parts),
    usage: mapUsage(parsed.data.usageMetadata ?? parsed.data.usage_metadata),
  };
}

function mapParts(parts: z.infer<typeof partSchema>[]): ModelDecision[] {
  const decisions: ModelDecision[] = [];
  let openCalls: ToolCall[] | undefined;

  for (const part of parts) {
    const functionCall = part.functionCall ?? part.function_call;

    if (typeof part.text === 'string') {
      openCalls = undefined;
      decisions.push({ kind: 'text', text: part.text });
    } else if (functionCall) {
      const call: ToolCall = {
        id: createCallId(),
        name: functionCall.name,
        ...(functionCall.args ? { arguments: functionCall.args } : {}),
      };

      if (openCalls) {
        openCalls.push(call);
      } else {
        openCalls = [call];
        decisions.push({ kind: 'tool_calls', calls: openCalls });
      }
    } else {
      throw new ProtocolError('Gemini returned an unsupported content part');
    }
  }

  return decisions;
}

function mapUsage(usage: z.infer<typeof usageSchema> | undefined): ModelResponse['usage'] {
  const promptTokens = usage?.promptTokenCount ?? usage?.prompt_token_count;
  const totalTokens = usage?.totalTokenCount ?? usage?.total_token_count;

  if (promptTokens === undefined || totalTokens === undefined) {
    throw new ProtocolError('Gemini response is missing usage metadata');
  }

  return {
    promptTokens,
    completionTokens: usage?.candidatesTokenCount ?? usage?.candidates_token_count ?? 0,
    totalTokens,
  };
}

export class GeminiAdapter implements ModelAdapter {
  readonly name: string;

  private readonly client: CredentialManager;

  constructor(options: GeminiAdapterOptions) {
    this.name = options.name;
    this.client = new CredentialManager({
      baseUrl: options.url,
      auth: options.auth,
      fetch: options.fetch,
      now: options.now,
    });
  }

  async warmUp(): Promise<void> {
    await this.client.prime();
  }

  async call(
    conversation: Conversation,
    tools: ToolSpecification[],
    options: ModelCallOptions = {},
  ): Promise<ModelResponse> {
    const body = buildGeminiRequest(conversation, tools);
    const text = await this.client.call(this.client.url, body, { signal: options.signal });
    return parseGeminiResponse(text);
  }
}
