import type OpenAI from 'openai';
import { z } from 'zod';

import { ProtocolError, RequestError } from '../../errors.js';
import type { Logger } from '../../logging.js';
import type {
  Conversation,
  JsonObject,
  Message,
  ModelDecision,
  ModelResponse,
  TextMessage,
  ToolCall,
  ToolSpecification,
} from '../types.js';

export type ChatMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
export type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;
export type ChatRequest = Omit<
  OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
  'model'
> & { model?: string };

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const choiceSchema = z.object({
  finish_reason: z.string().nullish(),
  message: z.object({
    role: z.string().optional(),
    content: z.string().nullish(),
    tool_calls: z.array(toolCallSchema).nullish(),
  }),
});

const responseSchema = z.object({
  choices: z.array(choiceSchema),
  usage: z.object({
    completion_tokens: z.number(),
    prompt_tokens: z.number(),
    total_tokens: z.number(),
  }),
});

type ChatChoice = z.infer<typeof choiceSchema>;

export function mapMessage(message: Message): ChatMessageParam {
  switch (message.kind) {
    case 'text':
      return mapTextMessage(message);
    case 'tool_calls':
      if (message.role !== 'assistant') {
        throw new RequestError('Tool calls can only come from the assistant');
      }
      return {
        role: 'assistant',
        content: null,
        tool_calls: message.calls.map((call) => ({
          id: call.id,
          type: 'function',
          function: {
            name: call.name,
            arguments: JSON.stringify(call.arguments ?? {}),
          },
        })),
      };
    case 'tool_output':
      return { role: 'tool', tool_call_id: message.callId, content: message.output };
  }
}

function mapTextMessage(message: TextMessage): ChatMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'tool':
      throw new RequestError('Tool-role messages must carry a call_id');
  }
}

export function mapTool(tool: ToolSpecification, logger: Logger): ChatTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: describeTool(tool, logger),
      parameters: tool.inputSchema,
    },
  };
}

export function describeTool(tool: ToolSpecification, logger: Logger): string {
  if (tool.description === undefined) {
    logger.warn(`Tool "${tool.name}" doesn't have a description`);
    return '';
  }
  return tool.description;
}

export function buildChatRequest(
  conversation: Conversation,
  tools: ToolSpecification[],
  logger: Logger,
): ChatRequest {
  const request: ChatRequest = {
    messages: conversation.messages.map((message) => mapMessage(message)),
  };

  if (conversation.temperature !== undefined) {
    request.temperature = conversation.temperature;
  }

  if (conversation.maxTokens !== undefined) {
    request.max_tokens = conversation.maxTokens;
  }

  if (conversation.topP !== undefined) {
    request.top_p = conversation.topP;
  }

  if (tools.length > 0) {
    request.tools = tools.map((tool) => mapTool(tool, logger));
    request.tool_choice = 'auto';
  }

  return request;
}

export function parseJson(text: string, providerName: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError(
      `${providerName} returned a response that is not JSON`,
      text.slice(0, 200),
    );
  }
}

export function parseChatResponse(
  text: string,
  providerName: string,
  logger: Logger,
): ModelResponse {
  const parsed = responseSchema.safeParse(parseJson(text, providerName));
  if (!parsed.success) {
    throw new ProtocolError(
      `${providerName} returned an unexpected response`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const { choices, usage } = parsed.data;
  const [choice] = choices;
  if (!choice) {
    throw new ProtocolError(`${providerName} returned no choices`);
  }

  if (choices.length > 1) {
    logger.warn('Model gave multiple choices, moving on with first one');
  }

  return {
    decisions: mapChoice(choice, providerName),
    usage: {
      completionTokens: usage.completion_tokens,
      promptTokens: usage.prompt_tokens,
      totalTokens: usage.total_tokens,
    },
  };
}

function mapChoice(choice: ChatChoice, providerName: string): ModelDecision[] {
  const { message } = choice;
  const toolCalls = message.tool_calls ?? [];

  switch (choice.finish_reason) {
    case 'stop':
      if (typeof message.content !== 'string' || toolCalls.length > 0) {
        throw new ProtocolError(`${providerName} sent a stop without a plain text message`);
      }
      return [{ kind: 'text', text: message.content }];
    case 'tool_calls': {
      if (toolCalls.length === 0) {
        throw new ProtocolError(`${providerName} finished with tool_calls but sent none`);
      }

      const decisions: ModelDecision[] = [];
      if (message.content) {
        decisions.push({ kind: 'text', text: message.content });
      }
      decisions.push({ kind: 'tool_calls', calls: parseToolCalls(toolCalls, providerName) });
      return decisions;
    }
    default:
      throw new ProtocolError(
        `${providerName} finished with unsupported reason "${choice.finish_reason ?? 'none'}"`,
      );
  }
}

function parseToolCalls(
  toolCalls: z.infer<typeof toolCallSchema>[],
  providerName: string,
): ToolCall[] {
  const seen = new Set<string>();

  return toolCalls.map((call) => {
    if (seen.has(call.id)) {
      throw new ProtocolError(`${providerName} reused tool call id "${call.id}"`);
    }
    seen.add(call.id);

    return {
      id: call.id,
      name: call.function.name,
      arguments: parseArguments(call.function.arguments, call.function.name, providerName),
    };
  });
}

export function parseArguments(raw: string, toolName: string, providerName: string): JsonObject {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ProtocolError(
      `${providerName} sent unparsable arguments for tool "${toolName}"`,
      raw.slice(0, 200),
    );
  }

  if (!isJsonObject(value)) {
    throw new ProtocolError(`${providerName} sent non-object arguments for tool "${toolName}"`);
  }

  return value;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
