import { z } from 'zod';

import { RequestError } from '../errors.js';
import type { Conversation, Message, UsageTokens } from './types.js';

const roleSchema = z.enum(['system', 'user', 'assistant', 'tool']);
const jsonObjectSchema = z.record(z.unknown());

const textMessageSchema = z.object({
  role: roleSchema,
  content: z.string(),
});

const toolCallsMessageSchema = z.object({
  role: roleSchema,
  tool_calls: z.array(
    z.object({
      name: z.string(),
      id: z.string(),
      arguments: jsonObjectSchema.nullish(),
    }),
  ),
});

const toolOutputMessageSchema = z.object({
  type: z.literal('function_call_output').optional(),
  call_id: z.string(),
  output: z.string(),
});

// Variants overlap structurally; the first shape that matches wins, so the order here is part of
// the wire contract.
const messageSchema = z.union([textMessageSchema, toolCallsMessageSchema, toolOutputMessageSchema]);

const callerToolSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string(),
    description: z.string().optional(),
    parameters: jsonObjectSchema.optional(),
  }),
});

const conversationSchema = z.object({
  messages: z.array(messageSchema),
  temperature: z.number().nullish(),
  max_tokens: z.number().int().nullish(),
  top_p: z.number().nullish(),
  tools: z.array(callerToolSchema).nullish(),
});

export type WireMessage =
  | z.infer<typeof textMessageSchema>
  | z.infer<typeof toolCallsMessageSchema>
  | { type: 'function_call_output'; call_id: string; output: string };

export interface WireConversation {
  messages: WireMessage[];
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  tools?: z.infer<typeof callerToolSchema>[];
  usage?: {
    completion_tokens: number;
    prompt_tokens: number;
    total_tokens: number;
  };
}

export function decodeMessage(value: z.infer<typeof messageSchema>): Message {
  if ('content' in value) {
    return { kind: 'text', role: value.role, content: value.content };
  }

  if ('tool_calls' in value) {
    return {
      kind: 'tool_calls',
      role: value.role,
      calls: value.tool_calls.map((call) => ({
        id: call.id,
        name: call.name,
        ...(call.arguments ? { arguments: call.arguments } : {}),
      })),
    };
  }

  return { kind: 'tool_output', callId: value.call_id, output: value.output };
}

export function encodeMessage(message: Message): WireMessage {
  switch (message.kind) {
    case 'text':
      return { role: message.role, content: message.content };
    case 'tool_calls':
      return {
        role: message.role,
        tool_calls: message.calls.map((call) => ({
          name: call.name,
          id: call.id,
          ...(call.arguments ? { arguments: call.arguments } : {}),
        })),
      };
    case 'tool_output':
      return { type: 'function_call_output', call_id: message.callId, output: message.output };
  }
}

export function parseConversation(body: unknown): Conversation {
  const parsed = conversationSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new RequestError(`Invalid request body${where}`);
  }

  const { messages, temperature, max_tokens, top_p, tools } = parsed.data;

  return {
    messages: messages.map((message) => decodeMessage(message)),
    ...(temperature != null ? { temperature } : {}),
    ...(max_tokens != null ? { maxTokens: max_tokens } : {}),
    ...(top_p != null ? { topP: top_p } : {}),
    ...(tools ? { tools } : {}),
  };
}

export function serializeConversation(
  conversation: Conversation,
  usage?: UsageTokens,
): WireConversation {
  return {
    messages: conversation.messages.map((message) => encodeMessage(message)),
    ...(conversation.temperature !== undefined ? { temperature: conversation.temperature } : {}),
    ...(conversation.maxTokens !== undefined ? { max_tokens: conversation.maxTokens } : {}),
    ...(conversation.topP !== undefined ? { top_p: conversation.topP } : {}),
    ...(conversation.tools ? { tools: conversation.tools } : {}),
    ...(usage
      ? {
          usage: {
            completion_tokens: usage.completionTokens,
            prompt_tokens: usage.promptTokens,
            total_tokens: usage.totalTokens,
          },
        }
      : {}),
  };
}
