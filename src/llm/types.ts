export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type JsonObject = Record<string, unknown>;

export interface ToolCall {
  id: string;
  name: string;
  arguments?: JsonObject;
}

export interface TextMessage {
  kind: 'text';
  role: Role;
  content: string;
}

export interface ToolCallsMessage {
  kind: 'tool_calls';
  role: Role;
  calls: ToolCall[];
}

export interface ToolOutputMessage {
  kind: 'tool_output';
  callId: string;
  output: string;
}

export type Message = TextMessage | ToolCallsMessage | ToolOutputMessage;

export type ModelDecision =
  | { kind: 'text'; text: string }
  | { kind: 'tool_calls'; calls: ToolCall[] };

export interface UsageTokens {
  completionTokens: number;
  promptTokens: number;
  totalTokens: number;
}

/**
 * Function tool definition as callers send it in the request body. Kept verbatim so it can be
 * echoed back in the response.
 */
export interface CallerTool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: JsonObject;
  };
}

export interface Conversation {
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  tools?: CallerTool[];
}

export interface ToolSpecification {
  name: string;
  description?: string;
  inputSchema: JsonObject;
}

export interface ModelCallOptions {
  signal?: AbortSignal;
}

export interface ModelResponse {
  decisions: ModelDecision[];
  usage: UsageTokens;
}

export interface ModelAdapter {
  readonly name: string;
  call(
    conversation: Conversation,
    tools: ToolSpecification[],
    options?: ModelCallOptions,
  ): Promise<ModelResponse>;
  /** Acquires credentials ahead of the first request, e.g. an OAuth2 token. */
  warmUp?(): Promise<void>;
}

export function emptyUsage(): UsageTokens {
  return { completionTokens: 0, promptTokens: 0, totalTokens: 0 };
}

export function addUsage(left: UsageTokens, right: UsageTokens): UsageTokens {
  return {
    completionTokens: left.completionTokens + right.completionTokens,
    promptTokens: left.promptTokens + right.promptTokens,
    totalTokens: left.totalTokens + right.totalTokens,
  };
}

export function textMessage(role: Role, content: string): TextMessage {
  return { kind: 'text', role, content };
}
