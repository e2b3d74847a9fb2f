import type { Auth } from './auth/types.js';
import { AnthropicAdapter } from './clients/anthropic.js';
import { AzureAdapter } from './clients/azure.js';
import { GeminiAdapter } from './clients/gemini.js';
import { MockModelAdapter } from './clients/mock.js';
import { OpenAICompatibleAdapter } from './clients/openai-compatible.js';
import type { ModelAdapter } from './types.js';

export type {
  CallerTool,
  Conversation,
  JsonObject,
  Message,
  ModelAdapter,
  ModelCallOptions,
  ModelDecision,
  ModelResponse,
  Role,
  TextMessage,
  ToolCall,
  ToolCallsMessage,
  ToolOutputMessage,
  ToolSpecification,
  UsageTokens,
} from './types.js';
export { addUsage, emptyUsage, textMessage } from './types.js';
export type { Auth, AuthLocation, ClientCredentials } from './auth/types.js';

export type ModelDefinition =
  | { type: 'openai'; url: string; auth: Auth; model: string }
  | { type: 'azure'; url: string; auth: Auth; apiVersion: string }
  | { type: 'anthropic'; url: string; auth: Auth; model: string; anthropicVersion?: string }
  | { type: 'gemini'; url: string; auth: Auth }
  | { type: 'mock'; model?: string };

export interface CreateModelAdapterOptions {
  fetch?: typeof fetch;
  now?: () => number;
}

export function createModelAdapter(
  name: string,
  definition: ModelDefinition,
  options: CreateModelAdapterOptions = {},
): ModelAdapter {
  switch (definition.type) {
    case 'openai':
      return new OpenAICompatibleAdapter({
        name,
        url: definition.url,
        auth: definition.auth,
        model: definition.model,
        ...options,
      });
    case 'azure':
      return new AzureAdapter({
        name,
        url: definition.url,
        auth: definition.auth,
        apiVersion: definition.apiVersion,
        ...options,
      });
    case 'anthropic':
      return new AnthropicAdapter({
        name,
        url: definition.url,
        auth: definition.auth,
        model: definition.model,
        version: definition.anthropicVersion,
        ...options,
      });
    case 'gemini':
      return new GeminiAdapter({
        name,
        url: definition.url,
        auth: definition.auth,
        ...options,
      });
    case 'mock':
      return new MockModelAdapter(name, definition.model ?? name);
  }
}
