import { createLogger } from '../../logging.js';
import { CredentialManager, type EndpointOptions } from '../auth/credential-manager.js';
import type {
  Conversation,
  ModelAdapter,
  ModelCallOptions,
  ModelResponse,
  ToolSpecification,
} from '../types.js';
import { buildChatRequest, parseChatResponse } from './chat-completions.js';

export interface AnthropicAdapterOptions extends EndpointOptions {
  name: string;
  model: string;
  version?: string;
}

const DEFAULT_VERSION = '2023-06-01';

const logger = createLogger('anthropic');

/**
 * Talks to Anthropic's OpenAI-compatible chat completions endpoint, which takes the same body as
 * OpenAI plus the `anthropic-version` header.
 */
export class AnthropicAdapter implements ModelAdapter {
  readonly name: string;

  private readonly client: CredentialManager;
  private readonly model: string;

  constructor(options: AnthropicAdapterOptions) {
    this.name = options.name;
    this.model = options.model;
    this.client = new CredentialManager({
      baseUrl: options.url,
      auth: options.auth,
      headers: { 'anthropic-version': options.version ?? DEFAULT_VERSION },
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
    const body = {
      model: this.model,
      ...buildChatRequest(conversation, tools, logger),
    };

    const text = await this.client.call(this.client.url, body, { signal: options.signal });
    return parseChatResponse(text, 'Anthropic', logger);
  }
}
