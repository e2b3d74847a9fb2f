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

export interface OpenAICompatibleAdapterOptions extends EndpointOptions {
  name: string;
  model: string;
  providerName?: string;
}

const logger = createLogger('openai');

export class OpenAICompatibleAdapter implements ModelAdapter {
  readonly name: string;

  private readonly client: CredentialManager;
  private readonly model: string;
  private readonly providerName: string;

  constructor(options: OpenAICompatibleAdapterOptions) {
    this.name = options.name;
    this.model = options.model;
    this.providerName = options.providerName ?? 'OpenAI';
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
    const body = {
      model: this.model,
      ...buildChatRequest(conversation, tools, logger),
    };

    const text = await this.client.call(this.client.url, body, { signal: options.signal });
    return parseChatResponse(text, this.providerName, logger);
  }
}
