import { ConfigurationError } from '../../errors.js';
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

export interface AzureAdapterOptions extends EndpointOptions {
  name: string;
  apiVersion: string;
}

const logger = createLogger('azure');

/**
 * Azure OpenAI deployment. The deployment in the URL selects the model, so the body carries no
 * `model`; the API version travels as the `api-version` query parameter.
 */
export class AzureAdapter implements ModelAdapter {
  readonly name: string;

  private readonly client: CredentialManager;

  constructor(options: AzureAdapterOptions) {
    if (options.auth.kind !== 'api_key' || options.auth.location.kind !== 'header') {
      throw new ConfigurationError(
        `Model "${options.name}": Azure only supports an API key sent as a header`,
      );
    }

    this.name = options.name;
    this.client = new CredentialManager({
      baseUrl: options.url,
      auth: options.auth,
      params: { 'api-version': options.apiVersion },
      fetch: options.fetch,
      now: options.now,
    });
  }

  async call(
    conversation: Conversation,
    tools: ToolSpecification[],
    options: ModelCallOptions = {},
  ): Promise<ModelResponse> {
    const body = buildChatRequest(conversation, tools, logger);
    const text = await this.client.call(this.client.url, body, { signal: options.signal });
    return parseChatResponse(text, 'Azure', logger);
  }
}
