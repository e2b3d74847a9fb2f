import {
  type Conversation,
  emptyUsage,
  type ModelAdapter,
  type ModelResponse,
} from '../types.js';

/**
 * Offline echo model for smoke-testing a workspace without upstream credentials.
 */
export class MockModelAdapter implements ModelAdapter {
  constructor(
    readonly name: string,
    private readonly model: string,
  ) {}

  async call(conversation: Conversation): Promise<ModelResponse> {
    const lastUserMessage = [...conversation.messages]
      .reverse()
      .find((message) => message.kind === 'text' && message.role === 'user');

    const content =
      lastUserMessage?.kind === 'text' && lastUserMessage.content.trim().length > 0
        ? lastUserMessage.content.trim()
        : 'I did not receive any input. Feel free to ask me something!';

    return {
      decisions: [{ kind: 'text', text: `[mock:${this.model}] ${content}` }],
      usage: emptyUsage(),
    };
  }
}
