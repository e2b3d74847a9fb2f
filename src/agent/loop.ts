import {
  GatewayError,
  IterationLimitError,
  RequestTimeoutError,
  ToolExecutionError,
  ToolResolutionError,
  describeError,
} from '../errors.js';
import {
  addUsage,
  emptyUsage,
  textMessage,
  type Conversation,
  type ModelAdapter,
  type ToolCall,
  type UsageTokens,
} from '../llm/index.js';
import { createLogger } from '../logging.js';
import { buildToolCatalog, type ToolCatalog, type ToolProvider } from '../tools/index.js';

export const DEFAULT_MAX_ITERATIONS = 25;
export const DEFAULT_REQUEST_TIMEOUT_MS = 300_000;

export interface WorkspaceAgentOptions {
  name: string;
  model: ModelAdapter;
  toolProviders?: readonly ToolProvider[];
  maxIterations?: number;
  timeoutMs?: number;
}

export interface AgentRunResult {
  conversation: Conversation;
  usage: UsageTokens;
}

const logger = createLogger('agent');

/**
 * Drives one request: asks the model, runs the tools it picks, feeds the outputs back and stops
 * once a turn comes back without tool calls.
 */
export class WorkspaceAgent {
  readonly name: string;

  private readonly model: ModelAdapter;
  private readonly toolProviders: readonly ToolProvider[];
  private readonly maxIterations: number;
  private readonly timeoutMs: number;

  constructor(options: WorkspaceAgentOptions) {
    this.name = options.name;
    this.model = options.model;
    this.toolProviders = options.toolProviders ?? [];
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  getToolProviders(): readonly ToolProvider[] {
    return this.toolProviders;
  }

  async run(conversation: Conversation): Promise<AgentRunResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError()), this.timeoutMs);

    try {
      return await abortable(this.loop(conversation, controller.signal), controller.signal);
    } finally {
      clearTimeout(timer);
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }
  }

  private async loop(conversation: Conversation, signal: AbortSignal): Promise<AgentRunResult> {
    const messages = [...conversation.messages];
    const catalog = await buildToolCatalog(this.toolProviders, { signal });
    const tools = catalog.list();
    let usage = emptyUsage();

    for (let iteration = 0; iteration < this.maxIterations; iteration += 1) {
      signal.throwIfAborted();

      const response = await this.model.call({ ...conversation, messages: [...messages] }, tools, {
        signal,
      });
      usage = addUsage(usage, response.usage);

      let calledTools = false;
      for (const decision of response.decisions) {
        if (decision.kind === 'text') {
          messages.push(textMessage('assistant', decision.text));
          continue;
        }

        calledTools = true;
        messages.push({ kind: 'tool_calls', role: 'assistant', calls: decision.calls });
        for (const call of decision.calls) {
          messages.push({
            kind: 'tool_output',
            callId: call.id,
            output: await this.dispatch(catalog, call, signal),
          });
        }
      }

      if (!calledTools) {
        logger.debug(`Workspace "${this.name}" answered after ${iteration + 1} model call(s)`);
        return { conversation: { ...conversation, messages }, usage };
      }
    }

    logger.warn(`Workspace "${this.name}" hit the limit of ${this.maxIterations} model calls`);
    throw new IterationLimitError(this.maxIterations);
  }

  private async dispatch(
    catalog: ToolCatalog,
    call: ToolCall,
    signal: AbortSignal,
  ): Promise<string> {
    let provider: ToolProvider;
    try {
      provider = catalog.resolve(call.name);
    } catch (error) {
      if (error instanceof ToolResolutionError) {
        logger.warn(`Model called unknown tool "${call.name}"`);
        return error.message;
      }
      throw error;
    }

    logger.debug(`Calling "${call.name}" on "${provider.name}"`);
    try {
      return await provider.callTool(call.name, call.arguments, { signal });
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      logger.error(`Tool "${call.name}" failed: ${describeError(error)}`);
      throw new ToolExecutionError(call.name, { cause: error });
    }
  }
}

/**
 * Settles with the task, or rejects with the signal's reason as soon as it aborts.
 */
export function abortable<T>(task: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
