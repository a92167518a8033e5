import { nanoid } from 'nanoid';
import { userMessage, type FunctionTool } from '@ai-request/llm';
import { isReasoningModel, resolveProviderConfig } from '../config/config.js';
import type { ConversationStore } from '../conversation/store.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { createAdapter, type AdapterFactory } from '../providers/factory.js';
import { getToolDefinitions, toNativeTools } from '../tools/registry.js';
import {
  InvalidRequestIdError,
  ToolCallNotFoundError,
  type CompleteRequest,
  type Conversation,
  type Environment,
  type InboundRequest,
  type OutboundEvent,
  type ToolResponseRequest,
} from '../types/index.js';
import { buildChatRequest, buildResumeHistory, buildUserMessage } from './history.js';

export type RouterOptions = {
  readonly store: ConversationStore;
  readonly env?: Environment;
  readonly logger?: Logger;
  readonly adapterFactory?: AdapterFactory;
  readonly tools?: ReadonlyArray<FunctionTool>;
  readonly generateId?: () => string;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Turns one inbound request into the events written back for it.
 *
 * A `complete` request streams from the provider and parks a conversation in
 * the store at its first tool call. A `tool_response` resumes that
 * conversation once and then drops it.
 */
export class Router {
  private readonly store: ConversationStore;
  private readonly env: Environment;
  private readonly logger: Logger;
  private readonly adapterFactory: AdapterFactory;
  private readonly tools: ReadonlyArray<FunctionTool>;
  private readonly generateId: () => string;

  constructor(options: RouterOptions) {
    this.store = options.store;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? silentLogger;
    this.adapterFactory = options.adapterFactory ?? createAdapter;
    this.tools = options.tools ?? getToolDefinitions();
    this.generateId = options.generateId ?? (() => nanoid());
  }

  async* handle(request: InboundRequest): AsyncIterable<OutboundEvent> {
    const requestId = request.type === 'complete' ? request.request_id || this.generateId() : request.request_id;

    try {
      if (request.type === 'complete') {
        yield* this.start(request, requestId);
      } else {
        yield* this.resume(request);
      }
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(message, {
        requestId,
        toolCallId: request.type === 'tool_response' ? request.tool_call_id : undefined,
      });
      yield { type: 'error', message };
    }
  }

  private async* start(request: CompleteRequest, requestId: string): AsyncIterable<OutboundEvent> {
    const release = await this.store.acquire(requestId);
    let conversation: Conversation | undefined;

    try {
      if (this.store.remove(requestId)) {
        this.logger.warn('Discarding pending conversation replaced by a new request', { requestId });
      }

      const config = resolveProviderConfig(request.config, this.env);
      if (!config.ok) {
        throw config.error;
      }
      const adapter = this.adapterFactory(config.value);
      if (!adapter.ok) {
        throw adapter.error;
      }

      const { maxToolCalls, model } = config.value;
      const toolSchema = maxToolCalls > 0 ? toNativeTools(this.tools, adapter.value.toolFormat) : [];
      const isReasoningProvider = isReasoningModel(model);
      const message = buildUserMessage(request.context, request.prompt);
      const chat = buildChatRequest(config.value, [userMessage(message)], toolSchema, isReasoningProvider);

      this.logger.info(`Starting ${model}`, { requestId, provider: adapter.value.name });

      for await (const event of adapter.value.stream(chat)) {
        if (event.type === 'tool_call') {
          if ((conversation?.pendingToolCalls.length ?? 0) >= maxToolCalls) {
            this.logger.warn(`Dropping tool call beyond limit of ${maxToolCalls}`, {
              requestId,
              toolCallId: event.id,
            });
            continue;
          }
          conversation ??= this.store.create(requestId, {
            config: config.value,
            adapter: adapter.value,
            toolSchema,
            isReasoningProvider,
            userMessage: message,
          });
          conversation.pendingToolCalls.push(event);
          this.logger.debug(`Tool call ${event.name}`, { requestId, toolCallId: event.id });
        } else if (event.type === 'completion' && conversation) {
          conversation.accumulatedText.push(event.content);
        }
        yield event;
      }
    } catch (error) {
      if (conversation) {
        this.store.remove(requestId);
      }
      throw error;
    } finally {
      release();
    }
  }

  private async* resume(request: ToolResponseRequest): AsyncIterable<OutboundEvent> {
    const requestId = request.request_id;
    const release = await this.store.acquire(requestId);

    try {
      const conversation = this.store.get(requestId);
      if (!conversation) {
        throw new InvalidRequestIdError(requestId);
      }

      try {
        const toolCall = conversation.pendingToolCalls.find((call) => call.id === request.tool_call_id);
        if (!toolCall) {
          throw new ToolCallNotFoundError(requestId, request.tool_call_id);
        }

        const messages = buildResumeHistory(conversation, toolCall, request.content);
        const chat = buildChatRequest(
          conversation.config,
          messages,
          conversation.toolSchema,
          conversation.isReasoningProvider,
        );

        this.logger.info('Resuming after tool result', {
          requestId,
          toolCallId: toolCall.id,
          provider: conversation.adapter.name,
        });

        for await (const event of conversation.adapter.stream(chat)) {
          if (event.type === 'tool_call') {
            this.logger.warn(`Tool call ${event.name} after a resume cannot be answered`, {
              requestId,
              toolCallId: event.id,
            });
          }
          yield event;
        }
      } finally {
        this.store.remove(requestId);
      }
    } finally {
      release();
    }
  }
}
