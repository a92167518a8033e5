import type { NativeTool, ProviderAdapter, ToolCallEvent } from '@ai-request/llm';
import type { ProviderConfig } from './config.js';

/**
 * A request paused on a tool call. Lives in the ConversationStore from the
 * first tool_call of its initial stream until the one resume it allows.
 */
export type Conversation = {
  readonly requestId: string;
  readonly config: ProviderConfig;
  readonly adapter: ProviderAdapter;
  readonly toolSchema: ReadonlyArray<NativeTool>;
  readonly isReasoningProvider: boolean;
  readonly userMessage: string;
  readonly pendingToolCalls: Array<ToolCallEvent>;
  readonly accumulatedText: Array<string>;
  readonly createdAt: number;
};

export type ConversationInit = Omit<Conversation, 'requestId' | 'pendingToolCalls' | 'accumulatedText' | 'createdAt'>;
