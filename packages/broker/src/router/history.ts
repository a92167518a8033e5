import {
  assistantMessage,
  toolMessage,
  userMessage,
  type ChatRequest,
  type ContentPart,
  type Message,
  type ToolCallEvent,
} from '@ai-request/llm';
import type { Conversation, ProviderConfig } from '../types/index.js';

export const SYSTEM_PROMPT = 'You are a code completion assistant.';
export const MAX_TOKENS = 4096;

export function buildUserMessage(context: string, prompt?: string): string {
  return prompt ? `${context}\n\n${prompt}` : context;
}

function timeoutFor(config: ProviderConfig): ChatRequest['timeout'] {
  const ms = config.timeout * 1000;
  return { requestMs: ms, streamReadMs: ms };
}

export function buildChatRequest(
  config: ProviderConfig,
  messages: ReadonlyArray<Message>,
  tools: Conversation['toolSchema'],
  reasoning: boolean,
): ChatRequest {
  return {
    model: config.model,
    system: SYSTEM_PROMPT,
    messages,
    tools,
    maxTokens: MAX_TOKENS,
    reasoning,
    timeout: timeoutFor(config),
  };
}

/**
 * Rebuilds the three turns a resumed request sends: the original user message,
 * the assistant's text plus the call being answered, and the tool result.
 */
export function buildResumeHistory(
  conversation: Conversation,
  toolCall: ToolCallEvent,
  content: string,
): Array<Message> {
  const assistantParts: Array<ContentPart> = [];
  const text = conversation.accumulatedText.join('');
  if (text) {
    assistantParts.push({ kind: 'TEXT', text });
  }
  assistantParts.push({
    kind: 'TOOL_CALL',
    toolCallId: toolCall.id,
    toolName: toolCall.name,
    args: toolCall.args,
  });

  return [
    userMessage(conversation.userMessage),
    assistantMessage(assistantParts),
    toolMessage(toolCall.id, content),
  ];
}
