import type { ChatRequest, ContentPart } from '../../types/index.js';

export const ANTHROPIC_DEFAULT_BASE_URL = 'https://api.anthropic.com';
export const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

type AnthropicMessage = {
  readonly role: 'user' | 'assistant';
  readonly content: Array<Record<string, unknown>>;
};

function translateContent(content: ContentPart): Record<string, unknown> {
  switch (content.kind) {
    case 'TEXT':
      return { type: 'text', text: content.text };
    case 'TOOL_CALL':
      return {
        type: 'tool_use',
        id: content.toolCallId,
        name: content.toolName,
        input: content.args,
      };
    case 'TOOL_RESULT':
      return {
        type: 'tool_result',
        tool_use_id: content.toolCallId,
        content: content.content,
      };
  }
}

export function translateRequest(
  request: Readonly<ChatRequest>,
  apiKey: string,
  baseUrl: string = ANTHROPIC_DEFAULT_BASE_URL,
): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/v1/messages`;
  const headers: Record<string, string> = {
    'x-api-key': apiKey,
    'anthropic-version': ANTHROPIC_VERSION,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: request.maxTokens || DEFAULT_MAX_TOKENS,
    stream: true,
  };

  if (request.system) {
    body['system'] = request.system;
  }

  // Anthropic has no tool role: tool results travel in a user turn, and
  // consecutive user turns are merged into one.
  const messages: Array<AnthropicMessage> = [];
  for (const message of request.messages) {
    if (message.role === 'system') {
      continue;
    }

    const role = message.role === 'assistant' ? 'assistant' : 'user';
    const contentParts: Array<Record<string, unknown>> =
      typeof message.content === 'string'
        ? [{ type: 'text', text: message.content }]
        : message.content.map(translateContent);

    if (contentParts.length === 0) {
      continue;
    }

    const lastMessage = messages[messages.length - 1];
    if (lastMessage && lastMessage.role === role && role === 'user') {
      lastMessage.content.push(...contentParts);
    } else {
      messages.push({ role, content: contentParts });
    }
  }
  body['messages'] = messages;

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools;
  }

  return { url, headers, body };
}
