import type { ChatRequest } from '../../types/index.js';

export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_MAX_TOKENS = 4096;

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

/**
 * Builds a streaming Chat Completions request. `baseUrl` follows the OpenAI SDK
 * convention of already ending in the API version (`.../v1`).
 */
export function translateRequest(
  request: Readonly<ChatRequest>,
  apiKey: string,
  baseUrl: string = OPENAI_DEFAULT_BASE_URL,
): RequestOutput {
  const url = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    'Content-Type': 'application/json',
  };

  const messages: Array<Record<string, unknown>> = [];

  // Reasoning models reject the system role.
  if (request.system && !request.reasoning) {
    messages.push({
      role: 'system',
      content: request.system,
    });
  }

  for (const message of request.messages) {
    if (message.role === 'system') {
      continue;
    }

    if (message.role === 'user') {
      const content =
        typeof message.content === 'string'
          ? message.content
          : message.content
              .map((part) => (part.kind === 'TEXT' ? part.text : ''))
              .join('');

      messages.push({
        role: 'user',
        content,
      });
    } else if (message.role === 'assistant') {
      let content: string | null = null;
      const toolCalls: Array<Record<string, unknown>> = [];

      if (typeof message.content === 'string') {
        content = message.content;
      } else {
        const textParts: Array<string> = [];
        for (const part of message.content) {
          if (part.kind === 'TEXT') {
            textParts.push(part.text);
          } else if (part.kind === 'TOOL_CALL') {
            toolCalls.push({
              id: part.toolCallId,
              type: 'function',
              function: {
                name: part.toolName,
                arguments: JSON.stringify(part.args),
              },
            });
          }
        }

        if (textParts.length > 0) {
          content = textParts.join('');
        }
      }

      const assistantMessage: Record<string, unknown> = {
        role: 'assistant',
        content,
      };
      if (toolCalls.length > 0) {
        assistantMessage['tool_calls'] = toolCalls;
      }
      messages.push(assistantMessage);
    } else if (message.role === 'tool' && typeof message.content !== 'string') {
      for (const part of message.content) {
        if (part.kind === 'TOOL_RESULT') {
          messages.push({
            role: 'tool',
            tool_call_id: part.toolCallId,
            content: part.content,
          });
        }
      }
    }
  }

  const body: Record<string, unknown> = {
    model: request.model,
    messages,
    stream: true,
  };

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools;
  }

  const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS;
  if (request.reasoning) {
    body['max_completion_tokens'] = maxTokens;
  } else {
    body['max_tokens'] = maxTokens;
  }

  return { url, headers, body };
}
