import type { ProviderAdapter, ChatRequest, StreamEvent } from '../../types/index.js';
import { fetchStream } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { OPENAI_DEFAULT_BASE_URL, translateRequest } from './request.js';
import { translateStream } from './stream.js';

/**
 * Chat Completions adapter. Serves OpenAI itself and any server speaking the
 * same protocol (Ollama, vLLM, LM Studio) through `baseUrl`.
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  readonly toolFormat = 'openai';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, baseUrl: string = OPENAI_DEFAULT_BASE_URL, options?: { readonly name?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl;
    this.name = options?.name || 'openai-compatible';
  }

  async* stream(request: ChatRequest): AsyncIterable<StreamEvent> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const response = await fetchStream({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      provider: this.name,
    });

    const sseStream = createSSEStream(response, { idleTimeoutMs: request.timeout?.streamReadMs });
    yield* translateStream(sseStream);
  }
}

export { translateRequest, translateStream };
