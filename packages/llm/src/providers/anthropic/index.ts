import type { ProviderAdapter, ChatRequest, StreamEvent } from '../../types/index.js';
import { fetchStream } from '../../utils/http.js';
import { createSSEStream } from '../../utils/sse.js';
import { ANTHROPIC_DEFAULT_BASE_URL, translateRequest } from './request.js';
import { translateStream } from './stream.js';

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = 'anthropic';
  readonly toolFormat = 'anthropic';
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, options?: { readonly baseUrl?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = options?.baseUrl || ANTHROPIC_DEFAULT_BASE_URL;
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
