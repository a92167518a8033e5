// @ai-request/llm: provider adapters normalized to canonical stream events

export * from './types/index.js';
export { AnthropicAdapter } from './providers/anthropic/index.js';
export { ANTHROPIC_DEFAULT_BASE_URL } from './providers/anthropic/request.js';
export { OpenAICompatibleAdapter } from './providers/openai-compatible/index.js';
export { OPENAI_DEFAULT_BASE_URL } from './providers/openai-compatible/request.js';
export { fetchStream, type FetchOptions } from './utils/http.js';
export { createSSEStream, type SSEEvent, type SSEStreamOptions } from './utils/sse.js';
export { mapHttpError } from './utils/error-mapping.js';
export { isRecord, parseToolArguments } from './utils/json.js';
