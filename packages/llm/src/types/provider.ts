import type { ChatRequest } from './request.js';
import type { StreamEvent } from './event.js';
import type { ToolFormat } from './tool.js';

export interface ProviderAdapter {
  readonly name: string;
  readonly toolFormat: ToolFormat;
  stream(request: ChatRequest): AsyncIterable<StreamEvent>;
}
