import type { Message } from './message.js';
import type { NativeTool } from './tool.js';
import type { TimeoutConfig } from './config.js';

export type ChatRequest = {
  readonly model: string;
  readonly system?: string;
  readonly messages: ReadonlyArray<Message>;
  /** Tool declarations already in the adapter's native format. */
  readonly tools?: ReadonlyArray<NativeTool>;
  readonly maxTokens?: number;
  /** Reasoning models take a different request shape on some providers. */
  readonly reasoning?: boolean;
  readonly timeout?: TimeoutConfig;
};
