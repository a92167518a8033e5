import type { ProviderConfigInput } from './config.js';

export type CompleteRequest = {
  readonly type: 'complete';
  readonly request_id?: string;
  readonly context: string;
  readonly prompt?: string;
  readonly config?: ProviderConfigInput;
};

export type ToolResponseRequest = {
  readonly type: 'tool_response';
  readonly request_id: string;
  readonly tool_call_id: string;
  readonly content: string;
};

export type InboundRequest = CompleteRequest | ToolResponseRequest;
