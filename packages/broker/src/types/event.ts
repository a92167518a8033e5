import type { StreamEvent } from '@ai-request/llm';

export type ErrorEvent = {
  readonly type: 'error';
  readonly message: string;
};

/** Everything the broker writes to its output, one object per line. */
export type OutboundEvent = StreamEvent | ErrorEvent;
