export type CompletionEvent = {
  readonly type: 'completion';
  readonly content: string;
};

export type ThinkingEvent = {
  readonly type: 'thinking';
  readonly content: string;
};

export type ToolCallEvent = {
  readonly type: 'tool_call';
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
};

export type DoneEvent = {
  readonly type: 'done';
};

/**
 * Canonical events every adapter normalizes its wire format into.
 * A successful stream ends with exactly one `done`.
 */
export type StreamEvent = CompletionEvent | ThinkingEvent | ToolCallEvent | DoneEvent;
