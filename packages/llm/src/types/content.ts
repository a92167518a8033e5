export type Role = 'system' | 'user' | 'assistant' | 'tool';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

export type ToolCallData = {
  readonly kind: 'TOOL_CALL';
  readonly toolCallId: string;
  readonly toolName: string;
  readonly args: Record<string, unknown>;
};

export type ToolResultData = {
  readonly kind: 'TOOL_RESULT';
  readonly toolCallId: string;
  readonly content: string;
};

export type ContentPart = TextData | ToolCallData | ToolResultData;
