/** Canonical tool declaration; this is also the OpenAI-native shape. */
export type FunctionTool = {
  readonly type: 'function';
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: Record<string, unknown>;
  };
};

export type AnthropicTool = {
  readonly name: string;
  readonly description: string;
  readonly input_schema: Record<string, unknown>;
};

export type NativeTool = FunctionTool | AnthropicTool;

export type ToolFormat = 'openai' | 'anthropic';
