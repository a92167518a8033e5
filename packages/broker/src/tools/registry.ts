import type { AnthropicTool, FunctionTool, NativeTool, ToolFormat } from '@ai-request/llm';

const TOOL_DEFINITIONS: ReadonlyArray<FunctionTool> = [
  {
    type: 'function',
    function: {
      name: 'get_implementation',
      description: 'Retrieve the full implementation of a function or class from the codebase.',
      parameters: {
        type: 'object',
        properties: {
          function_name: {
            type: 'string',
            description: "Name of the function or class to retrieve (e.g., 'validateEmail' or 'UserService')",
          },
        },
        required: ['function_name'],
      },
    },
  },
];

/** The tools the editor plugin can answer, in the canonical function shape. */
export function getToolDefinitions(): ReadonlyArray<FunctionTool> {
  return TOOL_DEFINITIONS;
}

export function toAnthropicTools(tools: ReadonlyArray<FunctionTool>): Array<AnthropicTool> {
  return tools.map((tool) => ({
    name: tool.function.name,
    description: tool.function.description,
    input_schema: tool.function.parameters,
  }));
}

export function toNativeTools(tools: ReadonlyArray<FunctionTool>, format: ToolFormat): ReadonlyArray<NativeTool> {
  switch (format) {
    case 'anthropic':
      return toAnthropicTools(tools);
    case 'openai':
      return tools;
  }
}
