import { describe, it, expect } from 'vitest';
import { getToolDefinitions, toAnthropicTools, toNativeTools } from './registry.js';

describe('tool registry', () => {
  it('declares get_implementation with a required function_name', () => {
    const [tool, ...rest] = getToolDefinitions();

    expect(rest).toHaveLength(0);
    expect(tool?.type).toBe('function');
    expect(tool?.function.name).toBe('get_implementation');
    expect(tool?.function.description).toBe(
      'Retrieve the full implementation of a function or class from the codebase.',
    );
    expect(tool?.function.parameters).toEqual({
      type: 'object',
      properties: {
        function_name: {
          type: 'string',
          description: "Name of the function or class to retrieve (e.g., 'validateEmail' or 'UserService')",
        },
      },
      required: ['function_name'],
    });
  });

  it('converts to the Anthropic shape', () => {
    const tools = getToolDefinitions();

    expect(toAnthropicTools(tools)).toEqual([
      {
        name: 'get_implementation',
        description: 'Retrieve the full implementation of a function or class from the codebase.',
        input_schema: tools[0]?.function.parameters,
      },
    ]);
  });

  it('picks the conversion by tool format', () => {
    const tools = getToolDefinitions();

    expect(toNativeTools(tools, 'openai')).toBe(tools);
    expect(toNativeTools(tools, 'anthropic')).toEqual(toAnthropicTools(tools));
  });

  it('returns an empty list unchanged', () => {
    expect(toNativeTools([], 'anthropic')).toEqual([]);
  });
});
