import { describe, it, expect } from 'vitest';
import { translateRequest } from './request.js';
import { assistantMessage, toolMessage, userMessage } from '../../types/index.js';
import type { ChatRequest } from '../../types/index.js';

const tools = [
  {
    name: 'get_implementation',
    description: 'Retrieve a function',
    input_schema: { type: 'object', properties: { function_name: { type: 'string' } } },
  },
];

describe('Anthropic Request Translation', () => {
  it('targets /v1/messages with the API key and version headers', () => {
    const { url, headers } = translateRequest(
      { model: 'claude-sonnet-4-5', messages: [userMessage('hi')] },
      'test-key',
      'https://api.anthropic.com/',
    );

    expect(url).toBe('https://api.anthropic.com/v1/messages');
    expect(headers['x-api-key']).toBe('test-key');
    expect(headers['anthropic-version']).toBe('2023-06-01');
  });

  it('builds a streaming body with system prompt, default max_tokens and native tools', () => {
    const { body } = translateRequest(
      {
        model: 'claude-sonnet-4-5',
        system: 'You are a code completion assistant.',
        messages: [userMessage('def f():\n# TODO\n\nimplement it')],
        tools,
      },
      'test-key',
    );

    expect(body).toEqual({
      model: 'claude-sonnet-4-5',
      max_tokens: 4096,
      stream: true,
      system: 'You are a code completion assistant.',
      messages: [
        { role: 'user', content: [{ type: 'text', text: 'def f():\n# TODO\n\nimplement it' }] },
      ],
      tools,
    });
  });

  it('omits tools when none are declared', () => {
    const { body } = translateRequest({ model: 'm', messages: [userMessage('x')], tools: [] }, 'k');

    expect(body).not.toHaveProperty('tools');
  });

  it('translates a tool round-trip into tool_use and tool_result blocks', () => {
    const request: ChatRequest = {
      model: 'claude-sonnet-4-5',
      messages: [
        userMessage('complete foo'),
        assistantMessage([
          { kind: 'TEXT', text: 'Let me look.' },
          { kind: 'TOOL_CALL', toolCallId: 'toolu_01', toolName: 'get_implementation', args: { function_name: 'foo' } },
        ]),
        toolMessage('toolu_01', 'def foo(): pass'),
      ],
    };

    const { body } = translateRequest(request, 'k');

    expect(body['messages']).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'complete foo' }] },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Let me look.' },
          { type: 'tool_use', id: 'toolu_01', name: 'get_implementation', input: { function_name: 'foo' } },
        ],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'toolu_01', content: 'def foo(): pass' }],
      },
    ]);
  });

  it('merges consecutive user turns', () => {
    const { body } = translateRequest(
      { model: 'm', messages: [userMessage('one'), toolMessage('toolu_01', 'two')] },
      'k',
    );

    expect(body['messages']).toEqual([
      {
        role: 'user',
        content: [
          { type: 'text', text: 'one' },
          { type: 'tool_result', tool_use_id: 'toolu_01', content: 'two' },
        ],
      },
    ]);
  });
});
