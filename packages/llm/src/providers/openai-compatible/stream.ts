import type { SSEEvent } from '../../utils/sse.js';
import type { StreamEvent, ToolCallEvent } from '../../types/index.js';
import { StreamError } from '../../types/index.js';
import {
  getArray,
  getNumber,
  getRecord,
  getString,
  isRecord,
  parseJsonRecord,
  parseToolArguments,
} from '../../utils/json.js';

interface ToolCallState {
  id: string;
  name: string;
  argsJson: string;
}

function drainToolCalls(toolCallMap: Map<number, ToolCallState>): Array<ToolCallEvent> {
  const calls = Array.from(toolCallMap.entries())
    .sort(([a], [b]) => a - b)
    .map(([index, call]) => ({
      type: 'tool_call' as const,
      id: call.id || `call_${index}`,
      name: call.name,
      args: parseToolArguments(call.argsJson),
    }));
  toolCallMap.clear();
  return calls;
}

/**
 * Normalizes a Chat Completions SSE stream into canonical events.
 *
 * Tool-call fragments are keyed by `tool_calls[].index` and emitted once the
 * choice reports a finish reason (or the stream ends).
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncIterable<StreamEvent> {
  const toolCallMap = new Map<number, ToolCallState>();

  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }
    if (event.data === '[DONE]') {
      break;
    }

    const data = parseJsonRecord(event.data);
    if (!data) {
      continue;
    }

    const error = getRecord(data, 'error');
    if (error) {
      throw new StreamError(`Provider stream error: ${getString(error, 'message') ?? 'unknown error'}`);
    }

    const firstChoice = getArray(data, 'choices')?.[0];
    if (!isRecord(firstChoice)) {
      continue;
    }

    const delta = getRecord(firstChoice, 'delta');

    // DeepSeek and Ollama name the reasoning field differently.
    const reasoning = getString(delta, 'reasoning_content') ?? getString(delta, 'reasoning');
    if (reasoning) {
      yield { type: 'thinking', content: reasoning };
    }

    const content = getString(delta, 'content');
    if (content) {
      yield { type: 'completion', content };
    }

    const toolCallDeltas = getArray(delta, 'tool_calls') ?? [];
    for (const [position, tc] of toolCallDeltas.entries()) {
      if (!isRecord(tc)) {
        continue;
      }

      // Some local servers send whole calls without an index.
      const index = getNumber(tc, 'index') ?? position;
      const functionObj = getRecord(tc, 'function');
      let call = toolCallMap.get(index);
      if (!call) {
        call = { id: '', name: '', argsJson: '' };
        toolCallMap.set(index, call);
      }

      call.id ||= getString(tc, 'id') ?? '';
      call.name ||= getString(functionObj, 'name') ?? '';
      call.argsJson += getString(functionObj, 'arguments') ?? '';
    }

    if (getString(firstChoice, 'finish_reason')) {
      yield* drainToolCalls(toolCallMap);
    }
  }

  yield* drainToolCalls(toolCallMap);
  yield { type: 'done' };
}
