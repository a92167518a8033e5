import type { SSEEvent } from '../../utils/sse.js';
import type { StreamEvent, ToolCallEvent } from '../../types/index.js';
import { StreamError } from '../../types/index.js';
import {
  getNumber,
  getRecord,
  getString,
  parseJsonRecord,
  parseToolArguments,
} from '../../utils/json.js';

interface ToolCallState {
  readonly id: string;
  readonly name: string;
  argsJson: string;
}

function finishToolCall(call: ToolCallState): ToolCallEvent {
  return { type: 'tool_call', id: call.id, name: call.name, args: parseToolArguments(call.argsJson) };
}

/**
 * Normalizes an Anthropic Messages SSE stream into canonical events.
 *
 * Tool-use blocks are buffered by content-block index and surface as a single
 * `tool_call` when their block stops.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncIterable<StreamEvent> {
  const openCalls = new Map<number, ToolCallState>();
  let stopped = false;

  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }

    const data = parseJsonRecord(event.data);
    if (!data) {
      continue;
    }

    const eventType = getString(data, 'type');
    const index = getNumber(data, 'index') ?? 0;

    if (eventType === 'content_block_start') {
      const contentBlock = getRecord(data, 'content_block');
      if (getString(contentBlock, 'type') === 'tool_use') {
        openCalls.set(index, {
          id: getString(contentBlock, 'id') ?? '',
          name: getString(contentBlock, 'name') ?? '',
          argsJson: '',
        });
      }
    } else if (eventType === 'content_block_delta') {
      const delta = getRecord(data, 'delta');
      const deltaType = getString(delta, 'type');

      if (deltaType === 'text_delta') {
        const text = getString(delta, 'text');
        if (text) {
          yield { type: 'completion', content: text };
        }
      } else if (deltaType === 'thinking_delta') {
        const thinking = getString(delta, 'thinking');
        if (thinking) {
          yield { type: 'thinking', content: thinking };
        }
      } else if (deltaType === 'input_json_delta') {
        const call = openCalls.get(index);
        if (call) {
          call.argsJson += getString(delta, 'partial_json') ?? '';
        }
      }
    } else if (eventType === 'content_block_stop') {
      const call = openCalls.get(index);
      if (call) {
        openCalls.delete(index);
        yield finishToolCall(call);
      }
    } else if (eventType === 'message_stop') {
      stopped = true;
      break;
    } else if (eventType === 'error') {
      const error = getRecord(data, 'error');
      const message = getString(error, 'message') ?? 'unknown error';
      const errorType = getString(error, 'type');
      throw new StreamError(
        errorType ? `Anthropic stream error (${errorType}): ${message}` : `Anthropic stream error: ${message}`,
      );
    }
  }

  // Blocks still open here were never completed, so none of them is a call.
  if (!stopped) {
    throw new StreamError('Anthropic stream ended before message_stop');
  }

  yield { type: 'done' };
}
