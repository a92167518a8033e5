import type { EventSourceMessage } from 'eventsource-parser';
import { EventSourceParserStream } from 'eventsource-parser/stream';
import { RequestTimeoutError, StreamError } from '../types/error.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

export type SSEStreamOptions = {
  /** Abort the stream when no chunk arrives within this many milliseconds. */
  readonly idleTimeoutMs?: number;
};

/**
 * Creates an async iterable of SSE events from a Response body.
 * Pipes the response body through EventSourceParserStream and yields parsed events.
 */
export async function* createSSEStream(
  response: globalThis.Response,
  options: SSEStreamOptions = {},
): AsyncIterable<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new StreamError('Response body is null or undefined');
  }

  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();
  let finished = false;

  try {
    while (true) {
      let result: ReadableStreamReadResult<EventSourceMessage>;
      try {
        result = await readWithTimeout(reader, options.idleTimeoutMs);
      } catch (err) {
        if (err instanceof RequestTimeoutError) {
          throw err;
        }
        throw new StreamError(
          `Failed to parse SSE stream: ${err instanceof Error ? err.message : 'Unknown error'}`,
          err instanceof Error ? err : undefined,
        );
      }

      if (result.done) {
        finished = true;
        break;
      }

      const value = result.value;
      yield {
        event: value.event || '',
        data: value.data || '',
        ...(value.id && { id: value.id }),
      };
    }
  } finally {
    if (!finished) {
      // Consumer stopped early or the read failed; close the connection. The
      // original failure, if any, is what propagates.
      await reader.cancel().catch(() => undefined);
    }
    reader.releaseLock();
  }
}

async function readWithTimeout<T>(
  reader: ReadableStreamDefaultReader<T>,
  timeoutMs: number | undefined,
): Promise<ReadableStreamReadResult<T>> {
  if (!timeoutMs) {
    return reader.read();
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new RequestTimeoutError(`Stream stalled: no data received for ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([reader.read(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
