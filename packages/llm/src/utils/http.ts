import { NetworkError, RequestTimeoutError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly provider: string;
};

/**
 * Fetches and returns the raw Response object for streaming.
 * The request timeout covers the wait for response headers; the body is the
 * caller's to read.
 */
export async function fetchStream(
  options: FetchOptions,
): Promise<globalThis.Response> {
  const {
    url,
    method = 'POST',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    provider,
  } = options;

  const timeoutController = new AbortController();

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeout.requestMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: timeoutController.signal,
      });
    } catch (err) {
      if (timeoutController.signal.aborted) {
        throw new RequestTimeoutError(
          `Request to ${provider} timed out after ${timeout?.requestMs ?? 0}ms`,
        );
      }
      const cause = err instanceof Error ? err : undefined;
      throw new NetworkError(
        `Network error calling ${provider}: ${describeFetchFailure(err)}`,
        cause,
      );
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({ statusCode: response.status, body: text, provider });
    }

    return response;
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Node's fetch reports connection failures as "fetch failed" with the useful
 * part in `cause`.
 */
function describeFetchFailure(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  if (err.cause instanceof Error && err.cause.message) {
    return `${err.message} (${err.cause.message})`;
  }
  return err.message;
}
